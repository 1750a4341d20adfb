import dotenv from 'dotenv';

dotenv.config();

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const AGENT_NAME = 'resilience_coach';
export const AGENT_VERSION = process.env.npm_package_version || '1.0.0';

export const config = {
  agentName: AGENT_NAME,
  agentVersion: AGENT_VERSION,
  port: readNumber('PORT', 5000),
  nodeEnv: process.env.NODE_ENV || 'development',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:8000',

  gemini: {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || 'gemini-2.0-flash-lite',
    embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-004',
    temperature: 0.7,
    maxOutputTokens: 500,
    requestTimeoutMs: readNumber('AI_REQUEST_TIMEOUT_MS', 30000),
  },

  retry: {
    attempts: readNumber('AI_RETRY_ATTEMPTS', 3),
    baseDelayMs: readNumber('AI_RETRY_DELAY_MS', 2000),
  },

  mongodbUri: process.env.MONGODB_URI || '',

  rateLimit: {
    windowMs: 60 * 1000,
    maxRequests: readNumber('RATE_LIMIT_MAX_REQUESTS', 12),
  },

  crisisThreshold: 0.7,
};
