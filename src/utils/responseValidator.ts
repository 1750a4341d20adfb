import { logger } from './logger';
import { MAX_MESSAGE_LENGTH } from './crisisResources';
import { ValidationResult } from './inputValidator';
import {
  AnalysisResult,
  ResponseStatus,
  Sentiment,
  StressLevel,
  isRecord,
  isSentiment,
  isStressLevel,
} from '../types/resilience';

export const DEFAULT_RESPONSE_MESSAGE = "I'm here to support you.";

const REQUIRED_RESPONSE_FIELDS = ['agent', 'status', 'analysis', 'recommendation', 'message'] as const;
const REQUIRED_ANALYSIS_FIELDS = ['sentiment', 'stress_level', 'emotions'] as const;
const REQUIRED_RECOMMENDATION_FIELDS = ['type', 'steps'] as const;

export interface ValidatedResponse {
  agent: string;
  status: ResponseStatus;
  analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>;
  recommendation: {
    type: string;
    steps: string[];
    reasoning?: string;
  };
  message: string;
  crisis_score?: number;
  confidence?: number;
  reasoning?: string;
}

function missingField(record: Record<string, unknown>, fields: readonly string[]): string | undefined {
  return fields.find(field => !(field in record));
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Check the workflow output before it leaves the service. Recoverable problems
 * (unknown enum values, empty emotions or message, overlong message) are coerced;
 * structural problems reject the response.
 */
export function validateResponse(response: unknown): ValidationResult<ValidatedResponse> {
  if (!isRecord(response)) {
    return { valid: false, error: 'Invalid response: not an object' };
  }

  const missing = missingField(response, REQUIRED_RESPONSE_FIELDS);
  if (missing) {
    logger.error(`Missing required field: ${missing}`);
    return { valid: false, error: `Invalid response: missing ${missing}` };
  }

  const { analysis, recommendation } = response;

  if (!isRecord(analysis)) {
    return { valid: false, error: 'Invalid analysis format' };
  }
  const missingAnalysis = missingField(analysis, REQUIRED_ANALYSIS_FIELDS);
  if (missingAnalysis) {
    return { valid: false, error: `Invalid analysis: missing ${missingAnalysis}` };
  }

  let sentiment: Sentiment = 'neutral';
  if (isSentiment(analysis.sentiment)) {
    sentiment = analysis.sentiment;
  } else {
    logger.warn(`Invalid sentiment: ${String(analysis.sentiment)}, defaulting to neutral`);
  }

  let stressLevel: StressLevel = 'medium';
  if (isStressLevel(analysis.stress_level)) {
    stressLevel = analysis.stress_level;
  } else {
    logger.warn(`Invalid stress level: ${String(analysis.stress_level)}, defaulting to medium`);
  }

  let emotions = Array.isArray(analysis.emotions)
    ? analysis.emotions.filter((emotion): emotion is string => typeof emotion === 'string')
    : [];
  if (emotions.length === 0) {
    logger.warn('Invalid emotions format, using default');
    emotions = ['uncertain'];
  }

  if (!isRecord(recommendation)) {
    return { valid: false, error: 'Invalid recommendation format' };
  }
  const missingRecommendation = missingField(recommendation, REQUIRED_RECOMMENDATION_FIELDS);
  if (missingRecommendation) {
    return { valid: false, error: `Invalid recommendation: missing ${missingRecommendation}` };
  }
  if (typeof recommendation.type !== 'string' || !recommendation.type) {
    return { valid: false, error: 'Invalid recommendation type' };
  }
  const steps = Array.isArray(recommendation.steps)
    ? recommendation.steps.filter((step): step is string => typeof step === 'string' && step.trim().length > 0)
    : [];
  if (steps.length === 0) {
    return { valid: false, error: 'Invalid recommendation steps' };
  }

  let message = typeof response.message === 'string' ? response.message : '';
  if (message.trim().length === 0) {
    logger.warn('Empty message, using default');
    message = DEFAULT_RESPONSE_MESSAGE;
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    message = message.slice(0, MAX_MESSAGE_LENGTH - 3) + '...';
  }

  const crisisScore = optionalNumber(response.crisis_score);
  const confidence = optionalNumber(response.confidence);
  const reasoning = typeof response.reasoning === 'string' ? response.reasoning : undefined;

  return {
    valid: true,
    value: {
      agent: String(response.agent),
      status: response.status === 'error' ? 'error' : 'success',
      analysis: { sentiment, stress_level: stressLevel, emotions },
      recommendation: {
        type: recommendation.type,
        steps,
        ...(typeof recommendation.reasoning === 'string' ? { reasoning: recommendation.reasoning } : {}),
      },
      message,
      ...(crisisScore !== undefined ? { crisis_score: crisisScore } : {}),
      ...(confidence !== undefined ? { confidence } : {}),
      ...(reasoning !== undefined ? { reasoning } : {}),
    },
  };
}
