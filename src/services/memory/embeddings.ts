import { GoogleGenerativeAI } from '@google/generative-ai';
import { config } from '../../utils/config';
import { logger } from '../../utils/logger';
import { withTimeout } from '../ai/geminiClient';

/**
 * Similarity search helpers for the memory store.
 *
 * Primary:  Gemini embeddings, compared by cosine similarity
 * Fallback: token overlap between documents when no embedding is available
 */

export interface EmbeddingProvider {
  readonly isConfigured: boolean;
  embed(text: string): Promise<number[]>;
}

const CACHE_MAX_SIZE = 200;

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  private genAI: GoogleGenerativeAI | null;
  private modelName: string;
  private cache = new Map<string, number[]>();

  constructor(apiKey: string = config.gemini.apiKey, modelName: string = config.gemini.embeddingModel) {
    this.genAI = apiKey ? new GoogleGenerativeAI(apiKey) : null;
    this.modelName = modelName;
  }

  get isConfigured(): boolean {
    return this.genAI !== null;
  }

  async embed(text: string): Promise<number[]> {
    if (!this.genAI) {
      throw new Error('Embedding service not configured');
    }

    const cached = this.cache.get(text);
    if (cached) {
      return cached;
    }

    const model = this.genAI.getGenerativeModel({ model: this.modelName });
    const result = await withTimeout(model.embedContent(text), config.gemini.requestTimeoutMs, 'Gemini embedContent');
    const values = result.embedding.values;

    if (this.cache.size >= CACHE_MAX_SIZE) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) {
        this.cache.delete(oldest);
      }
    }
    this.cache.set(text, values);

    logger.debug(`Embedded ${text.length} chars into ${values.length} dimensions`);
    return values;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'your', 'with', 'this', 'that', 'have',
  'has', 'was', 'were', 'been', 'about', 'just', 'really', 'feel', 'feeling', 'from', 'what',
  'when', 'user', 'message', 'emotional', 'state', 'stress', 'level', 'emotions', 'recommended',
  'strategy', 'timestamp', 'crisis', 'severity',
]);

export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .split(/[^a-z']+/)
    .map(token => token.replace(/^'+|'+$/g, ''))
    .filter(token => token.length >= 3 && !STOP_WORDS.has(token));
  return new Set(tokens);
}

/**
 * Jaccard overlap of the two texts' content words, in [0, 1].
 */
export function lexicalSimilarity(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}
