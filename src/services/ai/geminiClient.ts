import { GoogleGenerativeAI } from '@google/generative-ai';
import { config } from '../../utils/config';
import { logger } from '../../utils/logger';
import { AnalyzerError, classifyAIError } from './aiErrors';

export interface GenerationOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Prompt in, text out. The only contract the analyzer relies on.
 */
export interface TextGenerator {
  readonly isConfigured: boolean;
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new AnalyzerError('timeout', `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export interface GeminiTextGeneratorOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export class GeminiTextGenerator implements TextGenerator {
  private genAI: GoogleGenerativeAI | null;
  private modelName: string;
  private timeoutMs: number;

  constructor(options: GeminiTextGeneratorOptions = {}) {
    const apiKey = options.apiKey ?? config.gemini.apiKey;
    this.modelName = options.model ?? config.gemini.model;
    this.timeoutMs = options.timeoutMs ?? config.gemini.requestTimeoutMs;
    this.genAI = apiKey ? new GoogleGenerativeAI(apiKey) : null;

    if (!this.genAI) {
      logger.warn('GEMINI_API_KEY not set. AI features will use fallback responses. Set this environment variable for production.');
    }
  }

  get isConfigured(): boolean {
    return this.genAI !== null;
  }

  async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    if (!this.genAI) {
      throw new AnalyzerError('not_configured', 'AI service not configured');
    }

    const model = this.genAI.getGenerativeModel({ model: this.modelName });

    try {
      const result = await withTimeout(
        model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: options.temperature ?? config.gemini.temperature,
            maxOutputTokens: options.maxOutputTokens ?? config.gemini.maxOutputTokens,
          },
        }),
        this.timeoutMs,
        'Gemini generateContent'
      );

      const responseText = result.response.text()?.trim() || '';
      if (responseText.length === 0) {
        throw new AnalyzerError('parse', 'AI returned empty response');
      }
      return responseText;
    } catch (error) {
      throw classifyAIError(error);
    }
  }
}
