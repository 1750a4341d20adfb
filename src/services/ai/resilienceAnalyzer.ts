import { config } from '../../utils/config';
import { logger } from '../../utils/logger';
import { FALLBACK_CRISIS_MESSAGE, withCrisisResources } from '../../utils/crisisResources';
import { AnalysisResult, EmotionalPattern, Interaction, Recommendation } from '../../types/resilience';
import { analyzeWithRules, detectCrisisSignal } from '../analysis/ruleBasedClassifier';
import { AnalyzerError } from './aiErrors';
import { GeminiTextGenerator, GenerationOptions, TextGenerator } from './geminiClient';
import {
  buildAnalysisPrompt,
  buildCrisisPrompt,
  buildCrisisResponsePrompt,
  buildReasoningPrompt,
  buildRecommendationPrompt,
  buildSupportPrompt,
} from './prompts';
import { parseAnalysisResponse, parseCrisisScore, parseRecommendationResponse } from './responseParser';
import { RetryPolicy, linearBackoff, retryOnTransientErrors } from './retryPolicy';

/**
 * Model-backed analysis for the coaching pipeline.
 *
 * Every operation goes through the same retry policy and, once that is exhausted,
 * falls back to local heuristics. Fallback results are marked (`source: 'rule_based'`
 * on analyses, `fallback_reason` on recommendations) so callers can tell.
 */

export const CRISIS_FALLBACK_SCORE = 0.5;
export const EXPLICIT_CRISIS_FLOOR = 0.9;

const HEURISTIC_CRISIS_SCORES = {
  explicit: 0.95,
  implicit: 0.8,
  none: 0,
} as const;

export const DEFAULT_REASONING =
  'The user is working through some difficult feelings; a short, practical coping exercise may help.';

export const DEFAULT_RECOMMENDATION_STEPS = [
  'Inhale slowly through your nose for 4 counts',
  'Exhale slowly through your mouth for 6 counts',
  'Repeat for a few minutes until you feel steadier',
];

export function defaultRetryPolicy(): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.retry.attempts,
    backoff: linearBackoff(config.retry.baseDelayMs),
    isRetryable: retryOnTransientErrors,
  });
}

function describeFailure(error: unknown): string {
  if (error instanceof AnalyzerError) return `${error.kind}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return 'unknown error';
}

/**
 * Contextual reply used when the model cannot write one.
 */
export function generateFallbackSupportMessage(analysis: Pick<AnalysisResult, 'emotions' | 'stress_level'>): string {
  const emotions = analysis.emotions.join(' ');

  if (/anxi|panic|nervous|worr/.test(emotions)) {
    return "Anxiety is real, and it does pass. Try a few slow breaths or ground yourself with what you can see and touch around you. Take it moment by moment.";
  }

  if (/sad|depress|hopeless|lonel/.test(emotions)) {
    return "Whatever you're feeling is real and valid. Do something small that feels safe: reach out to someone, take a walk, or just rest. You don't have to push through alone.";
  }

  if (/overwhelm|stress|burnout/.test(emotions) || analysis.stress_level === 'high') {
    return "It sounds like there's a lot on you right now. Try breaking one thing into smaller pieces, or just pause and breathe. It's okay to step back.";
  }

  return "I'm here to support you. Take things one step at a time.";
}

export class ResilienceAnalyzer {
  private generator: TextGenerator;
  private retryPolicy: RetryPolicy;

  constructor(generator: TextGenerator = new GeminiTextGenerator(), retryPolicy: RetryPolicy = defaultRetryPolicy()) {
    this.generator = generator;
    this.retryPolicy = retryPolicy;
  }

  private async run<T>(
    label: string,
    prompt: string,
    options: GenerationOptions,
    parse: (text: string) => T
  ): Promise<T> {
    if (!this.generator.isConfigured) {
      throw new AnalyzerError('not_configured', 'AI service not configured');
    }

    return this.retryPolicy.execute(label, async () => {
      const text = await this.generator.generate(prompt, options);
      return parse(text);
    });
  }

  async analyzeEmotion(
    text: string,
    memoryContext?: Interaction[],
    patterns?: EmotionalPattern | null
  ): Promise<AnalysisResult> {
    try {
      const parsed = await this.run(
        'Emotion analysis',
        buildAnalysisPrompt(text, memoryContext, patterns),
        { temperature: config.gemini.temperature, maxOutputTokens: config.gemini.maxOutputTokens },
        parseAnalysisResponse
      );

      logger.info(`Analysis completed - Sentiment: ${parsed.sentiment}, Stress: ${parsed.stress_level}`);
      return { ...parsed, source: 'model' };
    } catch (error) {
      logger.warn(`Emotion analysis falling back to rule-based classifier (${describeFailure(error)})`);
      const fallback = analyzeWithRules(text);
      return {
        ...fallback,
        reasoning: `${fallback.reasoning} (model unavailable)`,
      };
    }
  }

  /**
   * Crisis severity in [0, 1]. An explicit self-harm phrase keeps the score at or
   * above EXPLICIT_CRISIS_FLOOR whatever the model says.
   */
  async assessCrisisLevel(
    text: string,
    analysis: AnalysisResult,
    patterns?: EmotionalPattern | null
  ): Promise<number> {
    const signal = detectCrisisSignal(text);
    const heuristic = HEURISTIC_CRISIS_SCORES[signal];

    let score: number;
    try {
      score = await this.run(
        'Crisis assessment',
        buildCrisisPrompt(text, analysis, patterns),
        { temperature: 0.1, maxOutputTokens: 20 },
        parseCrisisScore
      );
    } catch (error) {
      logger.warn(`Crisis assessment failed, using conservative score (${describeFailure(error)})`);
      score = Math.max(CRISIS_FALLBACK_SCORE, heuristic);
    }

    if (signal === 'explicit') {
      score = Math.max(score, EXPLICIT_CRISIS_FLOOR);
    }

    logger.info(`Crisis score: ${score.toFixed(2)} (keyword signal: ${signal})`);
    return score;
  }

  async generateReasoning(
    text: string,
    analysis: AnalysisResult,
    patterns: EmotionalPattern | null | undefined,
    crisisScore: number
  ): Promise<string> {
    try {
      return await this.run(
        'Reasoning',
        buildReasoningPrompt(text, analysis, patterns, crisisScore),
        { temperature: 0.5, maxOutputTokens: 120 },
        response => response.trim()
      );
    } catch (error) {
      logger.warn(`Reasoning unavailable (${describeFailure(error)})`);
      return DEFAULT_REASONING;
    }
  }

  async generateRecommendation(
    text: string,
    analysis: AnalysisResult,
    patterns: EmotionalPattern | null | undefined,
    recentTypes: string[],
    reasoning: string
  ): Promise<Recommendation> {
    try {
      const recommendation = await this.run(
        'Recommendation',
        buildRecommendationPrompt(text, analysis, patterns, recentTypes, reasoning),
        { temperature: 0.6, maxOutputTokens: 300 },
        parseRecommendationResponse
      );
      logger.info(`Model recommended strategy: ${recommendation.type}`);
      return recommendation;
    } catch (error) {
      const reason = describeFailure(error);
      logger.warn(`Recommendation generation failed, using default (${reason})`);
      return {
        type: 'breathing_exercise',
        steps: [...DEFAULT_RECOMMENDATION_STEPS],
        fallback_reason: reason,
      };
    }
  }

  async generateSupportiveMessage(
    text: string,
    analysis: AnalysisResult,
    recommendation: Recommendation | null,
    patterns?: EmotionalPattern | null
  ): Promise<string> {
    try {
      const message = await this.run(
        'Supportive message',
        buildSupportPrompt(text, analysis, recommendation, patterns),
        { temperature: 0.8, maxOutputTokens: 150 },
        response => response.trim()
      );
      logger.info('Supportive message generated');
      return message;
    } catch (error) {
      logger.warn(`Supportive message fallback (${describeFailure(error)})`);
      return generateFallbackSupportMessage(analysis);
    }
  }

  /**
   * Crisis reply. The crisis contacts are appended on every path.
   */
  async generateCrisisResponse(text: string, analysis: AnalysisResult): Promise<string> {
    let body: string;
    try {
      body = await this.run(
        'Crisis response',
        buildCrisisResponsePrompt(text, analysis),
        { temperature: 0.4, maxOutputTokens: 150 },
        response => response.trim()
      );
    } catch (error) {
      logger.error(`Crisis response generation failed, using fixed message (${describeFailure(error)})`);
      body = FALLBACK_CRISIS_MESSAGE;
    }

    return withCrisisResources(body);
  }
}
