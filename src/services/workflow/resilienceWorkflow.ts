import { AGENT_NAME, config } from '../../utils/config';
import { logger } from '../../utils/logger';
import { CRISIS_SUPPORT_RECOMMENDATION, FALLBACK_CRISIS_MESSAGE, withCrisisResources } from '../../utils/crisisResources';
import {
  AnalysisResult,
  RequestMetadata,
  ResilienceResponse,
  isStrategyKey,
} from '../../types/resilience';
import { DEFAULT_REASONING, ResilienceAnalyzer } from '../ai/resilienceAnalyzer';
import { EMPTY_PATTERN, MemoryStore } from '../memory/memoryStore';
import { RecommendationEngine } from '../recommendations/recommendationEngine';
import {
  END,
  RequestState,
  Stage,
  StageName,
  Transition,
  WorkflowError,
  defineStage,
} from './types';

const workflowLogger = logger.child('workflow');

export const DEFAULT_SUPPORT_MESSAGE = "I'm here to support you. Take things one step at a time.";
export const GENERIC_ERROR_MESSAGE =
  "I'm sorry, something went wrong while processing your message. Please try again in a moment.";

const FALLBACK_ANALYSIS: Readonly<AnalysisResult> = Object.freeze({
  sentiment: 'neutral',
  stress_level: 'medium',
  emotions: ['uncertain'],
  confidence: 0,
  reasoning: 'Analysis unavailable',
  source: 'rule_based',
});

/**
 * The only branch point: crisis path above the threshold, normal path otherwise.
 */
export function routeAfterCrisisDetection(crisisScore: number, threshold: number = config.crisisThreshold): 'crisis_response' | 'reason' {
  return crisisScore > threshold ? 'crisis_response' : 'reason';
}

export function nextStage(current: StageName, crisisScore: number | null, threshold: number = config.crisisThreshold): Transition {
  switch (current) {
    case 'retrieve_memory':
      return 'analyze';
    case 'analyze':
      return 'detect_crisis';
    case 'detect_crisis':
      return routeAfterCrisisDetection(crisisScore ?? 0, threshold);
    case 'crisis_response':
      return 'store_memory';
    case 'reason':
      return 'recommend';
    case 'recommend':
      return 'support';
    case 'support':
      return 'store_memory';
    case 'store_memory':
      return 'format';
    case 'format':
      return END;
  }
}

export function createInitialState(inputText: unknown, metadata: RequestMetadata | undefined): RequestState {
  if (typeof inputText !== 'string' || inputText.trim().length === 0) {
    throw new WorkflowError('Input text must be a non-empty string');
  }

  const safeMetadata: RequestMetadata = { ...(metadata ?? {}) };
  const userId = typeof safeMetadata.user_id === 'string' && safeMetadata.user_id.trim() ? safeMetadata.user_id.trim() : 'anonymous';

  return {
    inputText,
    metadata: Object.freeze(safeMetadata),
    userId,
    status: { kind: 'processing' },
    completedStages: [],
    failures: [],
    memoryContext: [],
    patterns: { ...EMPTY_PATTERN },
    recentStrategies: [],
    analysis: null,
    confidence: 0,
    crisisScore: null,
    reasoning: '',
    recommendation: null,
    message: '',
    interactionId: '',
  };
}

function requireAnalysis(state: Readonly<RequestState>): Readonly<AnalysisResult> {
  if (!state.analysis) {
    throw new WorkflowError('Analysis has not been produced yet');
  }
  return state.analysis;
}

export interface ResilienceWorkflowDeps {
  analyzer: ResilienceAnalyzer;
  recommendations: RecommendationEngine;
  memory: MemoryStore;
  crisisThreshold?: number;
}

/**
 * Resilience coaching workflow
 *
 * retrieve_memory → analyze → detect_crisis → (crisis_response | reason → recommend → support)
 *   → store_memory → format
 *
 * A failing stage never aborts the run: its fallback values are applied and the run
 * continues, so every request ends with a best-effort response.
 */
export class ResilienceWorkflow {
  private analyzer: ResilienceAnalyzer;
  private recommendations: RecommendationEngine;
  private memory: MemoryStore;
  private crisisThreshold: number;
  private stages: Record<StageName, Stage>;

  constructor(deps: ResilienceWorkflowDeps) {
    this.analyzer = deps.analyzer;
    this.recommendations = deps.recommendations;
    this.memory = deps.memory;
    this.crisisThreshold = deps.crisisThreshold ?? config.crisisThreshold;
    this.stages = this.buildStages();
    workflowLogger.info('Resilience workflow initialized');
  }

  private buildStages(): Record<StageName, Stage> {
    return {
      retrieve_memory: defineStage<'memoryContext' | 'patterns' | 'recentStrategies'>({
        owns: ['memoryContext', 'patterns', 'recentStrategies'],
        requires: [],
        run: async state => {
          const [memoryContext, patterns, recentStrategies] = await Promise.all([
            this.memory.retrieveRelevantContext(state.userId, state.inputText, 3),
            this.memory.getEmotionalPatterns(state.userId),
            this.memory.getRecentStrategies(state.userId, 3),
          ]);
          return { memoryContext, patterns, recentStrategies };
        },
        fallback: () => ({ memoryContext: [], patterns: { ...EMPTY_PATTERN }, recentStrategies: [] }),
      }),

      analyze: defineStage<'analysis' | 'confidence'>({
        owns: ['analysis', 'confidence'],
        requires: ['retrieve_memory'],
        run: async state => {
          const analysis = await this.analyzer.analyzeEmotion(state.inputText, state.memoryContext, state.patterns);
          return {
            analysis: Object.freeze({ ...analysis, emotions: [...analysis.emotions] }),
            confidence: analysis.confidence,
          };
        },
        fallback: () => ({ analysis: FALLBACK_ANALYSIS, confidence: 0 }),
      }),

      detect_crisis: defineStage<'crisisScore'>({
        owns: ['crisisScore'],
        requires: ['analyze'],
        run: async state => ({
          crisisScore: await this.analyzer.assessCrisisLevel(state.inputText, requireAnalysis(state), state.patterns),
        }),
        fallback: () => ({ crisisScore: 0.5 }),
      }),

      crisis_response: defineStage<'recommendation' | 'message' | 'reasoning'>({
        owns: ['recommendation', 'message', 'reasoning'],
        requires: ['detect_crisis'],
        run: async state => ({
          recommendation: { ...CRISIS_SUPPORT_RECOMMENDATION, steps: [...CRISIS_SUPPORT_RECOMMENDATION.steps] },
          message: await this.analyzer.generateCrisisResponse(state.inputText, requireAnalysis(state)),
          reasoning: `Crisis indicators detected (score ${(state.crisisScore ?? 0).toFixed(2)}); prioritizing immediate support resources.`,
        }),
        fallback: () => ({
          recommendation: { ...CRISIS_SUPPORT_RECOMMENDATION, steps: [...CRISIS_SUPPORT_RECOMMENDATION.steps] },
          message: withCrisisResources(FALLBACK_CRISIS_MESSAGE),
          reasoning: 'Crisis indicators detected; prioritizing immediate support resources.',
        }),
      }),

      reason: defineStage<'reasoning'>({
        owns: ['reasoning'],
        requires: ['detect_crisis'],
        run: async state => ({
          reasoning: await this.analyzer.generateReasoning(
            state.inputText,
            requireAnalysis(state),
            state.patterns,
            state.crisisScore ?? 0
          ),
        }),
        fallback: () => ({ reasoning: DEFAULT_REASONING }),
      }),

      recommend: defineStage<'recommendation'>({
        owns: ['recommendation'],
        requires: ['reason'],
        run: async state => {
          const analysis = requireAnalysis(state);
          const generated = await this.analyzer.generateRecommendation(
            state.inputText,
            analysis,
            state.patterns,
            state.recentStrategies,
            state.reasoning
          );

          if (generated.fallback_reason || !isStrategyKey(generated.type)) {
            // Model unavailable: use the local selector instead of the bare default
            const local = this.recommendations.recommend(analysis, state.patterns, state.recentStrategies);
            return { recommendation: { ...local, fallback_reason: generated.fallback_reason } };
          }

          const review = this.recommendations.reviewCandidate(generated.type, analysis, state.patterns, state.recentStrategies);
          if (!review.accepted) {
            workflowLogger.info(`Model suggested ${generated.type}, using ${review.selection.type} instead (${review.reason})`);
            return { recommendation: this.recommendations.getRecommendation(review.selection.type) };
          }

          const template = this.recommendations.getAllStrategies()[generated.type];
          return { recommendation: { ...generated, name: template.name } };
        },
        fallback: () => ({ recommendation: this.recommendations.getRecommendation('breathing_exercise') }),
      }),

      support: defineStage<'message'>({
        owns: ['message'],
        requires: ['recommend'],
        run: async state => ({
          message: await this.analyzer.generateSupportiveMessage(
            state.inputText,
            requireAnalysis(state),
            state.recommendation,
            state.patterns
          ),
        }),
        fallback: () => ({ message: DEFAULT_SUPPORT_MESSAGE }),
      }),

      store_memory: defineStage<'interactionId'>({
        owns: ['interactionId'],
        requires: ['detect_crisis'],
        run: async state => ({
          interactionId: await this.memory.storeInteraction(
            state.userId,
            state.inputText,
            requireAnalysis(state),
            state.recommendation,
            state.crisisScore ?? 0
          ),
        }),
        fallback: () => ({ interactionId: '' }),
      }),

      format: defineStage<'status'>({
        owns: ['status'],
        requires: ['store_memory'],
        run: async state => ({ status: { kind: 'success', degraded: state.failures.length > 0 } }),
        fallback: () => ({ status: { kind: 'success', degraded: true } }),
      }),
    };
  }

  private applyPatch(stageName: StageName, stage: Stage, state: RequestState, patch: Partial<RequestState>): void {
    const owned = new Set<string>(stage.owns);
    const foreign = Object.keys(patch).filter(key => !owned.has(key));
    if (foreign.length > 0) {
      throw new WorkflowError(`Stage ${stageName} attempted to write fields it does not own: ${foreign.join(', ')}`);
    }
    Object.assign(state, patch);
  }

  private async runStage(stageName: StageName, state: RequestState): Promise<void> {
    const stage = this.stages[stageName];

    const missing = stage.requires.filter(required => !state.completedStages.includes(required));
    if (missing.length > 0) {
      throw new WorkflowError(`Stage ${stageName} entered before ${missing.join(', ')}`);
    }

    const startedAt = Date.now();
    try {
      const patch = await stage.run(state);
      this.applyPatch(stageName, stage, state, patch);
      workflowLogger.debug(`Stage ${stageName} completed in ${Date.now() - startedAt}ms`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      workflowLogger.error(`Stage ${stageName} failed, applying fallback: ${message}`);
      state.failures.push({ stage: stageName, error: message });
      this.applyPatch(stageName, stage, state, stage.fallback(state));
    }

    state.completedStages.push(stageName);
  }

  /**
   * Run the pipeline for one message. Never throws.
   */
  async process(inputText: string, metadata: RequestMetadata = {}): Promise<ResilienceResponse> {
    let state: RequestState;
    try {
      state = createInitialState(inputText, metadata);
    } catch (error) {
      workflowLogger.error('Failed to initialize request state:', error);
      return this.errorResponse();
    }

    workflowLogger.info(`Processing input for user ${state.userId}: ${state.inputText.slice(0, 50)}...`);

    try {
      let current: Transition = 'retrieve_memory';
      while (current !== END) {
        await this.runStage(current, state);
        current = nextStage(current, state.crisisScore, this.crisisThreshold);
      }

      workflowLogger.info(
        `Workflow completed via ${state.completedStages.join(' → ')}` +
          (state.failures.length > 0 ? ` with ${state.failures.length} degraded stage(s)` : '')
      );
      return this.toResponse(state);
    } catch (error) {
      workflowLogger.error('Workflow error:', error);
      return this.errorResponse();
    }
  }

  private toResponse(state: RequestState): ResilienceResponse {
    const analysis = state.analysis ?? FALLBACK_ANALYSIS;
    const recommendation = state.recommendation ?? this.recommendations.getRecommendation('breathing_exercise');

    return {
      agent: AGENT_NAME,
      status: state.status.kind === 'error' ? 'error' : 'success',
      analysis: {
        sentiment: analysis.sentiment,
        stress_level: analysis.stress_level,
        emotions: [...analysis.emotions],
      },
      recommendation: {
        type: recommendation.type,
        steps: [...recommendation.steps],
        ...(recommendation.reasoning ? { reasoning: recommendation.reasoning } : {}),
      },
      message: state.message || DEFAULT_SUPPORT_MESSAGE,
      crisis_score: state.crisisScore ?? 0,
      confidence: state.confidence,
      reasoning: state.reasoning,
    };
  }

  private errorResponse(): ResilienceResponse {
    return {
      agent: AGENT_NAME,
      status: 'error',
      analysis: {},
      recommendation: {},
      message: GENERIC_ERROR_MESSAGE,
    };
  }
}
