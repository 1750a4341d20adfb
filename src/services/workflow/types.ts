import {
  AnalysisResult,
  EmotionalPattern,
  Recommendation,
  RequestMetadata,
  RetrievedInteraction,
} from '../../types/resilience';

export type StageName =
  | 'retrieve_memory'
  | 'analyze'
  | 'detect_crisis'
  | 'crisis_response'
  | 'reason'
  | 'recommend'
  | 'support'
  | 'store_memory'
  | 'format';

export const END = 'END' as const;
export type Transition = StageName | typeof END;

export type WorkflowStatus =
  | { kind: 'processing' }
  | { kind: 'success'; degraded: boolean }
  | { kind: 'error'; reason: string };

export interface StageFailure {
  stage: StageName;
  error: string;
}

/**
 * Per-request record threaded through the stages. Field ownership:
 *
 * - retrieve_memory: memoryContext, patterns, recentStrategies
 * - analyze: analysis, confidence
 * - detect_crisis: crisisScore
 * - crisis_response: recommendation, message, reasoning
 * - reason: reasoning
 * - recommend: recommendation
 * - support: message
 * - store_memory: interactionId
 * - format: status
 *
 * `completedStages` and `failures` are maintained by the engine.
 */
export interface RequestState {
  readonly inputText: string;
  readonly metadata: Readonly<RequestMetadata>;
  readonly userId: string;
  status: WorkflowStatus;
  completedStages: StageName[];
  failures: StageFailure[];
  memoryContext: RetrievedInteraction[];
  patterns: EmotionalPattern;
  recentStrategies: string[];
  analysis: Readonly<AnalysisResult> | null;
  confidence: number;
  crisisScore: number | null;
  reasoning: string;
  recommendation: Recommendation | null;
  message: string;
  interactionId: string;
}

export type StateField = Exclude<keyof RequestState, 'inputText' | 'metadata' | 'userId' | 'completedStages' | 'failures'>;

export interface StageDefinition<K extends StateField> {
  owns: readonly K[];
  requires: readonly StageName[];
  run(state: Readonly<RequestState>): Promise<Pick<RequestState, K>>;
  fallback(state: Readonly<RequestState>): Pick<RequestState, K>;
}

export interface Stage {
  owns: readonly StateField[];
  requires: readonly StageName[];
  run(state: Readonly<RequestState>): Promise<Partial<RequestState>>;
  fallback(state: Readonly<RequestState>): Partial<RequestState>;
}

export function defineStage<K extends StateField>(definition: StageDefinition<K>): Stage {
  return definition;
}

export class WorkflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowError';
  }
}
