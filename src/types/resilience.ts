export const SENTIMENTS = [
  'positive',
  'neutral',
  'negative',
  'deeply_negative',
  'error_quota_exceeded',
  'error_api_failed',
] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const STRESS_LEVELS = ['low', 'medium', 'high', 'crisis', 'api_unavailable'] as const;
export type StressLevel = (typeof STRESS_LEVELS)[number];

export const STRATEGY_KEYS = [
  'breathing_exercise',
  'grounding_technique',
  'progressive_relaxation',
  'mindful_meditation',
  'positive_affirmations',
  'physical_activity',
  'journaling',
  'social_connection',
] as const;
export type StrategyKey = (typeof STRATEGY_KEYS)[number];
export type RecommendationType = StrategyKey | 'crisis_support';

export type AnalysisSource = 'model' | 'rule_based';

export interface AnalysisResult {
  sentiment: Sentiment;
  stress_level: StressLevel;
  emotions: string[];
  confidence: number;
  reasoning: string;
  source: AnalysisSource;
}

export interface Recommendation {
  type: RecommendationType;
  name?: string;
  steps: string[];
  reasoning?: string;
  fallback_reason?: string;
}

export interface EmotionalPattern {
  recurring_emotions: string[];
  avg_stress: 'low' | 'medium' | 'high';
  crisis_frequency: number;
  total_interactions: number;
}

export interface Interaction {
  id: string;
  user_id: string;
  timestamp: string;
  user_message: string;
  analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>;
  strategy_type: string;
  crisis_score: number;
  document: string;
}

export interface RetrievedInteraction extends Interaction {
  similarity: number;
}

export interface RequestMetadata {
  user_id?: string;
  language?: string;
}

export type ResponseStatus = 'success' | 'error';

export interface ResilienceResponse {
  agent: string;
  status: ResponseStatus;
  analysis: Partial<Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>>;
  recommendation: Partial<Pick<Recommendation, 'type' | 'steps' | 'reasoning'>>;
  message: string;
  crisis_score?: number;
  confidence?: number;
  reasoning?: string;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(candidate => candidate === value);
}

export function isSentiment(value: unknown): value is Sentiment {
  return isOneOf(SENTIMENTS, value);
}

export function isStressLevel(value: unknown): value is StressLevel {
  return isOneOf(STRESS_LEVELS, value);
}

export function isStrategyKey(value: unknown): value is StrategyKey {
  return isOneOf(STRATEGY_KEYS, value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
