import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../utils/logger';
import {
  AnalysisResult,
  EmotionalPattern,
  Recommendation,
  Sentiment,
  STRATEGY_KEYS,
  StrategyKey,
  StressLevel,
  isRecord,
} from '../../types/resilience';

/**
 * Recommendation Engine
 * Picks a coping strategy for an emotional state and personalizes it against the
 * user's history.
 */

export type RandomSource = () => number;
export type StrategyGroup = 'calming' | 'emotional' | 'energizing';

export interface StrategyTemplate {
  name: string;
  group: StrategyGroup;
  steps: string[];
}

export type StrategyCatalog = Record<StrategyKey, StrategyTemplate>;

interface EmotionRule {
  name: string;
  keywords: string[];
  pick: StrategyKey[];
}

// Order is priority: the first rule whose keyword appears in the emotion labels wins.
const EMOTION_RULES: EmotionRule[] = [
  { name: 'crisis', keywords: ['crisis', 'hopeless', 'despair', 'suicid'], pick: ['grounding_technique'] },
  { name: 'loneliness', keywords: ['lonel', 'isolat', 'alone'], pick: ['social_connection'] },
  { name: 'burnout', keywords: ['burnout', 'burnt', 'burned', 'exhaust', 'fatigue', 'drained'], pick: ['progressive_relaxation'] },
  { name: 'overwhelm', keywords: ['overwhelm', 'stressed'], pick: ['grounding_technique'] },
  { name: 'anxiety', keywords: ['anxi', 'panic', 'nervous', 'fear', 'scared'], pick: ['breathing_exercise'] },
  { name: 'sadness', keywords: ['depress', 'sad', 'down', 'grief', 'empty', 'numb'], pick: ['positive_affirmations', 'physical_activity'] },
  { name: 'anger', keywords: ['anger', 'angry', 'frustrat', 'irritat', 'annoy'], pick: ['physical_activity'] },
  { name: 'rumination', keywords: ['worr', 'rumina', 'overthink', 'confus'], pick: ['journaling'] },
];

const LONELINESS_KEYWORDS = ['lonel', 'isolat', 'alone'];

let catalogCache: StrategyCatalog | null = null;

function isStrategyCatalog(value: unknown): value is StrategyCatalog {
  if (!isRecord(value)) return false;
  return STRATEGY_KEYS.every(key => {
    const entry = value[key];
    return isRecord(entry) && typeof entry.name === 'string' && typeof entry.group === 'string' && Array.isArray(entry.steps);
  });
}

/**
 * Load the coping strategy templates from JSON
 */
export function loadStrategyCatalog(): StrategyCatalog {
  if (catalogCache) {
    return catalogCache;
  }

  const configPath = path.join(__dirname, '../../config/coping-strategies.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!isStrategyCatalog(parsed)) {
    throw new Error(`Coping strategy catalog at ${configPath} is malformed`);
  }

  catalogCache = parsed;
  return parsed;
}

function matchesAny(text: string, keywords: string[]): boolean {
  return keywords.some(keyword => text.includes(keyword));
}

export interface StrategySelection {
  type: StrategyKey;
  rule: string;
}

export type CandidateReview =
  | { accepted: true }
  | { accepted: false; reason: string; selection: StrategySelection };

export class RecommendationEngine {
  private strategies: StrategyCatalog;
  private random: RandomSource;

  constructor(random: RandomSource = Math.random, strategies: StrategyCatalog = loadStrategyCatalog()) {
    this.random = random;
    this.strategies = strategies;
  }

  private pick<T>(options: T[]): T {
    const index = Math.min(options.length - 1, Math.floor(this.random() * options.length));
    return options[index];
  }

  /**
   * The rule that applies to an emotional state and the strategies it allows.
   */
  private matchRule(sentiment: Sentiment, stressLevel: StressLevel, emotions: string[]): { rule: string; options: StrategyKey[] } {
    const emotionText = emotions.join(' ').toLowerCase();

    for (const rule of EMOTION_RULES) {
      if (matchesAny(emotionText, rule.keywords)) {
        return { rule: rule.name, options: rule.pick };
      }
    }

    if (sentiment === 'positive') {
      return { rule: 'positive', options: ['journaling', 'positive_affirmations'] };
    }

    switch (stressLevel) {
      case 'medium':
        return { rule: 'stress_medium', options: ['mindful_meditation'] };
      case 'low':
        return { rule: 'stress_low', options: ['journaling'] };
      default:
        return { rule: 'stress_high', options: ['breathing_exercise'] };
    }
  }

  /**
   * Select the base strategy from the current emotional state only.
   */
  selectStrategy(sentiment: Sentiment, stressLevel: StressLevel, emotions: string[]): StrategySelection {
    const { rule, options } = this.matchRule(sentiment, stressLevel, emotions);
    return { type: this.pick(options), rule };
  }

  /**
   * Select a strategy, then adjust it for the user's history: recurring loneliness
   * steers toward social connection, and the most recent strategy is not repeated
   * unless stress is high.
   */
  selectPersonalized(
    analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>,
    patterns?: EmotionalPattern | null,
    recentTypes: string[] = []
  ): StrategySelection {
    let selection = this.selectStrategy(analysis.sentiment, analysis.stress_level, analysis.emotions);

    if (this.prefersSocialConnection(selection.rule, patterns) && selection.type !== 'social_connection') {
      logger.debug('Recurring loneliness in history, preferring social connection');
      selection = { type: 'social_connection', rule: 'recurring_loneliness' };
    }

    const recent = recentTypes.slice(0, 3);

    if (this.isUnwantedRepeat(selection.type, analysis.stress_level, recent)) {
      const group = this.strategies[selection.type].group;
      const sameGroup = STRATEGY_KEYS.filter(key => this.strategies[key].group === group && key !== selection.type);
      const unused = sameGroup.filter(key => !recent.includes(key));
      const candidates = unused.length > 0 ? unused : sameGroup;

      if (candidates.length > 0) {
        const alternative = this.pick(candidates);
        logger.debug(`Avoiding repeat of ${selection.type}, using ${alternative}`);
        selection = { type: alternative, rule: `${selection.rule}_variety` };
      }
    }

    return selection;
  }

  /**
   * Check a strategy proposed elsewhere (the model) against the selection rules.
   * A rejected candidate comes back with the selector's own choice.
   */
  reviewCandidate(
    candidate: StrategyKey,
    analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>,
    patterns?: EmotionalPattern | null,
    recentTypes: string[] = []
  ): CandidateReview {
    const { rule, options } = this.matchRule(analysis.sentiment, analysis.stress_level, analysis.emotions);
    let rejection: string | null = null;

    if (this.prefersSocialConnection(rule, patterns)) {
      if (candidate !== 'social_connection') rejection = 'recurring loneliness calls for social_connection';
    } else if (!options.includes(candidate)) {
      rejection = `${rule} rule allows ${options.join(', ')}`;
    }

    if (!rejection && this.isUnwantedRepeat(candidate, analysis.stress_level, recentTypes)) {
      rejection = 'repeats the latest strategy';
    }

    if (!rejection) {
      return { accepted: true };
    }

    logger.debug(`Rejected suggested strategy ${candidate}: ${rejection}`);
    return { accepted: false, reason: rejection, selection: this.selectPersonalized(analysis, patterns, recentTypes) };
  }

  private prefersSocialConnection(rule: string, patterns?: EmotionalPattern | null): boolean {
    const recurringLoneliness = patterns?.recurring_emotions.some(e => matchesAny(e.toLowerCase(), LONELINESS_KEYWORDS)) ?? false;
    return recurringLoneliness && rule !== 'crisis';
  }

  private isUnwantedRepeat(type: StrategyKey, stressLevel: StressLevel, recentTypes: string[]): boolean {
    const highStress = stressLevel === 'high' || stressLevel === 'crisis';
    return recentTypes[0] === type && !highStress;
  }

  getRecommendation(type: StrategyKey, reasoning?: string): Recommendation {
    const strategy = this.strategies[type];
    return {
      type,
      name: strategy.name,
      steps: [...strategy.steps],
      ...(reasoning ? { reasoning } : {}),
    };
  }

  /**
   * Personalized recommendation with a short explanation of why it was chosen.
   */
  recommend(
    analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>,
    patterns?: EmotionalPattern | null,
    recentTypes: string[] = []
  ): Recommendation {
    try {
      const selection = this.selectPersonalized(analysis, patterns, recentTypes);
      logger.info(`Recommended strategy: ${selection.type} (${selection.rule})`);

      const name = this.strategies[selection.type].name;
      return this.getRecommendation(
        selection.type,
        `${name} suits how you're feeling right now (${analysis.emotions.slice(0, 2).join(', ') || analysis.stress_level}).`
      );
    } catch (error) {
      logger.error('Error generating recommendation:', error);
      return this.getRecommendation('breathing_exercise');
    }
  }

  getAllStrategies(): StrategyCatalog {
    return this.strategies;
  }
}
