import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../utils/logger';
import { AnalysisResult, Sentiment, StressLevel, isRecord } from '../../types/resilience';

/**
 * Rule-based emotion classifier
 * Offline keyword scorer used whenever the language model cannot produce an analysis.
 * Output depends only on the input text.
 */

interface LexiconCategory {
  name: string;
  label: string;
  weight: number;
  phrases: string[];
}

interface EmotionLexicon {
  explicitCrisis: string[];
  implicitCrisis: string[];
  categories: LexiconCategory[];
}

export type CrisisSignal = 'explicit' | 'implicit' | 'none';

export interface ClassificationResult {
  sentiment: Sentiment;
  stress_level: StressLevel;
  emotions: string[];
  score: number;
  crisisSignal: CrisisSignal;
  matchedCategories: string[];
}

const MAX_EMOTIONS = 4;

// First matching group wins
const STRESS_PRIORITY: Array<{ labels: string[]; level: StressLevel }> = [
  { labels: ['crisis', 'despair', 'hopelessness', 'panic'], level: 'high' },
  { labels: ['burnout', 'overwhelm', 'anxiety'], level: 'high' },
  { labels: ['sadness', 'depression', 'loneliness', 'masking'], level: 'medium' },
];

let lexiconCache: EmotionLexicon | null = null;

function isLexicon(value: unknown): value is EmotionLexicon {
  return (
    isRecord(value) &&
    Array.isArray(value.explicitCrisis) &&
    Array.isArray(value.implicitCrisis) &&
    Array.isArray(value.categories)
  );
}

/**
 * Load the keyword lexicon from JSON
 */
export function loadEmotionLexicon(): EmotionLexicon {
  if (lexiconCache) {
    return lexiconCache;
  }

  const configPath = path.join(__dirname, '../../config/emotion-lexicon.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!isLexicon(parsed)) {
    throw new Error(`Emotion lexicon at ${configPath} is malformed`);
  }

  lexiconCache = parsed;
  logger.debug('Emotion lexicon loaded', { categories: parsed.categories.length });
  return parsed;
}

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word phrase match, so "sad" does not fire on "crusade".
 */
export function containsPhrase(normalized: string, phrase: string): boolean {
  const pattern = new RegExp(`(^|[^a-z])${escapeRegExp(phrase)}($|[^a-z])`);
  return pattern.test(normalized);
}

export function detectCrisisSignal(text: string): CrisisSignal {
  const lexicon = loadEmotionLexicon();
  const normalized = normalizeText(text);

  if (lexicon.explicitCrisis.some(phrase => containsPhrase(normalized, phrase))) {
    return 'explicit';
  }
  if (lexicon.implicitCrisis.some(phrase => containsPhrase(normalized, phrase))) {
    return 'implicit';
  }
  return 'none';
}

function dedupe(labels: string[]): string[] {
  return labels.filter((label, index) => labels.indexOf(label) === index);
}

export function deriveStressLevel(emotions: string[], sentiment: Sentiment): StressLevel {
  for (const group of STRESS_PRIORITY) {
    if (emotions.some(emotion => group.labels.includes(emotion))) {
      return group.level;
    }
  }
  return sentiment === 'positive' ? 'low' : 'medium';
}

export function classifyText(text: string): ClassificationResult {
  const lexicon = loadEmotionLexicon();
  const normalized = normalizeText(text);
  const crisisSignal = detectCrisisSignal(text);

  if (crisisSignal === 'explicit') {
    return {
      sentiment: 'deeply_negative',
      stress_level: 'high',
      emotions: ['crisis', 'despair'],
      score: -10,
      crisisSignal,
      matchedCategories: ['crisis'],
    };
  }

  let score = 0;
  const labels: string[] = [];
  const matchedCategories: string[] = [];

  if (crisisSignal === 'implicit') {
    score -= 3;
    labels.push('hopelessness', 'despair');
    matchedCategories.push('implicit_crisis');
  }

  for (const category of lexicon.categories) {
    if (category.phrases.some(phrase => containsPhrase(normalized, phrase))) {
      score += category.weight;
      labels.push(category.label);
      matchedCategories.push(category.name);
    }
  }

  let emotions = dedupe(labels).slice(0, MAX_EMOTIONS);

  const negativeLabels = new Set(
    lexicon.categories.filter(c => c.weight < 0).map(c => c.label).concat(['despair'])
  );
  const positiveLabels = new Set(lexicon.categories.filter(c => c.weight > 0).map(c => c.label));

  let sentiment: Sentiment;
  if (score >= 2) {
    sentiment = 'positive';
  } else if (score <= -2) {
    sentiment = 'negative';
  } else if (emotions.some(e => negativeLabels.has(e))) {
    sentiment = 'negative';
  } else if (emotions.some(e => positiveLabels.has(e))) {
    sentiment = 'positive';
  } else {
    sentiment = 'neutral';
  }

  if (emotions.length === 0) {
    emotions = [sentiment === 'positive' ? 'calm' : 'uncertain'];
  }

  return {
    sentiment,
    stress_level: deriveStressLevel(emotions, sentiment),
    emotions,
    score,
    crisisSignal,
    matchedCategories,
  };
}

/**
 * Classify text into the analysis shape the pipeline consumes.
 */
export function analyzeWithRules(text: string): AnalysisResult {
  const result = classifyText(text);

  let confidence = result.matchedCategories.length > 0 ? 0.6 : 0.4;
  if (result.crisisSignal === 'explicit') confidence = 0.9;

  const reasoning =
    result.matchedCategories.length > 0
      ? `Keyword analysis matched: ${result.matchedCategories.join(', ')}`
      : 'No strong emotional keywords detected';

  return {
    sentiment: result.sentiment,
    stress_level: result.stress_level,
    emotions: result.emotions,
    confidence,
    reasoning,
    source: 'rule_based',
  };
}
