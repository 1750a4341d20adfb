import {
  AnalysisResult,
  Recommendation,
  Sentiment,
  StrategyKey,
  StressLevel,
  isRecord,
  isStrategyKey,
} from '../../types/resilience';
import { AnalyzerError } from './aiErrors';

const MODEL_SENTIMENTS: Sentiment[] = ['positive', 'neutral', 'negative', 'deeply_negative'];
const MODEL_STRESS_LEVELS: StressLevel[] = ['low', 'medium', 'high', 'crisis'];
const MAX_EMOTIONS = 4;
const MAX_STEPS = 8;

/**
 * Return the first balanced `{...}` substring, ignoring braces inside JSON strings.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) {
        try {
          const parsed: unknown = JSON.parse(text.slice(start, i + 1));
          if (isRecord(parsed)) {
            return parsed;
          }
        } catch {
          return null;
        }
        return null;
      }
    }
  }

  return null;
}

/**
 * Parse `KEY: value` lines. Keys are upper-cased with spaces turned into underscores;
 * markdown bullets and bold markers are tolerated.
 */
export function parseKeyValueBlock(text: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(/^[\s*\-•]+/, '').replace(/\*\*/g, '').trim();
    const match = line.match(/^([A-Za-z][A-Za-z _]*?)\s*:\s*(.*)$/);
    if (!match) continue;

    const key = match[1].trim().toUpperCase().replace(/\s+/g, '_');
    if (!(key in fields)) {
      fields[key] = match[2].trim();
    }
  }

  return fields;
}

export function coerceSentiment(value: unknown): Sentiment {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase().replace(/[\s-]+/g, '_') : '';
  return MODEL_SENTIMENTS.find(s => s === normalized) ?? 'neutral';
}

export function coerceStressLevel(value: unknown): StressLevel {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return MODEL_STRESS_LEVELS.find(s => s === normalized) ?? 'medium';
}

export function clampUnit(value: unknown, fallback: number): number {
  const parsed = typeof value === 'number' ? value : parseFloat(String(value ?? ''));
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(1, Math.max(0, parsed));
}

export function normalizeEmotions(value: unknown): string[] {
  let raw: unknown[] = [];
  if (Array.isArray(value)) raw = value;
  else if (typeof value === 'string') raw = value.replace(/^\[|\]$/g, '').split(',');

  const labels = raw
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim().toLowerCase().replace(/^["']|["']$/g, ''))
    .filter(item => item.length > 0);

  return labels.filter((label, index) => labels.indexOf(label) === index).slice(0, MAX_EMOTIONS);
}

function readField(json: Record<string, unknown> | null, kv: Record<string, string>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (json && json[key] !== undefined) return json[key];
    const upper = key.toUpperCase();
    if (kv[upper] !== undefined) return kv[upper];
  }
  return undefined;
}

/**
 * Parse the model's emotion analysis. Unknown values are coerced, never rejected;
 * a response carrying none of the expected fields is a parse error.
 */
export function parseAnalysisResponse(text: string): Omit<AnalysisResult, 'source'> {
  const json = extractJsonObject(text);
  const kv: Record<string, string> = json ? {} : parseKeyValueBlock(text);

  const sentiment = readField(json, kv, 'sentiment');
  const stress = readField(json, kv, 'stress_level', 'stress');
  const emotions = readField(json, kv, 'emotions');

  if (sentiment === undefined && stress === undefined && emotions === undefined) {
    throw new AnalyzerError('parse', 'Analysis response contained no recognizable fields');
  }

  const parsedEmotions = normalizeEmotions(emotions);
  const reasoning = readField(json, kv, 'reasoning');

  return {
    sentiment: coerceSentiment(sentiment),
    stress_level: coerceStressLevel(stress),
    emotions: parsedEmotions.length > 0 ? parsedEmotions : ['mixed'],
    confidence: clampUnit(readField(json, kv, 'confidence'), 0.7),
    reasoning: typeof reasoning === 'string' ? reasoning.trim() : '',
  };
}

export function parseCrisisScore(text: string): number {
  const json = extractJsonObject(text);
  const kv: Record<string, string> = json ? {} : parseKeyValueBlock(text);
  let value = readField(json, kv, 'crisis_score', 'score');

  if (value === undefined) {
    const match = text.match(/-?\d+(?:\.\d+)?/);
    value = match ? match[0] : undefined;
  }

  const score = clampUnit(value, Number.NaN);
  if (Number.isNaN(score)) {
    throw new AnalyzerError('parse', 'Crisis response did not contain a score');
  }
  return score;
}

function splitSteps(value: unknown): string[] {
  let raw: unknown[] = [];
  if (Array.isArray(value)) raw = value;
  else if (typeof value === 'string') raw = value.split(/\s*[|;]\s*/);

  return raw
    .filter((step): step is string => typeof step === 'string')
    .map(step => step.replace(/^\s*\d+[.)]\s*/, '').trim())
    .filter(step => step.length > 0)
    .slice(0, MAX_STEPS);
}

export interface ParsedRecommendation extends Recommendation {
  type: StrategyKey;
}

/**
 * Parse and validate a model recommendation. `type` must be one of the known keys and
 * `steps` must be non-empty.
 */
export function parseRecommendationResponse(text: string): ParsedRecommendation {
  const json = extractJsonObject(text);
  const kv: Record<string, string> = json ? {} : parseKeyValueBlock(text);

  const rawType = readField(json, kv, 'type', 'strategy');
  const type = typeof rawType === 'string' ? rawType.trim().toLowerCase() : '';
  if (!isStrategyKey(type)) {
    throw new AnalyzerError('parse', `Unknown strategy type: ${type || '(missing)'}`);
  }

  const steps = splitSteps(readField(json, kv, 'steps'));
  if (steps.length === 0) {
    throw new AnalyzerError('parse', 'Recommendation response had no steps');
  }

  const reasoning = readField(json, kv, 'reasoning');
  const reasoningText = typeof reasoning === 'string' ? reasoning.trim() : '';

  return {
    type,
    steps,
    ...(reasoningText ? { reasoning: reasoningText } : {}),
  };
}
