import { describe, expect, it } from 'vitest';
import {
  extractJsonObject,
  parseAnalysisResponse,
  parseCrisisScore,
  parseKeyValueBlock,
  parseRecommendationResponse,
} from './responseParser';

describe('extractJsonObject', () => {
  it('finds the first object inside surrounding prose', () => {
    const text = 'Here you go:\n```json\n{"sentiment": "negative", "note": "uses {braces}"}\n```';
    expect(extractJsonObject(text)).toEqual({ sentiment: 'negative', note: 'uses {braces}' });
  });

  it('returns null for text without a valid object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('{not: valid}')).toBeNull();
  });
});

describe('parseKeyValueBlock', () => {
  it('reads bullet and bold formatted lines', () => {
    expect(parseKeyValueBlock('- **Sentiment**: negative\n* Stress level: high\nrandom line')).toEqual({
      SENTIMENT: 'negative',
      STRESS_LEVEL: 'high',
    });
  });
});

describe('parseAnalysisResponse', () => {
  it('parses line-formatted output', () => {
    const result = parseAnalysisResponse(
      'SENTIMENT: negative\nSTRESS_LEVEL: high\nEMOTIONS: Anxiety, overwhelm, anxiety\nCONFIDENCE: 0.82\nREASONING: Exams are close.'
    );

    expect(result).toEqual({
      sentiment: 'negative',
      stress_level: 'high',
      emotions: ['anxiety', 'overwhelm'],
      confidence: 0.82,
      reasoning: 'Exams are close.',
    });
  });

  it('coerces unknown enum values and clamps confidence', () => {
    const result = parseAnalysisResponse('{"sentiment": "furious", "stress_level": "extreme", "emotions": [], "confidence": 4}');

    expect(result.sentiment).toBe('neutral');
    expect(result.stress_level).toBe('medium');
    expect(result.emotions).toEqual(['mixed']);
    expect(result.confidence).toBe(1);
  });

  it('rejects output with none of the expected fields', () => {
    expect(() => parseAnalysisResponse('I am not sure what to say.')).toThrow(
      'Analysis response contained no recognizable fields'
    );
  });
});

describe('parseCrisisScore', () => {
  it('reads labelled and bare scores', () => {
    expect(parseCrisisScore('CRISIS_SCORE: 0.85')).toBe(0.85);
    expect(parseCrisisScore('{"crisis_score": 0.1}')).toBe(0.1);
    expect(parseCrisisScore('0.3')).toBe(0.3);
  });

  it('clamps out of range values', () => {
    expect(parseCrisisScore('CRISIS_SCORE: 1.7')).toBe(1);
  });

  it('throws when no number is present', () => {
    expect(() => parseCrisisScore('unclear')).toThrow('Crisis response did not contain a score');
  });
});

describe('parseRecommendationResponse', () => {
  it('splits numbered steps and keeps reasoning', () => {
    const result = parseRecommendationResponse(
      'TYPE: Grounding_Technique\nSTEPS: 1. Name 5 things you see | 2. Name 4 things you can touch\nREASONING: Brings attention to the present.'
    );

    expect(result).toEqual({
      type: 'grounding_technique',
      steps: ['Name 5 things you see', 'Name 4 things you can touch'],
      reasoning: 'Brings attention to the present.',
    });
  });

  it('rejects unknown strategy types', () => {
    expect(() => parseRecommendationResponse('TYPE: yoga_retreat\nSTEPS: Relax')).toThrow('Unknown strategy type: yoga_retreat');
  });

  it('rejects a recommendation without steps', () => {
    expect(() => parseRecommendationResponse('{"type": "journaling", "steps": []}')).toThrow(
      'Recommendation response had no steps'
    );
  });
});
