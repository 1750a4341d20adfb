import { describe, expect, it } from 'vitest';
import { CRISIS_RESOURCES_MESSAGE, FALLBACK_CRISIS_MESSAGE } from '../../utils/crisisResources';
import { GenerationOptions, TextGenerator } from '../ai/geminiClient';
import { DEFAULT_REASONING, ResilienceAnalyzer } from '../ai/resilienceAnalyzer';
import { RetryPolicy, linearBackoff, retryOnTransientErrors } from '../ai/retryPolicy';
import { InMemoryInteractionRepository } from '../memory/interactionRepository';
import { MemoryStore } from '../memory/memoryStore';
import { RecommendationEngine, loadStrategyCatalog } from '../recommendations/recommendationEngine';
import {
  DEFAULT_SUPPORT_MESSAGE,
  GENERIC_ERROR_MESSAGE,
  ResilienceWorkflow,
  createInitialState,
  nextStage,
  routeAfterCrisisDetection,
} from './resilienceWorkflow';
import { END, WorkflowError } from './types';

class PromptRouter implements TextGenerator {
  readonly isConfigured: boolean;

  constructor(private routes: Array<[marker: string, reply: string]>, isConfigured = true) {
    this.isConfigured = isConfigured;
  }

  async generate(prompt: string, _options?: GenerationOptions): Promise<string> {
    const route = this.routes.find(([marker]) => prompt.includes(marker));
    if (!route) {
      throw new Error(`No scripted reply for prompt: ${prompt.slice(0, 40)}`);
    }
    return route[1];
  }
}

function modelScript(analysis: string, strategy: string) {
  return new PromptRouter([
    ['Provide your analysis', analysis],
    ['safety assessor', 'CRISIS_SCORE: 0.2'],
    ['Choose ONE coping strategy', `TYPE: ${strategy}\nSTEPS: First step | Second step\nREASONING: Model choice.`],
    ['In ONE or TWO sentences', 'They are under pressure.'],
    ['Write ONE SHORT supportive message', 'You are not alone in this.'],
  ]);
}

const instantRetry = () =>
  new RetryPolicy({ maxAttempts: 3, backoff: linearBackoff(2000), isRetryable: retryOnTransientErrors, sleep: async () => {} });

function setup(generator: TextGenerator = new PromptRouter([], false), analyzerOverride?: ResilienceAnalyzer) {
  const memory = new MemoryStore(new InMemoryInteractionRepository());
  const analyzer = analyzerOverride ?? new ResilienceAnalyzer(generator, instantRetry());
  const workflow = new ResilienceWorkflow({ analyzer, memory, recommendations: new RecommendationEngine(() => 0) });
  return { memory, workflow };
}

describe('routing', () => {
  it('takes the crisis path only above the threshold', () => {
    expect(routeAfterCrisisDetection(0.7)).toBe('reason');
    expect(routeAfterCrisisDetection(0.71)).toBe('crisis_response');
  });

  it('walks the stage graph', () => {
    expect(nextStage('retrieve_memory', null)).toBe('analyze');
    expect(nextStage('detect_crisis', null)).toBe('reason');
    expect(nextStage('detect_crisis', 0.95)).toBe('crisis_response');
    expect(nextStage('crisis_response', 0.95)).toBe('store_memory');
    expect(nextStage('support', 0.2)).toBe('store_memory');
    expect(nextStage('format', 0.2)).toBe(END);
  });
});

describe('createInitialState', () => {
  it('defaults the user id to anonymous', () => {
    const state = createInitialState('Hello there', {});
    expect(state.userId).toBe('anonymous');
    expect(state.status).toEqual({ kind: 'processing' });
    expect(state.crisisScore).toBeNull();
  });

  it('rejects empty or non-string input', () => {
    expect(() => createInitialState('   ', {})).toThrow(WorkflowError);
    expect(() => createInitialState(42, {})).toThrow('Input text must be a non-empty string');
  });
});

describe('ResilienceWorkflow.process', () => {
  it('handles exam stress on local fallbacks when the model is unavailable', async () => {
    const { workflow, memory } = setup();

    const response = await workflow.process("I'm feeling really stressed and anxious about my exams", { user_id: 'student-1' });

    expect(response).toEqual({
      agent: 'resilience_coach',
      status: 'success',
      analysis: { sentiment: 'negative', stress_level: 'high', emotions: ['overwhelm', 'anxiety'] },
      recommendation: {
        type: 'grounding_technique',
        steps: loadStrategyCatalog().grounding_technique.steps,
        reasoning: "Grounding Technique (5-4-3-2-1) suits how you're feeling right now (overwhelm, anxiety).",
      },
      message:
        'Anxiety is real, and it does pass. Try a few slow breaths or ground yourself with what you can see and touch around you. Take it moment by moment.',
      crisis_score: 0.5,
      confidence: 0.6,
      reasoning: DEFAULT_REASONING,
    });
    await expect(memory.getRecentStrategies('student-1')).resolves.toEqual(['grounding_technique']);
  });

  it('routes explicit crisis language to crisis support', async () => {
    const { workflow, memory } = setup();

    const response = await workflow.process('I want to end my life', { user_id: 'user-2' });

    expect(response.status).toBe('success');
    expect(response.crisis_score).toBe(0.95);
    expect(response.recommendation.type).toBe('crisis_support');
    expect(response.message).toBe(`${FALLBACK_CRISIS_MESSAGE}\n\n${CRISIS_RESOURCES_MESSAGE}`);
    expect(response.message).toContain('988');
    expect(response.message).toContain('741741');
    expect(response.reasoning).toBe('Crisis indicators detected (score 0.95); prioritizing immediate support resources.');

    const patterns = await memory.getEmotionalPatterns('user-2');
    expect(patterns.crisis_frequency).toBe(1);
  });

  it('uses model output on every stage when available', async () => {
    const generator = new PromptRouter([
      ['Provide your analysis', 'SENTIMENT: negative\nSTRESS_LEVEL: medium\nEMOTIONS: worry, rumination\nCONFIDENCE: 0.75\nREASONING: Work pressure.'],
      ['safety assessor', 'CRISIS_SCORE: 0.1'],
      ['Choose ONE coping strategy', 'TYPE: journaling\nSTEPS: Write for five minutes | Name one worry\nREASONING: Helps untangle thoughts.'],
      ['In ONE or TWO sentences', 'They are stretched thin at work.'],
      ['Write ONE SHORT supportive message', 'That sounds heavy. You are doing your best.'],
    ]);
    const { workflow } = setup(generator);

    const response = await workflow.process('Work has been piling up and I keep worrying', { user_id: 'user-3' });

    expect(response).toEqual({
      agent: 'resilience_coach',
      status: 'success',
      analysis: { sentiment: 'negative', stress_level: 'medium', emotions: ['worry', 'rumination'] },
      recommendation: {
        type: 'journaling',
        steps: ['Write for five minutes', 'Name one worry'],
        reasoning: 'Helps untangle thoughts.',
      },
      message: 'That sounds heavy. You are doing your best.',
      crisis_score: 0.1,
      confidence: 0.75,
      reasoning: 'They are stretched thin at work.',
    });
  });

  it('does not repeat the latest strategy the model suggests at medium stress', async () => {
    const { workflow, memory } = setup(
      modelScript('SENTIMENT: negative\nSTRESS_LEVEL: medium\nEMOTIONS: worry, rumination\nCONFIDENCE: 0.7', 'journaling')
    );
    await memory.storeInteraction('repeat-user', 'I could not stop thinking', { sentiment: 'negative', stress_level: 'medium', emotions: ['worry'] }, { type: 'journaling' }, 0.1);

    const response = await workflow.process('My thoughts keep going in circles tonight', { user_id: 'repeat-user' });

    expect(response.recommendation).toEqual({
      type: 'positive_affirmations',
      steps: loadStrategyCatalog().positive_affirmations.steps,
    });
  });

  it('steers recurring loneliness to social connection over the model pick', async () => {
    const { workflow, memory } = setup(
      modelScript('SENTIMENT: negative\nSTRESS_LEVEL: medium\nEMOTIONS: sadness\nCONFIDENCE: 0.7', 'mindful_meditation')
    );
    for (let i = 0; i < 3; i++) {
      await memory.storeInteraction('lonely-user', 'Nobody texted me back', { sentiment: 'negative', stress_level: 'medium', emotions: ['loneliness'] }, { type: 'journaling' }, 0.1);
    }

    const response = await workflow.process('Another quiet weekend on my own', { user_id: 'lonely-user' });

    expect(response.recommendation).toEqual({
      type: 'social_connection',
      steps: loadStrategyCatalog().social_connection.steps,
    });
  });

  it('keeps exam stress on a calming strategy whatever the model suggests', async () => {
    const { workflow } = setup(
      modelScript('SENTIMENT: negative\nSTRESS_LEVEL: high\nEMOTIONS: anxiety, stress\nCONFIDENCE: 0.8', 'positive_affirmations')
    );

    const response = await workflow.process("I'm feeling really stressed and anxious about my exams", { user_id: 'exam-user' });

    expect(['breathing_exercise', 'grounding_technique']).toContain(response.recommendation.type);
    expect(response.recommendation).toEqual({
      type: 'breathing_exercise',
      steps: loadStrategyCatalog().breathing_exercise.steps,
    });
  });

  it('applies stage fallbacks when a stage throws', async () => {
    class ThrowingAnalyzer extends ResilienceAnalyzer {
      async generateReasoning(): Promise<string> {
        throw new Error('reasoning exploded');
      }

      async generateSupportiveMessage(): Promise<string> {
        throw new Error('support exploded');
      }
    }
    const { workflow } = setup(undefined, new ThrowingAnalyzer(new PromptRouter([], false), instantRetry()));

    const response = await workflow.process('I feel lonely and tired of everything', { user_id: 'user-4' });

    expect(response.status).toBe('success');
    expect(response.reasoning).toBe(DEFAULT_REASONING);
    expect(response.message).toBe(DEFAULT_SUPPORT_MESSAGE);
    expect(response.recommendation.type).toBe('social_connection');
  });

  it('returns the generic error response for unusable input', async () => {
    const { workflow } = setup();

    await expect(workflow.process('   ')).resolves.toEqual({
      agent: 'resilience_coach',
      status: 'error',
      analysis: {},
      recommendation: {},
      message: GENERIC_ERROR_MESSAGE,
    });
  });
});
