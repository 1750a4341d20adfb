import { describe, expect, it } from 'vitest';
import { EmbeddingProvider, lexicalSimilarity } from './embeddings';
import { InMemoryInteractionRepository, InteractionRepository, StoredInteraction } from './interactionRepository';
import { EMPTY_PATTERN, MemoryStore, bucketAverageStress } from './memoryStore';

class KeywordEmbeddings implements EmbeddingProvider {
  readonly isConfigured = true;

  async embed(text: string): Promise<number[]> {
    return /exam/i.test(text) ? [1, 0] : [0, 1];
  }
}

class BrokenEmbeddings implements EmbeddingProvider {
  readonly isConfigured = true;

  async embed(): Promise<number[]> {
    throw new Error('embedding service down');
  }
}

class FailingRepository implements InteractionRepository {
  readonly name = 'failing';

  async insert(_interaction: StoredInteraction): Promise<void> {
    throw new Error('write failed');
  }

  async findByUser(): Promise<StoredInteraction[]> {
    throw new Error('read failed');
  }

  async deleteByUser(): Promise<number> {
    throw new Error('delete failed');
  }
}

const anxious = { sentiment: 'negative', stress_level: 'high', emotions: ['anxiety', 'overwhelm'] } as const;
const worried = { sentiment: 'negative', stress_level: 'medium', emotions: ['anxiety'] } as const;
const down = { sentiment: 'negative', stress_level: 'low', emotions: ['sadness'] } as const;

describe('MemoryStore', () => {
  it('stores interactions under a user-prefixed id', async () => {
    const repository = new InMemoryInteractionRepository();
    const store = new MemoryStore(repository);

    const id = await store.storeInteraction('user-1', 'Exams are coming', { ...anxious, emotions: [...anxious.emotions] }, { type: 'breathing_exercise' }, 0.1);

    expect(id).toMatch(/^user-1_[0-9a-f]{24}$/);
    await expect(repository.findByUser('user-1')).resolves.toHaveLength(1);
  });

  it('summarizes stored interactions into an emotional pattern', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository());

    await store.storeInteraction('user-1', 'first', { ...anxious, emotions: [...anxious.emotions] }, { type: 'breathing_exercise' }, 0.1);
    await store.storeInteraction('user-1', 'second', { ...worried, emotions: [...worried.emotions] }, { type: 'journaling' }, 0.2);
    await store.storeInteraction('user-1', 'third', { ...down, emotions: [...down.emotions] }, null, 0.9);

    await expect(store.getEmotionalPatterns('user-1')).resolves.toEqual({
      recurring_emotions: ['anxiety', 'overwhelm', 'sadness'],
      avg_stress: 'medium',
      crisis_frequency: 1,
      total_interactions: 3,
    });
    await expect(store.getRecentStrategies('user-1', 2)).resolves.toEqual(['unknown', 'journaling']);
  });

  it('returns the empty pattern for a user without history', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository());
    await expect(store.getEmotionalPatterns('nobody')).resolves.toEqual(EMPTY_PATTERN);
    await expect(store.retrieveRelevantContext('nobody', 'hello there')).resolves.toEqual([]);
  });

  it('ranks past interactions by keyword overlap without embeddings', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository());
    await store.storeInteraction('user-1', 'I am anxious about my exams tomorrow', { ...worried, emotions: ['anxiety'] }, null);
    await store.storeInteraction('user-1', 'Had a lovely walk in the park', { ...down, emotions: ['calm'] }, null);

    const [top] = await store.retrieveRelevantContext('user-1', 'exams make me anxious', 1);

    expect(top.user_message).toBe('I am anxious about my exams tomorrow');
    expect(top.similarity).toBe(0.5);
    expect('embedding' in top).toBe(false);
  });

  it('prefers embedding similarity when embeddings are available', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository(), new KeywordEmbeddings());
    await store.storeInteraction('user-1', 'Worried about my exam results', { ...worried, emotions: ['anxiety'] }, null);
    await store.storeInteraction('user-1', 'Had a lovely walk in the park', { ...down, emotions: ['calm'] }, null);

    const [top] = await store.retrieveRelevantContext('user-1', 'school tests', 1);

    expect(top.user_message).toBe('Had a lovely walk in the park');
    expect(top.similarity).toBe(1);
  });

  it('still stores and retrieves when the embedding service fails', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository(), new BrokenEmbeddings());

    const id = await store.storeInteraction('user-1', 'I feel anxious today', { ...worried, emotions: ['anxiety'] }, null);
    const context = await store.retrieveRelevantContext('user-1', 'anxious again');

    expect(id).not.toBe('');
    expect(context).toHaveLength(1);
  });

  it('reports whether a history clear deleted anything', async () => {
    const store = new MemoryStore(new InMemoryInteractionRepository());
    await store.storeInteraction('user-1', 'hello', { ...worried, emotions: ['anxiety'] }, null);

    await expect(store.clearUserHistory('user-1')).resolves.toBe(true);
    await expect(store.clearUserHistory('user-1')).resolves.toBe(false);
    await expect(store.getEmotionalPatterns('user-1')).resolves.toEqual(EMPTY_PATTERN);
  });

  it('swallows repository failures', async () => {
    const store = new MemoryStore(new FailingRepository());

    await expect(store.storeInteraction('user-1', 'hello', { ...worried, emotions: ['anxiety'] }, null)).resolves.toBe('');
    await expect(store.retrieveRelevantContext('user-1', 'hello')).resolves.toEqual([]);
    await expect(store.getEmotionalPatterns('user-1')).resolves.toEqual(EMPTY_PATTERN);
    await expect(store.getRecentStrategies('user-1')).resolves.toEqual([]);
    await expect(store.clearUserHistory('user-1')).resolves.toBe(false);
  });
});

describe('bucketAverageStress', () => {
  it('buckets the mean stress level', () => {
    expect(bucketAverageStress(['low', 'low', 'medium'])).toBe('low');
    expect(bucketAverageStress(['high', 'low'])).toBe('medium');
    expect(bucketAverageStress(['high', 'crisis'])).toBe('high');
    expect(bucketAverageStress([])).toBe('medium');
  });
});

describe('lexicalSimilarity', () => {
  it('ignores stop words and short tokens', () => {
    expect(lexicalSimilarity('I feel so tired', 'tired of this')).toBe(1);
    expect(lexicalSimilarity('the and for', 'anything')).toBe(0);
  });
});
