import { IInteraction, InteractionModel } from '../../models/Interaction';
import { Interaction, isSentiment, isStressLevel } from '../../types/resilience';

export interface StoredInteraction extends Interaction {
  embedding?: number[];
}

export interface FindOptions {
  limit?: number;
}

/**
 * Persistence boundary for the interaction log. Results are newest first.
 */
export interface InteractionRepository {
  readonly name: string;
  insert(interaction: StoredInteraction): Promise<void>;
  findByUser(userId: string, options?: FindOptions): Promise<StoredInteraction[]>;
  deleteByUser(userId: string): Promise<number>;
}

export class MongoInteractionRepository implements InteractionRepository {
  readonly name = 'mongodb';

  async insert(interaction: StoredInteraction): Promise<void> {
    await InteractionModel.create({
      interactionId: interaction.id,
      userId: interaction.user_id,
      timestamp: new Date(interaction.timestamp),
      userMessage: interaction.user_message,
      sentiment: interaction.analysis.sentiment,
      stressLevel: interaction.analysis.stress_level,
      emotions: interaction.analysis.emotions,
      strategyType: interaction.strategy_type,
      crisisScore: interaction.crisis_score,
      document: interaction.document,
      embedding: interaction.embedding ?? [],
    });
  }

  async findByUser(userId: string, options: FindOptions = {}): Promise<StoredInteraction[]> {
    let query = InteractionModel.find({ userId }).sort({ timestamp: -1, _id: -1 });
    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }

    const docs = await query.lean<IInteraction[]>();

    return docs.map(doc => ({
      id: doc.interactionId,
      user_id: doc.userId,
      timestamp: doc.timestamp.toISOString(),
      user_message: doc.userMessage,
      analysis: {
        sentiment: isSentiment(doc.sentiment) ? doc.sentiment : 'neutral',
        stress_level: isStressLevel(doc.stressLevel) ? doc.stressLevel : 'medium',
        emotions: [...doc.emotions],
      },
      strategy_type: doc.strategyType,
      crisis_score: doc.crisisScore,
      document: doc.document,
      embedding: doc.embedding.length > 0 ? [...doc.embedding] : undefined,
    }));
  }

  async deleteByUser(userId: string): Promise<number> {
    const result = await InteractionModel.deleteMany({ userId });
    return result.deletedCount;
  }
}

/**
 * Process-local store used when no database is connected, and in tests.
 */
export class InMemoryInteractionRepository implements InteractionRepository {
  readonly name = 'in-memory';
  private records = new Map<string, StoredInteraction[]>();

  async insert(interaction: StoredInteraction): Promise<void> {
    const existing = this.records.get(interaction.user_id) ?? [];
    existing.push({ ...interaction, analysis: { ...interaction.analysis, emotions: [...interaction.analysis.emotions] } });
    this.records.set(interaction.user_id, existing);
  }

  async findByUser(userId: string, options: FindOptions = {}): Promise<StoredInteraction[]> {
    const records = this.records.get(userId) ?? [];
    // Array.prototype.sort is stable, so equal timestamps keep insertion order before the reverse
    const newestFirst = [...records].sort((a, b) => a.timestamp.localeCompare(b.timestamp)).reverse();
    return options.limit !== undefined ? newestFirst.slice(0, options.limit) : newestFirst;
  }

  async deleteByUser(userId: string): Promise<number> {
    const count = this.records.get(userId)?.length ?? 0;
    this.records.delete(userId);
    return count;
  }
}
