import { Types } from 'mongoose';
import { logger } from '../../utils/logger';
import {
  AnalysisResult,
  EmotionalPattern,
  Recommendation,
  RetrievedInteraction,
} from '../../types/resilience';
import { EmbeddingProvider, cosineSimilarity, lexicalSimilarity } from './embeddings';
import { InteractionRepository, StoredInteraction } from './interactionRepository';

/**
 * Long-term memory for the coaching pipeline
 * Append-only interaction log with similarity retrieval and pattern summaries.
 * Every operation logs and swallows its own failures.
 */

const STRESS_SCALE: Record<string, number> = { low: 1, medium: 2, high: 3, crisis: 4 };
const CRISIS_THRESHOLD = 0.7;
// Upper bound on records scanned when ranking by similarity
const RETRIEVAL_SCAN_LIMIT = 200;

export const EMPTY_PATTERN: EmotionalPattern = {
  recurring_emotions: [],
  avg_stress: 'medium',
  crisis_frequency: 0,
  total_interactions: 0,
};

export function buildInteractionDocument(
  userMessage: string,
  analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>,
  strategyType: string,
  crisisScore: number,
  timestamp: string
): string {
  return [
    `User Message: ${userMessage}`,
    `Emotional State: ${analysis.sentiment}`,
    `Stress Level: ${analysis.stress_level}`,
    `Emotions: ${analysis.emotions.join(', ')}`,
    `Crisis Severity: ${crisisScore}`,
    `Recommended Strategy: ${strategyType}`,
    `Timestamp: ${timestamp}`,
  ].join('\n');
}

export function bucketAverageStress(levels: string[]): EmotionalPattern['avg_stress'] {
  if (levels.length === 0) return 'medium';
  const average = levels.reduce((sum, level) => sum + (STRESS_SCALE[level] ?? 2), 0) / levels.length;
  if (average < 1.5) return 'low';
  if (average < 2.5) return 'medium';
  return 'high';
}

export class MemoryStore {
  private repository: InteractionRepository;
  private embeddings: EmbeddingProvider | null;

  constructor(repository: InteractionRepository, embeddings: EmbeddingProvider | null = null) {
    this.repository = repository;
    this.embeddings = embeddings;
    logger.info(`Memory store initialized (${repository.name}${embeddings?.isConfigured ? ', semantic search' : ', keyword search'})`);
  }

  private async tryEmbed(text: string): Promise<number[] | undefined> {
    if (!this.embeddings?.isConfigured) return undefined;
    try {
      return await this.embeddings.embed(text);
    } catch (error) {
      logger.warn('Embedding failed, falling back to keyword similarity', error);
      return undefined;
    }
  }

  /**
   * Append one interaction. Returns its id, or an empty string when it could not be stored.
   */
  async storeInteraction(
    userId: string,
    userMessage: string,
    analysis: Pick<AnalysisResult, 'sentiment' | 'stress_level' | 'emotions'>,
    recommendation: Pick<Recommendation, 'type'> | null,
    crisisScore: number = 0
  ): Promise<string> {
    try {
      const timestamp = new Date().toISOString();
      const id = `${userId}_${new Types.ObjectId().toHexString()}`;
      const strategyType = recommendation?.type ?? 'unknown';
      const document = buildInteractionDocument(userMessage, analysis, strategyType, crisisScore, timestamp);

      const interaction: StoredInteraction = {
        id,
        user_id: userId,
        timestamp,
        user_message: userMessage,
        analysis: {
          sentiment: analysis.sentiment,
          stress_level: analysis.stress_level,
          emotions: [...analysis.emotions],
        },
        strategy_type: strategyType,
        crisis_score: crisisScore,
        document,
        embedding: await this.tryEmbed(document),
      };

      await this.repository.insert(interaction);
      logger.info(`Stored interaction for user ${userId}`);
      return id;
    } catch (error) {
      logger.error('Error storing interaction:', error);
      return '';
    }
  }

  /**
   * Past interactions for this user, most similar to `currentMessage` first.
   */
  async retrieveRelevantContext(userId: string, currentMessage: string, nResults: number = 3): Promise<RetrievedInteraction[]> {
    try {
      const records = await this.repository.findByUser(userId, { limit: RETRIEVAL_SCAN_LIMIT });
      if (records.length === 0) {
        logger.info(`No previous context found for user ${userId}`);
        return [];
      }

      const queryEmbedding = await this.tryEmbed(currentMessage);

      const ranked = records
        .map((record, recency) => {
          const similarity =
            queryEmbedding && record.embedding && record.embedding.length === queryEmbedding.length
              ? cosineSimilarity(queryEmbedding, record.embedding)
              : lexicalSimilarity(currentMessage, record.user_message);
          return { record, similarity, recency };
        })
        .sort((a, b) => b.similarity - a.similarity || a.recency - b.recency)
        .slice(0, nResults)
        .map(({ record, similarity }): RetrievedInteraction => {
          const { embedding: _embedding, ...interaction } = record;
          return { ...interaction, similarity };
        });

      logger.info(`Retrieved ${ranked.length} relevant contexts for user ${userId}`);
      return ranked;
    } catch (error) {
      logger.error('Error retrieving context:', error);
      return [];
    }
  }

  /**
   * Summarize the user's last `limit` interactions.
   */
  async getEmotionalPatterns(userId: string, limit: number = 10): Promise<EmotionalPattern> {
    try {
      const recent = await this.repository.findByUser(userId, { limit });
      if (recent.length === 0) {
        return { ...EMPTY_PATTERN };
      }

      // Oldest first so equal counts rank by first appearance
      const chronological = [...recent].reverse();
      const emotionCounts = new Map<string, number>();
      let crisisCount = 0;

      for (const record of chronological) {
        for (const emotion of record.analysis.emotions) {
          emotionCounts.set(emotion, (emotionCounts.get(emotion) ?? 0) + 1);
        }
        if (record.crisis_score > CRISIS_THRESHOLD) {
          crisisCount++;
        }
      }

      const recurringEmotions = [...emotionCounts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, 3)
        .map(([emotion]) => emotion);

      return {
        recurring_emotions: recurringEmotions,
        avg_stress: bucketAverageStress(chronological.map(record => record.analysis.stress_level)),
        crisis_frequency: crisisCount,
        total_interactions: recent.length,
      };
    } catch (error) {
      logger.error('Error analyzing patterns:', error);
      return { ...EMPTY_PATTERN };
    }
  }

  /**
   * Strategy types of the latest interactions, newest first.
   */
  async getRecentStrategies(userId: string, count: number = 3): Promise<string[]> {
    try {
      const recent = await this.repository.findByUser(userId, { limit: count });
      return recent.map(record => record.strategy_type);
    } catch (error) {
      logger.error('Error reading recent strategies:', error);
      return [];
    }
  }

  /**
   * Delete every interaction for a user. False when there was nothing to delete.
   */
  async clearUserHistory(userId: string): Promise<boolean> {
    try {
      const deleted = await this.repository.deleteByUser(userId);
      if (deleted > 0) {
        logger.info(`Cleared history for user ${userId}`);
        return true;
      }
      return false;
    } catch (error) {
      logger.error('Error clearing history:', error);
      return false;
    }
  }
}
