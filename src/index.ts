import { createApp, createServices } from "./app";
import { config } from "./utils/config";
import { logger } from "./utils/logger";
import { connectDB, disconnectDB } from "./utils/db";
import { GeminiTextGenerator } from "./services/ai/geminiClient";
import { ResilienceAnalyzer } from "./services/ai/resilienceAnalyzer";
import { GeminiEmbeddingProvider } from "./services/memory/embeddings";
import { MemoryStore } from "./services/memory/memoryStore";
import {
  InMemoryInteractionRepository,
  InteractionRepository,
  MongoInteractionRepository,
} from "./services/memory/interactionRepository";

const start = async () => {
  const connected = await connectDB();
  const repository: InteractionRepository = connected
    ? new MongoInteractionRepository()
    : new InMemoryInteractionRepository();

  const memory = new MemoryStore(repository, new GeminiEmbeddingProvider());
  const analyzer = new ResilienceAnalyzer(new GeminiTextGenerator());
  const app = createApp(createServices({ analyzer, memory }));

  const server = app.listen(config.port, () => {
    logger.info(`Resilience Coach Agent is running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/health`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      disconnectDB()
        .catch(error => logger.error("Error while disconnecting from MongoDB:", error))
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

start().catch(error => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
