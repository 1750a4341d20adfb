import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { config } from "./utils/config";
import { logger } from "./utils/logger";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { RateLimiter } from "./middleware/rateLimiter";
import healthRoutes from "./routes/health";
import { createResilienceRouter } from "./routes/resilience";
import { createResilienceController } from "./controllers/resilienceController";
import { ResilienceAnalyzer } from "./services/ai/resilienceAnalyzer";
import { RecommendationEngine } from "./services/recommendations/recommendationEngine";
import { MemoryStore } from "./services/memory/memoryStore";
import { ResilienceWorkflow } from "./services/workflow/resilienceWorkflow";

export interface AppDeps {
  workflow: ResilienceWorkflow;
  memory: MemoryStore;
  rateLimiter?: RateLimiter;
}

export interface ServiceDeps {
  analyzer: ResilienceAnalyzer;
  memory: MemoryStore;
  recommendations?: RecommendationEngine;
}

export const createServices = ({ analyzer, memory, recommendations = new RecommendationEngine() }: ServiceDeps): AppDeps => ({
  workflow: new ResilienceWorkflow({ analyzer, recommendations, memory }),
  memory,
});

const allowedOrigins = (() => {
  if (config.nodeEnv === "production") {
    return [config.frontendUrl];
  }
  return ["http://localhost:3000", "http://localhost:8000", config.frontendUrl];
})();

const corsOptions = {
  origin: allowedOrigins,
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type"],
};

export const createApp = ({ workflow, memory, rateLimiter = new RateLimiter() }: AppDeps) => {
  const app = express();

  app.use(helmet());
  app.use(cors(corsOptions));
  app.use(express.json({ limit: "100kb" }));

  const morganFormat = config.nodeEnv === "production" ? "combined" : "dev";
  app.use(
    morgan(morganFormat, {
      stream: {
        write: (message: string) => {
          logger.info(message.trim());
        },
      },
    })
  );

  app.use(healthRoutes);
  app.use("/resilience", createResilienceRouter(createResilienceController({ workflow, memory }), rateLimiter));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
