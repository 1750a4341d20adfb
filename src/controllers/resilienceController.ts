import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { validateResponse } from "../utils/responseValidator";
import { AppError, agentError } from "../middleware/errorHandler";
import { ResilienceWorkflow } from "../services/workflow/resilienceWorkflow";
import { MemoryStore } from "../services/memory/memoryStore";

const MAX_USER_ID_LENGTH = 100;

export interface ResilienceControllerDeps {
  workflow: ResilienceWorkflow;
  memory: MemoryStore;
}

function readUserId(req: Request): string {
  const userId = req.params.userId?.trim();
  if (!userId || userId.length > MAX_USER_ID_LENGTH) {
    throw new AppError("Invalid user id", 400);
  }
  return userId;
}

export const createResilienceController = ({ workflow, memory }: ResilienceControllerDeps) => {
  // Run one message through the coaching workflow
  const processMessage = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = req.resilience;
      if (!request) {
        throw new AppError("Request was not validated", 500);
      }

      logger.info(`Processing request for user: ${request.userId}`);
      const result = await workflow.process(request.inputText, request.metadata);

      if (result.status === "error") {
        return res.status(500).json(agentError(result.message));
      }

      const validated = validateResponse(result);
      if (!validated.valid) {
        logger.error(`Invalid response generated: ${validated.error}`);
        return res.status(500).json(agentError("Failed to generate valid response. Please try again."));
      }

      logger.info("Request processed successfully");
      res.status(200).json(validated.value);
    } catch (error) {
      next(error);
    }
  };

  // Emotional pattern summary for a user
  const getPatterns = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = readUserId(req);
      const patterns = await memory.getEmotionalPatterns(userId);
      res.json({ user_id: userId, patterns });
    } catch (error) {
      next(error);
    }
  };

  // Forget everything stored for a user
  const clearHistory = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = readUserId(req);
      const cleared = await memory.clearUserHistory(userId);
      logger.info(`History clear requested for user ${userId}: ${cleared ? "cleared" : "nothing stored"}`);
      res.json({ user_id: userId, cleared });
    } catch (error) {
      next(error);
    }
  };

  return { processMessage, getPatterns, clearHistory };
};

export type ResilienceController = ReturnType<typeof createResilienceController>;
