import express from "express";
import { ResilienceController } from "../controllers/resilienceController";
import { validateResilienceRequest } from "../middleware/validateResilienceRequest";
import { RateLimiter } from "../middleware/rateLimiter";

export const createResilienceRouter = (controller: ResilienceController, rateLimiter: RateLimiter) => {
  const router = express.Router();

  // Validation resolves the user id the limiter keys on
  router.post("/", validateResilienceRequest, rateLimiter.middleware(), controller.processMessage);

  router.get("/patterns/:userId", controller.getPatterns);
  router.delete("/history/:userId", controller.clearHistory);

  return router;
};
