import { Request, Response, NextFunction } from "express";
import { AGENT_NAME } from "../utils/config";
import { logger } from "../utils/logger";
import { validateInputText, validateMetadata } from "../utils/inputValidator";
import { RequestMetadata, isRecord } from "../types/resilience";
import { AppError } from "./errorHandler";

export interface ResilienceRequest {
  inputText: string;
  metadata: RequestMetadata;
  userId: string;
}

// Validated payload for the resilience endpoint
declare global {
  namespace Express {
    interface Request {
      resilience?: ResilienceRequest;
    }
  }
}

/**
 * Checks the envelope (`agent`, `input_text`, `metadata`) of a coaching request and
 * attaches the sanitized values to `req.resilience`.
 */
export const validateResilienceRequest = (req: Request, _res: Response, next: NextFunction) => {
  if (!req.is("application/json")) {
    logger.warn("Invalid content type received");
    return next(new AppError("Content-Type must be application/json", 400));
  }

  const body: unknown = req.body;
  if (!isRecord(body)) {
    return next(new AppError("Request body must be a JSON object", 400));
  }

  if (!("agent" in body)) {
    return next(new AppError("Missing required field: agent", 400));
  }
  if (body.agent !== AGENT_NAME) {
    return next(new AppError(`Invalid agent name. Expected: '${AGENT_NAME}', got: '${String(body.agent)}'`, 400));
  }

  if (!("input_text" in body)) {
    return next(new AppError("Missing required field: input_text", 400));
  }

  const input = validateInputText(body.input_text);
  if (!input.valid) {
    logger.warn(`Invalid input: ${input.error}`);
    return next(new AppError(input.error, 400));
  }

  const metadata = validateMetadata(body.metadata);
  if (!metadata.valid) {
    logger.warn(`Invalid metadata: ${metadata.error}`);
    return next(new AppError(metadata.error, 400));
  }

  req.resilience = {
    inputText: input.value,
    metadata: metadata.value,
    userId: metadata.value.user_id ?? "anonymous",
  };
  next();
};
