import { Request, Response, NextFunction } from "express";
import { AGENT_NAME } from "../utils/config";
import { logger } from "../utils/logger";

export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;

    Error.captureStackTrace(this, this.constructor);
  }
}

export interface AgentErrorBody {
  status: "error";
  agent: string;
  message: string;
  details?: string;
}

export function agentError(message: string): AgentErrorBody {
  return { status: "error", agent: AGENT_NAME, message };
}

function hasStatusCode(err: unknown): err is { status: number; type?: string } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn("Route not found:", { url: req.originalUrl, method: req.method });
  res.status(404).json(agentError("Endpoint not found"));
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const details = process.env.NODE_ENV === "production" || !(err instanceof Error) ? undefined : err.stack;

  if (err instanceof AppError) {
    return res.status(err.statusCode).json({ ...agentError(err.message), details });
  }

  // Malformed JSON bodies surface from express.json() as 400s
  if (hasStatusCode(err) && err.status === 400) {
    return res.status(400).json(agentError("Request must be valid JSON"));
  }

  logger.error("Unexpected error:", err);

  return res.status(500).json({ ...agentError("Internal server error"), details });
};
