import { Request, Response } from 'express';
import { AGENT_NAME, AGENT_VERSION } from '../utils/config';

export const healthCheck = (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'ok',
    agent: AGENT_NAME,
    version: AGENT_VERSION,
    message: 'Resilience Coach Agent is running',
  });
};

export const apiInfo = (_req: Request, res: Response) => {
  res.status(200).json({
    agent: AGENT_NAME,
    version: AGENT_VERSION,
    status: 'running',
    endpoints: {
      api_info: { path: '/api', method: 'GET', description: 'API information' },
      health: { path: '/health', method: 'GET', description: 'Health check endpoint' },
      resilience: {
        path: '/resilience',
        method: 'POST',
        description: 'Main agent interaction endpoint',
        required_fields: ['agent', 'input_text'],
        optional_fields: ['metadata'],
      },
      patterns: {
        path: '/resilience/patterns/:userId',
        method: 'GET',
        description: "Summary of a user's recurring emotions and stress trend",
      },
      history: {
        path: '/resilience/history/:userId',
        method: 'DELETE',
        description: 'Delete all stored interactions for a user',
      },
    },
  });
};
