/**
 * Status API.
 *
 * A read-only express app exposing liveness and the supervisor's last
 * outcome, so operators and health checks can see a persistent failure without
 * waiting for the escalation message.
 */

import express, { NextFunction, Request, Response } from 'express';
import { SupervisorStatus } from './domain/cycle';
import { createTypedError, describeThrown } from './domain/errors';
import { ESCALATION_FIRST_AT } from './engine/escalation';
import { logger } from './logger';

export const VERSION = '0.1.0';

/** Anything that can report supervisor status. */
export interface StatusSource {
  getStatus(): SupervisorStatus;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  logger.error('Unhandled request error', { error: describeThrown(err) });
  res.status(500).json({
    error: createTypedError({ code: 'SYSTEM.UNEXPECTED', message: 'Internal server error' }),
  });
}

/** Create and configure the status application. */
export function createStatusApp(source: StatusSource, startTime: number = Date.now()): express.Application {
  const app = express();

  // Health check: degraded once failures have reached the escalation threshold
  app.get('/health', (_req, res) => {
    const status = source.getStatus();
    res.json({
      status: status.consecutiveFailures >= ESCALATION_FIRST_AT ? 'degraded' : 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
    });
  });

  app.get('/status', (_req, res) => {
    res.json(source.getStatus());
  });

  app.use((req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
  });

  app.use(errorHandler);

  return app;
}
