import express, { Express, Request, Response, NextFunction } from 'express';
import { toErrorResponse } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { createBookingRouter, createSlotsRouter } from './routes/booking.route.js';
import { createChatRouter } from './routes/chat.route.js';
import { BookingSessionMachine } from './services/booking-session.service.js';
import { IdempotencyService } from './services/idempotency.service.js';
import { ReconciliationEngine } from './services/reconciliation.service.js';
import { ApiResponse, ErrorCode } from './types/index.js';

export interface AppDeps {
  engine: ReconciliationEngine;
  sessions: BookingSessionMachine;
  idempotency: IdempotencyService;
}

export function createApp({ engine, sessions, idempotency }: AppDeps): Express {
  const app = express();

  app.use(express.json());

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} | ${res.statusCode} | ${duration}ms`);
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: engine.degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/slots', createSlotsRouter(engine));
  app.use('/api/appointments', createBookingRouter({ engine, idempotency }));
  app.use('/api/chat', createChatRouter(sessions));

  app.use((req, res) => {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.NOT_FOUND,
        message: `Endpoint ${req.method} ${req.path} not found`,
      },
    };
    res.status(404).json(response);
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      logger.error(`Unhandled error on ${req.method} ${req.path}:`, err);
    }
    res.status(status).json(body);
  });

  return app;
}
