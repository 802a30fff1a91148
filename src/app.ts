import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { env } from './config/env';
import { stream } from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestIdMiddleware, requestLogger } from './middleware/request-logger';
import { createChatRouter } from './routes/chat.routes';
import { createHealthRouter } from './routes/health.routes';
import { Assistant } from './services/assistant';

export const createApp = (assistant: Assistant): Application => {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production',
      crossOriginEmbedderPolicy: env.NODE_ENV === 'production'
    })
  );

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id']
    })
  );

  app.use(express.json({ limit: '100kb' }));

  if (env.NODE_ENV !== 'test') {
    app.use(morgan('combined', { stream }));
  }

  app.use(requestIdMiddleware);
  app.use(requestLogger);

  app.use('/api/health', createHealthRouter(assistant));
  app.use('/chat', createChatRouter(assistant));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Banking Assistant',
      version: '1.0.0',
      status: 'running',
      endpoints: ['POST /chat', 'GET /chat/approvals', 'POST /chat/approvals/:id', 'GET /api/health'],
      timestamp: new Date().toISOString()
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

// Extend Express Request type to include id
declare global {
  namespace Express {
    interface Request {
      id?: string;
    }
  }
}
