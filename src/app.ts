// ============================================
// src/app.ts - Express application
// ============================================

import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { AppConfig } from './config/env';
import { DocumentStore } from './db/documentStore';

import { createSystemRouter } from './routes/systemRouter';
import { createModuleRouter } from './routes/moduleRouter';
import { createProgressRouter } from './routes/progressRouter';
import { createNoteRouter } from './routes/noteRouter';

import { createApiLimiter } from './middlewares/rateLimiter';
import { errorHandler } from './middlewares/errorHandler';
import { notFound } from './middlewares/notFound';

export interface AppDependencies {
  store: DocumentStore;
  config: AppConfig;
}

export const createApp = ({ store, config }: AppDependencies): Application => {
  const app = express();

  // ============================================
  // MIDDLEWARE CONFIGURATION
  // ============================================
  app.use(
    helmet({
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );

  // Any origin, method and header
  app.use(cors());

  app.use(express.json({ limit: '1mb' }));

  if (config.nodeEnv === 'development') app.use(morgan('dev'));
  else if (config.nodeEnv !== 'test') app.use(morgan('combined'));

  app.use('/api/', createApiLimiter(config.rateLimitMax));

  // ============================================
  // ROUTES
  // ============================================
  app.use('/', createSystemRouter(store, config));
  app.use('/api/modules', createModuleRouter(store));
  app.use('/api/progress', createProgressRouter(store));
  app.use('/api/notes', createNoteRouter(store));

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
