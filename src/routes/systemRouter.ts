import express, { Router } from 'express';
import { DocumentStore } from '../db/documentStore';
import { AppConfig } from '../config/env';
import { createSystemController } from '../controllers/systemController';

export const createSystemRouter = (store: DocumentStore, config: AppConfig): Router => {
  const systemRouter = express.Router();
  const { getRoot, getDiagnostics, seedModules } = createSystemController(store, config);

  systemRouter.get('/', getRoot);
  systemRouter.get('/test', getDiagnostics);
  systemRouter.post('/api/seed', seedModules);

  return systemRouter;
};
