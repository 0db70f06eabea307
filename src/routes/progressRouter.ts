// ============================================
// src/routes/progressRouter.ts
// ============================================

import express, { Router } from 'express';
import { DocumentStore } from '../db/documentStore';
import { createProgressController } from '../controllers/progressController';
import { progressValidation, validateRequest } from '../middlewares/validation';

export const createProgressRouter = (store: DocumentStore): Router => {
  const progressRouter = express.Router();
  const { saveProgress, getProgress } = createProgressController(store);

  progressRouter.post('/', progressValidation.save, validateRequest, saveProgress);
  progressRouter.get('/', progressValidation.lookup, validateRequest, getProgress);

  return progressRouter;
};
