// ============================================
// src/routes/moduleRouter.ts
// ============================================

import express, { Router } from 'express';
import { DocumentStore } from '../db/documentStore';
import { createModuleController } from '../controllers/moduleController';
import { moduleValidation, validateRequest } from '../middlewares/validation';

export const createModuleRouter = (store: DocumentStore): Router => {
  const moduleRouter = express.Router();
  const { createModule, listModules, getModuleById } = createModuleController(store);

  moduleRouter.post('/', moduleValidation.create, validateRequest, createModule);
  moduleRouter.get('/', moduleValidation.list, validateRequest, listModules);
  moduleRouter.get('/:id', getModuleById);

  return moduleRouter;
};
