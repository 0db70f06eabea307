// ============================================
// src/controllers/moduleController.ts
// ============================================

import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { asyncHandler } from '../middlewares/asyncHandler';
import { DEFAULT_LIMIT, DocumentStore, StoredDocument } from '../db/documentStore';
import { ModuleInput, toModuleRecord } from '../models/Module';
import { BadRequestError, NotFoundError, errorMessage } from '../utils/errors';
import { toWire } from '../utils/serialize';

export const createModuleController = (store: DocumentStore) => ({
  // ==============================
  // @desc    Create module
  // @route   POST /api/modules
  // ==============================
  createModule: asyncHandler(async (req: Request, res: Response) => {
    const module = toModuleRecord(matchedData<ModuleInput>(req, { locations: ['body'] }));
    const id = await store.insert('module', module);
    res.status(200).json({ id });
  }),

  // ==============================
  // @desc    List modules, at most `limit` (default 50)
  // @route   GET /api/modules
  // ==============================
  listModules: asyncHandler(async (req: Request, res: Response) => {
    const { limit } = matchedData<{ limit?: number }>(req, { locations: ['query'] });
    const modules = await store.findMany('module', {}, limit ?? DEFAULT_LIMIT);
    res.status(200).json(modules.map(toWire));
  }),

  // ==============================
  // @desc    Get one module
  // @route   GET /api/modules/:id
  // ==============================
  getModuleById: asyncHandler(async (req: Request, res: Response) => {
    let module: StoredDocument | null;
    try {
      module = await store.findById('module', req.params.id);
    } catch (error) {
      // Malformed ids and storage faults alike answer 400 on this route
      throw new BadRequestError(errorMessage(error));
    }

    if (!module) {
      throw new NotFoundError('Module not found');
    }

    res.status(200).json(toWire(module));
  }),
});
