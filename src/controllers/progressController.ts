// ============================================
// src/controllers/progressController.ts
// ============================================

import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { asyncHandler } from '../middlewares/asyncHandler';
import { DocumentStore } from '../db/documentStore';
import { ProgressInput, defaultProgress, toProgressRecord } from '../models/Progress';
import { toWire } from '../utils/serialize';

export const createProgressController = (store: DocumentStore) => ({
  // ==============================
  // @desc    Save viewing progress (one record per user and module)
  // @route   POST /api/progress
  // ==============================
  saveProgress: asyncHandler(async (req: Request, res: Response) => {
    const progress = toProgressRecord(matchedData<ProgressInput>(req, { locations: ['body'] }));
    const stored = await store.upsertOne(
      'progress',
      { user_id: progress.user_id, module_id: progress.module_id },
      progress
    );
    res.status(200).json(toWire(stored));
  }),

  // ==============================
  // @desc    Get progress, or zeroed defaults if none saved yet
  // @route   GET /api/progress?user_id=&module_id=
  // ==============================
  getProgress: asyncHandler(async (req: Request, res: Response) => {
    const { user_id, module_id } = matchedData<{ user_id: string; module_id: string }>(req, {
      locations: ['query'],
    });

    const stored = await store.findOne('progress', { user_id, module_id });
    res.status(200).json(stored ? toWire(stored) : defaultProgress(user_id, module_id));
  }),
});
