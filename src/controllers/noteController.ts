// ============================================
// src/controllers/noteController.ts
// ============================================

import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { asyncHandler } from '../middlewares/asyncHandler';
import { DocumentStore } from '../db/documentStore';
import { NoteInput, defaultNote, toNoteRecord } from '../models/Note';
import { toWire } from '../utils/serialize';

export const createNoteController = (store: DocumentStore) => ({
  // ==============================
  // @desc    Save a user's note for a module (last write wins)
  // @route   POST /api/notes
  // ==============================
  saveNote: asyncHandler(async (req: Request, res: Response) => {
    const note = toNoteRecord(matchedData<NoteInput>(req, { locations: ['body'] }));
    const stored = await store.upsertOne('note', { user_id: note.user_id, module_id: note.module_id }, note);
    res.status(200).json(toWire(stored));
  }),

  // ==============================
  // @desc    Get a note, or an empty one if none saved yet
  // @route   GET /api/notes?user_id=&module_id=
  // ==============================
  getNote: asyncHandler(async (req: Request, res: Response) => {
    const { user_id, module_id } = matchedData<{ user_id: string; module_id: string }>(req, {
      locations: ['query'],
    });

    const stored = await store.findOne('note', { user_id, module_id });
    res.status(200).json(stored ? toWire(stored) : defaultNote(user_id, module_id));
  }),
});
