// ============================================
// src/routes/noteRouter.ts
// ============================================

import express, { Router } from 'express';
import { DocumentStore } from '../db/documentStore';
import { createNoteController } from '../controllers/noteController';
import { noteValidation, validateRequest } from '../middlewares/validation';

export const createNoteRouter = (store: DocumentStore): Router => {
  const noteRouter = express.Router();
  const { saveNote, getNote } = createNoteController(store);

  noteRouter.post('/', noteValidation.save, validateRequest, saveNote);
  noteRouter.get('/', noteValidation.lookup, validateRequest, getNote);

  return noteRouter;
};
