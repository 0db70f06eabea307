// ============================================
// src/controllers/systemController.ts - liveness, diagnostics, seeding
// ============================================

import { Request, Response } from 'express';
import { asyncHandler } from '../middlewares/asyncHandler';
import { DocumentStore } from '../db/documentStore';
import { AppConfig } from '../config/env';
import { sampleModules } from '../seeds/sampleModules';
import { errorMessage, truncate } from '../utils/errors';

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

const MAX_REPORTED_COLLECTIONS = 10;
const MAX_REPORTED_ERROR = 50;

/**
 * Best-effort status report for a status page. Resolves in every case:
 * whatever goes wrong ends up described in the `database` field.
 */
export const buildDiagnostics = async (
  store: DocumentStore,
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName'>
): Promise<DiagnosticsReport> => {
  const report: DiagnosticsReport = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: config.databaseUrl ? '✅ Set' : '❌ Not Set',
    database_name: config.databaseName ? '✅ Set' : '❌ Not Set',
    connection_status: 'Not Connected',
    collections: [],
  };

  try {
    if (!store.connected) {
      report.database = '⚠️  Available but not initialized';
      return report;
    }

    report.database = '✅ Available';
    report.connection_status = 'Connected';
    try {
      const collections = await store.listCollections();
      report.collections = collections.slice(0, MAX_REPORTED_COLLECTIONS);
      report.database = '✅ Connected & Working';
    } catch (error) {
      report.database = `⚠️  Connected but Error: ${truncate(errorMessage(error), MAX_REPORTED_ERROR)}`;
    }
  } catch (error) {
    report.database = `❌ Error: ${truncate(errorMessage(error), MAX_REPORTED_ERROR)}`;
  }

  return report;
};

export const createSystemController = (store: DocumentStore, config: AppConfig) => ({
  // @route   GET /
  getRoot: (_req: Request, res: Response): void => {
    res.status(200).json({ message: 'Teacher Training API running' });
  },

  // @route   GET /test
  getDiagnostics: asyncHandler(async (_req: Request, res: Response) => {
    res.status(200).json(await buildDiagnostics(store, config));
  }),

  // ==============================
  // @desc    Insert the sample modules, only into an empty collection
  // @route   POST /api/seed
  // ==============================
  seedModules: asyncHandler(async (_req: Request, res: Response) => {
    const existing = await store.count('module');
    if (existing > 0) {
      res.status(200).json({ status: 'ok', message: 'Modules already exist', count: existing });
      return;
    }

    for (const module of sampleModules) {
      await store.insert('module', module);
    }

    res.status(200).json({ status: 'ok', inserted: sampleModules.length });
  }),
});
