// ============================================
// src/config/database.ts - MongoDB connection
// ============================================

import mongoose from 'mongoose';
import { AppConfig } from './env';
import { DocumentStore } from '../db/documentStore';
import { MongoStore } from '../db/mongoStore';
import { UnavailableStore } from '../db/unavailableStore';
import { Logger } from '../utils/loggers';
import { errorMessage } from '../utils/errors';

/**
 * Connects the default Mongoose connection and wraps it in a MongoStore.
 * Never rejects: without a URL, or when the first connection attempt fails,
 * the server runs on an UnavailableStore and /test reports the problem.
 */
export const connectDB = async (config: AppConfig): Promise<DocumentStore> => {
  if (!config.databaseUrl) {
    Logger.warning('DATABASE_URL is not set, running without a database');
    return new UnavailableStore('DATABASE_URL is not set');
  }

  try {
    await mongoose.connect(config.databaseUrl, { dbName: config.databaseName });
    Logger.success(`MongoDB connected (${mongoose.connection.name})`);

    mongoose.connection.on('error', (err) => Logger.error('MongoDB error', err));
    mongoose.connection.on('disconnected', () => Logger.warning('MongoDB disconnected'));
    mongoose.connection.on('reconnected', () => Logger.info('MongoDB reconnected'));

  } catch (error) {
    Logger.error('MongoDB connection failed', error);
    return new UnavailableStore(`MongoDB connection failed: ${errorMessage(error)}`);
  }

  const store = new MongoStore(mongoose.connection);
  try {
    await store.ensureIndexes();
    Logger.debug('Collection indexes are in place');
  } catch (error) {
    // e.g. existing duplicate (user_id, module_id) pairs block the unique index
    Logger.warning('Could not build collection indexes', errorMessage(error));
  }
  return store;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
};
