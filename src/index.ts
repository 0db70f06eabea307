// ============================================
// src/index.ts - Main Server Entry Point
// ============================================

import http from 'http';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadConfig } from './config/env';
import { connectDB, disconnectDB } from './config/database';
import { createApp } from './app';
import { Logger } from './utils/loggers';

const SHUTDOWN_TIMEOUT_MS = 10000;

const start = async (): Promise<void> => {
  const config = loadConfig();
  const store = await connectDB(config);
  const server = http.createServer(createApp({ store, config }));

  // ============================================
  // GRACEFUL SHUTDOWN
  // ============================================
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    Logger.info(`${signal} received. Shutting down gracefully...`);

    // Force shutdown safety net
    setTimeout(() => {
      Logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    try {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      Logger.success('HTTP server closed');

      if (store.connected) {
        await disconnectDB();
        Logger.success('MongoDB connection closed');
      }
      process.exit(0);
    } catch (error) {
      Logger.error('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  server.listen(config.port, () => {
    Logger.success(`Server running in ${config.nodeEnv} mode on port ${config.port}`);
  });
};

process.on('unhandledRejection', (reason: unknown) => {
  Logger.error('UNHANDLED REJECTION', reason);
});

start().catch((error: unknown) => {
  Logger.error('Failed to start server', error);
  process.exit(1);
});
