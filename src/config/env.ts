// ============================================
// src/config/env.ts
// ============================================

export interface AppConfig {
  nodeEnv: string;
  port: number;
  databaseUrl?: string;
  databaseName?: string;
  rateLimitMax: number; // requests per IP per 15 minutes on /api/
}

const DEFAULT_PORT = 8000;
const DEFAULT_RATE_LIMIT_MAX = 300;

const positiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

// Empty strings count as unset
const optional = (value: string | undefined): string | undefined =>
  value && value.trim() !== '' ? value : undefined;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  nodeEnv: env.NODE_ENV || 'development',
  port: positiveInt(env.PORT, DEFAULT_PORT),
  databaseUrl: optional(env.DATABASE_URL),
  databaseName: optional(env.DATABASE_NAME),
  rateLimitMax: positiveInt(env.RATE_LIMIT_MAX, DEFAULT_RATE_LIMIT_MAX),
});
