import 'dotenv/config';
import { fileURLToPath } from 'node:url';

const DEFAULT_HELP_PATH = fileURLToPath(new URL('../README.md', import.meta.url));

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export const config = {
  port: intFromEnv('PORT', 9990),
  host: process.env.HOST || '0.0.0.0',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  redisKeyPrefix: process.env.REDIS_KEY_PREFIX || 'paste:',
  trustProxy: process.env.TRUST_PROXY === 'true',
  helpPath: process.env.HELP_PATH || DEFAULT_HELP_PATH,
  names: {
    length: intFromEnv('NAME_LENGTH', 3),
    maxAttempts: 1000,
  },
  // request body limits, bytes
  limits: {
    uploadBytes: 2 * 1024 * 1024,
    editBytes: 10 * 1024 * 1024,
  },
  reaper: {
    intervalSeconds: intFromEnv('REAPER_INTERVAL_S', 60 * 60),
    graceSeconds: intFromEnv('REAPER_GRACE_S', 4 * 60 * 60),
  },
};
