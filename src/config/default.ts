// src/config/default.ts
import { IndexConfiguration, LogLevel } from '../types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = process.env[name]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? fallback;
}

/**
 * Default configuration for the level index.
 * THIS IS THE SINGLE SOURCE OF TRUTH FOR DEFAULTS.
 */
export const defaultIndexConfiguration: IndexConfiguration = {
  index: {
    maxNeighbors: 5,
    maxLevels: 4,
    levelProbability: 0.5,
    seed: envNumber('STRATA_SEED'),
  },

  search: {
    defaultK: 10,
    cacheSize: envNumber('STRATA_CACHE_SIZE') ?? 1000,
  },

  logging: {
    level: envLogLevel('STRATA_LOG_LEVEL', 'info'),
  },
};
