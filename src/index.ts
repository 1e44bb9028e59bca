import LevelIndex from './ann/level_index';
import { createConfig, defaultIndexConfiguration } from './config';
import { IndexError, VectorNotFoundError } from './errors';
import { euclidean } from './utils/distance_metrics';
import { log, setLogLevel, getLogLevel } from './utils/log';
import { createTimer } from './utils/profiling';
import { createSeededRandom } from './utils/random';

export * from './types';
export type { IndexErrorCode } from './errors';
export type { Timer } from './utils/profiling';
export {
  // Core index
  LevelIndex,

  // Errors
  IndexError,
  VectorNotFoundError,

  // Distance
  euclidean,

  // Configuration
  createConfig,
  defaultIndexConfiguration,

  // Utils
  createTimer,
  createSeededRandom,
  log,
  setLogLevel,
  getLogLevel,
};
