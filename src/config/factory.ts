// src/config/factory.ts
import { IndexConfiguration, PartialIndexConfiguration } from '../types';
import { defaultIndexConfiguration } from './default';

/**
 * Creates a full configuration by merging defaults with user options.
 * Values left undefined fall back to the defaults.
 */
export function createConfig(userConfig: PartialIndexConfiguration = {}): IndexConfiguration {
  const defaults = defaultIndexConfiguration;
  const { index = {}, search = {}, logging = {} } = userConfig;

  return {
    index: {
      maxNeighbors: index.maxNeighbors ?? defaults.index.maxNeighbors,
      maxLevels: index.maxLevels ?? defaults.index.maxLevels,
      levelProbability: index.levelProbability ?? defaults.index.levelProbability,
      seed: index.seed ?? defaults.index.seed,
    },
    search: {
      defaultK: search.defaultK ?? defaults.search.defaultK,
      cacheSize: search.cacheSize ?? defaults.search.cacheSize,
    },
    logging: {
      level: logging.level ?? defaults.logging.level,
    },
  };
}
