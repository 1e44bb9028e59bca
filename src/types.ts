import type { Timer } from './utils/profiling';

// --- Core Types ---

export type Vector = Float32Array | number[];

/**
 * Vector value supplied by callers and handed back from queries
 */
export interface VectorData {
  id: string;
  vector: Vector;
  metadata?: Record<string, unknown>;
}

/**
 * One vector's presence at one level of the graph
 */
export interface IndexNode {
  readonly id: string;
  readonly data: VectorData;
  readonly level: number;
  readonly sequence: number; // Shared by every level object of one insertion
  readonly neighbors: readonly string[];
}

export type Level = Map<string, IndexNode>;

export interface LevelSearchResult {
  id: string;
  dist: number;
  level: number; // Level the candidate was collected from
  data: VectorData;
}

// --- Logging ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// --- Configuration ---

export interface IndexSettings {
  maxNeighbors: number;
  maxLevels: number;
  levelProbability: number;
  seed?: number;
}

export interface SearchSettings {
  defaultK: number;
  cacheSize: number; // 0 disables the query cache
}

export interface LoggingSettings {
  level: LogLevel;
}

export interface IndexConfiguration {
  index: IndexSettings;
  search: SearchSettings;
  logging: LoggingSettings;
}

export type PartialIndexConfiguration = {
  [K in keyof IndexConfiguration]?: IndexConfiguration[K] extends object ? Partial<IndexConfiguration[K]> : IndexConfiguration[K];
};

/**
 * LevelIndex options interface
 */
export interface LevelIndexOptions {
  levelProbability?: number; // Chance of promoting a node one level up
  seed?: number; // Seed for the built-in generator
  random?: () => number; // Custom source in [0, 1), wins over seed
  cacheSize?: number;
  defaultK?: number; // k used when a query omits it
  timer?: Timer;
}

export interface LevelIndexStats {
  totalNodes: number;
  maxNeighbors: number;
  maxLevels: number;
  levelProbability: number;
  nodesPerLevel: number[];
  avgNeighborsPerLevel: number[];
  danglingNeighbors: number;
  lastInsertMs?: number;
  lastSearchMs?: number;
  cache: {
    size: number;
    max: number;
  };
}

// --- Events ---

export type LevelIndexEventData = {
  'vector:add': { id: string; levels: number[] };
  'vector:update': { id: string; levels: number[] };
  'vector:delete': { id: string };
  'index:close': Record<string, never>;
};

export interface TypedEventEmitter<Events extends Record<string, unknown>> {
  on<E extends keyof Events>(event: E, listener: (payload: Events[E]) => void): this;
  once<E extends keyof Events>(event: E, listener: (payload: Events[E]) => void): this;
  off<E extends keyof Events>(event: E, listener: (payload: Events[E]) => void): this;
  emit<E extends keyof Events>(event: E, payload: Events[E]): boolean;
  listenerCount<E extends keyof Events>(event: E): number;
  listeners<E extends keyof Events>(event: E): ((payload: Events[E]) => void)[];
  removeAllListeners<E extends keyof Events>(event?: E): this;
}

// --- Profiling ---

export interface TimerData {
  start: [number, number];
  splits: { label: string | null; elapsed: number }[];
  lastDuration?: number; // Store the duration of the last stop
}

export interface TimerResult {
  total: number;
  splits: { label: string | null; elapsed: number }[];
}
