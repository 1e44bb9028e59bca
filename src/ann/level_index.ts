import { EventEmitter } from 'events';
import { LRUCache } from 'lru-cache';
import config, { createConfig } from '../config';
import { VectorNotFoundError } from '../errors';
import {
  IndexNode,
  Level,
  LevelIndexEventData,
  LevelIndexOptions,
  LevelIndexStats,
  LevelSearchResult,
  PartialIndexConfiguration,
  TypedEventEmitter,
  Vector,
  VectorData,
} from '../types';
import { euclidean } from '../utils/distance_metrics';
import { log } from '../utils/log';
import { createTimer, Timer } from '../utils/profiling';
import { createSeededRandom } from '../utils/random';

interface RankedNode {
  node: IndexNode;
  dist: number;
}

const INSERT_TIMER = 'level_index_insert';
const SEARCH_TIMER = 'level_index_search';

function toValues(query: Vector | VectorData): Vector {
  return Array.isArray(query) || query instanceof Float32Array ? query : query.vector;
}

function copyResult(result: LevelSearchResult): LevelSearchResult {
  return { ...result };
}

// Ascending distance, earlier insertion first on ties
function byDistance(a: RankedNode, b: RankedNode): number {
  return a.dist - b.dist || a.node.sequence - b.node.sequence;
}

/**
 * Multi-level graph index for approximate nearest neighbor search.
 *
 * Every vector lives in the bottom level (`maxLevels - 1`) and is promoted one
 * level at a time towards level 0 while a coin flip with `levelProbability`
 * succeeds. Each placement gets its own node object whose neighbor list holds
 * the `maxNeighbors` closest nodes already on that level. Edges are directed:
 * placing a node never rewrites the lists of the nodes it points at.
 *
 * Queries scan every level linearly, bottom first, append each level's `k`
 * closest nodes and cut the concatenation to `k`. Omitting `k` uses the
 * `defaultK` option.
 *
 * Adding an ID that is already present does not fail: its earlier placements
 * are removed and the vector is inserted afresh, with only a `warn` log line
 * to report the replacement. Use `hasVector` first to reject duplicates.
 *
 * @example
 * ```typescript
 * const index = new LevelIndex(5, 4, { seed: 42 });
 *
 * index.addVector('a', { id: 'a', vector: [0, 0, 1] });
 * index.addVector('b', { id: 'b', vector: [0, 1, 0] });
 *
 * const nearest = index.nearestNeighbors([0, 0, 0.9], 1); // [{ id: 'a', ... }]
 * index.updateVector('b', { id: 'b', vector: [1, 0, 0] });
 * index.deleteVector('a');
 * ```
 *
 * @fires vector:add - When a vector is inserted
 * @fires vector:update - When a vector is replaced through updateVector
 * @fires vector:delete - When a present vector is removed
 * @fires index:close - When the index is cleared by close()
 *
 * @extends EventEmitter
 */
export class LevelIndex extends (EventEmitter as new () => TypedEventEmitter<LevelIndexEventData>) {
  readonly maxNeighbors: number;
  readonly maxLevels: number;
  readonly levelProbability: number;
  private nodes: Map<string, IndexNode>; // Bottom-level node per ID
  private levels: Array<Level | undefined>;
  private defaultK: number;
  private random: () => number;
  private sequence: number;
  private searchCache: LRUCache<string, LevelSearchResult[]> | null;
  private timer: Timer;

  constructor(maxNeighbors: number, maxLevels: number, options: LevelIndexOptions = {}) {
    super();
    this.maxNeighbors = maxNeighbors;
    this.maxLevels = maxLevels;
    this.levelProbability = options.levelProbability ?? config.index.levelProbability;

    const seed = options.seed ?? config.index.seed;
    this.random = options.random ?? (seed !== undefined ? createSeededRandom(seed) : Math.random);

    this.nodes = new Map();
    this.levels = Array.from({ length: Math.max(0, maxLevels) }, () => undefined);
    this.sequence = 0;
    this.defaultK = options.defaultK ?? config.search.defaultK;
    this.timer = options.timer ?? createTimer();

    const cacheSize = Math.floor(options.cacheSize ?? config.search.cacheSize);
    this.searchCache = cacheSize >= 1 ? new LRUCache<string, LevelSearchResult[]>({ max: cacheSize }) : null;

    log('debug', `[LevelIndex] Created with maxNeighbors=${maxNeighbors}, maxLevels=${maxLevels}, cacheSize=${this.searchCache ? cacheSize : 0}`);
  }

  /**
   * Build an index from a partial configuration merged over the defaults
   */
  static fromConfig(userConfig: PartialIndexConfiguration = {}): LevelIndex {
    const resolved = createConfig(userConfig);
    return new LevelIndex(resolved.index.maxNeighbors, resolved.index.maxLevels, {
      levelProbability: resolved.index.levelProbability,
      seed: resolved.index.seed,
      cacheSize: resolved.search.cacheSize,
      defaultK: resolved.search.defaultK,
    });
  }

  /**
   * Insert a vector under `id`. An ID that is already present has its earlier
   * placements removed first.
   */
  addVector(id: string, data: VectorData): void {
    this.timer.start(INSERT_TIMER);

    if (this.nodes.has(id)) {
      log('warn', `[LevelIndex] Vector with id ${id} already exists, replacing it`);
      this._removePlacements(id);
    }
    const levels = this._insert(id, data);
    this._invalidateCache();

    this.timer.stop(INSERT_TIMER);
    this.emit('vector:add', { id, levels });
  }

  /**
   * Replace the vector stored under `id` with a fresh placement
   * @throws VectorNotFoundError when `id` is not in the index
   */
  updateVector(id: string, data: VectorData): void {
    if (!this.nodes.has(id)) {
      log('warn', `[LevelIndex] Attempted to update non-existent vector ID: ${id}`);
      throw new VectorNotFoundError(id);
    }

    this.timer.start(INSERT_TIMER);
    this._removePlacements(id);
    const levels = this._insert(id, data);
    this._invalidateCache();

    this.timer.stop(INSERT_TIMER);
    this.emit('vector:update', { id, levels });
  }

  /**
   * Remove `id` from every level. Neighbor lists of other nodes keep the ID.
   * @returns True if the vector was present
   */
  deleteVector(id: string): boolean {
    const deleted = this._removePlacements(id);
    if (deleted) {
      this._invalidateCache();
      this.emit('vector:delete', { id });
    }
    return deleted;
  }

  /**
   * Find up to k nearest vectors, level by level from the bottom
   * @returns Vectors ordered by level first, then by distance
   */
  nearestNeighbors(query: Vector | VectorData, k: number = this.defaultK): VectorData[] {
    return this.findNearest(query, k).map((result) => result.data);
  }

  /**
   * Same search as nearestNeighbors, keeping the ID, distance and level of
   * every hit
   */
  findNearest(query: Vector | VectorData, k: number = this.defaultK): LevelSearchResult[] {
    const limit = Math.floor(k);
    if (!(limit > 0)) return [];

    const values = toValues(query);
    const cacheKey = this.searchCache ? `${limit}:${Array.from(values).join(',')}` : '';
    const cached = this.searchCache?.get(cacheKey);
    if (cached) return cached.map(copyResult);

    this.timer.start(SEARCH_TIMER);
    const results: LevelSearchResult[] = [];

    for (let levelIndex = this.levels.length - 1; levelIndex >= 0; levelIndex--) {
      const level = this.levels[levelIndex];
      if (!level) continue;

      for (const { node, dist } of this._rank(values, level).slice(0, limit)) {
        results.push({ id: node.id, dist, level: levelIndex, data: node.data });
      }
    }

    const topK = results.slice(0, limit);
    this.timer.stop(SEARCH_TIMER);

    this.searchCache?.set(cacheKey, topK.map(copyResult));
    return topK;
  }

  hasVector(id: string): boolean {
    return this.nodes.has(id);
  }

  getVector(id: string): VectorData | null {
    return this.nodes.get(id)?.data ?? null;
  }

  /**
   * Get the node object for `id` at a level (bottom level by default)
   */
  getNode(id: string, level: number = this.maxLevels - 1): IndexNode | null {
    return this.levels[level]?.get(id) ?? null;
  }

  /**
   * Neighbor IDs of `id` at a level that are still present on that level
   */
  getNeighbors(id: string, level: number = this.maxLevels - 1): string[] {
    const table = this.levels[level];
    const node = table?.get(id);
    if (!table || !node) return [];

    return node.neighbors.filter((neighborId) => table.has(neighborId));
  }

  /**
   * Levels `id` resides on, in ascending order
   */
  getLevels(id: string): number[] {
    const found: number[] = [];
    this.levels.forEach((level, index) => {
      if (level?.has(id)) found.push(index);
    });
    return found;
  }

  getLevelSize(level: number): number {
    return this.levels[level]?.size ?? 0;
  }

  getNodeCount(): number {
    return this.nodes.size;
  }

  /**
   * Get index statistics
   */
  getStats(): LevelIndexStats {
    const nodesPerLevel: number[] = [];
    const avgNeighborsPerLevel: number[] = [];
    let danglingNeighbors = 0;

    for (const level of this.levels) {
      let totalNeighbors = 0;
      for (const node of level?.values() ?? []) {
        totalNeighbors += node.neighbors.length;
        for (const neighborId of node.neighbors) {
          if (!level?.has(neighborId)) danglingNeighbors++;
        }
      }
      const size = level?.size ?? 0;
      nodesPerLevel.push(size);
      avgNeighborsPerLevel.push(size > 0 ? totalNeighbors / size : 0);
    }

    return {
      totalNodes: this.nodes.size,
      maxNeighbors: this.maxNeighbors,
      maxLevels: this.maxLevels,
      levelProbability: this.levelProbability,
      nodesPerLevel,
      avgNeighborsPerLevel,
      danglingNeighbors,
      lastInsertMs: this.timer.getDuration(INSERT_TIMER),
      lastSearchMs: this.timer.getDuration(SEARCH_TIMER),
      cache: {
        size: this.searchCache?.size ?? 0,
        max: this.searchCache?.max ?? 0,
      },
    };
  }

  /**
   * Drop every vector and cached result
   */
  close(): void {
    this.nodes.clear();
    this.levels.fill(undefined);
    this.searchCache?.clear();
    this.emit('index:close', {});
  }

  /**
   * Place a new vector on the bottom level and promote it upwards
   * @returns Levels the vector was placed on, ascending
   * @private
   */
  private _insert(id: string, data: VectorData): number[] {
    let level = this.maxLevels - 1;
    if (level < 0) return [];

    const sequence = this.sequence++;
    const bottomNode = this._addNodeToLevel(id, data, sequence, level);
    const placed = [level];

    while (level > 0 && this.random() < this.levelProbability) {
      level--;
      this._addNodeToLevel(id, data, sequence, level);
      placed.push(level);
    }

    this.nodes.set(id, bottomNode);
    return placed.reverse();
  }

  /**
   * Create the node for one level, linking it to the closest nodes there
   * @private
   */
  private _addNodeToLevel(id: string, data: VectorData, sequence: number, levelIndex: number): IndexNode {
    let level = this.levels[levelIndex];
    if (!level) {
      level = new Map();
      this.levels[levelIndex] = level;
    }

    const neighbors = this._rank(data.vector, level, id)
      .slice(0, Math.max(0, this.maxNeighbors))
      .map(({ node }) => node.id);

    const node: IndexNode = { id, data, level: levelIndex, sequence, neighbors };
    level.set(id, node);
    return node;
  }

  /**
   * Distance from `values` to every node of a level, closest first
   * @private
   */
  private _rank(values: Vector, level: Level, excludeId?: string): RankedNode[] {
    const ranked: RankedNode[] = [];
    for (const node of level.values()) {
      if (node.id === excludeId) continue;
      ranked.push({ node, dist: euclidean(values, node.data.vector) });
    }
    return ranked.sort(byDistance);
  }

  /**
   * @returns True if `id` was found on any level
   * @private
   */
  private _removePlacements(id: string): boolean {
    let removed = this.nodes.delete(id);
    for (const level of this.levels) {
      if (level?.delete(id)) removed = true;
    }
    return removed;
  }

  private _invalidateCache(): void {
    this.searchCache?.clear();
  }
}

export default LevelIndex;
