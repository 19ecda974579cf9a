import { ReadWriteLock } from './ReadWriteLock';
import { NodeRecord, NodeSnapshotSource, NodeStoreStats } from '../types';
import { Clock, RandomSource, randomInt } from '../common/utils';

/** Exclusive upper bound of a node's value */
export const MAX_NODE_VALUE = 100;

export interface NodeStoreOptions {
  random?: RandomSource;
  clock?: Clock;
  nameFor?: (id: number) => string;
}

export function defaultNodeName(id: number): string {
  return `Node-${id}`;
}

function copyRecord(record: NodeRecord): NodeRecord {
  return { ...record, timestamp: new Date(record.timestamp.getTime()) };
}

/**
 * Fixed-size collection of node records guarded by a single reader/writer lock.
 *
 * Every read and write goes through the lock: snapshots share it, while
 * initialize and updateRandom hold it exclusively.
 */
export class NodeStore implements NodeSnapshotSource {
  private nodes: NodeRecord[] = [];
  private initialized = false;
  private generation = 0;
  private updates = 0;
  private readonly lock = new ReadWriteLock();
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly nameFor: (id: number) => string;

  constructor(options: NodeStoreOptions = {}) {
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
    this.nameFor = options.nameFor ?? defaultNodeName;
  }

  /**
   * Replace the whole collection with count freshly generated records.
   * Snapshots taken before the call belong to the previous generation.
   */
  async initialize(count: number): Promise<void> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error(`Node count must be a positive integer, got ${count}`);
    }

    await this.lock.withWrite(() => {
      const nodes: NodeRecord[] = [];
      for (let id = 0; id < count; id++) {
        nodes.push({
          id,
          name: this.nameFor(id),
          value: randomInt(MAX_NODE_VALUE, this.random),
          timestamp: this.clock()
        });
      }

      this.nodes = nodes;
      this.initialized = true;
      this.generation++;
      this.updates = 0;
    });
  }

  /**
   * Point-in-time copy of every record, in ascending id order
   */
  async snapshot(): Promise<NodeRecord[]> {
    return this.lock.withRead(() => {
      this.assertInitialized('snapshot');
      return this.nodes.map(copyRecord);
    });
  }

  /**
   * Rewrite value and timestamp of one uniformly chosen record.
   * Resolves with a copy of the record as written.
   */
  async updateRandom(): Promise<NodeRecord> {
    return this.lock.withWrite(() => {
      this.assertInitialized('updateRandom');

      const index = randomInt(this.nodes.length, this.random);
      const current = this.nodes[index];
      const now = this.clock().getTime();

      // Timestamps never move backwards, even if the wall clock does
      const updated: NodeRecord = {
        ...current,
        value: randomInt(MAX_NODE_VALUE, this.random),
        timestamp: new Date(Math.max(now, current.timestamp.getTime()))
      };

      this.nodes[index] = updated;
      this.updates++;
      return copyRecord(updated);
    });
  }

  getStats(): NodeStoreStats {
    return {
      nodeCount: this.nodes.length,
      generation: this.generation,
      updates: this.updates
    };
  }

  private assertInitialized(operation: string): void {
    if (!this.initialized) {
      throw new Error(`NodeStore.${operation}() called before initialize()`);
    }
  }
}
