/**
 * Type definitions for the distributed system simulator
 */

import type { LoggingConfig } from './common/logger';

export interface NodeRecord {
  id: number;
  name: string;
  value: number;
  timestamp: Date;
}

/**
 * JSON shape of a node record on the wire; key order is part of the format
 */
export interface WireNodeRecord {
  id: number;
  name: string;
  value: number;
  time: string;
}

export interface NodeSnapshotSource {
  snapshot(): Promise<NodeRecord[]>;
}

export interface NodeStoreStats {
  nodeCount: number;
  generation: number;
  updates: number;
}

export enum UpdateLoopState {
  IDLE = 'idle',
  FIRING = 'firing',
  STOPPED = 'stopped'
}

export interface SimulatorConfig {
  port: number;
  host: string;
  nodeCount: number;
  updateInterval: number;   // ms between firings of the update loop
  logging?: LoggingConfig;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  port: 8080,
  host: '0.0.0.0',
  nodeCount: 5,
  updateInterval: 5000
};

export const WELCOME_MESSAGE = 'Welcome to the Distributed System Simulator! Visit /nodes to get node data.';

export function toWireNodeRecord(record: NodeRecord): WireNodeRecord {
  return {
    id: record.id,
    name: record.name,
    value: record.value,
    time: record.timestamp.toISOString()
  };
}
