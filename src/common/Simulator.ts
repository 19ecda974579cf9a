/**
 * Simulator.ts
 *
 * Composition root of the simulator runtime. One NodeStore is created (or
 * handed in) here and passed by reference to both the HTTP server, which
 * only reads snapshots, and the update loop, which only calls updateRandom.
 *
 * Startup order: initialize store -> bind HTTP server -> arm update loop.
 * Shutdown order is the reverse for the two running parts: the loop is
 * stopped first (waiting out an in-flight update), then the listener closes.
 */

import { NodeStore } from '../state/NodeStore';
import { UpdateLoop } from '../simulation/UpdateLoop';
import { SimulatorHTTPServer } from '../transport/SimulatorHTTPServer';
import { SimulatorLogger, createLogger } from './logger';
import { DEFAULT_SIMULATOR_CONFIG, SimulatorConfig } from '../types';

export interface SimulatorOptions extends Partial<SimulatorConfig> {
  store?: NodeStore;
  logger?: SimulatorLogger;
}

export class Simulator {
  readonly config: SimulatorConfig;
  readonly store: NodeStore;
  readonly updateLoop: UpdateLoop;
  readonly server: SimulatorHTTPServer;

  private readonly logger: SimulatorLogger;
  private isStarted = false;
  private isStarting = false;

  constructor(options: SimulatorOptions = {}) {
    this.config = {
      port: options.port ?? DEFAULT_SIMULATOR_CONFIG.port,
      host: options.host ?? DEFAULT_SIMULATOR_CONFIG.host,
      nodeCount: options.nodeCount ?? DEFAULT_SIMULATOR_CONFIG.nodeCount,
      updateInterval: options.updateInterval ?? DEFAULT_SIMULATOR_CONFIG.updateInterval,
      logging: options.logging
    };
    this.logger = options.logger ?? createLogger(this.config.logging);

    this.store = options.store ?? new NodeStore();
    this.server = new SimulatorHTTPServer(this.store, {
      port: this.config.port,
      host: this.config.host,
      logger: this.logger
    });
    this.updateLoop = new UpdateLoop(this.store, {
      updateInterval: this.config.updateInterval,
      logger: this.logger
    });
  }

  /**
   * Start the simulator. If the listener cannot bind, nothing is left running.
   * A signal that is already aborted is rejected before anything starts.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.isStarted) {
      throw new Error('Simulator is already started');
    }
    if (this.isStarting) {
      throw new Error('Simulator is already starting');
    }
    if (signal?.aborted) {
      throw new Error('Simulator start aborted');
    }

    this.isStarting = true;
    try {
      await this.startComponents(signal);
    } finally {
      this.isStarting = false;
    }
  }

  private async startComponents(signal?: AbortSignal): Promise<void> {
    await this.store.initialize(this.config.nodeCount);
    this.logger.simulation(`Initialized ${this.config.nodeCount} nodes`);

    try {
      await this.server.start();
    } catch (error) {
      this.logger.error('Simulator failed to start', error);
      throw error;
    }

    if (signal?.aborted) {
      await this.server.stop();
      throw new Error('Simulator start aborted');
    }

    this.updateLoop.start(signal);
    this.isStarted = true;
  }

  /**
   * Stop the update loop, then the HTTP server
   */
  async stop(): Promise<void> {
    if (!this.isStarted) {
      return;
    }
    this.isStarted = false;

    await this.updateLoop.stop();
    await this.server.stop();
    this.logger.simulation('Simulator stopped');
  }

  isRunning(): boolean {
    return this.isStarted;
  }

  getAddress(): { host: string; port: number } {
    return this.server.getAddress();
  }
}
