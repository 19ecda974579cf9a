import { EventEmitter } from 'eventemitter3';
import { NodeRecord, UpdateLoopState } from '../types';
import { SimulatorLogger, createLogger } from '../common/logger';

/**
 * The single write operation the loop drives
 */
export interface RandomUpdater {
  updateRandom(): Promise<NodeRecord>;
}

export interface UpdateLoopConfig {
  updateInterval: number;
  logger?: SimulatorLogger;
}

export interface UpdateLoopStats {
  state: UpdateLoopState;
  ticks: number;
  failures: number;
  updateInterval: number;
}

export interface UpdateLoopEvents {
  started: (info: { updateInterval: number }) => void;
  updated: (record: NodeRecord) => void;
  'update-failed': (error: Error) => void;
  stopped: (info: { ticks: number }) => void;
}

/**
 * Background task that rewrites one random node per tick.
 *
 * Scheduling is fixed-delay: the next tick is armed only after the previous
 * firing has settled, so firings are at least updateInterval apart and never
 * overlap. The first firing happens one full interval after start().
 */
export class UpdateLoop extends EventEmitter<UpdateLoopEvents> {
  private readonly config: Required<UpdateLoopConfig>;
  private state: UpdateLoopState = UpdateLoopState.STOPPED;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private abortSignal?: AbortSignal;
  private ticks = 0;
  private failures = 0;

  constructor(
    private readonly store: RandomUpdater,
    config: UpdateLoopConfig
  ) {
    super();

    if (!Number.isFinite(config.updateInterval) || config.updateInterval <= 0) {
      throw new Error(`Update interval must be a positive number of milliseconds, got ${config.updateInterval}`);
    }

    this.config = {
      updateInterval: config.updateInterval,
      logger: config.logger ?? createLogger()
    };
  }

  /**
   * Start ticking. Aborting the signal has the same effect as stop().
   * Refuses to restart while an update from the previous run is still pending.
   */
  start(signal?: AbortSignal): void {
    if (this.isRunning()) {
      throw new Error('Update loop is already running');
    }
    if (this.inFlight) {
      throw new Error('Update loop is still finishing an update; await stop() before restarting');
    }
    if (signal?.aborted) {
      return;
    }

    this.state = UpdateLoopState.IDLE;
    if (signal) {
      this.abortSignal = signal;
      signal.addEventListener('abort', this.onAbort, { once: true });
    }

    this.scheduleNext();
    this.config.logger.simulation(`Update loop started (interval ${this.config.updateInterval}ms)`);
    this.emit('started', { updateInterval: this.config.updateInterval });
  }

  /**
   * Cancel the pending tick and wait for an in-flight update to settle
   */
  async stop(): Promise<void> {
    if (!this.isRunning()) {
      return;
    }

    this.state = UpdateLoopState.STOPPED;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.abortSignal) {
      this.abortSignal.removeEventListener('abort', this.onAbort);
      this.abortSignal = undefined;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    this.config.logger.simulation(`Update loop stopped after ${this.ticks} ticks`);
    this.emit('stopped', { ticks: this.ticks });
  }

  isRunning(): boolean {
    return this.state !== UpdateLoopState.STOPPED;
  }

  getState(): UpdateLoopState {
    return this.state;
  }

  getStats(): UpdateLoopStats {
    return {
      state: this.state,
      ticks: this.ticks,
      failures: this.failures,
      updateInterval: this.config.updateInterval
    };
  }

  private readonly onAbort = (): void => {
    this.stop().catch((error: unknown) => {
      this.config.logger.error('Failed to stop update loop on abort', error);
    });
  };

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.fire()
        .catch((error: unknown) => {
          this.config.logger.error('Update loop listener failed', error);
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }, this.config.updateInterval);
    this.timer.unref(); // The HTTP server keeps the process alive, not the loop
  }

  private async fire(): Promise<void> {
    this.state = UpdateLoopState.FIRING;
    this.ticks++;

    try {
      let record: NodeRecord;
      try {
        record = await this.store.updateRandom();
      } catch (error) {
        this.failures++;
        const failure = error instanceof Error ? error : new Error(String(error));
        this.config.logger.error('Failed to update node', failure);
        this.emit('update-failed', failure);
        return;
      }

      this.config.logger.simulation(`Updated ${record.name} to value ${record.value}`);
      this.emit('updated', record);
    } finally {
      // stop() may have run while the update was pending
      if (this.state === UpdateLoopState.FIRING) {
        this.state = UpdateLoopState.IDLE;
        this.scheduleNext();
      }
    }
  }
}
