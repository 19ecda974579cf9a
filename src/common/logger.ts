/**
 * Logging utility for the simulator
 * Provides configurable logging for the HTTP server and the background simulation
 */

export interface LoggingConfig {
  enableServerLogs?: boolean;
  enableSimulationLogs?: boolean;
  enableTestMode?: boolean;
}

export class SimulatorLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log HTTP server messages
   */
  server(message: string, ...args: unknown[]): void {
    if (this.config.enableServerLogs && !this.config.enableTestMode) {
      console.log(`[SERVER] ${message}`, ...args);
    }
  }

  /**
   * Log update loop and node store messages
   */
  simulation(message: string, ...args: unknown[]): void {
    if (this.config.enableSimulationLogs && !this.config.enableTestMode) {
      console.log(`[SIMULATION] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): SimulatorLogger {
  return new SimulatorLogger(config);
}
