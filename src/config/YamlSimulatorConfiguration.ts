import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { DEFAULT_SIMULATOR_CONFIG, SimulatorConfig } from '../types';
import { isValidAddress } from '../common/utils';

/**
 * YAML Simulator Configuration Schema
 */
export interface YamlSimulatorConfig {
  /** HTTP listener */
  server?: {
    /** Listen port (0 picks a free port) */
    port?: number;

    /** Listen address */
    host?: string;
  };

  /** Node collection and background updater */
  simulation?: {
    /** Number of node records */
    node_count?: number;

    /** Delay between update loop firings (ms) */
    update_interval?: number;
  };

  logging?: {
    enable_server_logs?: boolean;
    enable_simulation_logs?: boolean;
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Partial<YamlSimulatorConfig>;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * YAML configuration loader with per-environment overrides
 */
export class YamlSimulatorConfiguration extends EventEmitter {
  private config: YamlSimulatorConfig | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.config = this.parseFromYaml(yamlContent);
      this.configPath = filePath;

      // Apply environment-specific overrides
      this.applyEnvironmentOverrides();

      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load YAML configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlSimulatorConfig {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      return this.validateConfiguration(parsed ?? {});
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }
  }

  /**
   * Convert to the runtime configuration, filling in defaults
   */
  toSimulatorConfig(): SimulatorConfig {
    const config = this.config ?? {};

    return {
      port: config.server?.port ?? DEFAULT_SIMULATOR_CONFIG.port,
      host: config.server?.host ?? DEFAULT_SIMULATOR_CONFIG.host,
      nodeCount: config.simulation?.node_count ?? DEFAULT_SIMULATOR_CONFIG.nodeCount,
      updateInterval: config.simulation?.update_interval ?? DEFAULT_SIMULATOR_CONFIG.updateInterval,
      logging: {
        enableServerLogs: config.logging?.enable_server_logs ?? true,
        enableSimulationLogs: config.logging?.enable_simulation_logs ?? true
      }
    };
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(base: YamlSimulatorConfig, override: Partial<YamlSimulatorConfig>): YamlSimulatorConfig {
    return {
      server: { ...base.server, ...override.server },
      simulation: { ...base.simulation, ...override.simulation },
      logging: { ...base.logging, ...override.logging },
      environments: { ...base.environments, ...override.environments }
    };
  }

  /**
   * Validate configuration structure
   */
  private validateConfiguration(config: unknown): YamlSimulatorConfig {
    if (!isRecord(config)) {
      throw new Error('configuration must be a mapping');
    }

    const result: YamlSimulatorConfig = {
      server: this.validateServer(config.server, 'server'),
      simulation: this.validateSimulation(config.simulation, 'simulation'),
      logging: this.validateLogging(config.logging, 'logging')
    };

    if (config.environments !== undefined) {
      if (!isRecord(config.environments)) {
        throw new Error('environments must be a mapping');
      }

      const environments: Record<string, Partial<YamlSimulatorConfig>> = {};
      for (const [name, override] of Object.entries(config.environments)) {
        if (!isRecord(override)) {
          throw new Error(`environments.${name} must be a mapping`);
        }
        environments[name] = {
          server: this.validateServer(override.server, `environments.${name}.server`),
          simulation: this.validateSimulation(override.simulation, `environments.${name}.simulation`),
          logging: this.validateLogging(override.logging, `environments.${name}.logging`)
        };
      }
      result.environments = environments;
    }

    return result;
  }

  private validateServer(section: unknown, path: string): YamlSimulatorConfig['server'] {
    if (section === undefined || section === null) {
      return {};
    }
    if (!isRecord(section)) {
      throw new Error(`${path} must be a mapping`);
    }

    const server: NonNullable<YamlSimulatorConfig['server']> = {};
    if (section.port !== undefined) {
      const port = section.port;
      if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`${path}.port must be an integer between 0 and 65535`);
      }
      server.port = port;
    }
    if (section.host !== undefined) {
      const host = section.host;
      if (typeof host !== 'string' || !isValidAddress(host)) {
        throw new Error(`${path}.host must be a valid address`);
      }
      server.host = host;
    }
    return server;
  }

  private validateSimulation(section: unknown, path: string): YamlSimulatorConfig['simulation'] {
    if (section === undefined || section === null) {
      return {};
    }
    if (!isRecord(section)) {
      throw new Error(`${path} must be a mapping`);
    }

    const simulation: NonNullable<YamlSimulatorConfig['simulation']> = {};
    if (section.node_count !== undefined) {
      const nodeCount = section.node_count;
      if (typeof nodeCount !== 'number' || !Number.isInteger(nodeCount) || nodeCount <= 0) {
        throw new Error(`${path}.node_count must be a positive integer`);
      }
      simulation.node_count = nodeCount;
    }
    if (section.update_interval !== undefined) {
      const updateInterval = section.update_interval;
      if (typeof updateInterval !== 'number' || !Number.isInteger(updateInterval) || updateInterval <= 0) {
        throw new Error(`${path}.update_interval must be a positive integer`);
      }
      simulation.update_interval = updateInterval;
    }
    return simulation;
  }

  private validateLogging(section: unknown, path: string): YamlSimulatorConfig['logging'] {
    if (section === undefined || section === null) {
      return {};
    }
    if (!isRecord(section)) {
      throw new Error(`${path} must be a mapping`);
    }

    const logging: NonNullable<YamlSimulatorConfig['logging']> = {};
    for (const key of ['enable_server_logs', 'enable_simulation_logs'] as const) {
      const flag = section[key];
      if (flag === undefined) {
        continue;
      }
      if (typeof flag !== 'boolean') {
        throw new Error(`${path}.${key} must be a boolean`);
      }
      logging[key] = flag;
    }
    return logging;
  }

  /**
   * Apply environment-specific configuration overrides
   */
  private applyEnvironmentOverrides(): void {
    if (!this.config?.environments?.[this.currentEnvironment]) {
      return;
    }

    const envOverrides = this.config.environments[this.currentEnvironment];
    this.config = YamlSimulatorConfiguration.mergeConfigurations(this.config, envOverrides);
  }

  /**
   * Get current configuration
   */
  getConfig(): YamlSimulatorConfig | null {
    return this.config;
  }

  /**
   * Path of the last file loaded
   */
  getConfigPath(): string | null {
    return this.configPath;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }
}
