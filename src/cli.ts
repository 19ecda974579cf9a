#!/usr/bin/env node
import { Simulator } from './common/Simulator';
import { YamlSimulatorConfiguration } from './config/YamlSimulatorConfiguration';
import { createLogger } from './common/logger';

/**
 * Usage: simulator [config.yaml]
 * SIMULATOR_ENV selects the environment overrides applied from the file.
 */
async function main(): Promise<void> {
  const yamlConfig = new YamlSimulatorConfiguration(process.env.SIMULATOR_ENV ?? 'development');
  const configPath = process.argv[2];
  if (configPath) {
    await yamlConfig.loadFromFile(configPath);
  }

  const config = yamlConfig.toSimulatorConfig();
  const logger = createLogger({ ...config.logging, enableTestMode: false });
  const simulator = new Simulator({ ...config, logger });

  await simulator.start();
  console.log(`Server running on http://localhost:${simulator.getAddress().port}`);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.server(`Received ${signal}, shutting down`);

    simulator.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[FATAL]', error instanceof Error ? error.message : error);
  process.exit(1);
});
