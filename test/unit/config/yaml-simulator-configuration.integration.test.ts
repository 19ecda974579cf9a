import { YamlSimulatorConfiguration } from '../../../src/config/YamlSimulatorConfiguration';
import * as path from 'path';

describe('YamlSimulatorConfiguration Integration with Example Files', () => {
  const configExamplesDir = path.join(__dirname, '../../fixtures/config-examples');
  const configPath = path.join(configExamplesDir, 'simulator-environments.yaml');

  it('should load the base configuration', async () => {
    const yamlConfig = new YamlSimulatorConfiguration('development');

    await yamlConfig.loadFromFile(configPath);

    expect(yamlConfig.toSimulatorConfig()).toEqual({
      port: 8080,
      host: '0.0.0.0',
      nodeCount: 5,
      updateInterval: 5000,
      logging: { enableServerLogs: true, enableSimulationLogs: true }
    });
  });

  it('should apply staging overrides', async () => {
    const yamlConfig = new YamlSimulatorConfiguration('staging');

    await yamlConfig.loadFromFile(configPath);

    const config = yamlConfig.toSimulatorConfig();
    expect(config.port).toBe(9090);
    expect(config.host).toBe('0.0.0.0');
    expect(config.nodeCount).toBe(12);
    expect(config.updateInterval).toBe(5000);
  });

  it('should apply test overrides', async () => {
    const yamlConfig = new YamlSimulatorConfiguration('test');

    await yamlConfig.loadFromFile(configPath);

    expect(yamlConfig.toSimulatorConfig()).toEqual({
      port: 0,
      host: '127.0.0.1',
      nodeCount: 5,
      updateInterval: 50,
      logging: { enableServerLogs: false, enableSimulationLogs: false }
    });
  });

  it('should load the shipped default configuration', async () => {
    const yamlConfig = new YamlSimulatorConfiguration('production');

    await yamlConfig.loadFromFile(path.join(__dirname, '../../../config/simulator.yaml'));

    expect(yamlConfig.toSimulatorConfig()).toEqual({
      port: 8080,
      host: '0.0.0.0',
      nodeCount: 5,
      updateInterval: 5000,
      logging: { enableServerLogs: true, enableSimulationLogs: false }
    });
  });
});
