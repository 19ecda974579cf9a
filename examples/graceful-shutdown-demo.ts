import { Simulator } from '../src/common/Simulator';
import { NodeRecord } from '../src/types';

/**
 * Demonstration of the simulator's joint shutdown sequence.
 * The update loop is stopped first, waiting out any in-flight update,
 * and only then does the HTTP listener close.
 */
async function demonstrateGracefulShutdown() {
  console.log('=== Simulator Graceful Shutdown Demonstration ===\n');

  const simulator = new Simulator({
    host: '127.0.0.1',
    port: 0,
    nodeCount: 5,
    updateInterval: 250,
    logging: { enableServerLogs: true, enableSimulationLogs: true, enableTestMode: false }
  });

  console.log('1. Starting simulator...');
  await simulator.start();
  const { port } = simulator.getAddress();
  console.log(`   ✓ Serving http://127.0.0.1:${port}/nodes\n`);

  console.log('2. Waiting for three background updates...');
  await new Promise<void>(resolve => {
    let seen = 0;
    const onUpdated = (record: NodeRecord) => {
      console.log(`   → ${record.name} is now ${record.value}`);
      if (++seen === 3) {
        simulator.updateLoop.off('updated', onUpdated);
        resolve();
      }
    };
    simulator.updateLoop.on('updated', onUpdated);
  });

  console.log('\n3. Initiating graceful shutdown...');
  await simulator.stop();
  console.log(`   ✓ Stopped after ${simulator.updateLoop.getStats().ticks} ticks\n`);

  const final = await simulator.store.snapshot();
  console.log('Final node state:');
  for (const node of final) {
    console.log(`   ${node.name}: ${node.value} (${node.timestamp.toISOString()})`);
  }
}

export { demonstrateGracefulShutdown };
