import { SimulatorHTTPServer } from '../../../src/transport/SimulatorHTTPServer';
import { NodeStore } from '../../../src/state/NodeStore';
import { NodeSnapshotSource, WireNodeRecord } from '../../../src/types';
import { request } from '../../helpers/httpClient';
import { sequenceRandom, steppingClock } from '../../helpers/deterministic';
import { FIXTURE_EPOCH_MS, wireNodeFixtures } from '../../fixtures/nodes';

const WELCOME_BODY = '{"message":"Welcome to the Distributed System Simulator! Visit /nodes to get node data."}';

describe('SimulatorHTTPServer', () => {
  let store: NodeStore;
  let server: SimulatorHTTPServer;

  const port = () => server.getAddress().port;

  beforeEach(async () => {
    store = new NodeStore({
      random: sequenceRandom([0.42, 0.07, 0.995]),
      clock: steppingClock(FIXTURE_EPOCH_MS).clock
    });
    await store.initialize(3);
    server = new SimulatorHTTPServer(store, { host: '127.0.0.1', port: 0 });
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('Lifecycle Management', () => {
    test('should bind an ephemeral port when configured with port 0', async () => {
      await server.start();

      expect(port()).toBeGreaterThan(0);
      expect(server.getStats()).toEqual({
        isRunning: true,
        host: '127.0.0.1',
        port: port(),
        requestsHandled: 0,
        errors: 0
      });
    });

    test('should handle multiple start calls', async () => {
      await server.start();
      await expect(server.start()).rejects.toThrow('HTTP server is already running');
    });

    test('should bind a single listener when start is called concurrently', async () => {
      const results = await Promise.allSettled([server.start(), server.start()]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1]).toEqual({
        status: 'rejected',
        reason: new Error('HTTP server is already starting')
      });

      const boundPort = port();
      await server.stop();
      await expect(request(boundPort, '/')).rejects.toThrow('ECONNREFUSED');
    });

    test('should accept a new start after a failed one', async () => {
      const blocker = new SimulatorHTTPServer(store, { host: '127.0.0.1', port: 0 });
      await blocker.start();
      const contender = new SimulatorHTTPServer(store, { host: '127.0.0.1', port: blocker.getAddress().port });

      await expect(contender.start()).rejects.toThrow('Failed to start HTTP server');
      await blocker.stop();
      await expect(contender.start()).resolves.toBeUndefined();
      await contender.stop();
    });

    test('should handle stop when not started', async () => {
      await expect(server.stop()).resolves.toBeUndefined();
      expect(server.getStats().isRunning).toBe(false);
    });

    test('should fail to start on a port that is already bound', async () => {
      await server.start();
      const competitor = new SimulatorHTTPServer(store, { host: '127.0.0.1', port: port() });

      await expect(competitor.start()).rejects.toThrow('Failed to start HTTP server: listen EADDRINUSE');
      expect(competitor.getStats()).toMatchObject({ isRunning: false, errors: 1 });
    });

    test('should emit started and stopped events', async () => {
      const started = jest.fn();
      const stopped = jest.fn();
      server.on('started', started);
      server.on('stopped', stopped);

      await server.start();
      await server.stop();

      expect(started).toHaveBeenCalledWith({ host: '127.0.0.1', port: expect.any(Number) });
      expect(stopped).toHaveBeenCalledTimes(1);
    });
  });

  describe('Routes', () => {
    beforeEach(async () => {
      await server.start();
    });

    test('should serve the welcome message at /', async () => {
      const response = await request(port(), '/');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.body).toBe(WELCOME_BODY);
    });

    test('should serve the node snapshot at /nodes', async () => {
      const response = await request(port(), '/nodes');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.body).toBe(JSON.stringify(wireNodeFixtures));

      const nodes: WireNodeRecord[] = JSON.parse(response.body);
      expect(Object.keys(nodes[0])).toEqual(['id', 'name', 'value', 'time']);
    });

    test('should ignore the query string when routing', async () => {
      const response = await request(port(), '/nodes?verbose=true');

      expect(response.status).toBe(200);
      expect(response.body).toBe(JSON.stringify(wireNodeFixtures));
    });

    test('should reflect an update in the next /nodes response', async () => {
      const before: WireNodeRecord[] = JSON.parse((await request(port(), '/nodes')).body);
      const updated = await store.updateRandom();
      const after: WireNodeRecord[] = JSON.parse((await request(port(), '/nodes')).body);

      const changed = after.filter((node, index) =>
        node.value !== before[index].value || node.time !== before[index].time
      );
      expect(changed.map(node => node.id)).toEqual([updated.id]);
    });

    test('should answer unknown paths with 404', async () => {
      const response = await request(port(), '/metrics');

      expect(response.status).toBe(404);
      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(response.body).toBe('404 page not found\n');
    });

    test('should answer other methods on known paths with 405', async () => {
      const response = await request(port(), '/nodes', 'POST');

      expect(response.status).toBe(405);
      expect(response.headers.allow).toBe('GET');
      expect(response.body).toBe('Method Not Allowed\n');
    });

    test('should count handled requests', async () => {
      await request(port(), '/');
      await request(port(), '/nodes');
      await request(port(), '/missing');

      expect(server.getStats().requestsHandled).toBe(3);
      expect(server.getStats().errors).toBe(0);
    });
  });

  describe('Error Handling', () => {
    test('should answer 500 when the snapshot cannot be produced', async () => {
      const failing: NodeSnapshotSource = {
        snapshot: () => Promise.reject(new Error('snapshot failed'))
      };
      server = new SimulatorHTTPServer(failing, { host: '127.0.0.1', port: 0 });
      await server.start();

      const response = await request(port(), '/nodes');

      expect(response.status).toBe(500);
      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(response.body).toBe('Failed to marshal data\n');
      expect(server.getStats().errors).toBe(1);
    });

    test('should keep serving / when the snapshot source is broken', async () => {
      const failing: NodeSnapshotSource = {
        snapshot: () => Promise.reject(new Error('snapshot failed'))
      };
      server = new SimulatorHTTPServer(failing, { host: '127.0.0.1', port: 0 });
      await server.start();

      await request(port(), '/nodes');
      const response = await request(port(), '/');

      expect(response.status).toBe(200);
      expect(response.body).toBe(WELCOME_BODY);
    });
  });
});
