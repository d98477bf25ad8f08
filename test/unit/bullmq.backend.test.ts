import Redis from 'ioredis';
import { BullMQBackend, QueueHandle, formatWorkerIdentifier } from '../../src/backends/bullmq.backend';
import { createBackend } from '../../src/backends/factory';
import { LivenessMonitor } from '../../src/monitoring/liveness-monitor';
import { BackendConfig } from '../../src/types/config';
import {
  BackendUnavailableError,
  CircuitBreakerOpenError,
  UnsupportedBackendError,
} from '../../src/errors/errors';
import { createSilentLogger } from '../helpers/fake-backend';

interface FakeQueueState {
  counts?: { [state: string]: number };
  workers?: { [key: string]: string }[];
  active?: number;
}

function createFakeQueue(state: FakeQueueState = {}): jest.Mocked<QueueHandle> {
  return {
    getJobCounts: jest.fn(async () => state.counts || {}),
    getWorkers: jest.fn(async () => state.workers || []),
    getActiveCount: jest.fn(async () => state.active || 0),
    close: jest.fn(async () => undefined),
  };
}

// Never connects: lazyConnect and the fake queue factory keep it idle
const connection = new Redis({ lazyConnect: true });

afterAll(() => {
  connection.disconnect();
});

function createBackendWith(
  queues: Record<string, jest.Mocked<QueueHandle>>,
  config: BackendConfig = {}
) {
  const factory = jest.fn((queueName: string) => {
    const queue = queues[queueName];
    if (!queue) throw new Error(`unexpected queue ${queueName}`);
    return queue;
  });
  const backend = new BullMQBackend(connection, config, createSilentLogger(), factory);
  return { backend, factory };
}

describe('BullMQBackend', () => {
  describe('queryQueueStatus', () => {
    it('should count waiting, prioritized, delayed and paused jobs', async () => {
      const queue = createFakeQueue({
        counts: { wait: 3, prioritized: 1, delayed: 2, paused: 4 },
        workers: [{ id: '7', addr: '10.0.0.7:50412', rawname: 'bull:YQ==:w:step1' }],
      });
      const { backend } = createBackendWith({ a: queue });

      const status = await backend.queryQueueStatus(['a']);

      expect(status).toEqual({ a: { name: 'a', pendingJobs: 10, consumerCount: 1 } });
      expect(queue.getJobCounts).toHaveBeenCalledWith('wait', 'prioritized', 'delayed', 'paused');
    });

    it('should treat missing counts as zero', async () => {
      const { backend } = createBackendWith({ a: createFakeQueue({ counts: { wait: 2 } }) });

      const status = await backend.queryQueueStatus(['a']);

      expect(status['a']).toEqual({ name: 'a', pendingJobs: 2, consumerCount: 0 });
    });

    it('should reuse the queue handle across polls', async () => {
      const { backend, factory } = createBackendWith({ a: createFakeQueue() });

      await backend.queryQueueStatus(['a']);
      await backend.queryQueueStatus(['a']);

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('queryActiveQueues', () => {
    it('should map every known queue with workers to their identifiers', async () => {
      const shared = { id: '1', addr: '10.0.0.7:5001', rawname: 'bull:YQ==:w:sim' };
      const { backend } = createBackendWith(
        {
          a: createFakeQueue({ workers: [shared] }),
          b: createFakeQueue({
            workers: [shared, { id: '2', addr: '10.0.0.8:5002', rawname: 'bull:Yg==:w:post' }],
          }),
          c: createFakeQueue(),
        },
        { queues: ['a', 'b', 'c'] }
      );

      const snapshot = await backend.queryActiveQueues();

      expect(snapshot.activeQueues).toEqual({
        a: ['sim@10.0.0.7'],
        b: ['sim@10.0.0.7', 'post@10.0.0.8'],
      });
      expect(snapshot.workers).toEqual(['sim@10.0.0.7', 'post@10.0.0.8']);
    });

    it('should include queues first seen through a status query', async () => {
      const { backend } = createBackendWith({
        a: createFakeQueue({ workers: [{ id: '3', addr: 'node07:6000', rawname: 'x:w:step1' }] }),
      });

      expect(await backend.queryWorkerIdentifiers()).toEqual([]);

      await backend.queryQueueStatus(['a']);

      expect(await backend.queryWorkerIdentifiers()).toEqual(['step1@node07']);
    });
  });

  describe('watchQueues', () => {
    it('should make workers on watched queues visible without a status query', async () => {
      const { backend, factory } = createBackendWith({
        b: createFakeQueue({
          workers: [{ id: '5', addr: '10.0.0.1:41000', rawname: 'bull:Yg==:w:step1' }],
        }),
      });

      expect(await backend.queryWorkerIdentifiers()).toEqual([]);

      backend.watchQueues(['b']);
      backend.watchQueues(['b']);

      expect(await backend.queryWorkerIdentifiers()).toEqual(['step1@10.0.0.1']);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should ignore queues watched after dispose', async () => {
      const { backend, factory } = createBackendWith({ a: createFakeQueue() });

      await backend.dispose();
      backend.watchQueues(['a']);

      expect(factory).not.toHaveBeenCalled();
    });
  });

  describe('queryWorkersProcessing', () => {
    it('should report true when a relevant queue has active jobs', async () => {
      const { backend } = createBackendWith({
        a: createFakeQueue({ active: 0 }),
        b: createFakeQueue({ active: 2 }),
      });

      await expect(backend.queryWorkersProcessing(['a', 'b'])).resolves.toBe(true);
    });

    it('should report false when nothing is in progress', async () => {
      const { backend } = createBackendWith({ a: createFakeQueue({ active: 0 }) });

      await expect(backend.queryWorkersProcessing(['a'])).resolves.toBe(false);
    });
  });

  describe('failures', () => {
    it('should wrap broker errors in BackendUnavailableError', async () => {
      const queue = createFakeQueue();
      queue.getJobCounts.mockRejectedValue(new Error('ECONNREFUSED 127.0.0.1:6379'));
      const { backend } = createBackendWith({ a: queue });

      const error = await backend.queryQueueStatus(['a']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendUnavailableError);
      expect(error).toMatchObject({
        message: 'Backend unavailable: queryQueueStatus failed: ECONNREFUSED 127.0.0.1:6379',
      });
    });

    it('should fail fast once the circuit opens', async () => {
      const queue = createFakeQueue();
      queue.getActiveCount.mockRejectedValue(new Error('timeout'));
      const { backend } = createBackendWith(
        { a: queue },
        { circuitBreaker: { threshold: 2, timeoutMs: 60000 } }
      );

      await expect(backend.queryWorkersProcessing(['a'])).rejects.toThrow(BackendUnavailableError);
      await expect(backend.queryWorkersProcessing(['a'])).rejects.toThrow(BackendUnavailableError);
      await expect(backend.queryWorkersProcessing(['a'])).rejects.toThrow(CircuitBreakerOpenError);

      expect(queue.getActiveCount).toHaveBeenCalledTimes(2);
      expect(backend.getHealth()).toMatchObject({ state: 'open', totalFailures: 2 });
    });
  });

  describe('dispose', () => {
    it('should close every queue handle once and refuse further queries', async () => {
      const a = createFakeQueue();
      const b = createFakeQueue();
      const { backend } = createBackendWith({ a, b }, { queues: ['a', 'b'] });

      await backend.dispose();
      await backend.dispose();

      expect(a.close).toHaveBeenCalledTimes(1);
      expect(b.close).toHaveBeenCalledTimes(1);
      await expect(backend.queryActiveQueues()).rejects.toThrow(
        'Backend unavailable: bullmq backend has been disposed'
      );
    });
  });
});

describe('LivenessMonitor over BullMQBackend', () => {
  it('should see a worker on a relevant queue left out of the status queues', async () => {
    const { backend } = createBackendWith({
      a: createFakeQueue({ counts: { wait: 3 } }),
      b: createFakeQueue({
        workers: [{ id: '5', addr: '10.0.0.1:41000', rawname: 'bull:Yg==:w:step1' }],
      }),
    });
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const monitor = new LivenessMonitor(backend, createSilentLogger(), { sleep });

    const active = await monitor.checkStatus(
      { relevantQueues: ['a', 'b'], expectedWorkerNames: ['step1'] },
      { sleepSeconds: 1, statusQueues: ['a'] }
    );

    expect(active).toBe(true);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('formatWorkerIdentifier', () => {
  it('should use the worker name and client host', () => {
    expect(
      formatWorkerIdentifier({ id: '4', addr: '192.168.1.20:41234', rawname: 'bull:cQ==:w:step1' })
    ).toBe('step1@192.168.1.20');
  });

  it('should fall back to the client id for unnamed workers', () => {
    expect(formatWorkerIdentifier({ id: '12', addr: 'node03:7000', rawname: 'bull:cQ==' })).toBe(
      'worker-12@node03'
    );
  });

  it('should keep IPv6 hosts intact', () => {
    expect(formatWorkerIdentifier({ id: '1', addr: '[::1]:6000', rawname: 'p:w:sim' })).toBe(
      'sim@[::1]'
    );
  });

  it('should tolerate missing fields', () => {
    expect(formatWorkerIdentifier({})).toBe('worker-unknown@unknown');
  });
});

describe('createBackend', () => {
  it('should build a BullMQ backend by default', () => {
    const backend = createBackend({}, connection, createSilentLogger());

    expect(backend).toBeInstanceOf(BullMQBackend);
    expect(backend.backendType).toBe('bullmq');
  });

  it('should reject unknown backend types', () => {
    const config: BackendConfig = JSON.parse('{"type":"kafka"}');

    expect(() => createBackend(config, connection, createSilentLogger())).toThrow(
      UnsupportedBackendError
    );
  });
});
