import { LivenessMonitor } from '../../src/monitoring/liveness-monitor';
import { MonitorLoop, StatusReporter } from '../../src/monitoring/monitor-loop';
import { MonitorAbortedError, NoWorkersAvailableError } from '../../src/errors/errors';
import { JobSpecView, QueueStatus } from '../../src/types/status';
import { createFakeBackend, createSilentLogger } from '../helpers/fake-backend';

const view: JobSpecView = { relevantQueues: ['a'], expectedWorkerNames: ['step1'] };

describe('MonitorLoop', () => {
  it('should keep checking until the job goes idle', async () => {
    const backend = createFakeBackend({
      queues: [{ name: 'a', pendingJobs: 0, consumerCount: 1 }],
      activeQueues: { a: ['step1@host'] },
    });
    backend.queryWorkersProcessing
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(false);
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const loop = new MonitorLoop(
      new LivenessMonitor(backend, createSilentLogger()),
      createSilentLogger(),
      sleep
    );

    const summary = await loop.run(view, { sleepSeconds: 30 });

    expect(summary.checks).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(30000, undefined);
  });

  it('should hand every snapshot to the reporter', async () => {
    const backend = createFakeBackend({
      queues: [{ name: 'a', pendingJobs: 0, consumerCount: 1 }],
      activeQueues: { a: ['step1@host'] },
    });
    backend.queryWorkersProcessing.mockResolvedValueOnce(true).mockResolvedValueOnce(false);
    const reporter: jest.Mocked<StatusReporter> = {
      record: jest.fn(async (_statuses: Record<string, QueueStatus>) => undefined),
    };
    const loop = new MonitorLoop(
      new LivenessMonitor(backend, createSilentLogger()),
      createSilentLogger(),
      async () => undefined
    );

    await loop.run(view, { sleepSeconds: 1, reporter });

    expect(reporter.record).toHaveBeenCalledTimes(2);
    expect(reporter.record).toHaveBeenCalledWith({
      a: { name: 'a', pendingJobs: 0, consumerCount: 1 },
    });
  });

  it('should stop with NoWorkersAvailableError when workers never start', async () => {
    const backend = createFakeBackend({
      queues: [{ name: 'a', pendingJobs: 2, consumerCount: 0 }],
    });
    const loop = new MonitorLoop(
      new LivenessMonitor(backend, createSilentLogger(), { sleep: async () => undefined }),
      createSilentLogger()
    );

    await expect(loop.run(view, { sleepSeconds: 0 })).rejects.toThrow(NoWorkersAvailableError);
  });

  it('should stop sleeping between checks when aborted', async () => {
    const backend = createFakeBackend({
      queues: [{ name: 'a', pendingJobs: 2, consumerCount: 1 }],
      activeQueues: { a: ['step1@host'] },
    });
    const loop = new MonitorLoop(
      new LivenessMonitor(backend, createSilentLogger()),
      createSilentLogger()
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      loop.run(view, { sleepSeconds: 60, signal: controller.signal })
    ).rejects.toThrow(MonitorAbortedError);
    expect(backend.queryQueueStatus).toHaveBeenCalledTimes(1);
  });
});
