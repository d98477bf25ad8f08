import { JobSpecView, MonitorSummary, QueueStatus } from '../types/status';
import { abortableSleep, SleepFn } from '../utils/backoff';
import { Logger } from '../utils/logger';
import { LivenessMonitor } from './liveness-monitor';

export interface StatusReporter {
  record(statuses: Record<string, QueueStatus>): Promise<void>;
}

export interface MonitorRunOptions {
  sleepSeconds: number;
  signal?: AbortSignal;
  statusQueues?: readonly string[];
  reporter?: StatusReporter;
}

/**
 * Keeps checking until the job goes idle. Each check is independent; the
 * loop only carries the count of checks made.
 */
export class MonitorLoop {
  private monitor: LivenessMonitor;
  private logger: Logger;
  private sleep: SleepFn;

  constructor(monitor: LivenessMonitor, logger: Logger, sleep: SleepFn = abortableSleep) {
    this.monitor = monitor;
    this.logger = logger.child('Monitor');
    this.sleep = sleep;
  }

  async run(view: JobSpecView, options: MonitorRunOptions): Promise<MonitorSummary> {
    const startTime = Date.now();
    const reporter = options.reporter;
    let checks = 0;

    for (;;) {
      checks++;
      const active = await this.monitor.checkStatus(view, {
        sleepSeconds: options.sleepSeconds,
        signal: options.signal,
        statusQueues: options.statusQueues,
        onSnapshot: reporter ? (statuses) => reporter.record(statuses) : undefined,
      });

      if (!active) break;

      this.logger.info('found tasks in queues and/or tasks being processed');
      await this.sleep(options.sleepSeconds * 1000, options.signal);
    }

    const durationMs = Date.now() - startTime;
    this.logger.info(
      `queues are empty and workers are idle after ${checks} checks (${durationMs}ms)`
    );

    return { checks, durationMs };
  }
}
