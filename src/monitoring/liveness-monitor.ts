import { TaskQueueBackend } from '../types/backend';
import { JobsScope } from '../types/config';
import { JobSpecView, MonitorState, QueueStatus } from '../types/status';
import { ConfigurationError, NoWorkersAvailableError } from '../errors/errors';
import { Backoff, SleepFn, throwIfAborted, validateSleepSeconds } from '../utils/backoff';
import { Logger } from '../utils/logger';
import { aggregateConsumers, aggregateJobs, filterStatuses } from './status-aggregator';

export const MAX_WORKER_CHECKS = 10;

export interface LivenessMonitorOptions {
  jobsScope?: JobsScope;
  sleep?: SleepFn;
}

export interface CheckStatusOptions {
  sleepSeconds: number;
  signal?: AbortSignal;
  // Queues whose backlog is counted; defaults to the view's relevant queues
  statusQueues?: readonly string[];
  // Receives the raw queue snapshot of this check
  onSnapshot?: (statuses: Record<string, QueueStatus>) => void | Promise<void>;
}

export class LivenessMonitor {
  private backend: TaskQueueBackend;
  private logger: Logger;
  private jobsScope: JobsScope;
  private sleep?: SleepFn;

  constructor(backend: TaskQueueBackend, logger: Logger, options: LivenessMonitorOptions = {}) {
    this.backend = backend;
    this.logger = logger.child('Monitor');
    this.jobsScope = options.jobsScope || 'all';
    this.sleep = options.sleep;

    if (this.jobsScope !== 'all' && this.jobsScope !== 'relevant') {
      throw new ConfigurationError(`unknown jobsScope: ${String(this.jobsScope)}`);
    }
  }

  /**
   * Decide whether the job still has active work.
   *
   * Waits for workers when none are subscribed to the relevant queues yet, and
   * throws NoWorkersAvailableError if none show up after MAX_WORKER_CHECKS polls.
   * Backend failures propagate untouched.
   */
  async checkStatus(view: JobSpecView, options: CheckStatusOptions): Promise<boolean> {
    validateSleepSeconds(options.sleepSeconds);
    throwIfAborted(options.signal);

    const state: MonitorState = { totalJobs: 0, totalConsumers: 0, attemptCount: 0 };

    const queueStatus = await this.backend.queryQueueStatus(
      options.statusQueues || view.relevantQueues
    );
    this.logger.debug('queue status:', queueStatus);

    if (options.onSnapshot) {
      await options.onSnapshot(queueStatus);
    }

    state.totalJobs = aggregateJobs(
      this.jobsScope === 'all'
        ? Object.values(queueStatus)
        : filterStatuses(queueStatus, view.relevantQueues)
    );

    this.backend.watchQueues(view.relevantQueues);
    const { activeQueues } = await this.backend.queryActiveQueues();
    this.logger.debug('active queues:', activeQueues);

    state.totalConsumers = aggregateConsumers(activeQueues, view.relevantQueues);

    this.logger.info(
      `found ${state.totalJobs} jobs in queues and ${state.totalConsumers} workers alive`
    );

    if (state.totalConsumers === 0) {
      state.attemptCount = await this.waitForWorkers(
        view,
        options.sleepSeconds,
        options.signal
      );
    }

    let active: boolean;
    if (state.totalJobs > 0) {
      active = true;
    } else {
      // Nothing queued: a worker may still be running a long task
      throwIfAborted(options.signal);
      active = await this.backend.queryWorkersProcessing(view.relevantQueues);
    }

    this.logger.debug(`active tasks: ${active}`);
    return active;
  }

  /**
   * Poll for expected workers. Returns the number of failed checks before
   * one showed up.
   */
  async waitForWorkers(
    view: JobSpecView,
    sleepSeconds: number,
    signal?: AbortSignal
  ): Promise<number> {
    validateSleepSeconds(sleepSeconds);

    const expected = view.expectedWorkerNames;
    this.logger.info(`Checking for the following workers: ${expected.join(', ')}`);

    const backoff = new Backoff({
      maxAttempts: MAX_WORKER_CHECKS,
      delayMs: sleepSeconds * 1000,
      signal,
      sleep: this.sleep,
    });

    for (;;) {
      backoff.checkAborted();

      // Identifiers look like "<worker name>@<host>"
      const running = await this.backend.queryWorkerIdentifiers();
      this.logger.info(
        `checking for workers, running workers = [${running.join(', ')}] ...`
      );

      if (hasExpectedWorker(expected, running)) {
        return backoff.attemptCount;
      }

      backoff.fail();
      if (backoff.exhausted) {
        throw new NoWorkersAvailableError(expected, backoff.attemptCount);
      }

      await backoff.pause();
    }
  }
}

export function hasExpectedWorker(
  expectedNames: readonly string[],
  reported: readonly string[]
): boolean {
  return expectedNames.some((name) => reported.some((identifier) => identifier.includes(name)));
}
