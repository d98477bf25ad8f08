import { QueueWatchConfig } from './types/config';
import { TaskQueueBackend } from './types/backend';
import { ActiveQueueMap, JobSpecView, MonitorSummary, QueueStatus } from './types/status';
import { ConfigurationError } from './errors/errors';
import { createBackend } from './backends/factory';
import { BaseBackend } from './backends/base.backend';
import { RedisConnectionManager } from './connection/redis-connection';
import { LivenessMonitor } from './monitoring/liveness-monitor';
import { MonitorLoop, StatusReporter } from './monitoring/monitor-loop';
import { filterWorkers, WorkerInfo, WorkerQuery } from './monitoring/worker-query';
import { JobSpec } from './spec/job-spec';
import { CircuitBreakerMetrics } from './utils/circuit-breaker';
import { validateSleepSeconds } from './utils/backoff';
import { Logger } from './utils/logger';

export interface CheckOptions {
  sleepSeconds?: number;
  signal?: AbortSignal;
  statusQueues?: readonly string[];
}

export interface MonitorOptions extends CheckOptions {
  reporter?: StatusReporter;
}

export class QueueWatch {
  private connectionManager?: RedisConnectionManager;
  private backend: TaskQueueBackend;
  private monitor: LivenessMonitor;
  private loop: MonitorLoop;
  private logger: Logger;
  private sleepSeconds: number;
  private active = true;

  private constructor(
    backend: TaskQueueBackend,
    config: Omit<QueueWatchConfig, 'redis'>,
    logger: Logger,
    connectionManager?: RedisConnectionManager
  ) {
    this.backend = backend;
    this.logger = logger;
    this.connectionManager = connectionManager;

    const sleepSeconds = config.monitor?.sleepSeconds ?? 1;
    validateSleepSeconds(sleepSeconds, 'monitor.sleepSeconds');
    this.sleepSeconds = sleepSeconds;

    this.monitor = new LivenessMonitor(backend, logger, {
      jobsScope: config.monitor?.jobsScope,
    });
    this.loop = new MonitorLoop(this.monitor, logger);
  }

  /**
   * Connect to Redis and build the configured backend.
   * The returned instance owns the connection; call shutdown() to release it.
   */
  static async create(config: QueueWatchConfig): Promise<QueueWatch> {
    if (!config.redis) {
      throw new ConfigurationError('redis configuration is required');
    }

    const logger = new Logger(config.logging);
    const connectionManager = new RedisConnectionManager(config.redis, logger);

    try {
      await connectionManager.testConnection();
      const backend = createBackend(config.backend || {}, connectionManager.getClient(), logger);
      const instance = new QueueWatch(backend, config, logger, connectionManager);
      logger.info(`QueueWatch initialized with ${backend.backendType} backend`);
      return instance;
    } catch (error) {
      await connectionManager.close();
      throw error;
    }
  }

  /**
   * Wrap an already constructed backend. The caller keeps ownership of
   * whatever connection the backend uses.
   */
  static withBackend(
    backend: TaskQueueBackend,
    config: Omit<QueueWatchConfig, 'redis'> = {}
  ): QueueWatch {
    return new QueueWatch(backend, config, new Logger(config.logging));
  }

  async checkStatus(view: JobSpecView | JobSpec, options: CheckOptions = {}): Promise<boolean> {
    this.assertActive();
    return this.monitor.checkStatus(toView(view), {
      sleepSeconds: options.sleepSeconds ?? this.sleepSeconds,
      signal: options.signal,
      statusQueues: options.statusQueues,
    });
  }

  /**
   * Check repeatedly until the job is idle.
   */
  async monitorUntilIdle(
    view: JobSpecView | JobSpec,
    options: MonitorOptions = {}
  ): Promise<MonitorSummary> {
    this.assertActive();
    return this.loop.run(toView(view), {
      sleepSeconds: options.sleepSeconds ?? this.sleepSeconds,
      signal: options.signal,
      statusQueues: options.statusQueues,
      reporter: options.reporter,
    });
  }

  async queryStatus(
    spec: JobSpec,
    steps: readonly string[] = ['all']
  ): Promise<Record<string, QueueStatus>> {
    this.assertActive();
    this.logger.info(`Querying queues for steps = ${steps.join(', ')}`);
    return this.backend.queryQueueStatus(spec.getQueueList(steps));
  }

  /**
   * Workers per queue. Only watched queues are visible: the configured
   * backend queues, those queried so far and `queues`.
   */
  async getActiveQueues(queues: readonly string[] = []): Promise<ActiveQueueMap> {
    this.assertActive();
    this.backend.watchQueues(queues);
    const { activeQueues } = await this.backend.queryActiveQueues();
    return activeQueues;
  }

  async getWorkers(queues: readonly string[] = []): Promise<string[]> {
    this.assertActive();
    this.backend.watchQueues(queues);
    return this.backend.queryWorkerIdentifiers();
  }

  /**
   * List connected workers with the queues they consume, filtered by worker
   * name, by queue and by a pattern on the worker identifier.
   */
  async queryWorkers(query: WorkerQuery = {}): Promise<WorkerInfo[]> {
    this.assertActive();
    this.backend.watchQueues(query.queues || []);

    const { activeQueues } = await this.backend.queryActiveQueues();
    const workers = filterWorkers(activeQueues, query);
    this.logger.info(`Found ${workers.length} matching workers`);
    return workers;
  }

  getBackendHealth(): CircuitBreakerMetrics | undefined {
    return this.backend instanceof BaseBackend ? this.backend.getHealth() : undefined;
  }

  getBackendType(): string {
    return this.backend.backendType;
  }

  async shutdown(): Promise<void> {
    if (!this.active) {
      this.logger.warn('QueueWatch is already shut down');
      return;
    }

    this.logger.info('Shutting down QueueWatch');
    this.active = false;

    try {
      await this.backend.dispose();
    } finally {
      if (this.connectionManager) {
        await this.connectionManager.close();
      }
    }

    this.logger.info('QueueWatch shutdown complete');
  }

  private assertActive(): void {
    if (!this.active) {
      throw new Error('QueueWatch has been shut down');
    }
  }
}

function toView(view: JobSpecView | JobSpec): JobSpecView {
  return view instanceof JobSpec ? view.toView() : view;
}
