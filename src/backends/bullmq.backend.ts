import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { BaseBackend } from './base.backend';
import { BackendConfig } from '../types/config';
import { ActiveQueuesSnapshot, ActiveQueueMap, QueueStatus } from '../types/status';
import { Logger } from '../utils/logger';

// Job states that still represent work nobody has picked up
const PENDING_STATES = ['wait', 'prioritized', 'delayed', 'paused'] as const;

/**
 * The subset of a BullMQ Queue the backend reads from.
 */
export interface QueueHandle {
  getJobCounts(...types: Array<(typeof PENDING_STATES)[number]>): Promise<{ [index: string]: number }>;
  getWorkers(): Promise<{ [index: string]: string }[]>;
  getActiveCount(): Promise<number>;
  close(): Promise<void>;
}

export type QueueFactory = (queueName: string) => QueueHandle;

export class BullMQBackend extends BaseBackend {
  readonly backendType = 'bullmq' as const;
  private queues: Map<string, QueueHandle> = new Map();
  private createQueue: QueueFactory;

  constructor(
    connection: Redis,
    config: BackendConfig,
    logger: Logger,
    queueFactory?: QueueFactory
  ) {
    super(logger, config.circuitBreaker);

    const prefix = config.prefix || 'bull';
    this.createQueue =
      queueFactory || ((queueName) => new Queue(queueName, { connection, prefix }));

    this.watchQueues(config.queues || []);
  }

  watchQueues(queueNames: readonly string[]): void {
    if (this.isDisposed) return;
    for (const queueName of queueNames) {
      this.getQueue(queueName);
    }
  }

  async queryQueueStatus(queueNames: readonly string[]): Promise<Record<string, QueueStatus>> {
    return this.roundTrip('queryQueueStatus', async () => {
      const result: Record<string, QueueStatus> = {};

      for (const queueName of queueNames) {
        const queue = this.getQueue(queueName);
        const counts = await queue.getJobCounts(...PENDING_STATES);
        const pendingJobs = PENDING_STATES.reduce((sum, state) => sum + (counts[state] || 0), 0);

        const workers = await queue.getWorkers();

        result[queueName] = { name: queueName, pendingJobs, consumerCount: workers.length };
      }

      return result;
    });
  }

  async queryActiveQueues(): Promise<ActiveQueuesSnapshot> {
    return this.roundTrip('queryActiveQueues', async () => {
      const activeQueues: ActiveQueueMap = {};
      const workers = new Set<string>();

      for (const [queueName, queue] of this.queues) {
        const clients = await queue.getWorkers();
        if (clients.length === 0) continue;

        const identifiers = clients.map(formatWorkerIdentifier);
        activeQueues[queueName] = identifiers;
        identifiers.forEach((identifier) => workers.add(identifier));
      }

      return { activeQueues, workers: Array.from(workers) };
    });
  }

  async queryWorkerIdentifiers(): Promise<string[]> {
    const { workers } = await this.queryActiveQueues();
    return workers;
  }

  async queryWorkersProcessing(relevantQueues: readonly string[]): Promise<boolean> {
    return this.roundTrip('queryWorkersProcessing', async () => {
      for (const queueName of relevantQueues) {
        const active = await this.getQueue(queueName).getActiveCount();
        if (active > 0) {
          this.logger.debug(`Queue ${queueName} has ${active} jobs in progress`);
          return true;
        }
      }
      return false;
    });
  }

  async dispose(): Promise<void> {
    if (this.isDisposed) return;

    const handles = Array.from(this.queues.values());
    this.queues.clear();
    await Promise.all(handles.map((queue) => queue.close()));

    await super.dispose();
  }

  private getQueue(queueName: string): QueueHandle {
    let queue = this.queues.get(queueName);
    if (!queue) {
      queue = this.createQueue(queueName);
      this.queues.set(queueName, queue);
      this.logger.debug(`Watching BullMQ queue: ${queueName}`);
    }
    return queue;
  }
}

/**
 * Render a Redis client entry from `Queue.getWorkers()` as "<name>@<host>".
 * Named workers carry their name after ":w:" in the raw client name.
 */
export function formatWorkerIdentifier(client: { [index: string]: string }): string {
  const rawName = client['rawname'] || '';
  const marker = rawName.lastIndexOf(':w:');
  const workerName =
    marker >= 0 && marker + 3 < rawName.length
      ? rawName.substring(marker + 3)
      : `worker-${client['id'] || 'unknown'}`;

  const addr = client['addr'] || '';
  const portSeparator = addr.lastIndexOf(':');
  const host = (portSeparator > 0 ? addr.substring(0, portSeparator) : addr) || 'unknown';

  return `${workerName}@${host}`;
}
