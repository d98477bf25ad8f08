import { ActiveQueuesSnapshot, QueueStatus } from './status';

export type BackendType = 'bullmq';

export interface TaskQueueBackend {
  readonly backendType: BackendType;

  /**
   * Add queues to the set the worker queries look at. Active-queue and
   * worker-identifier queries only see workers on watched queues.
   */
  watchQueues(queueNames: readonly string[]): void;
  queryQueueStatus(queueNames: readonly string[]): Promise<Record<string, QueueStatus>>;
  queryActiveQueues(): Promise<ActiveQueuesSnapshot>;
  queryWorkerIdentifiers(): Promise<string[]>;
  queryWorkersProcessing(relevantQueues: readonly string[]): Promise<boolean>;
  dispose(): Promise<void>;
}
