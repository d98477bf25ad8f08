export interface QueueStatus {
  name: string;
  pendingJobs: number;
  consumerCount: number;
}

// Queue name -> identifiers of the workers subscribed to it
export type ActiveQueueMap = Record<string, string[]>;

export interface ActiveQueuesSnapshot {
  activeQueues: ActiveQueueMap;
  workers: string[]; // Every distinct worker identifier seen while building the map
}

/**
 * Read-only view of the job being monitored.
 * Owned by the caller; the monitor never mutates it.
 */
export interface JobSpecView {
  readonly relevantQueues: readonly string[];
  readonly expectedWorkerNames: readonly string[];
}

export interface MonitorState {
  totalJobs: number;
  totalConsumers: number;
  attemptCount: number;
}

export interface MonitorSummary {
  checks: number;
  durationMs: number;
}
