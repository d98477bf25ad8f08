// Main exports
export { QueueWatch } from './queuewatch';
export type { CheckOptions, MonitorOptions } from './queuewatch';

// Core
export { aggregateJobs, aggregateConsumers } from './monitoring/status-aggregator';
export { LivenessMonitor, MAX_WORKER_CHECKS, hasExpectedWorker } from './monitoring/liveness-monitor';
export type { CheckStatusOptions, LivenessMonitorOptions } from './monitoring/liveness-monitor';
export { MonitorLoop } from './monitoring/monitor-loop';
export type { MonitorRunOptions, StatusReporter } from './monitoring/monitor-loop';
export { filterWorkers } from './monitoring/worker-query';
export type { WorkerInfo, WorkerQuery } from './monitoring/worker-query';

// Backends
export { BaseBackend } from './backends/base.backend';
export { BullMQBackend } from './backends/bullmq.backend';
export type { QueueHandle, QueueFactory } from './backends/bullmq.backend';
export { createBackend } from './backends/factory';
export { RedisConnectionManager } from './connection/redis-connection';

// Job specs and reporting
export { JobSpec } from './spec/job-spec';
export { CsvStatusReporter } from './reporting/csv-reporter';
export { Backoff, MAX_SLEEP_SECONDS, abortableSleep, validateSleepSeconds } from './utils/backoff';
export { Logger } from './utils/logger';

// Type exports
export type {
  QueueWatchConfig,
  RedisConfig,
  BackendConfig,
  CircuitBreakerOptions,
  MonitorConfig,
  LoggingConfig,
  JobsScope,
} from './types/config';

export type {
  QueueStatus,
  ActiveQueueMap,
  ActiveQueuesSnapshot,
  JobSpecView,
  MonitorState,
  MonitorSummary,
} from './types/status';

export type { TaskQueueBackend, BackendType } from './types/backend';

// Error exports
export {
  QueueWatchError,
  BackendUnavailableError,
  CircuitBreakerOpenError,
  NoWorkersAvailableError,
  MonitorAbortedError,
  UnsupportedBackendError,
  ConfigurationError,
  InvalidJobSpecError,
  RedisConnectionError,
} from './errors/errors';
