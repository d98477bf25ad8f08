export class QueueWatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueueWatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BackendUnavailableError extends QueueWatchError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(`Backend unavailable: ${message}`);
    this.name = 'BackendUnavailableError';
  }
}

export class CircuitBreakerOpenError extends BackendUnavailableError {
  constructor(circuitName: string) {
    super(`circuit breaker is open for ${circuitName}`);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class NoWorkersAvailableError extends QueueWatchError {
  constructor(
    public readonly expectedWorkers: readonly string[],
    public readonly attempts: number
  ) {
    super(
      `No workers available to process the queues: none of ` +
        `[${expectedWorkers.join(', ')}] started after ${attempts} checks`
    );
    this.name = 'NoWorkersAvailableError';
  }
}

export class MonitorAbortedError extends QueueWatchError {
  constructor() {
    super('Monitor run was aborted');
    this.name = 'MonitorAbortedError';
  }
}

export class UnsupportedBackendError extends QueueWatchError {
  constructor(backendType: string) {
    super(`Unsupported backend type: ${backendType}`);
    this.name = 'UnsupportedBackendError';
  }
}

export class ConfigurationError extends QueueWatchError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export class InvalidJobSpecError extends QueueWatchError {
  constructor(message: string) {
    super(`Invalid job spec: ${message}`);
    this.name = 'InvalidJobSpecError';
  }
}

export class RedisConnectionError extends QueueWatchError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(`Redis connection error: ${message}`);
    this.name = 'RedisConnectionError';
  }
}
