import { BackendType, TaskQueueBackend } from '../types/backend';
import { CircuitBreakerOptions } from '../types/config';
import { ActiveQueuesSnapshot, QueueStatus } from '../types/status';
import { BackendUnavailableError } from '../errors/errors';
import { CircuitBreaker, CircuitBreakerMetrics } from '../utils/circuit-breaker';
import { Logger } from '../utils/logger';

export abstract class BaseBackend implements TaskQueueBackend {
  protected logger: Logger;
  protected circuitBreaker: CircuitBreaker;
  protected isDisposed = false;

  abstract readonly backendType: BackendType;

  constructor(logger: Logger, circuitBreaker: CircuitBreakerOptions = {}) {
    this.logger = logger.child('Backend');
    this.circuitBreaker = new CircuitBreaker({
      threshold: circuitBreaker.threshold || 5,
      timeout: circuitBreaker.timeoutMs || 30000,
      name: 'queuewatch-backend',
    });
  }

  abstract watchQueues(queueNames: readonly string[]): void;
  abstract queryQueueStatus(queueNames: readonly string[]): Promise<Record<string, QueueStatus>>;
  abstract queryActiveQueues(): Promise<ActiveQueuesSnapshot>;
  abstract queryWorkerIdentifiers(): Promise<string[]>;
  abstract queryWorkersProcessing(relevantQueues: readonly string[]): Promise<boolean>;

  async dispose(): Promise<void> {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.logger.info(`Disposed ${this.backendType} backend`);
  }

  getHealth(): CircuitBreakerMetrics {
    return this.circuitBreaker.getMetrics();
  }

  /**
   * Run one broker round trip. Failures surface as BackendUnavailableError
   * and are never retried here.
   */
  protected async roundTrip<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.isDisposed) {
      throw new BackendUnavailableError(`${this.backendType} backend has been disposed`);
    }

    try {
      return await this.circuitBreaker.execute(fn);
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        throw error;
      }
      this.logger.error(`${operation} failed:`, error);
      throw new BackendUnavailableError(
        `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
