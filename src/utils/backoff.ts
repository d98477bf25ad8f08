import { ConfigurationError, MonitorAbortedError } from '../errors/errors';

// Largest delay setTimeout honours; longer ones fire after 1ms
export const MAX_DELAY_MS = 2 ** 31 - 1;
export const MAX_SLEEP_SECONDS = MAX_DELAY_MS / 1000;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or rejects with MonitorAbortedError as soon as the
 * signal fires.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new MonitorAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new MonitorAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function validateSleepSeconds(sleepSeconds: number, label = 'sleepSeconds'): void {
  if (!Number.isFinite(sleepSeconds) || sleepSeconds < 0) {
    throw new ConfigurationError(`${label} must be a non-negative number, got ${sleepSeconds}`);
  }
  if (sleepSeconds * 1000 > MAX_DELAY_MS) {
    throw new ConfigurationError(
      `${label} must be at most ${MAX_SLEEP_SECONDS} seconds, got ${sleepSeconds}`
    );
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new MonitorAbortedError();
  }
}

export interface BackoffOptions {
  maxAttempts: number;
  delayMs: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Fixed-delay attempt budget. Callers record each failed attempt with
 * `fail()` and wait with `pause()` while `exhausted` is false.
 */
export class Backoff {
  private attempts = 0;
  private readonly maxAttempts: number;
  private readonly delayMs: number;
  private readonly signal?: AbortSignal;
  private readonly sleep: SleepFn;

  constructor(options: BackoffOptions) {
    this.maxAttempts = options.maxAttempts;
    this.delayMs = options.delayMs;
    this.signal = options.signal;
    this.sleep = options.sleep || abortableSleep;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get exhausted(): boolean {
    return this.attempts >= this.maxAttempts;
  }

  fail(): void {
    this.attempts++;
  }

  checkAborted(): void {
    throwIfAborted(this.signal);
  }

  async pause(): Promise<void> {
    this.checkAborted();
    await this.sleep(this.delayMs, this.signal);
  }
}
