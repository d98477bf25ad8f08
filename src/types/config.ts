import { BackendType } from './backend';

export interface QueueWatchConfig {
  redis: RedisConfig | string;
  backend?: BackendConfig;
  monitor?: MonitorConfig;
  logging?: LoggingConfig;
}

export interface RedisConfig {
  host?: string; // Default: 'localhost'
  port?: number; // Default: 6379
  db?: number;
  username?: string;
  password?: string;
  url?: string;
  connectTimeoutMs?: number; // Default: 5000
  tls?: boolean;
}

export interface BackendConfig {
  type?: BackendType; // Default: 'bullmq'
  prefix?: string; // Default: 'bull'
  queues?: string[]; // Queues to inspect for workers besides the ones queried
  circuitBreaker?: CircuitBreakerOptions;
}

export interface CircuitBreakerOptions {
  threshold?: number; // Default: 5
  timeoutMs?: number; // Default: 30000
}

export type JobsScope = 'all' | 'relevant';

export interface MonitorConfig {
  sleepSeconds?: number; // Default: 1
  jobsScope?: JobsScope; // Default: 'all'
}

export interface LoggingConfig {
  enabled?: boolean; // Default: true
  level?: LogLevel; // Default: 'info'
  prefix?: string; // Default: '[QueueWatch]'
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
