import Redis, { RedisOptions } from 'ioredis';
import { RedisConfig } from '../types/config';
import { RedisConnectionError } from '../errors/errors';
import { Logger } from '../utils/logger';

export class RedisConnectionManager {
  private client: Redis;
  private logger: Logger;
  private closed = false;

  constructor(config: RedisConfig | string, logger: Logger) {
    this.logger = logger.child('Redis');
    this.client = this.createClient(config);
    this.setupEventHandlers();
  }

  private createClient(config: RedisConfig | string): Redis {
    const options: RedisOptions = {
      lazyConnect: true,
      // Fail a round trip instead of queueing it while the broker is down
      maxRetriesPerRequest: 1,
      connectTimeout: typeof config === 'string' ? 5000 : config.connectTimeoutMs || 5000,
    };

    if (typeof config === 'string') {
      return new Redis(config, options);
    }

    if (config.url) {
      return new Redis(config.url, options);
    }

    return new Redis({
      ...options,
      host: config.host || 'localhost',
      port: config.port || 6379,
      db: config.db,
      username: config.username,
      password: config.password,
      tls: config.tls ? {} : undefined,
    });
  }

  private setupEventHandlers(): void {
    this.client.on('error', (err: Error) => {
      this.logger.error('Redis connection error:', err.message);
    });

    this.client.on('connect', () => {
      this.logger.debug('Redis connection established');
    });

    this.client.on('reconnecting', () => {
      this.logger.debug('Reconnecting to Redis');
    });
  }

  async testConnection(): Promise<void> {
    try {
      if (this.client.status === 'wait') {
        await this.client.connect();
      }
      await this.client.ping();
      this.logger.info('Redis connection test successful');
    } catch (error) {
      this.logger.error('Redis connection test failed:', error);
      throw new RedisConnectionError(
        'Failed to connect to Redis',
        error instanceof Error ? error : undefined
      );
    }
  }

  getClient(): Redis {
    return this.client;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.client.quit();
      this.logger.info('Redis connection closed');
    } catch (error) {
      this.logger.warn('Redis quit failed, disconnecting:', error);
      this.client.disconnect();
    }
  }
}
