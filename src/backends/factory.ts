import Redis from 'ioredis';
import { TaskQueueBackend } from '../types/backend';
import { BackendConfig } from '../types/config';
import { UnsupportedBackendError } from '../errors/errors';
import { Logger } from '../utils/logger';
import { BullMQBackend } from './bullmq.backend';

/**
 * Pick the backend implementation once, at startup.
 */
export function createBackend(
  config: BackendConfig,
  connection: Redis,
  logger: Logger
): TaskQueueBackend {
  const type: string = config.type || 'bullmq';

  switch (type) {
    case 'bullmq':
      return new BullMQBackend(connection, config, logger);
    default:
      throw new UnsupportedBackendError(type);
  }
}
