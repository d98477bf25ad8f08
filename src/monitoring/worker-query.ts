import { ActiveQueueMap } from '../types/status';
import { ConfigurationError } from '../errors/errors';

export interface WorkerQuery {
  // Keep workers whose identifier contains one of these names
  workerNames?: readonly string[];
  // Keep workers subscribed to at least one of these queues
  queues?: readonly string[];
  // Keep workers whose identifier matches
  regex?: string | RegExp;
}

export interface WorkerInfo {
  worker: string;
  queues: string[];
}

/**
 * Invert an active-queue map into one entry per worker and apply the query.
 * Filters combine with AND; an empty or missing filter keeps everything.
 * Entries are sorted by worker identifier, their queues by name.
 */
export function filterWorkers(
  activeQueues: ActiveQueueMap | undefined,
  query: WorkerQuery = {}
): WorkerInfo[] {
  const byWorker = new Map<string, Set<string>>();
  for (const [queueName, workers] of Object.entries(activeQueues || {})) {
    for (const worker of workers) {
      let queues = byWorker.get(worker);
      if (!queues) {
        queues = new Set();
        byWorker.set(worker, queues);
      }
      queues.add(queueName);
    }
  }

  const names = query.workerNames || [];
  const queueFilter = new Set(query.queues || []);
  const pattern = compilePattern(query.regex);

  const result: WorkerInfo[] = [];
  for (const [worker, queues] of byWorker) {
    if (names.length > 0 && !names.some((name) => worker.includes(name))) continue;
    if (queueFilter.size > 0 && !Array.from(queues).some((queue) => queueFilter.has(queue))) {
      continue;
    }
    if (pattern && worker.search(pattern) < 0) continue;

    result.push({ worker, queues: Array.from(queues).sort() });
  }

  return result.sort((a, b) => (a.worker < b.worker ? -1 : a.worker > b.worker ? 1 : 0));
}

function compilePattern(regex: string | RegExp | undefined): RegExp | undefined {
  if (regex === undefined || regex === '') return undefined;
  if (regex instanceof RegExp) return regex;

  try {
    return new RegExp(regex);
  } catch (error) {
    throw new ConfigurationError(
      `invalid worker regex ${regex}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
