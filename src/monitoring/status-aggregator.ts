import { ActiveQueueMap, QueueStatus } from '../types/status';

/**
 * Sum of pending jobs over every status given, relevant or not.
 */
export function aggregateJobs(statuses: Iterable<QueueStatus>): number {
  let total = 0;
  for (const status of statuses) {
    total += status.pendingJobs;
  }
  return total;
}

/**
 * Number of distinct workers subscribed to at least one relevant queue.
 * A worker watching several relevant queues counts once; workers that only
 * watch other queues are ignored.
 */
export function aggregateConsumers(
  activeQueues: ActiveQueueMap | undefined,
  relevantQueues: ReadonlySet<string> | readonly string[]
): number {
  if (!activeQueues) return 0;

  const relevant: ReadonlySet<string> =
    relevantQueues instanceof Set ? relevantQueues : new Set(relevantQueues);
  const consumers = new Set<string>();

  for (const [queueName, workers] of Object.entries(activeQueues)) {
    if (!relevant.has(queueName)) continue;
    for (const worker of workers) {
      consumers.add(worker);
    }
  }

  return consumers.size;
}

export function filterStatuses(
  statuses: Record<string, QueueStatus>,
  queueNames: readonly string[]
): QueueStatus[] {
  const wanted = new Set(queueNames);
  return Object.values(statuses).filter((status) => wanted.has(status.name));
}
