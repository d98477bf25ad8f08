/**
 * Basic Usage Example
 *
 * Keeps an allocation alive while a job still has queued or running work.
 */

import { JobSpec, QueueWatch, NoWorkersAvailableError } from '../src';

const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379';

async function main() {
  const spec = JobSpec.parse(`
name: example
steps:
  - { name: simulate, queue: sim_queue }
  - { name: report, queue: post_queue }
workers:
  - { name: simworker, steps: [simulate] }
  - { name: postworker, steps: [report] }
`);

  const watch = await QueueWatch.create({
    redis: REDIS_URL,
    backend: { queues: spec.getQueueList() },
    monitor: { sleepSeconds: 10 },
    logging: { level: 'info' },
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const summary = await watch.monitorUntilIdle(spec, { signal: controller.signal });
    console.log(`Job finished after ${summary.checks} checks`);
  } catch (error) {
    if (error instanceof NoWorkersAvailableError) {
      console.error('Workers never started:', error.expectedWorkers);
      process.exitCode = 2;
    } else {
      throw error;
    }
  } finally {
    await watch.shutdown();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
