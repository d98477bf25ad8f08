import { existsSync, promises as fs } from 'fs';
import { QueueStatus } from '../types/status';
import { StatusReporter } from '../monitoring/monitor-loop';

/**
 * Appends one row of per-queue task and consumer counts per poll.
 * A new file gets a header built from the queues of its first row.
 */
export class CsvStatusReporter implements StatusReporter {
  private readonly filePath: string;
  private readonly now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
  }

  async record(statuses: Record<string, QueueStatus>): Promise<void> {
    const queues = Object.values(statuses);
    let content = '';

    if (!existsSync(this.filePath)) {
      content += '# time';
      for (const queue of queues) {
        content += `,${queue.name}:tasks,${queue.name}:consumers`;
      }
      content += '\n';
    }

    content += formatTimestamp(this.now());
    for (const queue of queues) {
      content += `,${queue.pendingJobs},${queue.consumerCount}`;
    }
    content += '\n';

    await fs.appendFile(this.filePath, content, 'utf8');
  }
}

// YYYY-MM-DD HH:MM:SS in local time
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
