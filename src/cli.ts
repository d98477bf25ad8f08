#!/usr/bin/env node
import chalk from 'chalk';
import Table from 'cli-table3';
import { QueueWatch } from './queuewatch';
import { JobSpec } from './spec/job-spec';
import { CsvStatusReporter } from './reporting/csv-reporter';
import { LogLevel } from './types/config';
import { QueueStatus } from './types/status';
import { WorkerInfo } from './monitoring/worker-query';
import { MAX_DELAY_MS, MAX_SLEEP_SECONDS } from './utils/backoff';
import {
  BackendUnavailableError,
  MonitorAbortedError,
  NoWorkersAvailableError,
  QueueWatchError,
  RedisConnectionError,
} from './errors/errors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_WORKERS = 2;
export const EXIT_BACKEND_UNAVAILABLE = 3;
export const EXIT_INTERRUPTED = 130;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const USAGE = `Usage:
  queuewatch status <spec.yaml> [--steps a,b] [--csv file]
  queuewatch monitor <spec.yaml> [--sleep seconds] [--steps a,b] [--csv file]
  queuewatch workers <spec.yaml> [--queues a,b] [--workers regex]

Options:
  --redis <url>        Redis URL (default: $QUEUEWATCH_REDIS_URL or redis://localhost:6379)
  --prefix <prefix>    BullMQ key prefix (default: bull)
  --log-level <level>  debug | info | warn | error (default: info)`;

export interface CliArgs {
  command: 'status' | 'monitor' | 'workers';
  specPath: string;
  steps: string[];
  csvFile?: string;
  queues?: string[];
  workerRegex?: string;
  sleepSeconds: number;
  redisUrl: string;
  prefix?: string;
  logLevel: LogLevel;
}

export class UsageError extends QueueWatchError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const positional: string[] = [];
  const options = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq > 0) {
        options.set(arg.substring(2, eq), arg.substring(eq + 1));
        continue;
      }
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      options.set(arg.substring(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const [command, specPath] = positional;
  if (command !== 'status' && command !== 'monitor' && command !== 'workers') {
    throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command');
  }
  if (!specPath) {
    throw new UsageError('Missing job spec path');
  }

  const known = new Set(['steps', 'csv', 'queues', 'workers', 'sleep', 'redis', 'prefix', 'log-level']);
  for (const name of options.keys()) {
    if (!known.has(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }
  }

  const sleepRaw = options.get('sleep') || '60';
  const sleepSeconds = Number(sleepRaw);
  if (!Number.isFinite(sleepSeconds) || sleepSeconds < 0) {
    throw new UsageError(`--sleep must be a non-negative number, got ${sleepRaw}`);
  }
  if (sleepSeconds * 1000 > MAX_DELAY_MS) {
    throw new UsageError(`--sleep must be at most ${MAX_SLEEP_SECONDS} seconds, got ${sleepRaw}`);
  }

  const logLevelRaw = options.get('log-level') || 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw);
  if (!logLevel) {
    throw new UsageError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const workerRegex = options.get('workers');
  if (workerRegex !== undefined) {
    try {
      new RegExp(workerRegex);
    } catch {
      throw new UsageError(`--workers must be a regular expression, got ${workerRegex}`);
    }
  }

  const steps = splitList(options.get('steps') || 'all');
  const queuesRaw = options.get('queues');

  return {
    command,
    specPath,
    steps: steps.length > 0 ? steps : ['all'],
    csvFile: options.get('csv'),
    queues: queuesRaw === undefined ? undefined : splitList(queuesRaw),
    workerRegex,
    sleepSeconds,
    redisUrl: options.get('redis') || env.QUEUEWATCH_REDIS_URL || 'redis://localhost:6379',
    prefix: options.get('prefix'),
    logLevel,
  };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function renderStatusTable(statuses: Record<string, QueueStatus>): string {
  const table = new Table({
    head: [chalk.cyan.bold('Queue'), chalk.cyan.bold('Tasks'), chalk.cyan.bold('Consumers')],
  });

  for (const status of Object.values(statuses)) {
    table.push([
      chalk.white(status.name),
      status.pendingJobs,
      status.consumerCount > 0 ? chalk.green(status.consumerCount) : chalk.yellow(0),
    ]);
  }

  return table.toString();
}

export function renderWorkerTable(workers: readonly WorkerInfo[]): string {
  const table = new Table({
    head: [chalk.cyan.bold('Worker'), chalk.cyan.bold('Queues')],
  });

  for (const info of workers) {
    table.push([chalk.white(info.worker), info.queues.join(', ')]);
  }

  return table.toString();
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof NoWorkersAvailableError) return EXIT_NO_WORKERS;
  if (error instanceof BackendUnavailableError || error instanceof RedisConnectionError) {
    return EXIT_BACKEND_UNAVAILABLE;
  }
  if (error instanceof MonitorAbortedError) return EXIT_INTERRUPTED;
  return EXIT_FAILURE;
}

export function describeError(error: unknown): string {
  if (error instanceof NoWorkersAvailableError) {
    return `Workers never started: ${error.message}`;
  }
  if (error instanceof BackendUnavailableError || error instanceof RedisConnectionError) {
    return `Task queue backend unreachable: ${error.message}`;
  }
  if (error instanceof MonitorAbortedError) {
    return 'Monitor interrupted';
  }
  return error instanceof Error ? error.message : String(error);
}

async function run(args: CliArgs): Promise<number> {
  const spec = JobSpec.load(args.specPath);
  const reporter = args.csvFile ? new CsvStatusReporter(args.csvFile) : undefined;

  const watch = await QueueWatch.create({
    redis: args.redisUrl,
    backend: { prefix: args.prefix, queues: spec.getQueueList(['all']) },
    monitor: { sleepSeconds: args.sleepSeconds },
    logging: { level: args.logLevel },
  });

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    if (args.command === 'workers') {
      const workers = await watch.queryWorkers({
        workerNames: spec.getWorkerNames(),
        queues: args.queues,
        regex: args.workerRegex,
      });
      if (workers.length === 0) {
        console.log(chalk.yellow('No matching workers are connected'));
      } else {
        console.log(renderWorkerTable(workers));
      }
      return EXIT_OK;
    }

    if (args.command === 'status') {
      const statuses = await watch.queryStatus(spec, args.steps);
      console.log(renderStatusTable(statuses));
      if (reporter) {
        await reporter.record(statuses);
      }
      return EXIT_OK;
    }

    const summary = await watch.monitorUntilIdle(spec, {
      signal: controller.signal,
      statusQueues: spec.getQueueList(args.steps),
      reporter,
    });
    console.log(
      `${chalk.green('✓')} ${spec.name}: work finished after ${summary.checks} checks`
    );
    return EXIT_OK;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    await watch.shutdown();
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  try {
    return await run(args);
  } catch (error) {
    console.error(chalk.red('Error:'), describeError(error));
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
