import { randomUUID } from 'crypto';

import { FORMAT_RULES } from '../config/formats';
import { ConversionCancelledError, ConversionError } from '../errors';
import type { ModelBundle } from '../types/bundle';
import type { Logger } from '../types/logger';
import type { ConversionOptions } from '../types/options';
import type {
  CancelResult,
  SubmitTaskExtras,
  TaskError,
  TaskListFilter,
  TaskSnapshot
} from '../types/task';
import type { ConversionContext, ConversionEngine } from './conversionEngine';
import type { HistoryStore } from './historyStore';
import type { Notifier } from './notifier';
import type { TaskLogStore } from './taskLogStore';
import { TaskQueue } from './taskQueue';
import { TaskRecord, TaskRegistry } from './taskRegistry';

export interface TaskManagerOptions {
  engine: ConversionEngine;
  workers: number;
  maxQueuedTasks: number;
  history: HistoryStore;
  logs: TaskLogStore;
  notifier?: Notifier;
  logger?: Logger;
  /** Running tasks are cancelled once they exceed this duration. */
  taskTimeoutMs?: number;
  generateId?: () => string;
}

export interface TaskManagerStats {
  workers: number;
  queued: number;
  running: number;
}

type ExecutionOutcome =
  | { kind: 'completed'; resultRef: string }
  | { kind: 'failed'; error: TaskError }
  | { kind: 'cancelled'; reason: string };

/**
 * Owns every task of the process: admission into a bounded FIFO queue, a
 * fixed pool of worker loops, the task state machine and terminal
 * side effects (history, callback, engine cleanup).
 */
export class TaskManager {
  private readonly registry = new TaskRegistry();
  private readonly queue: TaskQueue;
  private readonly logger: Logger;
  private readonly deadlines = new Map<string, NodeJS.Timeout>();
  private workerLoops: Promise<void>[] = [];
  private started = false;

  constructor(private readonly options: TaskManagerOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${options.workers}.`);
    }

    this.queue = new TaskQueue(options.maxQueuedTasks);
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.started) {
      return;
    }

    this.started = true;
    this.workerLoops = Array.from({ length: this.options.workers }, (_, index) =>
      this.runWorker(index + 1).catch((error: unknown) => this.fault(error))
    );
    this.logger.info(`Task manager started with ${this.options.workers} workers (${this.options.engine.name} engine)`);
  }

  /**
   * Stops accepting work, cancels queued tasks and waits for the workers to
   * return. Running conversions finish unless `cancelRunning` is set.
   */
  async stop(options: { cancelRunning?: boolean } = {}): Promise<void> {
    this.queue.close();

    for (const taskId of this.queue.snapshot()) {
      this.cancel(taskId, 'Service is shutting down.');
    }

    if (options.cancelRunning) {
      for (const task of this.registry.list({ states: ['running'] })) {
        this.cancel(task.id, 'Service is shutting down.');
      }
    }

    await Promise.all(this.workerLoops);
    this.workerLoops = [];
    this.started = false;
  }

  submit(bundle: ModelBundle, options: ConversionOptions, extras: SubmitTaskExtras = {}): string {
    this.queue.assertCapacity();

    const id = this.options.generateId?.() ?? randomUUID();
    const logRef = this.options.logs.create(id);
    this.registry.insert({
      id,
      bundle,
      options,
      logRef,
      callbackUrl: extras.callbackUrl,
      metadata: extras.metadata
    });

    try {
      this.queue.push(id);
    } catch (error) {
      this.registry.remove(id);
      this.options.logs.forget(id);
      throw error;
    }

    this.options.logs.append(
      id,
      'INFO',
      `Task created: ${FORMAT_RULES[bundle.format].label} model "${bundle.stem}" (${bundle.primaryFile.name}) for ${options.targetPlatform}`
    );
    return id;
  }

  /** Live tasks first, then tasks recorded in history by an earlier run. */
  get(taskId: string): TaskSnapshot | undefined {
    return this.registry.get(taskId)?.snapshot() ?? this.options.history.find(taskId);
  }

  /**
   * Live tasks plus history records of tasks no longer in the registry
   * (earlier runs, evicted tasks), newest first.
   */
  list(filter: TaskListFilter = {}): TaskSnapshot[] {
    const states = filter.states && filter.states.length > 0 ? new Set(filter.states) : undefined;
    const past = this.options.history
      .list()
      .filter((task) => !this.registry.get(task.id) && (!states || states.has(task.state)));

    return [...this.registry.list(filter), ...past].sort(
      (left, right) => right.createdAt.getTime() - left.createdAt.getTime()
    );
  }

  history(): TaskSnapshot[] {
    return this.options.history.list();
  }

  queuedTaskIds(): readonly string[] {
    return this.queue.snapshot();
  }

  stats(): TaskManagerStats {
    return {
      workers: this.options.workers,
      queued: this.queue.length,
      running: this.registry.countInState('running')
    };
  }

  cancel(taskId: string, reason = 'Cancelled by request.'): CancelResult {
    const record = this.registry.get(taskId);
    if (!record) {
      const past = this.options.history.find(taskId);
      return past ? { status: 'already_terminal', task: past } : { status: 'not_found' };
    }

    if (record.isTerminal) {
      return { status: 'already_terminal', task: record.snapshot() };
    }

    const firstRequest = record.cancelToken.cancel(reason);

    if (record.state === 'pending') {
      this.queue.remove(taskId);
      record.markCancelled();
      this.options.logs.append(taskId, 'WARN', `Task cancelled before it started: ${reason}`);
      void this.finalize(record);
    } else if (firstRequest) {
      this.options.logs.append(taskId, 'WARN', `Cancellation requested: ${reason}`);
    }

    return { status: 'ok', task: record.snapshot() };
  }

  async readLogs(taskId: string): Promise<string[] | undefined> {
    if (!this.get(taskId)) {
      return undefined;
    }
    return (await this.options.logs.read(taskId)) ?? [];
  }

  /** Drops a finished task from the live registry; its history record stays. */
  evict(taskId: string): boolean {
    const record = this.registry.get(taskId);
    if (!record || !record.isTerminal) {
      return false;
    }

    this.registry.remove(taskId);
    this.options.logs.forget(taskId);
    return true;
  }

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      const taskId = await this.queue.take();
      if (taskId === undefined) {
        return;
      }
      await this.execute(taskId, workerId);
    }
  }

  private async execute(taskId: string, workerId: number): Promise<void> {
    const record = this.registry.get(taskId);
    if (!record || record.state !== 'pending') {
      return;
    }

    record.markRunning();
    this.options.logs.append(taskId, 'INFO', `Worker ${workerId} started the conversion`);
    this.armDeadline(record);

    const context: ConversionContext = {
      taskId,
      cancelToken: record.cancelToken,
      onProgress: (percent) => {
        if (record.reportProgress(percent)) {
          this.options.logs.append(taskId, 'INFO', `Conversion progress: ${record.progress}%`);
        }
      },
      log: (message, level = 'INFO') => {
        if (!record.isTerminal) {
          this.options.logs.append(taskId, level, message);
        }
      }
    };

    let outcome: ExecutionOutcome;
    try {
      const resultRef = await this.options.engine.convert(record.bundle, record.options, context);
      outcome = { kind: 'completed', resultRef };
    } catch (error) {
      outcome = toFailureOutcome(error);
    } finally {
      this.disarmDeadline(taskId);
    }

    switch (outcome.kind) {
      case 'completed':
        record.complete(outcome.resultRef);
        this.options.logs.append(taskId, 'INFO', `Conversion completed: ${outcome.resultRef}`);
        break;
      case 'cancelled':
        record.markCancelled();
        this.options.logs.append(taskId, 'WARN', `Conversion cancelled: ${outcome.reason}`);
        break;
      case 'failed':
        record.fail(outcome.error);
        this.options.logs.append(taskId, 'ERROR', `Conversion failed: ${outcome.error.message}`);
        break;
    }

    await this.finalize(record);
  }

  private async finalize(record: TaskRecord): Promise<void> {
    const snapshot = record.snapshot();
    const persisted = this.options.history.append(snapshot);

    this.options.notifier?.notify(snapshot);
    this.scheduleCleanup(snapshot.id);

    try {
      await persisted;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to persist task ${snapshot.id} to history: ${reason}`);
    }

    await this.options.logs.release(snapshot.id);
  }

  private scheduleCleanup(taskId: string): void {
    const engine = this.options.engine;
    if (!engine.cleanup) {
      return;
    }

    void new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => engine.cleanup?.(taskId))
      .catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Cleanup for task ${taskId} failed: ${reason}`);
      });
  }

  private armDeadline(record: TaskRecord): void {
    const timeoutMs = this.options.taskTimeoutMs;
    if (!timeoutMs) {
      return;
    }

    const timer = setTimeout(() => {
      this.deadlines.delete(record.id);
      this.cancel(record.id, `Task exceeded the ${timeoutMs} ms deadline.`);
    }, timeoutMs);
    timer.unref();
    this.deadlines.set(record.id, timer);
  }

  private disarmDeadline(taskId: string): void {
    const timer = this.deadlines.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.deadlines.delete(taskId);
    }
  }

  /** A worker loop only rejects on an internal fault; surface it as an uncaught exception. */
  private fault(error: unknown): void {
    this.logger.error('Task worker stopped on an internal fault:', error);
    process.nextTick(() => {
      throw error;
    });
  }
}

function toFailureOutcome(error: unknown): ExecutionOutcome {
  if (error instanceof ConversionCancelledError) {
    return { kind: 'cancelled', reason: error.message };
  }

  if (error instanceof ConversionError) {
    return { kind: 'failed', error: { code: 'CONVERSION_FAILED', message: error.message } };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'failed', error: { code: 'ENGINE_CRASH', message } };
}
