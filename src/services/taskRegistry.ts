import { IllegalTransitionError } from '../errors';
import type { ModelBundle } from '../types/bundle';
import type { ConversionOptions } from '../types/options';
import {
  isTerminalState,
  type ConversionTask,
  type TaskError,
  type TaskListFilter,
  type TaskMetadata,
  type TaskSnapshot,
  type TaskState
} from '../types/task';
import { CancelToken } from './cancelToken';

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: []
};

export interface NewTask {
  id: string;
  bundle: ModelBundle;
  options: ConversionOptions;
  logRef: string;
  callbackUrl?: string;
  metadata?: TaskMetadata;
}

/**
 * A task together with its cancel token. Every mutation is a synchronous
 * method, so a worker's progress update and a concurrent `cancel` never
 * interleave on the same task.
 */
export class TaskRecord {
  readonly cancelToken = new CancelToken();
  private readonly task: ConversionTask;

  constructor(init: NewTask, readonly sequence: number) {
    this.task = {
      id: init.id,
      bundle: init.bundle,
      options: init.options,
      callbackUrl: init.callbackUrl,
      metadata: Object.freeze({ ...(init.metadata ?? {}) }),
      logRef: init.logRef,
      createdAt: new Date(),
      state: 'pending',
      progress: 0
    };
  }

  get id(): string {
    return this.task.id;
  }

  get state(): TaskState {
    return this.task.state;
  }

  get progress(): number {
    return this.task.progress;
  }

  get bundle(): ModelBundle {
    return this.task.bundle;
  }

  get options(): ConversionOptions {
    return this.task.options;
  }

  get callbackUrl(): string | undefined {
    return this.task.callbackUrl;
  }

  get logRef(): string {
    return this.task.logRef;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.task.state);
  }

  markRunning(): void {
    this.transition('running');
    this.task.startedAt = new Date();
  }

  /** Ignores values outside a running task or below the current progress. */
  reportProgress(percent: number): boolean {
    if (this.task.state !== 'running' || !Number.isFinite(percent)) {
      return false;
    }

    const clamped = Math.min(100, Math.max(0, percent));
    if (clamped <= this.task.progress) {
      return false;
    }

    this.task.progress = clamped;
    return true;
  }

  complete(resultRef: string): void {
    this.transition('completed');
    this.task.progress = 100;
    this.task.resultRef = resultRef;
    this.task.finishedAt = new Date();
  }

  fail(error: TaskError): void {
    this.transition('failed');
    this.task.error = { ...error };
    this.task.finishedAt = new Date();
  }

  markCancelled(): void {
    this.transition('cancelled');
    this.task.finishedAt = new Date();
  }

  snapshot(): TaskSnapshot {
    const task = this.task;
    return Object.freeze({
      id: task.id,
      state: task.state,
      progress: task.progress,
      format: task.bundle.format,
      primaryFile: task.bundle.primaryFile.name,
      createdAt: new Date(task.createdAt),
      startedAt: task.startedAt ? new Date(task.startedAt) : undefined,
      finishedAt: task.finishedAt ? new Date(task.finishedAt) : undefined,
      resultRef: task.resultRef,
      error: task.error ? { ...task.error } : undefined,
      cancelRequested: this.cancelToken.isCancelled,
      callbackUrl: task.callbackUrl,
      logRef: task.logRef,
      metadata: task.metadata
    });
  }

  private transition(next: TaskState): void {
    if (!TRANSITIONS[this.task.state].includes(next)) {
      throw new IllegalTransitionError(this.task.id, this.task.state, next);
    }
    this.task.state = next;
  }
}

/** Live tasks of this process, keyed by id. */
export class TaskRegistry {
  private readonly records = new Map<string, TaskRecord>();
  private sequence = 0;

  get size(): number {
    return this.records.size;
  }

  insert(init: NewTask): TaskRecord {
    if (this.records.has(init.id)) {
      throw new Error(`Task ${init.id} is already registered.`);
    }

    this.sequence += 1;
    const record = new TaskRecord(init, this.sequence);
    this.records.set(init.id, record);
    return record;
  }

  get(id: string): TaskRecord | undefined {
    return this.records.get(id);
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }

  countInState(state: TaskState): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.state === state) {
        count += 1;
      }
    }
    return count;
  }

  /** Newest first; records created in the same millisecond keep submission order reversed. */
  list(filter: TaskListFilter = {}): TaskSnapshot[] {
    const states = filter.states && filter.states.length > 0 ? new Set(filter.states) : undefined;

    return [...this.records.values()]
      .filter((record) => !states || states.has(record.state))
      .map((record) => ({ record, snapshot: record.snapshot() }))
      .sort((left, right) => {
        const byTime = right.snapshot.createdAt.getTime() - left.snapshot.createdAt.getTime();
        return byTime !== 0 ? byTime : right.record.sequence - left.record.sequence;
      })
      .map(({ snapshot }) => snapshot);
  }
}
