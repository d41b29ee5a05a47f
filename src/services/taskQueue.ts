import { QueueFullError } from '../errors';

type Waiter = (taskId: string | undefined) => void;

/**
 * FIFO of task ids waiting for a worker. Workers blocked in `take()` are
 * served in the order they started waiting; `close()` releases them with
 * `undefined`.
 */
export class TaskQueue {
  private readonly items: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}.`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  push(taskId: string): void {
    if (this.closed) {
      throw new Error('Task queue is closed.');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(taskId);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }
    this.items.push(taskId);
  }

  /** Throws QueueFullError without enqueuing when no slot is free. */
  assertCapacity(): void {
    if (this.waiters.length === 0 && this.items.length >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }
  }

  take(): Promise<string | undefined> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  remove(taskId: string): boolean {
    const index = this.items.indexOf(taskId);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  snapshot(): readonly string[] {
    return [...this.items];
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
