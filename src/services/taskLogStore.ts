import fs from 'fs';
import path from 'path';

import { isFileNotFound } from '../errors';
import type { Logger } from '../types/logger';

export type TaskLogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Append-only log per task, written to `<dir>/task_<id>.log`. Lines are kept
 * in memory for tasks of the current run and read back from disk otherwise.
 */
export class TaskLogStore {
  private readonly lines = new Map<string, string[]>();
  private readonly pendingWrites = new Map<string, Promise<void>>();
  private readonly unwritten = new Set<string>();

  constructor(
    private readonly directory: string,
    private readonly logger: Logger = console
  ) {}

  async ensureDirectory(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
  }

  /** Registers the log of a new task and returns its reference. */
  create(taskId: string): string {
    this.lines.set(taskId, []);
    return this.fileName(taskId);
  }

  append(taskId: string, level: TaskLogLevel, message: string): void {
    const line = `${new Date().toISOString()} ${level} ${message}`;
    const buffer = this.lines.get(taskId) ?? [];
    buffer.push(line);
    this.lines.set(taskId, buffer);

    const echo = `[${taskId}] ${message}`;
    if (level === 'ERROR') {
      this.logger.error(echo);
    } else if (level === 'WARN') {
      this.logger.warn(echo);
    } else {
      this.logger.info(echo);
    }

    const previous = this.pendingWrites.get(taskId) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => fs.promises.appendFile(path.join(this.directory, this.fileName(taskId)), `${line}\n`, 'utf8'))
      .catch((error: unknown) => {
        this.unwritten.add(taskId);
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed to write task log for ${taskId}: ${reason}`);
      })
      .then(() => {
        if (this.pendingWrites.get(taskId) === next) {
          this.pendingWrites.delete(taskId);
        }
      });
    this.pendingWrites.set(taskId, next);
  }

  async read(taskId: string): Promise<string[] | undefined> {
    const buffered = this.lines.get(taskId);
    if (buffered) {
      return [...buffered];
    }

    try {
      const content = await fs.promises.readFile(path.join(this.directory, this.fileName(taskId)), 'utf8');
      return content.split('\n').filter((line) => line.length > 0);
    } catch (error) {
      if (isFileNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /** Resolves once every queued line has reached the disk. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites.values()]);
  }

  /**
   * Drops the in-memory copy of a finished task's log once its lines are on
   * disk; later reads come from the file. Kept when a write failed.
   */
  async release(taskId: string): Promise<void> {
    await this.pendingWrites.get(taskId);
    if (!this.pendingWrites.has(taskId) && !this.unwritten.has(taskId)) {
      this.lines.delete(taskId);
    }
  }

  forget(taskId: string): void {
    this.lines.delete(taskId);
    this.pendingWrites.delete(taskId);
    this.unwritten.delete(taskId);
  }

  private fileName(taskId: string): string {
    return `task_${taskId}.log`;
  }
}
