import fs from 'fs';
import path from 'path';

import { isFileNotFound } from '../errors';
import { MODEL_FORMATS, type ModelFormat } from '../types/bundle';
import type { Logger } from '../types/logger';
import type { TaskError, TaskSnapshot, TaskState } from '../types/task';

interface HistoryLine {
  id: string;
  state: TaskState;
  progress: number;
  format: ModelFormat;
  primaryFile: string;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  resultRef?: string;
  error?: TaskError;
  cancelRequested: boolean;
  callbackUrl?: string;
  logRef: string;
  metadata: Record<string, unknown>;
}

const TERMINAL_STATES: readonly TaskState[] = ['completed', 'failed', 'cancelled'];

/**
 * Terminal task snapshots, persisted as one JSON object per line. Records
 * read by `load()` come from earlier runs and are flagged `historical`.
 */
export class HistoryStore {
  private readonly records = new Map<string, TaskSnapshot>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = console
  ) {}

  async load(): Promise<number> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return 0;
      }
      throw error;
    }

    let loaded = 0;
    content.split('\n').forEach((raw, index) => {
      if (!raw.trim()) {
        return;
      }

      const snapshot = parseLine(raw);
      if (!snapshot) {
        this.logger.warn(`Skipping malformed history line ${index + 1} in ${this.filePath}`);
        return;
      }

      this.records.set(snapshot.id, snapshot);
      loaded += 1;
    });

    return loaded;
  }

  /** Records the snapshot immediately and resolves once its line is on disk. */
  append(snapshot: TaskSnapshot): Promise<void> {
    this.records.set(snapshot.id, snapshot);

    const line = `${JSON.stringify(toLine(snapshot))}\n`;
    const write = this.writeChain.then(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, line, 'utf8');
    });
    // The caller receives the failure through `write`; the chain only orders lines.
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  find(taskId: string): TaskSnapshot | undefined {
    return this.records.get(taskId);
  }

  /** Newest `finishedAt` first. */
  list(): TaskSnapshot[] {
    return [...this.records.values()].sort(
      (left, right) => (right.finishedAt?.getTime() ?? 0) - (left.finishedAt?.getTime() ?? 0)
    );
  }
}

function toLine(snapshot: TaskSnapshot): HistoryLine {
  return {
    id: snapshot.id,
    state: snapshot.state,
    progress: snapshot.progress,
    format: snapshot.format,
    primaryFile: snapshot.primaryFile,
    createdAt: snapshot.createdAt.toISOString(),
    startedAt: snapshot.startedAt?.toISOString(),
    finishedAt: snapshot.finishedAt?.toISOString(),
    resultRef: snapshot.resultRef,
    error: snapshot.error,
    cancelRequested: snapshot.cancelRequested,
    callbackUrl: snapshot.callbackUrl,
    logRef: snapshot.logRef,
    metadata: snapshot.metadata
  };
}

function parseLine(raw: string): TaskSnapshot | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }

  if (!isRecord(value)) {
    return undefined;
  }

  const { id, state, progress, format, primaryFile, createdAt, logRef } = value;
  if (
    typeof id !== 'string'
    || typeof progress !== 'number'
    || typeof primaryFile !== 'string'
    || typeof createdAt !== 'string'
    || typeof logRef !== 'string'
  ) {
    return undefined;
  }

  const taskState = TERMINAL_STATES.find((candidate) => candidate === state);
  const modelFormat = MODEL_FORMATS.find((candidate) => candidate === format);
  if (!taskState || !modelFormat) {
    return undefined;
  }

  const created = readDate(createdAt);
  const startedAt = readDate(value.startedAt);
  const finishedAt = readDate(value.finishedAt);
  if (
    !created
    || (value.startedAt !== undefined && !startedAt)
    || (value.finishedAt !== undefined && !finishedAt)
  ) {
    return undefined;
  }

  return Object.freeze({
    id,
    state: taskState,
    progress,
    format: modelFormat,
    primaryFile,
    createdAt: created,
    startedAt,
    finishedAt,
    resultRef: typeof value.resultRef === 'string' ? value.resultRef : undefined,
    error: parseTaskError(value.error),
    cancelRequested: value.cancelRequested === true,
    callbackUrl: typeof value.callbackUrl === 'string' ? value.callbackUrl : undefined,
    logRef,
    metadata: isRecord(value.metadata) ? value.metadata : {},
    historical: true
  });
}

function parseTaskError(value: unknown): TaskError | undefined {
  if (!isRecord(value) || typeof value.message !== 'string') {
    return undefined;
  }
  const code = value.code === 'ENGINE_CRASH' ? 'ENGINE_CRASH' : 'CONVERSION_FAILED';
  return { code, message: value.message };
}

function readDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
