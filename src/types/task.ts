import type { ModelBundle, ModelFormat } from './bundle';
import type { ConversionOptions } from './options';

export const TASK_STATES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type TaskState = (typeof TASK_STATES)[number];

export type TerminalTaskState = Extract<TaskState, 'completed' | 'failed' | 'cancelled'>;

export type TaskErrorCode = 'CONVERSION_FAILED' | 'ENGINE_CRASH';

export interface TaskError {
  code: TaskErrorCode;
  message: string;
}

export type TaskMetadata = Record<string, unknown>;

export interface SubmitTaskExtras {
  callbackUrl?: string;
  metadata?: TaskMetadata;
}

export interface ConversionTask {
  readonly id: string;
  readonly bundle: ModelBundle;
  readonly options: ConversionOptions;
  readonly callbackUrl?: string;
  readonly metadata: TaskMetadata;
  readonly logRef: string;
  readonly createdAt: Date;
  state: TaskState;
  progress: number;
  startedAt?: Date;
  finishedAt?: Date;
  resultRef?: string;
  error?: TaskError;
}

export interface TaskSnapshot {
  readonly id: string;
  readonly state: TaskState;
  readonly progress: number;
  readonly format: ModelFormat;
  readonly primaryFile: string;
  readonly createdAt: Date;
  readonly startedAt?: Date;
  readonly finishedAt?: Date;
  readonly resultRef?: string;
  readonly error?: TaskError;
  readonly cancelRequested: boolean;
  readonly callbackUrl?: string;
  readonly logRef: string;
  readonly metadata: TaskMetadata;
  /** Set on snapshots restored from the history of an earlier run. */
  readonly historical?: boolean;
}

export interface TaskListFilter {
  states?: readonly TaskState[];
}

export type CancelResult =
  | { status: 'ok'; task: TaskSnapshot }
  | { status: 'not_found' }
  | { status: 'already_terminal'; task: TaskSnapshot };

export function isTerminalState(state: TaskState): state is TerminalTaskState {
  return state === 'completed' || state === 'failed' || state === 'cancelled';
}
