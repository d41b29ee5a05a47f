import type { BundleRole } from './types/bundle';
import type { TaskState } from './types/task';

export type ClassificationErrorKind = 'AmbiguousInput' | 'UnsupportedFormat' | 'MissingRole';

export class ClassificationError extends Error {
  readonly kind: ClassificationErrorKind;
  readonly files: string[];
  readonly missingRoles: BundleRole[];

  constructor(kind: ClassificationErrorKind, message: string, details: { files?: string[]; missingRoles?: BundleRole[] } = {}) {
    super(message);
    this.name = 'ClassificationError';
    this.kind = kind;
    this.files = details.files ?? [];
    this.missingRoles = details.missingRoles ?? [];
  }
}

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid conversion request: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class QueueFullError extends Error {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Task queue is full (${capacity} tasks waiting). Retry later.`);
    this.name = 'QueueFullError';
    this.capacity = capacity;
  }
}

/** Raised by a conversion engine; the message is reported to clients verbatim. */
export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class ConversionCancelledError extends Error {
  constructor(message = 'Conversion cancelled.') {
    super(message);
    this.name = 'ConversionCancelledError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(taskId: string, from: TaskState, to: TaskState) {
    super(`Task ${taskId} cannot move from "${from}" to "${to}".`);
    this.name = 'IllegalTransitionError';
  }
}

export class ContentNotFoundError extends Error {
  readonly ref: string;

  constructor(ref: string) {
    super(`Stored content not found: ${ref}`);
    this.name = 'ContentNotFoundError';
    this.ref = ref;
  }
}

/** Matches ENOENT by shape: errors raised by `fs` are not always `instanceof Error` in the current realm. */
export function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
