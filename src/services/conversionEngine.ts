import { OUTPUT_EXTENSION } from '../config/formats';
import type { ModelBundle } from '../types/bundle';
import type { ConversionOptions } from '../types/options';
import type { CancelToken } from './cancelToken';
import type { TaskLogLevel } from './taskLogStore';

export interface ConversionContext {
  taskId: string;
  onProgress: (percent: number) => void;
  cancelToken: CancelToken;
  log: (message: string, level?: TaskLogLevel) => void;
}

/**
 * Converts a model bundle into an artifact and returns its content-store
 * reference. Implementations poll `context.cancelToken` and throw
 * ConversionCancelledError once it is set; any other failure is reported
 * by throwing ConversionError.
 */
export interface ConversionEngine {
  readonly name: string;
  convert(bundle: ModelBundle, options: ConversionOptions, context: ConversionContext): Promise<string>;
  /** Removes temporary files left for a task; called once the task is terminal. */
  cleanup?(taskId: string): Promise<void>;
}

export function buildOutputFilename(bundle: ModelBundle, taskId: string): string {
  const safeStem = bundle.stem.replace(/[^\w.-]+/g, '_') || 'model';
  return `${safeStem}_${taskId}.${OUTPUT_EXTENSION}`;
}
