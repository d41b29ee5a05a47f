import type { ServerConfig } from '../config/settings';
import type { StoragePaths } from '../config/storage';
import { ContentNotFoundError } from '../errors';
import type { StoredFile } from '../types/bundle';
import type { Logger } from '../types/logger';
import type { TaskSnapshot } from '../types/task';
import { CommandConversionEngine } from './commandConversionEngine';
import type { ContentStore } from './contentStore';
import type { ConversionEngine } from './conversionEngine';
import { classifyInput } from './inputClassifier';
import {
  parseConversionRequest,
  parseJsonField,
  type ConversionRequest
} from './requestValidator';
import { SimulationConversionEngine } from './simulationConversionEngine';
import type { TaskManager } from './taskManager';

export interface ConversionServiceOptions {
  logger?: Logger;
}

/**
 * Entry point for new conversions: validates the request, classifies the
 * uploaded files into a model bundle and hands it to the task manager.
 */
export class ConversionService {
  private readonly logger: Logger;

  constructor(
    private readonly taskManager: TaskManager,
    private readonly store: ContentStore,
    options: ConversionServiceOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  /** Accepts a JSON request body referencing files already in the store. */
  async submit(body: unknown): Promise<TaskSnapshot> {
    return this.createConversionTask(parseConversionRequest(body));
  }

  async createConversionTask(request: ConversionRequest): Promise<TaskSnapshot> {
    const bundle = classifyInput(request.files);
    await this.assertStored(request.files);

    const taskId = this.taskManager.submit(bundle, request.options, {
      callbackUrl: request.callbackUrl,
      metadata: request.metadata
    });

    const task = this.taskManager.get(taskId);
    if (!task) {
      throw new Error('Task not found after submission.');
    }

    return task;
  }

  /**
   * Creates a task from files received in the same multipart request. The
   * files are removed again when the request is rejected.
   */
  async createFromUpload(files: StoredFile[], fields: unknown): Promise<TaskSnapshot> {
    try {
      const form: Record<string, unknown> = isRecord(fields) ? fields : {};
      const callbackUrl = typeof form.callbackUrl === 'string' && form.callbackUrl.trim()
        ? form.callbackUrl
        : undefined;

      const request = parseConversionRequest({
        files,
        options: parseJsonField('options', form.options),
        callbackUrl,
        metadata: parseJsonField('metadata', form.metadata)
      });

      return await this.createConversionTask(request);
    } catch (error) {
      await this.discard(files);
      throw error;
    }
  }

  async discard(files: readonly StoredFile[]): Promise<void> {
    await Promise.all(
      files.map(async (file) => {
        try {
          await this.store.delete(file.ref);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Failed to remove rejected upload ${file.ref}: ${reason}`);
        }
      })
    );
  }

  private async assertStored(files: readonly StoredFile[]): Promise<void> {
    for (const file of files) {
      if (!(await this.store.exists(file.ref))) {
        throw new ContentNotFoundError(file.ref);
      }
    }
  }
}

/** Picks the engine for this process; tests run against the simulation engine. */
export function createConversionEngine(config: ServerConfig, store: ContentStore, paths: StoragePaths): ConversionEngine {
  if (process.env.NODE_ENV === 'test') {
    return new SimulationConversionEngine(store);
  }

  return new CommandConversionEngine(store, {
    command: config.converterCommand,
    args: config.converterArgs,
    tempDirectory: paths.temp,
    cancelPollIntervalMs: config.cancelPollIntervalMs
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
