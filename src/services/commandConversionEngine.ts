import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';

import { ContentNotFoundError, ConversionCancelledError, ConversionError } from '../errors';
import { BUNDLE_ROLES, type BundleRole, type ModelBundle, type StoredFile } from '../types/bundle';
import type { ConversionOptions } from '../types/options';
import type { ContentStore } from './contentStore';
import { buildOutputFilename, type ConversionContext, type ConversionEngine } from './conversionEngine';

export interface CommandConversionEngineOptions {
  command: string;
  args?: string[];
  /** Per-task staging directories are created under this path. */
  tempDirectory: string;
  cancelPollIntervalMs?: number;
}

interface StagedBundle {
  modelPath: string;
  files: Partial<Record<BundleRole, string>>;
  shards: string[];
}

const PROGRESS_LINE = /^PROGRESS\s+(\d+(?:\.\d+)?)\s*$/;

/**
 * Runs an external converter (for example a script driving the RKNN
 * toolkit) in a child process. The converter receives the path of a JSON
 * request file as its last argument, prints `PROGRESS <percent>` lines on
 * stdout and exits with a non-zero code on failure.
 */
export class CommandConversionEngine implements ConversionEngine {
  readonly name = 'command';
  private readonly args: string[];
  private readonly cancelPollIntervalMs: number;

  constructor(
    private readonly store: ContentStore,
    private readonly options: CommandConversionEngineOptions
  ) {
    this.args = options.args ?? [];
    this.cancelPollIntervalMs = options.cancelPollIntervalMs ?? 500;
  }

  getCommand(): string {
    return [this.options.command, ...this.args].join(' ');
  }

  async convert(bundle: ModelBundle, options: ConversionOptions, context: ConversionContext): Promise<string> {
    context.cancelToken.throwIfCancelled();

    const workDirectory = this.workDirectory(context.taskId);
    await fs.promises.mkdir(workDirectory, { recursive: true });

    context.log('Staging model files...');
    const staged = await this.stageBundle(bundle, workDirectory);
    context.onProgress(5);

    const outputRef = this.store.reserve('outputs', buildOutputFilename(bundle, context.taskId));
    const outputPath = this.store.resolve(outputRef);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

    const requestPath = path.join(workDirectory, 'request.json');
    const request = {
      task_id: context.taskId,
      format: bundle.format,
      model_path: staged.modelPath,
      files: staged.files,
      shards: staged.shards,
      output_path: outputPath,
      ...(await this.toConverterConfig(options))
    };
    await fs.promises.writeFile(requestPath, JSON.stringify(request, null, 2), 'utf8');

    context.cancelToken.throwIfCancelled();
    context.log(`Running converter: ${this.getCommand()}`);
    await this.runConverter([...this.args, requestPath], workDirectory, context);

    if (!(await this.store.exists(outputRef))) {
      throw new ConversionError('Converter finished without producing an output file.');
    }

    return outputRef;
  }

  async cleanup(taskId: string): Promise<void> {
    await fs.promises.rm(this.workDirectory(taskId), { recursive: true, force: true });
  }

  private workDirectory(taskId: string): string {
    return path.join(this.options.tempDirectory, taskId);
  }

  /** Copies the bundle under its original file names, in the layout the toolkit loaders expect. */
  private async stageBundle(bundle: ModelBundle, workDirectory: string): Promise<StagedBundle> {
    const isSavedModel = bundle.format === 'tensorflow_savedmodel';
    const modelDirectory = path.join(workDirectory, isSavedModel ? 'saved_model' : 'model');
    const files: Partial<Record<BundleRole, string>> = {};

    const stage = async (file: StoredFile, role?: BundleRole): Promise<string> => {
      const basename = path.basename(file.name.replace(/\\/g, '/'));
      const inVariables = isSavedModel && role !== 'graph';
      const target = path.join(modelDirectory, inVariables ? 'variables' : '', basename);
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.copyFile(this.store.resolve(file.ref), target);
      return target;
    };

    for (const role of BUNDLE_ROLES) {
      const file = bundle.roles[role];
      if (!file || role === 'data') {
        continue;
      }
      files[role] = await stage(file, role);
    }

    const shards: string[] = [];
    for (const shard of bundle.shards) {
      shards.push(await stage(shard, 'data'));
    }
    if (shards.length > 0) {
      files.data = shards[0];
    }

    const primary = files[bundle.primaryRole];
    if (!primary) {
      throw new ConversionError(`Bundle has no ${bundle.primaryRole} file to convert.`);
    }

    return {
      modelPath: isSavedModel ? modelDirectory : primary,
      files,
      shards
    };
  }

  private async toConverterConfig(options: ConversionOptions): Promise<Record<string, unknown>> {
    return {
      config: {
        target_platform: options.targetPlatform,
        mean_values: options.meanValues,
        std_values: options.stdValues,
        quantized_dtype: options.quantizedDtype,
        quantized_algorithm: options.quantizedAlgorithm,
        quantized_method: options.quantizedMethod,
        float_dtype: options.floatDtype,
        optimization_level: options.optimizationLevel,
        single_core_mode: options.singleCoreMode
      },
      build: {
        do_quantization: options.doQuantization,
        dataset: options.dataset ? await this.resolveDataset(options.dataset) : null,
        rknn_batch_size: options.rknnBatchSize ?? null
      },
      load: {
        input_size_list: options.inputSizeList
      }
    };
  }

  /** Datasets uploaded to the store are passed as local paths; anything else is handed over as given. */
  private async resolveDataset(dataset: string): Promise<string> {
    try {
      return (await this.store.exists(dataset)) ? this.store.resolve(dataset) : dataset;
    } catch (error) {
      if (error instanceof ContentNotFoundError) {
        return dataset;
      }
      throw error;
    }
  }

  private runConverter(args: string[], cwd: string, context: ConversionContext): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, { cwd });

      let stderr = '';
      let stdoutBuffer = '';
      let cancelled = false;

      const handleLine = (line: string) => {
        const progress = PROGRESS_LINE.exec(line.trim());
        if (progress) {
          context.onProgress(Number(progress[1]));
        } else if (line.trim()) {
          context.log(line.trim());
        }
      };

      const poll = setInterval(() => {
        if (context.cancelToken.isCancelled && !cancelled) {
          cancelled = true;
          context.log('Cancellation requested, stopping converter', 'WARN');
          child.kill('SIGTERM');
        }
      }, this.cancelPollIntervalMs);

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (chunk: string) => {
        stdoutBuffer += chunk;
        const lines = stdoutBuffer.split(/\r?\n/);
        stdoutBuffer = lines.pop() ?? '';
        lines.forEach(handleLine);
      });

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearInterval(poll);
        if (error.code === 'ENOENT') {
          reject(new ConversionError(`Converter executable not found at "${this.options.command}". Set CONVERTER_COMMAND to the converter location.`));
          return;
        }

        reject(new ConversionError(error.message));
      });

      child.on('close', (code: number | null) => {
        clearInterval(poll);
        if (stdoutBuffer) {
          handleLine(stdoutBuffer);
        }

        if (cancelled) {
          reject(new ConversionCancelledError(context.cancelToken.reason));
          return;
        }

        if (code === 0) {
          resolve();
        } else {
          const message = stderr.trim() || `Converter exited with code ${code}`;
          reject(new ConversionError(message));
        }
      });
    });
  }
}
