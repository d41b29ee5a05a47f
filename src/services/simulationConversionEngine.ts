import type { ModelBundle } from '../types/bundle';
import type { ConversionOptions } from '../types/options';
import type { ContentStore } from './contentStore';
import { buildOutputFilename, type ConversionContext, type ConversionEngine } from './conversionEngine';

const CHECKPOINTS = [10, 30, 60, 90];

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Stands in for the converter under NODE_ENV=test: copies the primary file as the artifact. */
export class SimulationConversionEngine implements ConversionEngine {
  readonly name = 'simulation';

  constructor(
    private readonly store: ContentStore,
    private readonly stepDelayMs = 5
  ) {}

  async convert(bundle: ModelBundle, options: ConversionOptions, context: ConversionContext): Promise<string> {
    context.log(`Simulating ${bundle.format} conversion for ${options.targetPlatform}`);

    for (const checkpoint of CHECKPOINTS) {
      context.cancelToken.throwIfCancelled();
      await wait(this.stepDelayMs);
      context.onProgress(checkpoint);
    }

    context.cancelToken.throwIfCancelled();
    const content = await this.store.get(bundle.primaryFile.ref);
    const outputRef = this.store.reserve('outputs', buildOutputFilename(bundle, context.taskId));
    await this.store.write(outputRef, content);
    context.onProgress(100);
    return outputRef;
  }
}
