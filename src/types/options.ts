import type {
  QUANTIZED_ALGORITHMS,
  QUANTIZED_DTYPES,
  QUANTIZED_METHODS,
  TARGET_PLATFORMS
} from '../config/formats';

export type TargetPlatform = (typeof TARGET_PLATFORMS)[number];
export type QuantizedDtype = (typeof QUANTIZED_DTYPES)[number];
export type QuantizedAlgorithm = (typeof QUANTIZED_ALGORITHMS)[number];
export type QuantizedMethod = (typeof QUANTIZED_METHODS)[number];

export interface ConversionOptions {
  readonly targetPlatform: TargetPlatform;
  readonly doQuantization: boolean;
  /** Content-store reference (or converter-side path) of the calibration dataset list. */
  readonly dataset?: string;
  readonly quantizedDtype: QuantizedDtype;
  readonly quantizedAlgorithm: QuantizedAlgorithm;
  readonly quantizedMethod: QuantizedMethod;
  readonly optimizationLevel: number;
  readonly floatDtype: 'float16';
  /** One vector per model input. */
  readonly meanValues: readonly (readonly number[])[];
  readonly stdValues: readonly (readonly number[])[];
  readonly inputSizeList: readonly (readonly number[])[];
  readonly singleCoreMode: boolean;
  readonly rknnBatchSize?: number;
}
