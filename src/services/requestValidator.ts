import { z } from 'zod';

import {
  QUANTIZED_ALGORITHMS,
  QUANTIZED_DTYPES,
  QUANTIZED_METHODS,
  TARGET_PLATFORMS
} from '../config/formats';
import { ValidationError } from '../errors';
import type { StoredFile } from '../types/bundle';
import type { ConversionOptions } from '../types/options';
import type { TaskMetadata } from '../types/task';

const numericVector = z.array(z.number().finite()).nonempty();
const perInputVectors = z.union([numericVector, z.array(numericVector).nonempty()]);

const optionsSchema = z
  .object({
    target_platform: z.enum(TARGET_PLATFORMS).default('rk3588'),
    do_quantization: z.boolean().default(false),
    dataset: z.string().trim().min(1).optional(),
    quantized_dtype: z.enum(QUANTIZED_DTYPES).default('w8a8'),
    quantized_algorithm: z.enum(QUANTIZED_ALGORITHMS).default('normal'),
    quantized_method: z.enum(QUANTIZED_METHODS).default('channel'),
    optimization_level: z.number().int().min(0).max(3).default(3),
    float_dtype: z.literal('float16').default('float16'),
    mean_values: perInputVectors.default([0, 0, 0]),
    std_values: perInputVectors.default([255, 255, 255]),
    input_size_list: z.array(z.array(z.number().int().positive()).nonempty()).nonempty().default([[1, 3, 224, 224]]),
    single_core_mode: z.boolean().default(false),
    rknn_batch_size: z.number().int().positive().optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.do_quantization && !value.dataset) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dataset'],
        message: 'Required when do_quantization is enabled'
      });
    }

    const mean = toPerInput(value.mean_values);
    const std = toPerInput(value.std_values);
    if (mean.length !== std.length || mean.some((row, index) => row.length !== std[index].length)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['std_values'],
        message: 'Must have the same shape as mean_values'
      });
    }
  })
  .transform((value): ConversionOptions => ({
    targetPlatform: value.target_platform,
    doQuantization: value.do_quantization,
    dataset: value.dataset,
    quantizedDtype: value.quantized_dtype,
    quantizedAlgorithm: value.quantized_algorithm,
    quantizedMethod: value.quantized_method,
    optimizationLevel: value.optimization_level,
    floatDtype: value.float_dtype,
    meanValues: toPerInput(value.mean_values),
    stdValues: toPerInput(value.std_values),
    inputSizeList: value.input_size_list.map((shape) => [...shape]),
    singleCoreMode: value.single_core_mode,
    rknnBatchSize: value.rknn_batch_size
  }));

const storedFileSchema = z.object({
  name: z.string().trim().min(1),
  ref: z.string().trim().min(1),
  size: z.number().int().nonnegative().optional()
});

const callbackUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http or https URL' });

const conversionRequestSchema = z.object({
  files: z.array(storedFileSchema).nonempty(),
  options: z.unknown().optional(),
  callbackUrl: callbackUrlSchema.optional(),
  metadata: z.record(z.unknown()).optional()
});

export interface ConversionRequest {
  files: StoredFile[];
  options: ConversionOptions;
  callbackUrl?: string;
  metadata: TaskMetadata;
}

/** Parses wire-form (snake_case) conversion options, applying defaults. */
export function parseConversionOptions(input: unknown): ConversionOptions {
  const result = optionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error, 'options'));
  }
  return result.data;
}

export function parseConversionRequest(input: unknown): ConversionRequest {
  const result = conversionRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }

  return {
    files: result.data.files,
    options: parseConversionOptions(result.data.options),
    callbackUrl: result.data.callbackUrl,
    metadata: result.data.metadata ?? {}
  };
}

/** Parses a JSON-encoded multipart text field; blank fields yield undefined. */
export function parseJsonField(field: string, raw: unknown): unknown {
  if (typeof raw !== 'string' || !raw.trim()) {
    return undefined;
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError([`${field}: Must be valid JSON`]);
  }
}

function toPerInput(value: ReadonlyArray<number | readonly number[]>): number[][] {
  const flat = value.filter((item): item is number => typeof item === 'number');
  if (flat.length === value.length) {
    return [flat];
  }
  return value.filter((item): item is readonly number[] => typeof item !== 'number').map((row) => [...row]);
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const location = [prefix, ...issue.path].filter((segment) => segment !== undefined).join('.');
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}
