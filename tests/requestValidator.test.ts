import { ValidationError } from '../src/errors';
import {
  parseConversionOptions,
  parseConversionRequest,
  parseJsonField
} from '../src/services/requestValidator';

function validationIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected validation to fail.');
}

describe('parseConversionOptions', () => {
  it('applies defaults to an empty object', () => {
    const options = parseConversionOptions({});

    expect(options).toEqual({
      targetPlatform: 'rk3588',
      doQuantization: false,
      dataset: undefined,
      quantizedDtype: 'w8a8',
      quantizedAlgorithm: 'normal',
      quantizedMethod: 'channel',
      optimizationLevel: 3,
      floatDtype: 'float16',
      meanValues: [[0, 0, 0]],
      stdValues: [[255, 255, 255]],
      inputSizeList: [[1, 3, 224, 224]],
      singleCoreMode: false,
      rknnBatchSize: undefined
    });
  });

  it('treats missing options as defaults', () => {
    expect(parseConversionOptions(undefined).targetPlatform).toBe('rk3588');
  });

  it('keeps per-input normalization vectors', () => {
    const options = parseConversionOptions({
      target_platform: 'rk3566',
      mean_values: [[0, 0, 0], [127]],
      std_values: [[1, 1, 1], [128]]
    });

    expect(options.targetPlatform).toBe('rk3566');
    expect(options.meanValues).toEqual([[0, 0, 0], [127]]);
    expect(options.stdValues).toEqual([[1, 1, 1], [128]]);
  });

  it('requires a dataset when quantization is enabled', () => {
    const issues = validationIssues(() => parseConversionOptions({ do_quantization: true }));

    expect(issues).toEqual(['options.dataset: Required when do_quantization is enabled']);
  });

  it('accepts quantization with a dataset', () => {
    const options = parseConversionOptions({ do_quantization: true, dataset: 'uploads/dataset.txt' });

    expect(options.doQuantization).toBe(true);
    expect(options.dataset).toBe('uploads/dataset.txt');
  });

  it('rejects mean and std values of different shapes', () => {
    const issues = validationIssues(() =>
      parseConversionOptions({ mean_values: [0, 0, 0], std_values: [255] })
    );

    expect(issues).toEqual(['options.std_values: Must have the same shape as mean_values']);
  });

  it('rejects unknown platforms', () => {
    const issues = validationIssues(() => parseConversionOptions({ target_platform: 'rk9999' }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^options\.target_platform: /);
  });

  it('rejects an optimization level out of range', () => {
    const issues = validationIssues(() => parseConversionOptions({ optimization_level: 4 }));

    expect(issues[0]).toMatch(/^options\.optimization_level: /);
  });

  it('rejects unknown option keys', () => {
    const issues = validationIssues(() => parseConversionOptions({ targetPlatform: 'rk3588' }));

    expect(issues[0]).toMatch(/^options: /);
  });
});

describe('parseConversionRequest', () => {
  const files = [{ name: 'net.onnx', ref: 'uploads/net.onnx', size: 12 }];

  it('parses files, callback and metadata', () => {
    const request = parseConversionRequest({
      files,
      callbackUrl: 'https://hooks.example.test/done',
      metadata: { owner: 'qa' }
    });

    expect(request.files).toEqual(files);
    expect(request.callbackUrl).toBe('https://hooks.example.test/done');
    expect(request.metadata).toEqual({ owner: 'qa' });
    expect(request.options.targetPlatform).toBe('rk3588');
  });

  it('defaults metadata to an empty object', () => {
    expect(parseConversionRequest({ files }).metadata).toEqual({});
  });

  it('requires at least one file', () => {
    const issues = validationIssues(() => parseConversionRequest({ files: [] }));

    expect(issues[0]).toMatch(/^files: /);
  });

  it('rejects callbacks that are not http URLs', () => {
    const issues = validationIssues(() => parseConversionRequest({ files, callbackUrl: 'ftp://hooks.example.test/' }));

    expect(issues).toEqual(['callbackUrl: Must be an http or https URL']);
  });
});

describe('parseJsonField', () => {
  it('returns undefined for blank fields', () => {
    expect(parseJsonField('options', '')).toBeUndefined();
    expect(parseJsonField('options', undefined)).toBeUndefined();
  });

  it('parses JSON text', () => {
    expect(parseJsonField('options', '{"target_platform":"rk3562"}')).toEqual({ target_platform: 'rk3562' });
  });

  it('reports invalid JSON with the field name', () => {
    expect(validationIssues(() => parseJsonField('metadata', '{oops'))).toEqual(['metadata: Must be valid JSON']);
  });
});
