import { MODEL_FORMATS, type BundleRole, type ModelFormat } from '../types/bundle';

export interface FormatRule {
  format: ModelFormat;
  label: string;
  required: readonly BundleRole[];
  optional: readonly BundleRole[];
  primary: BundleRole;
  extensions: Partial<Record<BundleRole, readonly string[]>>;
}

export const FORMAT_RULES: Record<ModelFormat, FormatRule> = {
  onnx: {
    format: 'onnx',
    label: 'ONNX',
    required: ['model'],
    optional: [],
    primary: 'model',
    extensions: { model: ['.onnx'] }
  },
  tflite: {
    format: 'tflite',
    label: 'TensorFlow Lite',
    required: ['model'],
    optional: [],
    primary: 'model',
    extensions: { model: ['.tflite'] }
  },
  pytorch: {
    format: 'pytorch',
    label: 'PyTorch (TorchScript)',
    required: ['model'],
    optional: [],
    primary: 'model',
    extensions: { model: ['.pt', '.pth', '.pytorch'] }
  },
  caffe: {
    format: 'caffe',
    label: 'Caffe',
    required: ['graph', 'weights'],
    optional: [],
    primary: 'graph',
    extensions: { graph: ['.prototxt'], weights: ['.caffemodel'] }
  },
  darknet: {
    format: 'darknet',
    label: 'Darknet',
    required: ['config', 'weights'],
    optional: [],
    primary: 'config',
    extensions: { config: ['.cfg'], weights: ['.weights'] }
  },
  tensorflow_frozen: {
    format: 'tensorflow_frozen',
    label: 'TensorFlow frozen graph',
    required: ['graph'],
    optional: [],
    primary: 'graph',
    extensions: { graph: ['.pb'] }
  },
  tensorflow_savedmodel: {
    format: 'tensorflow_savedmodel',
    label: 'TensorFlow SavedModel',
    required: ['graph', 'index', 'data'],
    optional: [],
    primary: 'graph',
    extensions: { graph: ['saved_model.pb'], index: ['variables.index'], data: ['variables.data-*'] }
  },
  tensorflow_checkpoint: {
    format: 'tensorflow_checkpoint',
    label: 'TensorFlow checkpoint',
    required: ['meta', 'index', 'data'],
    optional: ['alias'],
    primary: 'meta',
    extensions: { meta: ['.meta'], index: ['.index'], data: ['.data-*'], alias: ['.ckpt'] }
  }
};

export const SUPPORTED_FORMATS: readonly FormatRule[] = MODEL_FORMATS.map((format) => FORMAT_RULES[format]);

export const SAVED_MODEL_MARKER = 'saved_model.pb';

export const INERT_EXTENSIONS: readonly string[] = ['.txt', '.md', '.json', '.yaml', '.yml', '.names', '.labels', '.csv'];

export const INERT_FILENAMES: readonly string[] = ['checkpoint', 'license', 'readme', '.ds_store'];

export const TARGET_PLATFORMS = [
  'rk3562',
  'rk3566',
  'rk3568',
  'rk3576',
  'rk3588',
  'rv1103',
  'rv1106',
  'rv1103b',
  'rv1106b',
  'rk2118'
] as const;

export const QUANTIZED_DTYPES = ['w8a8', 'w8a16', 'w16a16i', 'w16a16i_dfp', 'w4a16'] as const;

export const QUANTIZED_ALGORITHMS = ['normal', 'mmse', 'kl_divergence'] as const;

export const QUANTIZED_METHODS = ['layer', 'channel'] as const;

export const OUTPUT_EXTENSION = 'rknn';
