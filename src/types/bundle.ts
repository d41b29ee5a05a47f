export const MODEL_FORMATS = [
  'onnx',
  'tflite',
  'pytorch',
  'caffe',
  'darknet',
  'tensorflow_frozen',
  'tensorflow_savedmodel',
  'tensorflow_checkpoint'
] as const;

export type ModelFormat = (typeof MODEL_FORMATS)[number];

export const BUNDLE_ROLES = ['model', 'graph', 'weights', 'config', 'meta', 'index', 'data', 'alias'] as const;

export type BundleRole = (typeof BUNDLE_ROLES)[number];

/** A file the client uploaded, addressed by its content-store reference. */
export interface StoredFile {
  name: string;
  ref: string;
  size?: number;
}

export interface ModelBundle {
  readonly format: ModelFormat;
  /** Model name shared by every file of the bundle. */
  readonly stem: string;
  readonly roles: Readonly<Partial<Record<BundleRole, StoredFile>>>;
  /** Every `.data-*` shard in shard order; `roles.data` is the first one. */
  readonly shards: readonly StoredFile[];
  readonly primaryRole: BundleRole;
  readonly primaryFile: StoredFile;
}
