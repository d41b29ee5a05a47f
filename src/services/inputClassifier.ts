import path from 'path';

import {
  FORMAT_RULES,
  INERT_EXTENSIONS,
  INERT_FILENAMES,
  SAVED_MODEL_MARKER
} from '../config/formats';
import { ClassificationError } from '../errors';
import { BUNDLE_ROLES, type BundleRole, type ModelBundle, type ModelFormat, type StoredFile } from '../types/bundle';

type SingleFileFormat = 'onnx' | 'tflite' | 'pytorch' | 'tensorflow_frozen';
type GroupedFormat = 'caffe' | 'darknet' | 'tensorflow_checkpoint';

interface ShardPosition {
  index: number;
  total: number;
}

type ParsedFile =
  | { kind: 'inert'; file: StoredFile }
  | { kind: 'unsupported'; file: StoredFile }
  | { kind: 'marker'; file: StoredFile; directory: string }
  | { kind: 'single'; file: StoredFile; format: SingleFileFormat; stem: string }
  | { kind: 'part'; file: StoredFile; format: GroupedFormat; role: BundleRole; stem: string; shard?: ShardPosition };

type PartFile = Extract<ParsedFile, { kind: 'part' }>;

interface Candidate {
  format: ModelFormat;
  stem: string;
  roles: Partial<Record<BundleRole, StoredFile>>;
  shards: StoredFile[];
}

interface GroupOutcome {
  candidate?: Candidate;
  missing: BundleRole[];
}

const SINGLE_FILE_EXTENSIONS: Record<string, SingleFileFormat> = {
  '.onnx': 'onnx',
  '.tflite': 'tflite',
  '.pt': 'pytorch',
  '.pth': 'pytorch',
  '.pytorch': 'pytorch',
  '.pb': 'tensorflow_frozen'
};

const PART_EXTENSIONS: Record<string, { format: GroupedFormat; role: BundleRole }> = {
  '.prototxt': { format: 'caffe', role: 'graph' },
  '.caffemodel': { format: 'caffe', role: 'weights' },
  '.cfg': { format: 'darknet', role: 'config' },
  '.weights': { format: 'darknet', role: 'weights' },
  '.meta': { format: 'tensorflow_checkpoint', role: 'meta' },
  '.index': { format: 'tensorflow_checkpoint', role: 'index' },
  '.ckpt': { format: 'tensorflow_checkpoint', role: 'alias' }
};

const DATA_SHARD_PATTERN = /^(.+)\.data-([^.]+)$/i;
const SHARD_POSITION_PATTERN = /^(\d+)-of-(\d+)$/;
const SAVED_MODEL_VARIABLES_STEM = 'variables';

/**
 * Groups uploaded files into a single model bundle. Only file names are
 * inspected; the content store is never read.
 */
export function classifyInput(files: readonly StoredFile[]): ModelBundle {
  const parsed = files.map(parseFile);

  const unsupported = parsed.filter((entry) => entry.kind === 'unsupported').map((entry) => entry.file.name);
  if (unsupported.length > 0) {
    throw new ClassificationError('UnsupportedFormat', `Unsupported file type: ${unsupported.join(', ')}`, {
      files: unsupported
    });
  }

  const modelFiles = parsed.filter((entry) => entry.kind !== 'inert');
  if (modelFiles.length === 0) {
    throw new ClassificationError('UnsupportedFormat', 'No model file found in the upload.', {
      files: files.map((file) => file.name)
    });
  }

  if (modelFiles.some((entry) => entry.kind === 'marker')) {
    return classifySavedModel(modelFiles);
  }

  const candidates: Candidate[] = [];
  const missing = new Set<BundleRole>();
  const leftovers: string[] = [];

  for (const entry of modelFiles) {
    if (entry.kind === 'single') {
      const roles: Partial<Record<BundleRole, StoredFile>> = {};
      roles[FORMAT_RULES[entry.format].primary] = entry.file;
      candidates.push({ format: entry.format, stem: entry.stem, roles, shards: [] });
    }
  }

  for (const group of groupParts(modelFiles)) {
    const outcome = evaluateGroup(group.format, group.stem, group.parts);
    if (outcome.candidate) {
      candidates.push(outcome.candidate);
    } else {
      outcome.missing.forEach((role) => missing.add(role));
      leftovers.push(...group.parts.map((part) => part.file.name));
    }
  }

  if (candidates.length > 1) {
    const described = candidates.map((candidate) => `${candidate.stem} (${FORMAT_RULES[candidate.format].label})`);
    throw new ClassificationError('AmbiguousInput', `More than one model found: ${described.join(', ')}`, {
      files: modelFiles.map((entry) => entry.file.name)
    });
  }

  const [candidate] = candidates;
  if (candidate) {
    if (leftovers.length > 0) {
      throw new ClassificationError(
        'AmbiguousInput',
        `Files do not belong to the ${FORMAT_RULES[candidate.format].label} model "${candidate.stem}": ${leftovers.join(', ')}`,
        { files: leftovers }
      );
    }

    return buildBundle(candidate);
  }

  const missingRoles = [...missing];
  throw new ClassificationError('MissingRole', `Model files are incomplete, missing: ${missingRoles.join(', ')}`, {
    files: leftovers,
    missingRoles
  });
}

function classifySavedModel(modelFiles: ParsedFile[]): ModelBundle {
  const markers = modelFiles.filter((entry) => entry.kind === 'marker');
  if (markers.length > 1) {
    throw new ClassificationError('AmbiguousInput', `More than one ${SAVED_MODEL_MARKER} found.`, {
      files: markers.map((entry) => entry.file.name)
    });
  }

  const variables: PartFile[] = [];
  const extras: string[] = [];
  for (const entry of modelFiles) {
    if (entry.kind === 'marker') {
      continue;
    }
    if (
      entry.kind === 'part'
      && entry.format === 'tensorflow_checkpoint'
      && entry.stem === SAVED_MODEL_VARIABLES_STEM
      && (entry.role === 'index' || entry.role === 'data')
    ) {
      variables.push(entry);
    } else {
      extras.push(entry.file.name);
    }
  }

  if (extras.length > 0) {
    throw new ClassificationError('AmbiguousInput', `Files do not belong to the SavedModel: ${extras.join(', ')}`, {
      files: extras
    });
  }

  const [marker] = markers;
  if (!marker || marker.kind !== 'marker') {
    throw new ClassificationError('MissingRole', `Missing ${SAVED_MODEL_MARKER}.`, { missingRoles: ['graph'] });
  }

  const outcome = evaluateGroup('tensorflow_savedmodel', marker.directory, variables, { graph: marker.file });
  if (!outcome.candidate) {
    throw new ClassificationError('MissingRole', `SavedModel is incomplete, missing: ${outcome.missing.join(', ')}`, {
      files: variables.map((entry) => entry.file.name),
      missingRoles: outcome.missing
    });
  }

  return buildBundle(outcome.candidate);
}

function evaluateGroup(
  format: ModelFormat,
  stem: string,
  parts: readonly PartFile[],
  seed: Partial<Record<BundleRole, StoredFile>> = {}
): GroupOutcome {
  const rule = FORMAT_RULES[format];
  const roles: Partial<Record<BundleRole, StoredFile>> = { ...seed };
  const dataParts: PartFile[] = [];

  for (const part of parts) {
    if (part.role === 'data') {
      dataParts.push(part);
      continue;
    }
    if (roles[part.role]) {
      throw new ClassificationError('AmbiguousInput', `Duplicate ${part.role} file for model "${stem}": ${part.file.name}`, {
        files: [part.file.name]
      });
    }
    roles[part.role] = part.file;
  }

  const shards = orderShards(stem, dataParts);
  if (shards && shards.length > 0) {
    roles.data = shards[0];
  }

  const missing = rule.required.filter((role) => !roles[role]);
  if (missing.length > 0) {
    return { missing };
  }

  return { candidate: { format, stem, roles, shards: shards ?? [] }, missing: [] };
}

/** Returns the shards in order, or undefined when the numbered set has gaps. */
function orderShards(stem: string, dataParts: readonly PartFile[]): StoredFile[] | undefined {
  if (dataParts.length === 0) {
    return [];
  }

  const positioned = dataParts.filter((part) => part.shard);
  if (positioned.length !== dataParts.length) {
    return dataParts.length === 1 ? [dataParts[0].file] : undefined;
  }

  const total = positioned[0].shard?.total ?? 0;
  const byIndex = new Map<number, StoredFile>();
  for (const part of positioned) {
    if (!part.shard || part.shard.total !== total) {
      return undefined;
    }
    if (byIndex.has(part.shard.index)) {
      throw new ClassificationError('AmbiguousInput', `Duplicate data shard for model "${stem}": ${part.file.name}`, {
        files: [part.file.name]
      });
    }
    byIndex.set(part.shard.index, part.file);
  }

  const ordered: StoredFile[] = [];
  for (let index = 0; index < total; index += 1) {
    const shard = byIndex.get(index);
    if (!shard) {
      return undefined;
    }
    ordered.push(shard);
  }

  return ordered.length === byIndex.size ? ordered : undefined;
}

function groupParts(entries: readonly ParsedFile[]): Array<{ format: GroupedFormat; stem: string; parts: PartFile[] }> {
  const groups = new Map<string, { format: GroupedFormat; stem: string; parts: PartFile[] }>();

  for (const entry of entries) {
    if (entry.kind !== 'part') {
      continue;
    }
    const key = `${entry.format}\u0000${entry.stem}`;
    const group = groups.get(key) ?? { format: entry.format, stem: entry.stem, parts: [] };
    group.parts.push(entry);
    groups.set(key, group);
  }

  return [...groups.values()];
}

function buildBundle(candidate: Candidate): ModelBundle {
  const rule = FORMAT_RULES[candidate.format];
  const allowed = new Set<BundleRole>([...rule.required, ...rule.optional]);
  const unexpected = BUNDLE_ROLES.filter((role) => candidate.roles[role] && !allowed.has(role));
  if (unexpected.length > 0) {
    throw new ClassificationError('AmbiguousInput', `Unexpected roles for ${rule.label}: ${unexpected.join(', ')}`);
  }

  const primaryFile = candidate.roles[rule.primary];
  if (!primaryFile) {
    throw new ClassificationError('MissingRole', `${rule.label} model is missing its ${rule.primary} file.`, {
      missingRoles: [rule.primary]
    });
  }

  return Object.freeze({
    format: candidate.format,
    stem: candidate.stem,
    roles: Object.freeze({ ...candidate.roles }),
    shards: Object.freeze([...candidate.shards]),
    primaryRole: rule.primary,
    primaryFile
  });
}

function parseFile(file: StoredFile): ParsedFile {
  const segments = file.name.replace(/\\/g, '/').split('/').filter(Boolean);
  const basename = segments[segments.length - 1] ?? '';
  const lower = basename.toLowerCase();

  if (lower === SAVED_MODEL_MARKER) {
    const directory = segments.length > 1 ? segments[segments.length - 2] : 'saved_model';
    return { kind: 'marker', file, directory };
  }

  const shardMatch = DATA_SHARD_PATTERN.exec(basename);
  if (shardMatch) {
    const positionMatch = SHARD_POSITION_PATTERN.exec(shardMatch[2]);
    const shard = positionMatch
      ? { index: Number(positionMatch[1]), total: Number(positionMatch[2]) }
      : undefined;
    return {
      kind: 'part',
      file,
      format: 'tensorflow_checkpoint',
      role: 'data',
      stem: checkpointStem(shardMatch[1]),
      shard
    };
  }

  const extension = path.extname(lower);
  const stem = basename.slice(0, basename.length - extension.length);

  const singleFormat = SINGLE_FILE_EXTENSIONS[extension];
  if (singleFormat) {
    return { kind: 'single', file, format: singleFormat, stem };
  }

  const part = PART_EXTENSIONS[extension];
  if (part) {
    return {
      kind: 'part',
      file,
      format: part.format,
      role: part.role,
      stem: part.format === 'tensorflow_checkpoint' ? checkpointStem(stem) : stem
    };
  }

  if (INERT_EXTENSIONS.includes(extension) || INERT_FILENAMES.includes(lower) || INERT_FILENAMES.includes(stem.toLowerCase())) {
    return { kind: 'inert', file };
  }

  return { kind: 'unsupported', file };
}

function checkpointStem(stem: string): string {
  return stem.replace(/\.ckpt$/i, '');
}
