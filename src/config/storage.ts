import fs from 'fs';
import path from 'path';

export interface StoragePaths {
  root: string;
  uploads: string;
  outputs: string;
  temp: string;
  logs: string;
  historyFile: string;
}

export function resolveStoragePaths(storageRoot: string): StoragePaths {
  const root = path.resolve(storageRoot);

  return {
    root,
    uploads: path.join(root, 'uploads'),
    outputs: path.join(root, 'outputs'),
    temp: path.join(root, 'temp'),
    logs: path.join(root, 'logs'),
    historyFile: path.join(root, 'history.jsonl')
  };
}

export async function ensureStorageDirectories(paths: StoragePaths): Promise<void> {
  await Promise.all([
    fs.promises.mkdir(paths.root, { recursive: true }),
    fs.promises.mkdir(paths.uploads, { recursive: true }),
    fs.promises.mkdir(paths.outputs, { recursive: true }),
    fs.promises.mkdir(paths.temp, { recursive: true }),
    fs.promises.mkdir(paths.logs, { recursive: true })
  ]);
}
