import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import { ContentNotFoundError, isFileNotFound } from '../errors';

export type StorageArea = 'uploads' | 'outputs';

export interface ContentStore {
  put(bytes: Buffer, name: string, area?: StorageArea): Promise<string>;
  /** Writes to a reference obtained from `reserve`. */
  write(ref: string, bytes: Buffer): Promise<void>;
  get(ref: string): Promise<Buffer>;
  delete(ref: string): Promise<void>;
  /** Absolute local path of a reference. */
  resolve(ref: string): string;
  /** Allocates a reference for content a collaborator writes itself. */
  reserve(area: StorageArea, name: string): string;
  exists(ref: string): Promise<boolean>;
}

/** Content store on the local file system; refs are paths relative to the root. */
export class FileContentStore implements ContentStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  areaDirectory(area: StorageArea): string {
    return path.join(this.root, area);
  }

  async put(bytes: Buffer, name: string, area: StorageArea = 'uploads'): Promise<string> {
    const ref = this.reserve(area, `${randomUUID()}${path.extname(name)}`);
    await this.write(ref, bytes);
    return ref;
  }

  async write(ref: string, bytes: Buffer): Promise<void> {
    const target = this.resolve(ref);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, bytes);
  }

  async get(ref: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.resolve(ref));
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new ContentNotFoundError(ref);
      }
      throw error;
    }
  }

  async delete(ref: string): Promise<void> {
    await fs.promises.rm(this.resolve(ref), { force: true });
  }

  async exists(ref: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(ref), fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  reserve(area: StorageArea, name: string): string {
    return `${area}/${path.basename(name)}`;
  }

  /** Converts an absolute path under the root (such as a multer upload) into a ref. */
  refFor(absolutePath: string): string {
    const relative = path.relative(this.root, absolutePath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Path is outside the content store: ${absolutePath}`);
    }
    return relative.replace(/\\/g, '/');
  }

  resolve(ref: string): string {
    if (path.isAbsolute(ref)) {
      throw new ContentNotFoundError(ref);
    }

    const absolute = path.resolve(this.root, path.normalize(ref));
    const relative = path.relative(this.root, absolute);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ContentNotFoundError(ref);
    }
    return absolute;
  }
}
