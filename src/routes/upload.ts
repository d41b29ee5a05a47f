import express, { type Request, type RequestHandler, type Response } from 'express';
import multer from 'multer';
import path from 'path';
import { randomUUID } from 'crypto';

import type { FileContentStore } from '../services/contentStore';
import type { StoredFile } from '../types/bundle';

export interface UploadOptions {
  store: FileContentStore;
  maxFileSize: number;
}

/** Multipart parser writing every `files` part straight into the uploads area. */
export function createUploadMiddleware({ store, maxFileSize }: UploadOptions): RequestHandler {
  const storage = multer.diskStorage({
    destination: (_req: Request, _file: Express.Multer.File, cb: (error: Error | null, destination: string) => void) => {
      cb(null, store.areaDirectory('uploads'));
    },
    filename: (_req: Request, file: Express.Multer.File, cb: (error: Error | null, filename: string) => void) => {
      const extension = path.extname(file.originalname);
      const uniqueName = `${Date.now()}-${randomUUID()}${extension}`;
      cb(null, uniqueName);
    }
  });

  return multer({ storage, limits: { fileSize: maxFileSize } }).array('files');
}

export function toStoredFiles(store: FileContentStore, req: Request): StoredFile[] {
  const files = Array.isArray(req.files) ? req.files : [];

  return files.map((file) => ({
    name: file.originalname,
    ref: store.refFor(file.path),
    size: file.size
  }));
}

export function createUploadRouter(options: UploadOptions): express.Router {
  const router = express.Router();
  const upload = createUploadMiddleware(options);

  router.post('/', upload, (req: Request, res: Response) => {
    const files = toStoredFiles(options.store, req);

    if (files.length === 0) {
      return res.status(400).json({ message: 'No file uploaded.' });
    }

    return res.status(201).json({
      message: 'Files uploaded successfully.',
      files
    });
  });

  return router;
}
