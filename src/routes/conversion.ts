import express, { type Request, type Response } from 'express';

import type { ConversionService } from '../services/conversionService';
import type { FileContentStore } from '../services/contentStore';
import { sendError, serializeTask } from './responses';
import { createUploadMiddleware, toStoredFiles } from './upload';

export interface ConversionRouterOptions {
  store: FileContentStore;
  maxFileSize: number;
}

export function createConversionRouter(conversionService: ConversionService, options: ConversionRouterOptions): express.Router {
  const router = express.Router();
  const upload = createUploadMiddleware(options);

  router.post('/', async (req: Request, res: Response) => {
    const body: unknown = req.body;

    try {
      const task = await conversionService.submit(body);
      return res.status(202).json({
        message: 'Conversion task created successfully.',
        task: serializeTask(task)
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.post('/upload', upload, async (req: Request, res: Response) => {
    const files = toStoredFiles(options.store, req);
    const fields: unknown = req.body;

    if (files.length === 0) {
      return res.status(400).json({ message: 'At least one model file is required.' });
    }

    try {
      const task = await conversionService.createFromUpload(files, fields);
      return res.status(202).json({
        message: 'Conversion task created successfully.',
        task: serializeTask(task)
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  return router;
}
