import express, { type Request, type Response } from 'express';
import fs from 'fs';
import path from 'path';

import type { ContentStore } from '../services/contentStore';
import type { TaskManager } from '../services/taskManager';

export function createDownloadRouter(taskManager: TaskManager, store: ContentStore): express.Router {
  const router = express.Router();

  router.get('/:taskId', async (req: Request, res: Response) => {
    const task = taskManager.get(req.params.taskId);

    if (!task) {
      return res.status(404).json({ message: 'Task not found.' });
    }

    if (task.state !== 'completed' || !task.resultRef) {
      return res.status(409).json({
        message: 'Task is not completed yet or has no output.',
        state: task.state
      });
    }

    if (!(await store.exists(task.resultRef))) {
      return res.status(404).json({ message: 'Converted file not found on disk.' });
    }

    const filePath = store.resolve(task.resultRef);
    const fileName = path.basename(filePath);
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);

    const readStream = fs.createReadStream(filePath);
    readStream.on('error', (error: NodeJS.ErrnoException) => {
      if (!res.headersSent) {
        const status = error.code === 'ENOENT' ? 404 : 500;
        res.status(status).json({ message: 'Failed to read converted file.' });
      } else {
        res.destroy(error);
      }
    });

    readStream.pipe(res);
    return undefined;
  });

  return router;
}
