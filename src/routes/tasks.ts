import express, { type Request, type Response } from 'express';

import type { TaskManager } from '../services/taskManager';
import { TASK_STATES, type TaskSnapshot, type TaskState } from '../types/task';
import { buildDownloadUrl, serializeTask } from './responses';

export interface TaskRouterOptions {
  publicBaseUrl?: string;
}

export function createTaskRouter(taskManager: TaskManager, options: TaskRouterOptions = {}): express.Router {
  const router = express.Router();

  const present = (req: Request, task: TaskSnapshot) => {
    const downloadUrl = task.state === 'completed' && task.resultRef
      ? buildDownloadUrl(req, task.id, options.publicBaseUrl)
      : undefined;
    return serializeTask(task, downloadUrl);
  };

  router.get('/', (req: Request, res: Response) => {
    const raw = typeof req.query.state === 'string' ? req.query.state : '';
    const requested = raw.split(',').map((value) => value.trim()).filter((value) => value.length > 0);
    const states: TaskState[] = [];

    for (const value of requested) {
      const state = TASK_STATES.find((candidate) => candidate === value);
      if (!state) {
        return res.status(400).json({
          message: `Unknown task state "${value}". Expected one of: ${TASK_STATES.join(', ')}.`
        });
      }
      states.push(state);
    }

    const tasks = taskManager.list({ states });
    return res.json({ tasks: tasks.map((task) => present(req, task)), total: tasks.length });
  });

  router.get('/history', (req: Request, res: Response) => {
    const tasks = taskManager.history();
    return res.json({ tasks: tasks.map((task) => present(req, task)), total: tasks.length });
  });

  router.get('/:taskId', (req: Request, res: Response) => {
    const task = taskManager.get(req.params.taskId);

    if (!task) {
      return res.status(404).json({ message: 'Task not found.' });
    }

    return res.json({ task: present(req, task) });
  });

  router.delete('/:taskId', (req: Request, res: Response) => {
    const result = taskManager.cancel(req.params.taskId);

    switch (result.status) {
      case 'not_found':
        return res.status(404).json({ message: 'Task not found.' });
      case 'already_terminal':
        return res.status(409).json({
          message: `Task already ${result.task.state}.`,
          task: present(req, result.task)
        });
      case 'ok':
        if (result.task.state === 'cancelled') {
          return res.status(200).json({ message: 'Task cancelled.', task: present(req, result.task) });
        }
        return res.status(202).json({ message: 'Cancellation requested.', task: present(req, result.task) });
    }
  });

  router.get('/:taskId/logs', async (req: Request, res: Response) => {
    try {
      const logs = await taskManager.readLogs(req.params.taskId);
      if (!logs) {
        return res.status(404).json({ message: 'Task not found.' });
      }
      return res.json({ taskId: req.params.taskId, logs });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to read task logs.';
      return res.status(500).json({ message });
    }
  });

  return router;
}
