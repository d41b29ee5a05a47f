import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';

import {
  ClassificationError,
  ContentNotFoundError,
  QueueFullError,
  ValidationError
} from '../errors';
import type { TaskSnapshot } from '../types/task';

const QUEUE_FULL_RETRY_AFTER_SECONDS = 5;

export function buildDownloadUrl(req: Request, taskId: string, publicBaseUrl?: string): string | undefined {
  const host = req.get('host');
  const base = publicBaseUrl ?? (host ? `${req.protocol}://${host}` : undefined);

  if (!base) {
    return undefined;
  }

  try {
    const normalizedBase = base.endsWith('/') ? base : `${base}/`;
    return new URL(`download/${encodeURIComponent(taskId)}`, normalizedBase).toString();
  } catch (_error) {
    return undefined;
  }
}

export function serializeTask(task: TaskSnapshot, downloadUrl?: string) {
  return {
    id: task.id,
    state: task.state,
    progress: task.progress,
    format: task.format,
    primaryFile: task.primaryFile,
    resultRef: task.resultRef,
    error: task.error,
    cancelRequested: task.cancelRequested,
    callbackUrl: task.callbackUrl,
    metadata: task.metadata,
    historical: task.historical ?? false,
    createdAt: task.createdAt.toISOString(),
    startedAt: task.startedAt?.toISOString(),
    finishedAt: task.finishedAt?.toISOString(),
    downloadUrl
  };
}

/** Maps service errors onto HTTP responses; anything unrecognized is a 500. */
export function sendError(res: Response, error: unknown): Response {
  if (error instanceof ClassificationError) {
    return res.status(400).json({
      message: error.message,
      kind: error.kind,
      files: error.files,
      missingRoles: error.missingRoles
    });
  }

  if (error instanceof ValidationError) {
    return res.status(400).json({ message: error.message, issues: error.issues });
  }

  if (error instanceof QueueFullError) {
    res.setHeader('Retry-After', String(QUEUE_FULL_RETRY_AFTER_SECONDS));
    return res.status(503).json({ message: error.message });
  }

  if (error instanceof ContentNotFoundError) {
    return res.status(404).json({ message: 'Source file not found.', ref: error.ref });
  }

  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    return res.status(status).json({ message: error.message });
  }

  if (error instanceof SyntaxError) {
    return res.status(400).json({ message: 'Request body must be valid JSON.' });
  }

  const message = error instanceof Error ? error.message : 'Unknown server error.';
  return res.status(500).json({ message });
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (res.headersSent) {
    return;
  }
  sendError(res, error);
}
