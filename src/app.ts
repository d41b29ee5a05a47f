import express, { type Request, type Response } from 'express';

import packageJson from '../package.json';
import { loadServerConfig, type ServerConfig } from './config/settings';
import { ensureStorageDirectories, resolveStoragePaths } from './config/storage';
import { createConversionRouter } from './routes/conversion';
import { createDownloadRouter } from './routes/download';
import { formatsRouter } from './routes/formats';
import { errorHandler } from './routes/responses';
import { createTaskRouter } from './routes/tasks';
import { createUploadRouter } from './routes/upload';
import { FileContentStore } from './services/contentStore';
import type { ConversionEngine } from './services/conversionEngine';
import { ConversionService, createConversionEngine } from './services/conversionService';
import { HistoryStore } from './services/historyStore';
import { HttpNotifierTransport, Notifier, type NotifierTransport } from './services/notifier';
import { TaskLogStore } from './services/taskLogStore';
import { TaskManager } from './services/taskManager';
import type { Logger } from './types/logger';

export interface AppOverrides {
  config?: ServerConfig;
  engine?: ConversionEngine;
  notifierTransport?: NotifierTransport;
  logger?: Logger;
}

export interface AppContext {
  app: express.Express;
  config: ServerConfig;
  conversionService: ConversionService;
  taskManager: TaskManager;
  store: FileContentStore;
  history: HistoryStore;
  logs: TaskLogStore;
  notifier: Notifier;
  /** Stops the workers and waits for pending callbacks and log writes. */
  shutdown(options?: { cancelRunning?: boolean }): Promise<void>;
}

export async function createApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const config = overrides.config ?? loadServerConfig();
  const logger = overrides.logger ?? console;
  const paths = resolveStoragePaths(config.storageRoot);
  await ensureStorageDirectories(paths);

  const store = new FileContentStore(paths.root);
  const history = new HistoryStore(paths.historyFile, logger);
  const logs = new TaskLogStore(paths.logs, logger);
  const notifier = new Notifier(
    overrides.notifierTransport ?? new HttpNotifierTransport({ timeoutMs: config.callbackTimeoutMs }),
    { publicBaseUrl: config.publicBaseUrl, logger }
  );
  const engine = overrides.engine ?? createConversionEngine(config, store, paths);

  const restored = await history.load();

  const taskManager = new TaskManager({
    engine,
    workers: config.maxWorkers,
    maxQueuedTasks: config.maxQueuedTasks,
    history,
    logs,
    notifier,
    logger,
    taskTimeoutMs: config.taskTimeoutMs
  });
  const conversionService = new ConversionService(taskManager, store, { logger });

  logger.info(`Using storage directory: ${paths.root}`);
  logger.info(`Using conversion engine: ${engine.name}`);
  logger.info(`Restored ${restored} tasks from history`);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  const uploadOptions = { store, maxFileSize: config.maxFileSize };
  app.use('/upload', createUploadRouter(uploadOptions));
  app.use('/convert', createConversionRouter(conversionService, uploadOptions));
  app.use('/tasks', createTaskRouter(taskManager, { publicBaseUrl: config.publicBaseUrl }));
  app.use('/download', createDownloadRouter(taskManager, store));
  app.use('/formats', formatsRouter);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', version: packageJson.version, ...taskManager.stats() });
  });

  app.use(errorHandler);

  taskManager.start();

  const shutdown = async (options: { cancelRunning?: boolean } = {}): Promise<void> => {
    await taskManager.stop(options);
    await notifier.drain();
    await logs.flush();
    await history.flush();
  };

  return { app, config, conversionService, taskManager, store, history, logs, notifier, shutdown };
}
