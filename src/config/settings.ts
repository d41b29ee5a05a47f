import path from 'path';

export interface ServerConfig {
  port: number;
  host: string;
  storageRoot: string;
  maxWorkers: number;
  maxQueuedTasks: number;
  maxFileSize: number;
  converterCommand: string;
  converterArgs: string[];
  cancelPollIntervalMs: number;
  taskTimeoutMs?: number;
  callbackTimeoutMs: number;
  publicBaseUrl?: string;
}

const DEFAULT_MAX_FILE_SIZE = 500 * 1024 * 1024;

type Env = Record<string, string | undefined>;

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const host = (env.HOST ?? 'localhost').trim() || 'localhost';
  const converterArgs = (env.CONVERTER_ARGS ?? 'convert_rknn.py').split(/\s+/).filter((arg) => arg.length > 0);
  const publicBaseUrl = env.PUBLIC_BASE_URL?.trim() || undefined;

  return {
    port: readInteger(env, 'PORT', 3100, 0),
    host,
    storageRoot: path.resolve(process.cwd(), env.STORAGE_ROOT?.trim() || 'storage'),
    maxWorkers: readInteger(env, 'MAX_WORKERS', 4, 1),
    maxQueuedTasks: readInteger(env, 'MAX_QUEUED_TASKS', 100, 1),
    maxFileSize: readInteger(env, 'MAX_FILE_SIZE', DEFAULT_MAX_FILE_SIZE, 1),
    converterCommand: env.CONVERTER_COMMAND?.trim() || 'python3',
    converterArgs,
    cancelPollIntervalMs: readInteger(env, 'CANCEL_POLL_INTERVAL_MS', 500, 1),
    taskTimeoutMs: env.TASK_TIMEOUT_MS?.trim() ? readInteger(env, 'TASK_TIMEOUT_MS', 0, 1) : undefined,
    callbackTimeoutMs: readInteger(env, 'CALLBACK_TIMEOUT_MS', 10_000, 1),
    publicBaseUrl
  };
}

function readInteger(env: Env, name: string, fallback: number, minimum: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    throw new Error(`${name} must be an integer >= ${minimum}, got "${raw}".`);
  }
  return value;
}
