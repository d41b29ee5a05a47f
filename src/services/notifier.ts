import axios, { type AxiosInstance } from 'axios';

import type { Logger } from '../types/logger';
import type { TaskError, TaskSnapshot, TaskState } from '../types/task';

export interface NotificationPayload {
  taskId: string;
  state: TaskState;
  resultRef?: string;
  downloadUrl?: string;
  error?: TaskError;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
}

export interface NotifierTransport {
  deliver(url: string, payload: NotificationPayload): Promise<void>;
}

export interface HttpNotifierTransportOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export class HttpNotifierTransport implements NotifierTransport {
  private readonly client: AxiosInstance;

  constructor(options: HttpNotifierTransportOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? 10_000,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': options.userAgent ?? 'model-convert-service'
      }
    });
  }

  async deliver(url: string, payload: NotificationPayload): Promise<void> {
    await this.client.post(url, payload);
  }
}

export interface NotifierOptions {
  /** Base URL used to build `downloadUrl` for completed tasks. */
  publicBaseUrl?: string;
  logger?: Logger;
}

/**
 * Best-effort completion callbacks: one delivery attempt per task, never
 * retried, failures logged. `notify` returns before the request starts.
 */
export class Notifier {
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly transport: NotifierTransport,
    private readonly options: NotifierOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  notify(snapshot: TaskSnapshot): void {
    const url = snapshot.callbackUrl;
    if (!url) {
      return;
    }

    const payload = this.buildPayload(snapshot);
    const delivery = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.transport.deliver(url, payload))
      .then(() => {
        this.logger.info(`Callback delivered for task ${snapshot.id} (${snapshot.state}) to ${url}`);
      })
      .catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Callback for task ${snapshot.id} to ${url} failed, dropping: ${reason}`);
      })
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }

  /** Resolves when every delivery started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  buildPayload(snapshot: TaskSnapshot): NotificationPayload {
    return {
      taskId: snapshot.id,
      state: snapshot.state,
      resultRef: snapshot.resultRef,
      downloadUrl: this.buildDownloadUrl(snapshot),
      error: snapshot.error,
      createdAt: snapshot.createdAt.toISOString(),
      startedAt: snapshot.startedAt?.toISOString(),
      finishedAt: snapshot.finishedAt?.toISOString()
    };
  }

  private buildDownloadUrl(snapshot: TaskSnapshot): string | undefined {
    const base = this.options.publicBaseUrl;
    if (!base || snapshot.state !== 'completed' || !snapshot.resultRef) {
      return undefined;
    }

    try {
      const normalizedBase = base.endsWith('/') ? base : `${base}/`;
      return new URL(`download/${encodeURIComponent(snapshot.id)}`, normalizedBase).toString();
    } catch (_error) {
      return undefined;
    }
  }
}
