import http from 'http';

import {
  HttpNotifierTransport,
  Notifier,
  type NotificationPayload
} from '../src/services/notifier';
import { silentLogger } from '../src/types/logger';
import type { TaskSnapshot } from '../src/types/task';

const snapshot = (overrides: Partial<TaskSnapshot> = {}): TaskSnapshot => ({
  id: 'task-1',
  state: 'completed',
  progress: 100,
  format: 'onnx',
  primaryFile: 'net.onnx',
  createdAt: new Date('2026-01-05T10:00:00.000Z'),
  startedAt: new Date('2026-01-05T10:00:01.000Z'),
  finishedAt: new Date('2026-01-05T10:00:09.000Z'),
  resultRef: 'outputs/net_task-1.rknn',
  cancelRequested: false,
  callbackUrl: 'http://callback.test/hook',
  logRef: 'task_task-1.log',
  metadata: {},
  ...overrides
});

describe('Notifier', () => {
  it('skips tasks without a callback URL', async () => {
    const deliver = jest.fn<Promise<void>, [string, NotificationPayload]>().mockResolvedValue(undefined);
    const notifier = new Notifier({ deliver }, { logger: silentLogger });

    notifier.notify(snapshot({ callbackUrl: undefined }));
    await notifier.drain();

    expect(deliver).not.toHaveBeenCalled();
  });

  it('returns before the delivery starts', async () => {
    const deliver = jest.fn<Promise<void>, [string, NotificationPayload]>().mockResolvedValue(undefined);
    const notifier = new Notifier({ deliver }, { logger: silentLogger });

    notifier.notify(snapshot());
    expect(deliver).not.toHaveBeenCalled();

    await notifier.drain();
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver.mock.calls[0][0]).toBe('http://callback.test/hook');
  });

  it('builds a payload with a download URL for completed tasks', () => {
    const notifier = new Notifier({ deliver: async () => undefined }, {
      publicBaseUrl: 'https://models.example.test/api',
      logger: silentLogger
    });

    expect(notifier.buildPayload(snapshot())).toEqual({
      taskId: 'task-1',
      state: 'completed',
      resultRef: 'outputs/net_task-1.rknn',
      downloadUrl: 'https://models.example.test/api/download/task-1',
      error: undefined,
      createdAt: '2026-01-05T10:00:00.000Z',
      startedAt: '2026-01-05T10:00:01.000Z',
      finishedAt: '2026-01-05T10:00:09.000Z'
    });
  });

  it('omits the download URL for failed tasks', () => {
    const notifier = new Notifier({ deliver: async () => undefined }, {
      publicBaseUrl: 'https://models.example.test',
      logger: silentLogger
    });

    const payload = notifier.buildPayload(
      snapshot({
        state: 'failed',
        resultRef: undefined,
        error: { code: 'CONVERSION_FAILED', message: 'unsupported operator' }
      })
    );

    expect(payload.downloadUrl).toBeUndefined();
    expect(payload.error).toEqual({ code: 'CONVERSION_FAILED', message: 'unsupported operator' });
  });

  it('logs failed deliveries and drops them', async () => {
    const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const deliver = jest
      .fn<Promise<void>, [string, NotificationPayload]>()
      .mockRejectedValue(new Error('timeout of 10ms exceeded'));
    const notifier = new Notifier({ deliver }, { logger });

    notifier.notify(snapshot());
    await notifier.drain();

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Callback for task task-1 to http://callback.test/hook failed, dropping: timeout of 10ms exceeded'
    );
  });
});

describe('HttpNotifierTransport', () => {
  const received: Array<{ url?: string; body: unknown; userAgent?: string }> = [];
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        const parsed: unknown = JSON.parse(body);
        received.push({ url: req.url, body: parsed, userAgent: req.headers['user-agent'] });
        res.statusCode = req.url === '/fail' ? 500 : 204;
        res.end();
      });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Callback server has no port.');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('posts the payload as JSON', async () => {
    const transport = new HttpNotifierTransport({ timeoutMs: 1000 });
    const payload = new Notifier(transport, { logger: silentLogger }).buildPayload(snapshot());

    await transport.deliver(`${baseUrl}/hook`, payload);

    expect(received[0]).toEqual({
      url: '/hook',
      body: JSON.parse(JSON.stringify(payload)),
      userAgent: 'model-convert-service'
    });
  });

  it('rejects on error responses', async () => {
    const transport = new HttpNotifierTransport({ timeoutMs: 1000 });
    const payload = new Notifier(transport, { logger: silentLogger }).buildPayload(snapshot());

    await expect(transport.deliver(`${baseUrl}/fail`, payload)).rejects.toThrow('Request failed with status code 500');
  });
});
