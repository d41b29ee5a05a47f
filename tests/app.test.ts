import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type { Application } from 'express';

import { createApp, type AppContext } from '../src/app';
import { loadServerConfig } from '../src/config/settings';
import type { NotificationPayload, NotifierTransport } from '../src/services/notifier';
import { silentLogger } from '../src/types/logger';

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

class RecordingTransport implements NotifierTransport {
  readonly deliveries: Array<{ url: string; payload: NotificationPayload }> = [];

  async deliver(url: string, payload: NotificationPayload): Promise<void> {
    this.deliveries.push({ url, payload });
  }
}

describe('Model Conversion Service', () => {
  let storageRoot: string;
  let context: AppContext;
  let app: Application;
  let transport: RecordingTransport;

  async function uploadFiles(...files: Array<[string, string]>): Promise<Array<{ name: string; ref: string; size: number }>> {
    let pending = request(app).post('/upload');
    for (const [name, content] of files) {
      pending = pending.attach('files', Buffer.from(content), name);
    }
    const response = await pending;
    expect(response.status).toBe(201);
    return response.body.files;
  }

  async function waitForTerminal(taskId: string): Promise<Record<string, unknown>> {
    for (let attempt = 0; attempt < 100; attempt += 1) {
      const response = await request(app).get(`/tasks/${taskId}`);
      expect(response.status).toBe(200);
      const state: unknown = response.body.task.state;
      if (state === 'completed' || state === 'failed' || state === 'cancelled') {
        return response.body.task;
      }
      await wait(20);
    }
    throw new Error(`Task ${taskId} did not finish.`);
  }

  const listUploads = () => fs.readdirSync(path.join(storageRoot, 'uploads')).sort();

  beforeAll(async () => {
    storageRoot = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'model-convert-app-'));
    transport = new RecordingTransport();
    context = await createApp({
      config: loadServerConfig({ STORAGE_ROOT: storageRoot, MAX_WORKERS: '2' }),
      logger: silentLogger,
      notifierTransport: transport
    });
    app = context.app;
  });

  afterAll(async () => {
    await context.shutdown({ cancelRunning: true });
    await fs.promises.rm(storageRoot, { recursive: true, force: true });
  });

  it('uploads files into the content store', async () => {
    const [file] = await uploadFiles(['mobilenet.onnx', 'onnx-bytes']);

    expect(file.name).toBe('mobilenet.onnx');
    expect(file.size).toBe(10);
    expect(file.ref).toMatch(/^uploads\/\d+-[0-9a-f-]{36}\.onnx$/);
    expect(fs.existsSync(path.join(storageRoot, file.ref))).toBe(true);
  });

  it('creates and completes a conversion task', async () => {
    const files = await uploadFiles(['mobilenet.onnx', 'onnx-bytes']);

    const convertResponse = await request(app)
      .post('/convert')
      .send({ files, callbackUrl: 'http://callback.test/done' });

    expect(convertResponse.status).toBe(202);
    expect(convertResponse.body.task.state).toBe('pending');
    expect(convertResponse.body.task.format).toBe('onnx');
    expect(convertResponse.body.task.primaryFile).toBe('mobilenet.onnx');
    const taskId: string = convertResponse.body.task.id;

    const task = await waitForTerminal(taskId);
    expect(task.state).toBe('completed');
    expect(task.progress).toBe(100);
    expect(task.resultRef).toBe(`outputs/mobilenet_${taskId}.rknn`);
    expect(task.downloadUrl).toMatch(new RegExp(`^http://127\\.0\\.0\\.1:\\d+/download/${taskId}$`));

    const downloadResponse = await request(app).get(`/download/${taskId}`).expect(200);
    expect(downloadResponse.header['content-disposition']).toBe(`attachment; filename="mobilenet_${taskId}.rknn"`);
    const body: unknown = downloadResponse.body;
    const content = Buffer.isBuffer(body) ? body.toString() : downloadResponse.text;
    expect(content).toBe('onnx-bytes');

    for (let attempt = 0; attempt < 50 && transport.deliveries.length === 0; attempt += 1) {
      await wait(10);
    }
    expect(transport.deliveries).toHaveLength(1);
    expect(transport.deliveries[0].url).toBe('http://callback.test/done');
    expect(transport.deliveries[0].payload).toMatchObject({ taskId, state: 'completed' });

    const logsResponse = await request(app).get(`/tasks/${taskId}/logs`);
    expect(logsResponse.status).toBe(200);
    expect(logsResponse.body.logs[0]).toMatch(/ INFO Task created: ONNX model "mobilenet" \(mobilenet\.onnx\) for rk3588$/);

    const cancelResponse = await request(app).delete(`/tasks/${taskId}`);
    expect(cancelResponse.status).toBe(409);
    expect(cancelResponse.body.message).toBe('Task already completed.');

    const historyResponse = await request(app).get('/tasks/history');
    expect(historyResponse.body.tasks.map((entry: { id: string }) => entry.id)).toContain(taskId);
  });

  it('converts a multi-file model uploaded with the request', async () => {
    const response = await request(app)
      .post('/convert/upload')
      .attach('files', Buffer.from('name: "deploy"'), 'deploy.prototxt')
      .attach('files', Buffer.from('caffe-weights'), 'deploy.caffemodel')
      .field('options', JSON.stringify({ target_platform: 'rk3566' }))
      .field('metadata', JSON.stringify({ owner: 'qa' }));

    expect(response.status).toBe(202);
    expect(response.body.task.format).toBe('caffe');
    expect(response.body.task.primaryFile).toBe('deploy.prototxt');
    expect(response.body.task.metadata).toEqual({ owner: 'qa' });

    const task = await waitForTerminal(response.body.task.id);
    expect(task.state).toBe('completed');
  });

  it('removes uploaded files when the request is rejected', async () => {
    const before = listUploads();

    const response = await request(app)
      .post('/convert/upload')
      .attach('files', Buffer.from('onnx-bytes'), 'net.onnx')
      .field('options', JSON.stringify({ do_quantization: true }));

    expect(response.status).toBe(400);
    expect(response.body.issues).toEqual(['options.dataset: Required when do_quantization is enabled']);
    expect(listUploads()).toEqual(before);
  });

  it('rejects uploads that do not form a single model', async () => {
    const files = await uploadFiles(['a.onnx', 'a'], ['b.onnx', 'b']);

    const response = await request(app).post('/convert').send({ files });

    expect(response.status).toBe(400);
    expect(response.body.kind).toBe('AmbiguousInput');
    expect(response.body.message).toBe('More than one model found: a (ONNX), b (ONNX)');
  });

  it('reports missing roles', async () => {
    const files = await uploadFiles(['yolo.cfg', '[net]']);

    const response = await request(app).post('/convert').send({ files });

    expect(response.status).toBe(400);
    expect(response.body.kind).toBe('MissingRole');
    expect(response.body.missingRoles).toEqual(['weights']);
  });

  it('returns 404 for files that are not in the store', async () => {
    const response = await request(app)
      .post('/convert')
      .send({ files: [{ name: 'net.onnx', ref: 'uploads/never-uploaded.onnx' }] });

    expect(response.status).toBe(404);
    expect(response.body.ref).toBe('uploads/never-uploaded.onnx');
  });

  it('rejects malformed JSON bodies', async () => {
    const response = await request(app)
      .post('/convert')
      .set('Content-Type', 'application/json')
      .send('{"files": [');

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('Request body must be valid JSON.');
  });

  it('lists tasks and validates the state filter', async () => {
    const listResponse = await request(app).get('/tasks?state=completed');
    expect(listResponse.status).toBe(200);
    expect(listResponse.body.total).toBe(listResponse.body.tasks.length);
    expect(listResponse.body.tasks.every((task: { state: string }) => task.state === 'completed')).toBe(true);

    const invalidResponse = await request(app).get('/tasks?state=finished');
    expect(invalidResponse.status).toBe(400);
  });

  it('returns 404 for unknown tasks', async () => {
    await request(app).get('/tasks/unknown-task').expect(404);
    await request(app).delete('/tasks/unknown-task').expect(404);
    await request(app).get('/tasks/unknown-task/logs').expect(404);
    await request(app).get('/download/unknown-task').expect(404);
  });

  it('returns supported formats', async () => {
    const response = await request(app).get('/formats');

    expect(response.status).toBe(200);
    expect(response.body.formats.map((rule: { format: string }) => rule.format)).toContain('tensorflow_savedmodel');
    expect(response.body.targetPlatforms).toContain('rk3588');
    expect(response.body.output).toBe('rknn');
  });

  it('reports health with worker statistics', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'ok', version: '1.1.0', workers: 2 });
  });
});
