/**
 * Relay Web Server Unit Tests
 *
 * Tests:
 * 1. Bearer-token gate (dashboard paths and preflights exempt)
 * 2. Queue endpoints over the command/ and result/ collections
 * 3. Validation replies (invalid collection, missing filename)
 * 4. HttpQueueStore against the app on a loopback port
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Server } from 'http';
import request from 'supertest';
import { Express } from 'express';
import { WebServer, createApp, isPublicPath } from '../../../src/web/server';
import { FileQueueStore } from '../../../src/queue/file-queue-store';
import { HttpQueueStore } from '../../../src/queue/http-queue-store';
import { createSilentLogger } from '../../../src/logging';

const TOKEN = 'test-secret';
const AUTH = `Bearer ${TOKEN}`;

describe('Relay Web Server', () => {
  let tempDir: string;
  let storageDir: string;
  let store: FileQueueStore;
  let app: Express;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-server-test-'));
    storageDir = path.join(tempDir, 'storage');
    const staticDir = path.join(tempDir, 'public');
    fs.mkdirSync(staticDir);
    fs.writeFileSync(path.join(staticDir, 'index.html'), '<h1>queue dashboard</h1>');
    fs.writeFileSync(path.join(staticDir, 'style.css'), 'body { color: black; }');

    store = new FileQueueStore({ storageDir });
    store.ensureDirectories();
    app = createApp({ queueStore: store, apiToken: TOKEN, staticDir, logger: createSilentLogger() });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('auth gate', () => {
    it('rejects a request without a token', async () => {
      const res = await request(app).get('/list_commands?type=command');
      assert.equal(res.status, 401);
      assert.deepEqual(res.body, { success: false, error: 'Unauthorized access' });
    });

    it('rejects a wrong token', async () => {
      const res = await request(app).get('/list_results').set('Authorization', 'Bearer wrong');
      assert.equal(res.status, 401);
    });

    it('rejects the token without the Bearer scheme', async () => {
      const res = await request(app).get('/list_results').set('Authorization', TOKEN);
      assert.equal(res.status, 401);
    });

    it('serves the dashboard without a token', async () => {
      const index = await request(app).get('/ui/');
      assert.equal(index.status, 200);
      assert.equal(index.text, '<h1>queue dashboard</h1>');

      const asset = await request(app).get('/static/style.css');
      assert.equal(asset.status, 200);
      assert.equal(asset.text, 'body { color: black; }');
    });

    it('answers preflights before the gate', async () => {
      const res = await request(app).options('/save_file');
      assert.equal(res.status, 204);
      assert.equal(res.headers['access-control-allow-origin'], '*');
      assert.equal(res.headers['access-control-allow-methods'], 'GET, POST, OPTIONS');
      assert.equal(res.headers['access-control-allow-headers'], 'Content-Type, Authorization');
    });

    it('exempts exactly the dashboard prefixes', () => {
      assert.equal(isPublicPath('/ui/'), true);
      assert.equal(isPublicPath('/static/app.js'), true);
      assert.equal(isPublicPath('/read_file'), false);
    });
  });

  describe('queue endpoints', () => {
    it('saves, reads and deletes a command', async () => {
      const saved = await request(app)
        .post('/save_file')
        .set('Authorization', AUTH)
        .send({ type: 'command', filename: '1-a.yaml', content: 'action: list_executor_dir\n' });
      assert.deepEqual(saved.body, { success: true });
      assert.equal(fs.readFileSync(path.join(storageDir, 'command', '1-a.yaml'), 'utf-8'), 'action: list_executor_dir\n');

      const read = await request(app)
        .get('/read_file')
        .query({ type: 'command', filename: '1-a.yaml' })
        .set('Authorization', AUTH);
      assert.deepEqual(read.body, { success: true, content: 'action: list_executor_dir\n' });
      assert.equal(read.headers['access-control-allow-origin'], '*');

      const deleted = await request(app)
        .post('/delete_file')
        .set('Authorization', AUTH)
        .send({ type: 'command', filename: '1-a.yaml' });
      assert.deepEqual(deleted.body, { success: true });
      assert.equal(fs.existsSync(path.join(storageDir, 'command', '1-a.yaml')), false);
    });

    it('reports a missing file', async () => {
      const res = await request(app)
        .get('/read_file')
        .query({ type: 'result', filename: 'absent.yaml' })
        .set('Authorization', AUTH);
      assert.equal(res.status, 200);
      assert.deepEqual(res.body, { success: false, error: 'File not found' });
    });

    it('deletes an absent file successfully', async () => {
      const res = await request(app)
        .post('/delete_file')
        .set('Authorization', AUTH)
        .send({ type: 'result', filename: 'absent.yaml' });
      assert.deepEqual(res.body, { success: true });
    });

    it('lists either collection', async () => {
      fs.writeFileSync(path.join(storageDir, 'result', 'b.yaml'), 'success: true\n');
      fs.writeFileSync(path.join(storageDir, 'result', 'a.yaml'), 'success: true\n');
      fs.writeFileSync(path.join(storageDir, 'result', 'readme.md'), '');

      const byType = await request(app).get('/list_commands').query({ type: 'result' }).set('Authorization', AUTH);
      assert.deepEqual(byType.body, { success: true, files: ['a.yaml', 'b.yaml'] });

      const results = await request(app).get('/list_results').set('Authorization', AUTH);
      assert.deepEqual(results.body, { success: true, files: ['a.yaml', 'b.yaml'] });

      const commands = await request(app).get('/list_commands').query({ type: 'command' }).set('Authorization', AUTH);
      assert.deepEqual(commands.body, { success: true, files: [] });
    });
  });

  describe('validation', () => {
    it('rejects an unknown collection per endpoint', async () => {
      const read = await request(app)
        .get('/read_file')
        .query({ type: 'logs', filename: 'a.yaml' })
        .set('Authorization', AUTH);
      assert.deepEqual(read.body, { success: false, error: 'Invalid file type' });

      const save = await request(app)
        .post('/save_file')
        .set('Authorization', AUTH)
        .send({ type: 'logs', filename: 'a.yaml', content: '' });
      assert.deepEqual(save.body, { success: false, error: 'Invalid directory type' });

      const del = await request(app)
        .post('/delete_file')
        .set('Authorization', AUTH)
        .send({ type: 'logs', filename: 'a.yaml' });
      assert.deepEqual(del.body, { success: false, error: 'Invalid directory type' });

      const list = await request(app).get('/list_commands').query({ type: 'logs' }).set('Authorization', AUTH);
      assert.deepEqual(list.body, { success: false, error: 'Unknown file type' });
    });

    it('answers a missing filename with 400', async () => {
      const read = await request(app).get('/read_file').query({ type: 'command' }).set('Authorization', AUTH);
      assert.equal(read.status, 400);
      assert.deepEqual(read.body, { success: false, error: 'Missing filename' });

      const save = await request(app)
        .post('/save_file')
        .set('Authorization', AUTH)
        .send({ type: 'command', content: 'x' });
      assert.equal(save.status, 400);
      assert.deepEqual(save.body, { success: false, error: 'Missing filename' });
    });

    it('answers malformed JSON with 400', async () => {
      const res = await request(app)
        .post('/save_file')
        .set('Authorization', AUTH)
        .set('Content-Type', 'application/json')
        .send('{"type": ');
      assert.equal(res.status, 400);
      assert.equal(res.body.success, false);
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/nope').set('Authorization', AUTH);
      assert.equal(res.status, 404);
      assert.deepEqual(res.body, { success: false, error: 'Not found' });
    });
  });

  describe('with HttpQueueStore on a loopback port', () => {
    let server: Server;
    let client: HttpQueueStore;

    beforeEach(async () => {
      server = app.listen(0, '127.0.0.1');
      await new Promise<void>(resolve => server.once('listening', () => resolve()));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
      }
      client = new HttpQueueStore({ serverUrl: `http://127.0.0.1:${address.port}`, apiToken: TOKEN });
    });

    afterEach(async () => {
      await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    });

    it('round-trips through the HTTP surface', async () => {
      assert.deepEqual(await client.saveFile('command', 'x.yaml', 'action: execute\n'), {
        success: true,
        error: undefined,
      });
      assert.deepEqual(await client.listFiles('command'), { success: true, files: ['x.yaml'], error: undefined });
      assert.deepEqual(await client.readFile('command', 'x.yaml'), {
        success: true,
        content: 'action: execute\n',
        error: undefined,
      });
      assert.deepEqual(await client.deleteFile('command', 'x.yaml'), { success: true, error: undefined });
      assert.deepEqual(await client.listFiles('command'), { success: true, files: [], error: undefined });
    });
  });
});

describe('WebServer', () => {
  it('starts and stops', async () => {
    const storageDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-webserver-test-'));
    const server = new WebServer({
      port: 0,
      host: '127.0.0.1',
      queueStore: new FileQueueStore({ storageDir }),
      apiToken: TOKEN,
      staticDir: storageDir,
      logger: createSilentLogger(),
    });

    try {
      await server.start();
      assert.deepEqual(server.getState(), { isRunning: true, port: 0, host: '127.0.0.1' });
      assert.equal(server.getUrl(), 'http://127.0.0.1:0');
    } finally {
      await server.stop();
      fs.rmSync(storageDir, { recursive: true, force: true });
    }
    assert.equal(server.getState().isRunning, false);
  });
});
