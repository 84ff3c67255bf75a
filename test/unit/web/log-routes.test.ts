/**
 * Log Routes Unit Tests
 *
 * Tests:
 * 1. GET /logs returns buffered entries, newest last, limited and filtered
 * 2. GET /logs/stream forwards new entries as SSE and unsubscribes on close
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/web/server';
import { DEFAULT_LOG_LIMIT } from '../../../src/web/routes/logs';
import { FileQueueStore } from '../../../src/queue/file-queue-store';
import { RelayLogger, createSilentLogger } from '../../../src/logging';

const TOKEN = 'test-secret';
const AUTH = `Bearer ${TOKEN}`;

function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  return new Promise((resolve, reject) => {
    const check = (): void => {
      if (condition()) {
        resolve();
      } else if (Date.now() > deadline) {
        reject(new Error('condition not met in time'));
      } else {
        setTimeout(check, 10);
      }
    };
    check();
  });
}

describe('Log routes', () => {
  let tempDir: string;
  let logger: RelayLogger;
  let app: Express;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'log-routes-test-'));
    logger = createSilentLogger();
    app = createApp({
      queueStore: new FileQueueStore({ storageDir: tempDir }),
      apiToken: TOKEN,
      staticDir: tempDir,
      logger,
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('GET /logs', () => {
    it('requires the token', async () => {
      const res = await request(app).get('/logs');
      assert.equal(res.status, 401);
    });

    it('returns the most recent entries up to the limit', async () => {
      logger.info('POLL', 'first');
      logger.warn('TRANSPORT', 'second');
      logger.error('FINALIZE', 'third');

      const res = await request(app).get('/logs?limit=2').set('Authorization', AUTH);

      assert.equal(res.status, 200);
      assert.equal(res.body.success, true);
      assert.equal(res.body.count, 2);
      assert.deepEqual(
        res.body.logs.map((entry: { message: string }) => entry.message),
        ['second', 'third']
      );
    });

    it('filters by command', async () => {
      logger.info('DISPATCH', 'Dispatching read_file', { commandId: '1-a.yaml' });
      logger.info('DISPATCH', 'Dispatching execute', { commandId: '2-b.yaml' });

      const res = await request(app).get('/logs?commandId=2-b.yaml').set('Authorization', AUTH);

      assert.equal(res.body.count, 1);
      assert.equal(res.body.logs[0].message, 'Dispatching execute');
      assert.equal(res.body.logs[0].commandId, '2-b.yaml');
    });

    it('falls back to the default limit for a bad limit', async () => {
      for (let i = 0; i < DEFAULT_LOG_LIMIT + 5; i++) {
        logger.debug('POLL', `tick ${i}`);
      }

      const res = await request(app).get('/logs?limit=none').set('Authorization', AUTH);

      assert.equal(res.body.count, DEFAULT_LOG_LIMIT);
      assert.equal(res.body.logs[0].message, 'tick 5');
    });
  });

  describe('GET /logs/stream', () => {
    let server: http.Server;
    let port: number;

    beforeEach(async () => {
      server = app.listen(0, '127.0.0.1');
      await new Promise<void>(resolve => server.once('listening', () => resolve()));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
      }
      port = address.port;
    });

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('streams new entries for the command and unsubscribes on close', async () => {
      let buffer = '';
      const req = http.get({
        host: '127.0.0.1',
        port,
        path: '/logs/stream?commandId=1-a.yaml',
        headers: { Authorization: AUTH },
      });
      const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
        req.once('response', resolve);
        req.once('error', reject);
      });
      response.setEncoding('utf-8');
      response.on('data', (chunk: string) => {
        buffer += chunk;
      });

      assert.equal(response.statusCode, 200);
      assert.equal(response.headers['content-type'], 'text/event-stream');

      await waitFor(() => buffer.includes('event: connected'));
      assert.equal(logger.getSubscriberCount(), 1);

      logger.info('DISPATCH', 'Dispatching execute', { commandId: '2-b.yaml' });
      logger.info('DISPATCH', 'Dispatching read_file', { commandId: '1-a.yaml' });

      await waitFor(() => buffer.includes('event: log') && buffer.endsWith('\n\n'));
      const logEvents = buffer.split('\n\n').filter(event => event.startsWith('event: log\n'));
      assert.equal(logEvents.length, 1);
      const entry: unknown = JSON.parse(logEvents[0].slice('event: log\ndata: '.length));
      assert.deepEqual(
        entry !== null && typeof entry === 'object' && 'message' in entry && 'commandId' in entry
          ? { message: entry.message, commandId: entry.commandId }
          : null,
        { message: 'Dispatching read_file', commandId: '1-a.yaml' }
      );

      req.destroy();
      await waitFor(() => logger.getSubscriberCount() === 0);
    });
  });
});
