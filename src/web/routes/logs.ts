/**
 * Log Routes
 *
 * - GET /logs?limit=&commandId=  recent buffered entries
 * - GET /logs/stream?commandId=  live entries via Server-Sent Events
 */

import { Router, Request, Response } from 'express';
import { RelayLogEntry, RelayLogger, RelayLogSubscriber } from '../../logging';

export const DEFAULT_LOG_LIMIT = 100;

export const SSE_HEARTBEAT_MS = 30_000;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseLimit(value: unknown): number {
  const limit = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_LOG_LIMIT;
}

function sseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function createLogRoutes(logger: RelayLogger): Router {
  const router = Router();

  router.get('/logs', (req: Request, res: Response) => {
    const commandId = queryString(req.query.commandId);
    const entries = commandId ? logger.getCommandEntries(commandId) : logger.getEntries();
    const logs = entries.slice(-parseLimit(req.query.limit));

    res.json({ success: true, count: logs.length, logs });
  });

  router.get('/logs/stream', (req: Request, res: Response) => {
    const commandId = queryString(req.query.commandId);

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write(sseEvent('connected', { timestamp: new Date().toISOString() }));

    const subscriber: RelayLogSubscriber = {
      onLog(entry: RelayLogEntry) {
        if (commandId && entry.commandId !== commandId) {
          return;
        }
        res.write(sseEvent('log', entry));
      },
    };
    const unsubscribe = logger.subscribe(subscriber);

    const heartbeat = setInterval(() => {
      res.write(sseEvent('heartbeat', { timestamp: new Date().toISOString() }));
    }, SSE_HEARTBEAT_MS);

    res.on('close', () => {
      unsubscribe();
      clearInterval(heartbeat);
    });
  });

  return router;
}
