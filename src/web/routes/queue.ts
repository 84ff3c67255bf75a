/**
 * Queue Routes
 *
 * HTTP face of the Queue Store. Application-level failures (bad collection
 * name, missing file) are answered with 200 and { success: false, error };
 * only a missing filename is a 400.
 */

import { Router, Request, Response } from 'express';
import { describeError } from '../../errors';
import { RelayLogger } from '../../logging';
import { IQueueStore, QueueCollection, isQueueCollection } from '../../queue/queue-store';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function requestBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function sendMissingFilename(res: Response): void {
  res.status(400).json({ success: false, error: 'Missing filename' });
}

export function createQueueRoutes(queueStore: IQueueStore, logger: RelayLogger): Router {
  const router = Router();

  const sendFailure = (res: Response, route: string, error: unknown): void => {
    const message = describeError(error);
    logger.error('SERVER', `${route} failed: ${message}`);
    res.status(500).json({ success: false, error: message });
  };

  /**
   * GET /read_file?type=command|result&filename=...
   */
  router.get('/read_file', async (req: Request, res: Response) => {
    const type = req.query.type;
    if (!isQueueCollection(type)) {
      res.json({ success: false, error: 'Invalid file type' });
      return;
    }
    const filename = stringParam(req.query.filename);
    if (!filename) {
      sendMissingFilename(res);
      return;
    }

    try {
      res.json(await queueStore.readFile(type, filename));
    } catch (error) {
      sendFailure(res, 'read_file', error);
    }
  });

  /**
   * POST /save_file { type, filename, content }
   */
  router.post('/save_file', async (req: Request, res: Response) => {
    const body = requestBody(req);
    if (!isQueueCollection(body.type)) {
      res.json({ success: false, error: 'Invalid directory type' });
      return;
    }
    const filename = stringParam(body.filename);
    if (!filename) {
      sendMissingFilename(res);
      return;
    }
    const content = typeof body.content === 'string' ? body.content : '';

    try {
      const saved = await queueStore.saveFile(body.type, filename, content);
      if (saved.success) {
        logger.debug('SERVER', `Saved ${body.type}/${filename}`);
      }
      res.json(saved);
    } catch (error) {
      sendFailure(res, 'save_file', error);
    }
  });

  /**
   * POST /delete_file { type, filename }
   * Succeeds whether or not the file existed
   */
  router.post('/delete_file', async (req: Request, res: Response) => {
    const body = requestBody(req);
    if (!isQueueCollection(body.type)) {
      res.json({ success: false, error: 'Invalid directory type' });
      return;
    }
    const filename = stringParam(body.filename);
    if (!filename) {
      sendMissingFilename(res);
      return;
    }

    try {
      res.json(await queueStore.deleteFile(body.type, filename));
    } catch (error) {
      sendFailure(res, 'delete_file', error);
    }
  });

  const listCollection = async (res: Response, collection: QueueCollection, route: string): Promise<void> => {
    try {
      res.json(await queueStore.listFiles(collection));
    } catch (error) {
      sendFailure(res, route, error);
    }
  };

  /**
   * GET /list_commands?type=command|result
   */
  router.get('/list_commands', async (req: Request, res: Response) => {
    const type = req.query.type;
    if (!isQueueCollection(type)) {
      res.json({ success: false, error: 'Unknown file type' });
      return;
    }
    await listCollection(res, type, 'list_commands');
  });

  /**
   * GET /list_results
   */
  router.get('/list_results', async (_req: Request, res: Response) => {
    await listCollection(res, 'result', 'list_results');
  });

  return router;
}
