/**
 * HTTP Queue Store
 *
 * Client side of the relay server API, used by the executor and coordinator.
 *
 * - Bearer token on every request
 * - Listing uses its own (short) timeout so a hung server cannot stall the poll loop
 * - Transport failures (network error, timeout, non-2xx, unreadable reply) throw
 *   RelayError with an E2xx code; application-level failures come back as
 *   { success: false, error }
 */

import { ErrorCode, RelayError, describeError } from '../errors';
import {
  IQueueStore,
  ListFilesResult,
  QueueCollection,
  ReadFileResult,
  WriteResult,
} from './queue-store';

export interface HttpQueueStoreConfig {
  /** Relay server base URL, e.g. http://127.0.0.1:8000 */
  serverUrl: string;
  /** Bearer token */
  apiToken: string;
  /** Timeout for listFiles (default: 10000ms) */
  listTimeoutMs?: number;
  /** Timeout for read/save/delete (default: 30000ms) */
  requestTimeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export class HttpQueueStore implements IQueueStore {
  private readonly serverUrl: string;
  private readonly headers: Record<string, string>;
  private readonly listTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpQueueStoreConfig) {
    this.serverUrl = config.serverUrl.replace(/\/+$/, '');
    this.headers = { Authorization: `Bearer ${config.apiToken}` };
    this.listTimeoutMs = config.listTimeoutMs ?? 10_000;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  getServerUrl(): string {
    return this.serverUrl;
  }

  async readFile(collection: QueueCollection, filename: string): Promise<ReadFileResult> {
    const query = new URLSearchParams({ type: collection, filename });
    const body = await this.request('GET', `/read_file?${query.toString()}`, this.requestTimeoutMs);
    return {
      success: body.success === true,
      content: typeof body.content === 'string' ? body.content : undefined,
      error: typeof body.error === 'string' ? body.error : undefined,
    };
  }

  async saveFile(collection: QueueCollection, filename: string, content: string): Promise<WriteResult> {
    const body = await this.request('POST', '/save_file', this.requestTimeoutMs, {
      type: collection,
      filename,
      content,
    });
    return toWriteResult(body);
  }

  async deleteFile(collection: QueueCollection, filename: string): Promise<WriteResult> {
    const body = await this.request('POST', '/delete_file', this.requestTimeoutMs, {
      type: collection,
      filename,
    });
    return toWriteResult(body);
  }

  async listFiles(collection: QueueCollection): Promise<ListFilesResult> {
    const query = new URLSearchParams({ type: collection });
    const body = await this.request('GET', `/list_commands?${query.toString()}`, this.listTimeoutMs);
    const files = Array.isArray(body.files)
      ? body.files.filter((name): name is string => typeof name === 'string')
      : [];
    return {
      success: body.success === true,
      files,
      error: typeof body.error === 'string' ? body.error : undefined,
    };
  }

  /**
   * Send one request and return the decoded JSON object
   */
  private async request(
    method: 'GET' | 'POST',
    route: string,
    timeoutMs: number,
    payload?: Record<string, string>
  ): Promise<Record<string, unknown>> {
    const url = this.serverUrl + route;
    let response: Response;

    try {
      response = await this.fetchImpl(url, {
        method,
        headers: payload
          ? { ...this.headers, 'Content-Type': 'application/json' }
          : this.headers,
        body: payload ? JSON.stringify(payload) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new RelayError(ErrorCode.E203_QUEUE_STORE_TIMEOUT, `${method} ${route} after ${timeoutMs}ms`);
      }
      throw new RelayError(ErrorCode.E201_QUEUE_STORE_UNREACHABLE, `${method} ${route}: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new RelayError(ErrorCode.E202_QUEUE_STORE_HTTP_STATUS, `${method} ${route}: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RelayError(ErrorCode.E204_QUEUE_STORE_BAD_REPLY, `${method} ${route}: ${describeError(error)}`);
    }

    if (!isRecord(body)) {
      throw new RelayError(ErrorCode.E204_QUEUE_STORE_BAD_REPLY, `${method} ${route}: expected a JSON object`);
    }
    return body;
  }
}

function toWriteResult(body: Record<string, unknown>): WriteResult {
  return {
    success: body.success === true,
    error: typeof body.error === 'string' ? body.error : undefined,
  };
}
