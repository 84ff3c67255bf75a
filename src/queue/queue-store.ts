/**
 * Queue Store - shared contract
 *
 * The store is partitioned into two collections keyed by filename:
 * - command: pending work dropped by a coordinator
 * - result: outcomes written back by the executor
 *
 * A command and its result share the same filename.
 */

export type QueueCollection = 'command' | 'result';

export const QUEUE_COLLECTIONS: readonly QueueCollection[] = ['command', 'result'];

/**
 * Only names with this suffix are listed
 */
export const QUEUE_FILE_SUFFIX = '.yaml';

export function isQueueCollection(value: unknown): value is QueueCollection {
  return value === 'command' || value === 'result';
}

export interface ReadFileResult {
  success: boolean;
  content?: string;
  error?: string;
}

export interface WriteResult {
  success: boolean;
  error?: string;
}

export interface ListFilesResult {
  success: boolean;
  files: string[];
  error?: string;
}

/**
 * Queue Store interface
 * Implemented on disk by the relay server and over HTTP for the executor
 */
export interface IQueueStore {
  readFile(collection: QueueCollection, filename: string): Promise<ReadFileResult>;
  saveFile(collection: QueueCollection, filename: string, content: string): Promise<WriteResult>;
  deleteFile(collection: QueueCollection, filename: string): Promise<WriteResult>;
  listFiles(collection: QueueCollection): Promise<ListFilesResult>;
}
