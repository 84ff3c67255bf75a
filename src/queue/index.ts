/**
 * Queue Module Index
 */

export {
  QUEUE_COLLECTIONS,
  QUEUE_FILE_SUFFIX,
  isQueueCollection,
  type IQueueStore,
  type QueueCollection,
  type ReadFileResult,
  type WriteResult,
  type ListFilesResult,
} from './queue-store';
export { FileQueueStore, type FileQueueStoreConfig } from './file-queue-store';
export { HttpQueueStore, type HttpQueueStoreConfig } from './http-queue-store';
export {
  QueuePoller,
  type QueuePollerConfig,
  type QueuePollerState,
  type QueuePollerEvents,
} from './queue-poller';
