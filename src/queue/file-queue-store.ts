/**
 * File-based Queue Store
 *
 * Keeps each queue entry as its own file:
 *   {storageDir}/command/<filename>
 *   {storageDir}/result/<filename>
 *
 * Filenames are joined under the collection directory as given; the relay
 * trusts its authenticated clients not to address files outside it.
 *
 * Usage:
 *   const store = new FileQueueStore({ storageDir: '/path/to/storage' });
 *   store.ensureDirectories();
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  IQueueStore,
  ListFilesResult,
  QUEUE_COLLECTIONS,
  QUEUE_FILE_SUFFIX,
  QueueCollection,
  ReadFileResult,
  WriteResult,
} from './queue-store';
import { describeError } from '../errors';

export interface FileQueueStoreConfig {
  /** Root directory holding command/ and result/ */
  storageDir: string;
}

export class FileQueueStore implements IQueueStore {
  private readonly storageDir: string;

  constructor(config: FileQueueStoreConfig) {
    this.storageDir = config.storageDir;
  }

  getStorageDir(): string {
    return this.storageDir;
  }

  /**
   * Directory backing a collection
   */
  getCollectionDir(collection: QueueCollection): string {
    return path.join(this.storageDir, collection);
  }

  /**
   * Create both collection directories if missing
   */
  ensureDirectories(): void {
    for (const collection of QUEUE_COLLECTIONS) {
      fs.mkdirSync(this.getCollectionDir(collection), { recursive: true });
    }
  }

  async readFile(collection: QueueCollection, filename: string): Promise<ReadFileResult> {
    const filePath = path.join(this.getCollectionDir(collection), filename);
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File not found' };
    }

    try {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      return { success: true, content };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async saveFile(collection: QueueCollection, filename: string, content: string): Promise<WriteResult> {
    const filePath = path.join(this.getCollectionDir(collection), filename);
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, content, 'utf-8');
      return { success: true };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  /**
   * Deleting an absent file is still a success
   */
  async deleteFile(collection: QueueCollection, filename: string): Promise<WriteResult> {
    const filePath = path.join(this.getCollectionDir(collection), filename);
    try {
      await fs.promises.rm(filePath, { force: true });
      return { success: true };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async listFiles(collection: QueueCollection): Promise<ListFilesResult> {
    try {
      const names = await fs.promises.readdir(this.getCollectionDir(collection));
      const files = names.filter(name => name.endsWith(QUEUE_FILE_SUFFIX)).sort();
      return { success: true, files };
    } catch (error) {
      return { success: false, files: [], error: describeError(error) };
    }
  }
}
