import fs from 'fs';
import path from 'path';
import { Waiter } from './types';

export const DEFAULT_WATCH_TIMEOUT = 300000;

export interface FileChangeWaiterOptions {
  /** Longest time a single wait blocks without a change (ms) */
  timeout?: number;
}

/**
 * Blocks until the watched file is written, created, replaced or removed,
 * or until the timeout elapses. The parent directory is watched so that a
 * file that does not exist yet can still be waited on.
 */
export class FileChangeWaiter implements Waiter {
  private readonly directory: string;
  private readonly fileName: string;
  private readonly timeout: number;

  constructor(readonly filePath: string, options: FileChangeWaiterOptions = {}) {
    this.directory = path.dirname(filePath);
    this.fileName = path.basename(filePath);
    this.timeout = options.timeout ?? DEFAULT_WATCH_TIMEOUT;
  }

  async wait(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await fs.promises.mkdir(this.directory, { recursive: true });

    return new Promise<void>((resolve, reject) => {
      let watcher: fs.FSWatcher | undefined;
      let settled = false;
      const finish = (error?: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        watcher?.close();
        if (error === undefined) {
          resolve();
        } else {
          reject(error);
        }
      };
      const onAbort = () => finish(signal?.reason);
      const timer = setTimeout(() => finish(), this.timeout);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (signal?.aborted) {
        onAbort();
        return;
      }

      try {
        watcher = fs.watch(this.directory, (_event, changed) => {
          if (changed === null || changed.toString() === this.fileName) {
            finish();
          }
        });
        watcher.once('error', error => finish(error));
      } catch (error) {
        finish(error);
      }
    });
  }

  acted(): void {
    // change notifications need no pacing state
  }
}
