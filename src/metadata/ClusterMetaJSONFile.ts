import fs from 'fs/promises';
import path from 'path';
import * as lockfile from 'proper-lockfile';
import { ClusterMetaDocument, emptyDocument } from '../types';
import { NotFoundError } from '../common/errors';
import { Logger, createLogger } from '../common/logger';
import { delay, errorCode } from '../common/utils';
import { parseClusterMetaDocument, serializeClusterMetaDocument } from './document';
import { ClusterMetaSession, ClusterMetaStore, LoadOptions, LockOptions, MutableSession } from './types';

export interface ClusterMetaJSONFileOptions {
  /** How often a blocked lock attempt is retried (ms) */
  lockRetryInterval?: number;
  /** Age after which a lock left by a dead holder is taken over (ms) */
  staleLockTimeout?: number;
  logger?: Logger;
}

/**
 * Cluster metadata kept in a JSON file on a filesystem shared by the fleet.
 * The exclusive lock is a proper-lockfile lock directory beside the file.
 */
export class ClusterMetaJSONFile implements ClusterMetaStore {
  private readonly lockRetryInterval: number;
  private readonly staleLockTimeout: number;
  private readonly logger: Logger;

  constructor(readonly filePath: string, options: ClusterMetaJSONFileOptions = {}) {
    this.lockRetryInterval = options.lockRetryInterval ?? 100;
    this.staleLockTimeout = options.staleLockTimeout ?? 10000;
    this.logger = options.logger ?? createLogger({ component: 'cluster-meta' });
  }

  get location(): string {
    return `file:${this.filePath}`;
  }

  async load(options: LoadOptions = {}): Promise<ClusterMetaDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        if (options.mustExist) {
          throw new NotFoundError(this.location);
        }
        return emptyDocument();
      }
      throw error;
    }
    return parseClusterMetaDocument(content, this.location);
  }

  async withLock<T>(
    criticalSection: (session: ClusterMetaSession) => Promise<T>,
    options: LockOptions = {}
  ): Promise<T> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const release = await this.acquire(options.signal);

    try {
      const session = new MutableSession(await this.load());
      const result = await criticalSection(session);
      if (session.isChanged) {
        await this.store(session.document);
      }
      return result;
    } finally {
      try {
        await release();
        this.logger.debug(`Released lock on ${this.filePath}`);
      } catch (error) {
        // the section's own outcome stands
        this.logger.error(`Failed to release lock on ${this.filePath}: ${String(error)}`);
      }
    }
  }

  /**
   * Block until the lock is held. There is no timeout; only the signal
   * ends the wait early.
   */
  private async acquire(signal?: AbortSignal): Promise<() => Promise<void>> {
    let announced = false;
    for (;;) {
      signal?.throwIfAborted();
      try {
        const release = await lockfile.lock(this.filePath, {
          realpath: false,
          retries: 0,
          stale: this.staleLockTimeout
        });
        this.logger.debug(`Acquired lock on ${this.filePath}`);
        return release;
      } catch (error) {
        if (errorCode(error) !== 'ELOCKED') {
          throw error;
        }
        if (!announced) {
          this.logger.debug(`Waiting for lock on ${this.filePath}`);
          announced = true;
        }
        await delay(this.lockRetryInterval, signal);
      }
    }
  }

  /**
   * Write beside the file and rename over it, so that lock-free readers see
   * either the old or the new document.
   */
  private async store(document: ClusterMetaDocument): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(serializeClusterMetaDocument(document), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, this.filePath);
  }
}
