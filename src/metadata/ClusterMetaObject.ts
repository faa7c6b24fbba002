import { ClusterMetaDocument, emptyDocument } from '../types';
import { NotFoundError } from '../common/errors';
import { Logger, createLogger } from '../common/logger';
import { createId, delay } from '../common/utils';
import { parseClusterMetaDocument, serializeClusterMetaDocument } from './document';
import { ObjectStorageClient } from './ObjectStorageClient';
import { ClusterMetaSession, ClusterMetaStore, LoadOptions, LockOptions, MutableSession } from './types';

export interface ClusterMetaObjectOptions {
  /** Prefix of the location string, e.g. "s3://bucket/" */
  locationPrefix?: string;
  /** How often a blocked lock attempt is retried (ms) */
  lockRetryInterval?: number;
  logger?: Logger;
}

/**
 * Cluster metadata kept as a blob in object storage. The exclusive lock is a
 * companion "<key>.lock" object that only one holder can create.
 */
export class ClusterMetaObject implements ClusterMetaStore {
  private readonly lockKey: string;
  private readonly lockRetryInterval: number;
  private readonly logger: Logger;
  readonly location: string;

  constructor(
    private readonly client: ObjectStorageClient,
    readonly key: string,
    options: ClusterMetaObjectOptions = {}
  ) {
    this.lockKey = `${key}.lock`;
    this.lockRetryInterval = options.lockRetryInterval ?? 1000;
    this.logger = options.logger ?? createLogger({ component: 'cluster-meta' });
    this.location = `${options.locationPrefix ?? 'object:'}${key}`;
  }

  async load(options: LoadOptions = {}): Promise<ClusterMetaDocument> {
    const content = await this.client.getObject(this.key);
    if (content === undefined) {
      if (options.mustExist) {
        throw new NotFoundError(this.location);
      }
      return emptyDocument();
    }
    return parseClusterMetaDocument(content, this.location);
  }

  async withLock<T>(
    criticalSection: (session: ClusterMetaSession) => Promise<T>,
    options: LockOptions = {}
  ): Promise<T> {
    await this.acquire(options.signal);

    try {
      const session = new MutableSession(await this.load());
      const result = await criticalSection(session);
      if (session.isChanged) {
        await this.client.putObject(this.key, serializeClusterMetaDocument(session.document));
      }
      return result;
    } finally {
      try {
        await this.client.deleteObject(this.lockKey);
        this.logger.debug(`Released lock object ${this.lockKey}`);
      } catch (error) {
        this.logger.error(`Failed to release lock object ${this.lockKey}: ${String(error)}`);
      }
    }
  }

  private async acquire(signal?: AbortSignal): Promise<void> {
    const owner = JSON.stringify({ owner: createId(), pid: process.pid, acquiredAt: Date.now() });
    let announced = false;
    for (;;) {
      signal?.throwIfAborted();
      if (await this.client.putObject(this.lockKey, owner, { createOnly: true })) {
        this.logger.debug(`Acquired lock object ${this.lockKey}`);
        return;
      }
      if (!announced) {
        this.logger.debug(`Waiting for lock object ${this.lockKey}`);
        announced = true;
      }
      await delay(this.lockRetryInterval, signal);
    }
  }
}
