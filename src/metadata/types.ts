import { ClusterMetaDocument } from '../types';

export interface LoadOptions {
  /** Fail with NotFoundError instead of returning an empty document */
  mustExist?: boolean;
}

export interface LockOptions {
  /** Aborts the wait for the lock */
  signal?: AbortSignal;
}

/**
 * Handed to a critical section running under the store's exclusive lock
 */
export interface ClusterMetaSession {
  /** Fresh copy of the document, loaded after the lock was taken */
  readonly document: ClusterMetaDocument;

  /** Request that the (mutated) document be persisted before the lock is released */
  markChanged(): void;
}

/**
 * Locked load/store access to one cluster metadata document
 */
export interface ClusterMetaStore {
  readonly location: string;

  /**
   * Lock-free snapshot of the document
   */
  load(options?: LoadOptions): Promise<ClusterMetaDocument>;

  /**
   * Run a critical section under the exclusive, cross-process lock. The
   * document is persisted and synced only if the section marked it changed
   * and returned normally.
   */
  withLock<T>(criticalSection: (session: ClusterMetaSession) => Promise<T>, options?: LockOptions): Promise<T>;
}

export class MutableSession implements ClusterMetaSession {
  private changed = false;

  constructor(readonly document: ClusterMetaDocument) {}

  markChanged(): void {
    this.changed = true;
  }

  get isChanged(): boolean {
    return this.changed;
  }
}
