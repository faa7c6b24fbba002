import { ClusterMetaDocument, emptyDocument } from '../types';
import { NotFoundError } from '../common/errors';
import { abortable } from '../common/utils';
import { parseClusterMetaDocument, serializeClusterMetaDocument } from './document';
import { ClusterMetaSession, ClusterMetaStore, LoadOptions, LockOptions, MutableSession } from './types';

/**
 * In-process cluster metadata for tests and single-process use.
 * Documents are stored serialized so callers never share references.
 */
export class InMemoryClusterMeta implements ClusterMetaStore {
  private content: string | undefined;
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly location: string = 'memory:', initial?: ClusterMetaDocument) {
    if (initial) {
      this.content = serializeClusterMetaDocument(initial);
    }
  }

  async load(options: LoadOptions = {}): Promise<ClusterMetaDocument> {
    if (this.content === undefined) {
      if (options.mustExist) {
        throw new NotFoundError(this.location);
      }
      return emptyDocument();
    }
    return parseClusterMetaDocument(this.content, this.location);
  }

  async withLock<T>(
    criticalSection: (session: ClusterMetaSession) => Promise<T>,
    options: LockOptions = {}
  ): Promise<T> {
    const previous = this.tail;
    let unlock = () => {};
    const released = new Promise<void>(resolve => {
      unlock = resolve;
    });
    // a waiter that gives up early must not let the next one past the current holder
    this.tail = Promise.all([previous, released]).then(() => undefined);

    try {
      await abortable(previous, options.signal);
      const session = new MutableSession(await this.load());
      const result = await criticalSection(session);
      if (session.isChanged) {
        this.content = serializeClusterMetaDocument(session.document);
      }
      return result;
    } finally {
      unlock();
    }
  }

  /**
   * Current serialized content, or undefined if never written
   */
  snapshot(): string | undefined {
    return this.content;
  }
}
