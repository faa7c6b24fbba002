import {
  DuplicatePnnError,
  InconsistencyError,
  InvalidArgumentError,
  NodeNotPresentError
} from '../common/errors';
import { isValidAddress } from '../common/utils';
import { ClusterMetaStore } from '../metadata/types';
import { NodesFile } from '../nodes/NodesFile';
import { ClusterMetaDocument, LocalIdentity, NodeEntry, Pnn } from '../types';

export type RegistrationOutcome = 'added' | 'refreshed';

export interface RegistrationOptions {
  /** Nodes list the first node (pnn 0) bootstraps itself into */
  nodesFile?: NodesFile;
  signal?: AbortSignal;
}

function validateIdentity(local: LocalIdentity): void {
  if (!Number.isInteger(local.pnn) || local.pnn < 0) {
    throw new InvalidArgumentError(`invalid pnn: ${local.pnn}`);
  }
  if (!isValidAddress(local.node)) {
    throw new InvalidArgumentError(`invalid node address: ${local.node}`);
  }
}

function findEntry(document: ClusterMetaDocument, pnn: Pnn): NodeEntry | undefined {
  return document.nodes.find(entry => entry.pnn === pnn);
}

/**
 * Check an existing entry against a re-registering node. Nothing is changed:
 * the nodes list is append-only, so an address can never move.
 */
function refreshEntry(entry: NodeEntry, local: LocalIdentity): void {
  if (entry.identity !== undefined && entry.identity !== local.identity) {
    throw new DuplicatePnnError(local.pnn, entry.identity);
  }
  if (entry.node !== local.node) {
    throw new InconsistencyError(
      `pnn ${local.pnn} is registered with address ${entry.node}, not ${local.node}`
    );
  }
}

function appendEntry(document: ClusterMetaDocument, local: LocalIdentity): NodeEntry {
  const existing = findEntry(document, local.pnn);
  if (existing) {
    throw new DuplicatePnnError(local.pnn, existing.identity ?? existing.node);
  }
  const entry: NodeEntry = {
    node: local.node,
    pnn: local.pnn,
    // the first node is applied directly; everyone else waits for a reconciliation pass
    in_nodes: local.pnn === 0,
    identity: local.identity
  };
  document.nodes.push(entry);
  return entry;
}

/**
 * Confirm that an already registered node is unchanged
 */
export async function refreshNode(
  store: ClusterMetaStore,
  local: LocalIdentity,
  options: RegistrationOptions = {}
): Promise<void> {
  validateIdentity(local);
  await store.withLock(async session => {
    const entry = findEntry(session.document, local.pnn);
    if (!entry) {
      throw new NodeNotPresentError(local.identity, local.pnn);
    }
    refreshEntry(entry, local);
  }, { signal: options.signal });
}

/**
 * Record a new node's desire to join. Fails with DuplicatePnnError when the
 * pnn is taken.
 */
export async function addNode(
  store: ClusterMetaStore,
  local: LocalIdentity,
  options: RegistrationOptions = {}
): Promise<NodeEntry> {
  validateIdentity(local);
  return store.withLock(async session => {
    const entry = appendEntry(session.document, local);
    if (entry.pnn === 0 && options.nodesFile) {
      await options.nodesFile.ensureNodePresent(entry.node, 0);
    }
    session.markChanged();
    return entry;
  }, { signal: options.signal });
}

/**
 * Register the local node, or confirm an earlier registration, in a single
 * critical section so that at most one registration per pnn succeeds.
 */
export async function registerOrRefresh(
  store: ClusterMetaStore,
  local: LocalIdentity,
  options: RegistrationOptions = {}
): Promise<RegistrationOutcome> {
  validateIdentity(local);
  return store.withLock(async session => {
    const existing = findEntry(session.document, local.pnn);
    if (existing) {
      refreshEntry(existing, local);
      return 'refreshed';
    }

    appendEntry(session.document, local);
    if (local.pnn === 0 && options.nodesFile) {
      await options.nodesFile.ensureNodePresent(local.node, 0);
    }
    session.markChanged();
    return 'added';
  }, { signal: options.signal });
}

/**
 * True once the pnn's entry has been confirmed into the nodes list.
 * Fails with NotFoundError when the document does not exist.
 */
export async function pnnInClusterMeta(store: ClusterMetaStore, pnn: Pnn): Promise<boolean> {
  const document = await store.load({ mustExist: true });
  return document.nodes.some(entry => entry.pnn === pnn && entry.in_nodes);
}
