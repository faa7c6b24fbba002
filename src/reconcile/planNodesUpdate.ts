import { ClusterMetaDocument, NodeEntry } from '../types';
import { InconsistencyError, OutOfOrderError } from '../common/errors';

/**
 * What a reconciliation pass would change
 */
export interface NodesUpdatePlan {
  /** Nodes list the plan was computed against */
  currentNodes: readonly string[];
  /** Addresses to append, in ascending pnn order */
  appended: readonly string[];
  /** Entries whose in_nodes flag must flip to true once the daemon reloads */
  pending: readonly NodeEntry[];
}

export function isNoopPlan(plan: NodesUpdatePlan): boolean {
  return plan.appended.length === 0 && plan.pending.length === 0;
}

export function nodesAfter(plan: NodesUpdatePlan): string[] {
  return [...plan.currentNodes, ...plan.appended];
}

/**
 * Decide how the nodes list must grow to reflect the document. Pure: reads
 * its inputs and throws when they cannot be reconciled by appending.
 *
 * Entries are visited in ascending pnn. A confirmed entry whose address is
 * already at its position needs nothing. Any entry whose position is beyond
 * the end of the list must be exactly the next position, or the list would
 * gain a gap (OutOfOrderError). An unconfirmed entry is always pending, even
 * when its address is already listed: that is the state a failed daemon
 * reload leaves behind. A position holding some other address cannot be
 * fixed by appending (InconsistencyError).
 */
export function planNodesUpdate(document: ClusterMetaDocument, currentNodes: readonly string[]): NodesUpdatePlan {
  const entries = [...document.nodes].sort((a, b) => a.pnn - b.pnn);
  const appended: string[] = [];
  const pending: NodeEntry[] = [];
  let length = currentNodes.length;

  for (const entry of entries) {
    const listed = entry.pnn < length
      ? (entry.pnn < currentNodes.length ? currentNodes[entry.pnn] : appended[entry.pnn - currentNodes.length])
      : undefined;

    if (listed === undefined) {
      if (entry.pnn !== length) {
        throw new OutOfOrderError(entry.pnn, length);
      }
      appended.push(entry.node);
      length++;
    } else if (listed !== entry.node) {
      throw new InconsistencyError(
        `pnn ${entry.pnn} is ${entry.node} in the cluster metadata but ${listed} in the nodes list`
      );
    }

    if (!entry.in_nodes) {
      pending.push(entry);
    }
  }

  return { currentNodes, appended, pending };
}
