/**
 * Core membership types shared across the fleet-membership components
 */

/**
 * Physical node number: a member's stable position in the nodes list
 */
export type Pnn = number;

/**
 * One node's entry in the cluster metadata document. Field names follow the
 * on-disk JSON format.
 */
export interface NodeEntry {
  /** Network address the clustering daemon uses for this node */
  node: string;
  pnn: Pnn;
  /** False while desired but not yet applied to the nodes list */
  in_nodes: boolean;
  /** Host name or derived name of the node that registered the entry */
  identity?: string;
}

/**
 * Shared record of desired cluster membership
 */
export interface ClusterMetaDocument {
  nodes: NodeEntry[];
}

/**
 * Identity a node process supplies at start-up
 */
export interface LocalIdentity {
  identity: string;
  node: string;
  pnn: Pnn;
}

export function emptyDocument(): ClusterMetaDocument {
  return { nodes: [] };
}
