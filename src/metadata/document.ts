import { ClusterMetaDocument, NodeEntry, emptyDocument } from '../types';
import { MalformedDocumentError } from '../common/errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodeEntry(raw: unknown, index: number, location: string): NodeEntry {
  if (!isRecord(raw)) {
    throw new MalformedDocumentError(location, `nodes[${index}] is not an object`);
  }

  const { node, pnn, in_nodes: inNodes, identity } = raw;
  if (typeof node !== 'string' || node.length === 0) {
    throw new MalformedDocumentError(location, `nodes[${index}].node must be a non-empty string`);
  }
  if (typeof pnn !== 'number' || !Number.isInteger(pnn) || pnn < 0) {
    throw new MalformedDocumentError(location, `nodes[${index}].pnn must be a non-negative integer`);
  }
  if (typeof inNodes !== 'boolean') {
    throw new MalformedDocumentError(location, `nodes[${index}].in_nodes must be a boolean`);
  }

  const entry: NodeEntry = { node, pnn, in_nodes: inNodes };
  if (typeof identity === 'string') {
    entry.identity = identity;
  }
  return entry;
}

/**
 * Parse serialized cluster metadata. Empty content reads as an empty document.
 */
export function parseClusterMetaDocument(content: string, location: string): ClusterMetaDocument {
  if (content.trim() === '') {
    return emptyDocument();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new MalformedDocumentError(location, 'invalid JSON', error);
  }

  if (!isRecord(parsed)) {
    throw new MalformedDocumentError(location, 'top level is not an object');
  }
  if (parsed.nodes === undefined) {
    return emptyDocument();
  }
  if (!Array.isArray(parsed.nodes)) {
    throw new MalformedDocumentError(location, 'nodes is not an array');
  }

  const nodes = parsed.nodes.map((raw: unknown, index: number) => toNodeEntry(raw, index, location));
  const seen = new Set<number>();
  for (const entry of nodes) {
    if (seen.has(entry.pnn)) {
      throw new MalformedDocumentError(location, `pnn ${entry.pnn} appears more than once`);
    }
    seen.add(entry.pnn);
  }

  return { nodes };
}

export function serializeClusterMetaDocument(document: ClusterMetaDocument): string {
  return JSON.stringify(document, null, 2) + '\n';
}
