import fs from 'fs/promises';
import path from 'path';
import { InconsistencyError } from '../common/errors';
import { errorCode } from '../common/utils';
import { Pnn } from '../types';

export const CANONICAL_NODES_PATH = '/etc/ctdb/nodes';

export interface NodesFileConfig {
  /** Where the nodes list is actually stored (typically on persistent storage) */
  realPath: string;
  /** Fixed path the clustering daemon reads; kept as a symlink to realPath */
  canonicalPath?: string;
}

/**
 * One position per line. Blank lines stay as empty positions; only the piece
 * after the final newline is dropped.
 */
export function parseNodesList(content: string): string[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(line => line.trim());
}

export function formatNodesList(nodes: readonly string[]): string {
  return nodes.map(node => `${node}\n`).join('');
}

/**
 * The positional nodes list consumed by the clustering daemon: line i holds
 * the address of pnn i.
 */
export class NodesFile {
  readonly realPath: string;
  readonly canonicalPath?: string;

  constructor(config: NodesFileConfig) {
    this.realPath = config.realPath;
    this.canonicalPath = config.canonicalPath;
  }

  async read(): Promise<string[]> {
    try {
      return parseNodesList(await fs.readFile(this.realPath, 'utf-8'));
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  async write(nodes: readonly string[]): Promise<void> {
    await fs.mkdir(path.dirname(this.realPath), { recursive: true });
    const handle = await fs.open(this.realPath, 'w');
    try {
      await handle.writeFile(formatNodesList(nodes), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  /**
   * Point the canonical path at the real path: remove if exists, then re-create
   */
  async ensureLink(): Promise<void> {
    if (!this.canonicalPath) {
      return;
    }
    await fs.mkdir(path.dirname(this.canonicalPath), { recursive: true });
    await fs.rm(this.canonicalPath, { force: true });
    await fs.symlink(this.realPath, this.canonicalPath);
  }

  /**
   * Make sure the node is listed, and at expectedPnn when one is given
   */
  async ensureNodePresent(node: string, expectedPnn?: Pnn): Promise<string[]> {
    const nodes = await this.read();
    if (!nodes.includes(node)) {
      nodes.push(node);
    }
    if (expectedPnn !== undefined) {
      const foundPnn = nodes.indexOf(node);
      if (foundPnn !== expectedPnn) {
        throw new InconsistencyError(`expected pnn ${expectedPnn} for ${node}, found it at ${foundPnn}`);
      }
    }
    await this.ensureLink();
    await this.write(nodes);
    return nodes;
  }
}
