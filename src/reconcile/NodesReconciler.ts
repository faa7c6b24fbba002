import { Logger, createLogger } from '../common/logger';
import { DaemonController } from '../control/DaemonController';
import { ClusterMetaStore } from '../metadata/types';
import { NodesFile } from '../nodes/NodesFile';
import { Pnn } from '../types';
import { isNoopPlan, nodesAfter, planNodesUpdate } from './planNodesUpdate';

export interface NodesReconcilerConfig {
  store: ClusterMetaStore;
  nodesFile: NodesFile;
  controller: DaemonController;
  logger?: Logger;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
}

export interface ReconcileResult {
  /** True when the nodes list and/or the document were changed */
  updated: boolean;
  appended: string[];
  /** Pnns whose in_nodes flag was flipped to true */
  confirmed: Pnn[];
}

function noChanges(): ReconcileResult {
  return { updated: false, appended: [], confirmed: [] };
}

/**
 * Reconciles the shared cluster metadata with the local nodes list
 */
export class NodesReconciler {
  private readonly store: ClusterMetaStore;
  private readonly nodesFile: NodesFile;
  private readonly controller: DaemonController;
  private readonly logger: Logger;

  constructor(config: NodesReconcilerConfig) {
    this.store = config.store;
    this.nodesFile = config.nodesFile;
    this.controller = config.controller;
    this.logger = config.logger ?? createLogger({ component: 'reconcile' });
  }

  /**
   * A node may only rewrite the nodes list once it is itself listed there
   */
  async checkEligible(pnn: Pnn): Promise<boolean> {
    const document = await this.store.load({ mustExist: true });
    const own = document.nodes.find(entry => entry.pnn === pnn);
    if (!own) {
      this.logger.info(`pnn ${pnn} not found in ${this.store.location}`);
      return false;
    }
    const nodes = await this.nodesFile.read();
    return nodes.includes(own.node);
  }

  /**
   * One reconciliation pass: probe without the lock, then re-check and
   * commit under it.
   */
  async reconcile(options: ReconcileOptions = {}): Promise<ReconcileResult> {
    // Optimistic probe. Whatever it decides is re-validated under the lock.
    const probe = planNodesUpdate(await this.store.load(), await this.nodesFile.read());
    if (isNoopPlan(probe)) {
      this.logger.debug('examined nodes state - no changes');
      return noChanges();
    }

    return this.store.withLock(async session => {
      const plan = planNodesUpdate(session.document, await this.nodesFile.read());
      if (isNoopPlan(plan)) {
        this.logger.info('re-examined nodes state under lock - no changes');
        return noChanges();
      }

      if (plan.appended.length > 0) {
        this.logger.info(`writing ${plan.appended.join(', ')} to ${this.nodesFile.realPath}`);
        await this.nodesFile.write(nodesAfter(plan));
      }

      // Until the daemon has reloaded, the document must keep showing the
      // work as pending so that the next pass retries it.
      await this.controller.reloadNodes();

      const confirmed = plan.pending.map(entry => entry.pnn);
      for (const entry of session.document.nodes) {
        if (confirmed.includes(entry.pnn)) {
          entry.in_nodes = true;
        }
      }
      if (confirmed.length > 0) {
        session.markChanged();
      }

      this.logger.info(`nodes updated: appended [${plan.appended.join(', ')}], confirmed pnns [${confirmed.join(', ')}]`);
      return { updated: true, appended: [...plan.appended], confirmed };
    }, { signal: options.signal });
  }
}
