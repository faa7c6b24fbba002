import { EventEmitter } from 'events';
import { Logger, createLogger } from '../common/logger';
import { isAbortError } from '../common/utils';
import { ClusterMetaStore } from '../metadata/types';
import { NodesReconciler, ReconcileResult } from '../reconcile/NodesReconciler';
import { pnnInClusterMeta } from '../registration/NodeRegistration';
import { Pnn } from '../types';
import { Waiter } from '../wait/types';

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 10;

export interface MembershipSupervisorConfig {
  /** Local node's pnn; conventionally only pnn 0 runs the monitor loop */
  pnn: Pnn;
  store: ClusterMetaStore;
  reconciler: NodesReconciler;
  waiter: Waiter;
  /** Failures in a row tolerated before the loop gives up */
  maxConsecutiveFailures?: number;
  /** Skip passes while the local node is not itself in the nodes list */
  requireLocalMembership?: boolean;
  logger?: Logger;
}

export interface SupervisorRunOptions {
  signal?: AbortSignal;
}

export type PassOutcome =
  | { kind: 'ineligible' }
  | { kind: 'reconciled'; result: ReconcileResult };

/**
 * Drives reconciliation passes forever with bounded-retry fault tolerance.
 *
 * Events:
 * - 'ineligible' (pnn)
 * - 'pass-completed' (outcome)
 * - 'pass-failed' ({ error, failures })
 * - 'gave-up' ({ error, failures })
 */
export class MembershipSupervisor extends EventEmitter {
  private readonly pnn: Pnn;
  private readonly store: ClusterMetaStore;
  private readonly reconciler: NodesReconciler;
  private readonly waiter: Waiter;
  private readonly maxConsecutiveFailures: number;
  private readonly requireLocalMembership: boolean;
  private readonly logger: Logger;
  private failures = 0;

  constructor(config: MembershipSupervisorConfig) {
    super();
    this.pnn = config.pnn;
    this.store = config.store;
    this.reconciler = config.reconciler;
    this.waiter = config.waiter;
    this.maxConsecutiveFailures = config.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.requireLocalMembership = config.requireLocalMembership ?? true;
    this.logger = config.logger ?? createLogger({ component: 'supervisor' });
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Wait, pass, repeat. Only returns by throwing: the abort reason when the
   * signal fires, or the last error once failures exceed the threshold.
   */
  async run(options: SupervisorRunOptions = {}): Promise<never> {
    const { signal } = options;
    this.failures = 0;

    for (;;) {
      try {
        await this.waiter.wait(signal);
        const outcome = await this.runOnce({ signal });
        this.failures = 0;
        if (outcome.kind === 'reconciled' && outcome.result.updated) {
          this.waiter.acted();
        }
      } catch (error) {
        if (isAbortError(error, signal)) {
          throw error;
        }
        this.failures++;
        this.logger.error(`error during nodes monitoring: ${String(error)}, count=${this.failures}`);
        this.emit('pass-failed', { error, failures: this.failures });
        if (this.failures > this.maxConsecutiveFailures) {
          this.logger.error(`too many retries (${this.failures}). giving up`);
          this.emit('gave-up', { error, failures: this.failures });
          throw error;
        }
      }
    }
  }

  /**
   * One guarded pass: check eligibility, then reconcile
   */
  async runOnce(options: SupervisorRunOptions = {}): Promise<PassOutcome> {
    if (this.requireLocalMembership && !(await this.reconciler.checkEligible(this.pnn))) {
      this.logger.info(`pnn ${this.pnn} can not make updates yet`);
      this.emit('ineligible', this.pnn);
      const outcome: PassOutcome = { kind: 'ineligible' };
      this.emit('pass-completed', outcome);
      return outcome;
    }

    const result = await this.reconciler.reconcile({ signal: options.signal });
    if (result.updated) {
      this.logger.info('updated nodes');
    }
    const outcome: PassOutcome = { kind: 'reconciled', result };
    this.emit('pass-completed', outcome);
    return outcome;
  }

  /**
   * Readiness gate for the local pnn; see waitForAdmission
   */
  async waitUntilAdmitted(options: SupervisorRunOptions = {}): Promise<void> {
    await waitForAdmission({
      store: this.store,
      pnn: this.pnn,
      waiter: this.waiter,
      logger: this.logger,
      signal: options.signal
    });
  }
}

export interface AdmissionGateOptions {
  store: ClusterMetaStore;
  pnn: Pnn;
  waiter: Waiter;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Poll the document until the pnn is confirmed in the nodes list. Performs
 * no writes; errors propagate without retry.
 */
export async function waitForAdmission(options: AdmissionGateOptions): Promise<void> {
  const { store, pnn, waiter, signal } = options;
  const logger = options.logger ?? createLogger({ component: 'supervisor' });
  for (;;) {
    signal?.throwIfAborted();
    if (await pnnInClusterMeta(store, pnn)) {
      return;
    }
    logger.info(`pnn ${pnn} not yet ready`);
    await waiter.wait(signal);
  }
}
