/**
 * Control loop that keeps the seed list and quorum setting of the search
 * cluster in line with the orchestrator's membership.
 */

import { EventEmitter } from 'events';
import { ClusterProber } from '../probe/ClusterProber';
import { SeedHostRegistry } from '../seeding/SeedHostRegistry';
import { idealQuorum } from '../quorum/QuorumCalculator';
import {
  LeadershipOracle,
  MembershipSource,
  ReconcileTrigger,
  ReconciliationReport,
  ReconciliationStatus
} from '../types';
import { Logger, createLogger } from '../../common/logger';

export interface ClusterReconcilerDeps {
  leadership: LeadershipOracle;
  membership: MembershipSource;
  seeds: SeedHostRegistry;
  prober: ClusterProber;
  logger?: Logger;
}

type PassResult = Omit<ReconciliationReport, 'trigger' | 'isLeader' | 'expectedMembers' | 'seeds' | 'seedsChanged' | 'timestamp'>;

/**
 * Runs one level-triggered pass per call. Only the leader touches the seed
 * list or the backend; quorum is never written while the backend's live node
 * count differs from the orchestrator's member count.
 */
export class ClusterReconciler extends EventEmitter {
  private readonly leadership: LeadershipOracle;
  private readonly membership: MembershipSource;
  private readonly seeds: SeedHostRegistry;
  private readonly prober: ClusterProber;
  private readonly logger: Logger;
  private status: ReconciliationStatus = ReconciliationStatus.WAITING_FOR_MEMBERS;
  private lastReport?: ReconciliationReport;

  constructor(deps: ClusterReconcilerDeps) {
    super();
    this.leadership = deps.leadership;
    this.membership = deps.membership;
    this.seeds = deps.seeds;
    this.prober = deps.prober;
    this.logger = deps.logger ?? createLogger();
  }

  getStatus(): ReconciliationStatus {
    return this.status;
  }

  getLastReport(): ReconciliationReport | undefined {
    return this.lastReport;
  }

  async reconcile(trigger: ReconcileTrigger): Promise<ReconciliationReport> {
    const peers = this.membership.peerCount();
    if (!Number.isInteger(peers) || peers < 0) {
      throw new Error(`Peer count must be a non-negative integer, got ${peers}`);
    }

    const expectedMembers = peers + 1;
    const isLeader = this.leadership.isLeader();

    if (!isLeader) {
      return this.finish({
        trigger,
        isLeader,
        expectedMembers,
        seeds: this.seeds.currentSeeds(),
        seedsChanged: false,
        status: ReconciliationStatus.CONVERGED,
        quorumWritten: false,
        reason: 'Not the leader'
      });
    }

    const seedsChanged = this.bootstrapSeeds();
    const result = await this.convergeQuorum(expectedMembers);

    return this.finish({
      trigger,
      isLeader,
      expectedMembers,
      seeds: this.seeds.currentSeeds(),
      seedsChanged,
      ...result
    });
  }

  /**
   * Record a pass that ended in an exception as Degraded, so the status and
   * last report reflect it like any other pass.
   */
  recordFailure(trigger: ReconcileTrigger, reason: string): ReconciliationReport {
    return this.finish({
      trigger,
      isLeader: this.leadership.isLeader(),
      expectedMembers: this.membership.peerCount() + 1,
      seeds: this.seeds.currentSeeds(),
      seedsChanged: false,
      status: ReconciliationStatus.DEGRADED,
      quorumWritten: false,
      reason
    });
  }

  private bootstrapSeeds(): boolean {
    if (this.seeds.isBootstrapComplete()) {
      return false;
    }

    const previousCount = this.seeds.currentSeeds().length;
    this.seeds.onPeerJoined();
    const current = this.seeds.currentSeeds();

    if (current.length === previousCount) {
      return false;
    }

    this.logger.reconciler(`Seed list grew from ${previousCount} to ${current.length}`);
    this.emit('reconfigure-required', { seeds: current, previousCount });
    return true;
  }

  private async convergeQuorum(expectedMembers: number): Promise<PassResult> {
    const live = await this.prober.totalLiveNodes();
    if (live.kind === 'unknown') {
      return {
        status: ReconciliationStatus.WAITING_FOR_MEMBERS,
        quorumWritten: false,
        reason: `Backend unreachable: ${live.reason}`
      };
    }

    // Never raise quorum against a cluster that has not seen every member yet
    if (live.value !== expectedMembers) {
      return {
        status: ReconciliationStatus.WAITING_FOR_MEMBERS,
        liveNodes: live.value,
        quorumWritten: false,
        reason: `Backend reports ${live.value} nodes, expected ${expectedMembers}`
      };
    }

    const desiredQuorum = idealQuorum(expectedMembers);
    const current = await this.prober.currentQuorumSetting();
    if (current.kind === 'unknown') {
      return {
        status: ReconciliationStatus.WAITING_FOR_MEMBERS,
        liveNodes: live.value,
        desiredQuorum,
        quorumWritten: false,
        reason: `Quorum setting unreadable: ${current.reason}`
      };
    }

    if (current.value === desiredQuorum) {
      return {
        status: ReconciliationStatus.CONVERGED,
        liveNodes: live.value,
        desiredQuorum,
        observedQuorum: current.value,
        quorumWritten: false
      };
    }

    const applied = await this.prober.applyQuorumSetting(desiredQuorum);
    if (!applied.ok) {
      this.logger.error(`Failed to set quorum to ${desiredQuorum}: ${applied.reason}`);
      return {
        status: ReconciliationStatus.DEGRADED,
        liveNodes: live.value,
        desiredQuorum,
        observedQuorum: current.value,
        quorumWritten: false,
        reason: applied.reason
      };
    }

    this.logger.reconciler(`Quorum changed from ${current.value} to ${desiredQuorum}`);
    this.emit('quorum-applied', { value: desiredQuorum, previous: current.value });

    return {
      status: ReconciliationStatus.CONVERGED,
      liveNodes: live.value,
      desiredQuorum,
      observedQuorum: current.value,
      quorumWritten: true
    };
  }

  private finish(report: Omit<ReconciliationReport, 'timestamp'>): ReconciliationReport {
    const full: ReconciliationReport = { ...report, timestamp: Date.now() };

    if (full.status !== this.status) {
      this.logger.reconciler(`Status ${this.status} -> ${full.status} (${full.trigger})`);
    }

    this.status = full.status;
    this.lastReport = full;
    this.emit('status', full);
    return full;
  }
}
