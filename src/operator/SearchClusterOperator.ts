import { EventEmitter } from 'events';
import { ClusterReconciler } from '../cluster/reconciliation/ClusterReconciler';
import { ClusterProber } from '../cluster/probe/ClusterProber';
import { SeedHostRegistry, InitialSeeding } from '../cluster/seeding/SeedHostRegistry';
import { PeerMembership } from '../cluster/membership/PeerMembership';
import { toleratedFailures } from '../cluster/quorum/QuorumCalculator';
import {
  LeadershipOracle,
  ReconcileTrigger,
  ReconcilerEvents,
  ReconciliationReport,
  ReconciliationStatus,
  SeedStore
} from '../cluster/types';
import { ClusterBackend } from '../backend/types';
import { ElasticsearchClient } from '../backend/ElasticsearchClient';
import { NodeConfigRenderer } from '../config/NodeConfigRenderer';
import { OperatorConfiguration, OperatorOptions } from '../config/OperatorConfiguration';
import { Logger, createLogger } from '../common/logger';

export interface SearchClusterOperatorDeps {
  options: OperatorOptions;
  leadership: LeadershipOracle;
  membership: PeerMembership;

  /** Defaults to an HTTP client aimed at the recorded ingress address */
  backend?: ClusterBackend;
  renderer?: NodeConfigRenderer;
  seedStore?: SeedStore;
  initialSeeding?: InitialSeeding;
  logger?: Logger;
}

/**
 * Outbound health signal, one per reconciliation pass
 */
export interface HealthReport {
  status: ReconciliationStatus;
  message: string;
  report: ReconciliationReport;
}

export interface RenderedNodeConfig {
  seeds: string[];
  content: string;
}

export type ReconfigurableOptions = Partial<Pick<OperatorOptions, 'clusterName' | 'advertisedPort' | 'healthCheckInterval'>>;

export const TERMINATING_MESSAGE = 'Pod is terminating.';

/**
 * Event loop around the reconciler.
 *
 * Membership and config notifications update local state and queue a pass;
 * passes run one at a time in arrival order. A periodic health tick keeps the
 * loop level-triggered even when no notification arrives.
 */
export class SearchClusterOperator extends EventEmitter {
  private options: OperatorOptions;
  private readonly leadership: LeadershipOracle;
  private readonly membership: PeerMembership;
  private readonly seeds: SeedHostRegistry;
  private readonly reconciler: ClusterReconciler;
  private readonly renderer: NodeConfigRenderer;
  private readonly logger: Logger;
  private observedIngress?: string;
  private queue: Promise<unknown> = Promise.resolve();
  private healthTimer?: NodeJS.Timeout;
  private started = false;
  private stopped = false;

  constructor(deps: SearchClusterOperatorDeps) {
    super();

    this.options = { ...deps.options };
    this.leadership = deps.leadership;
    this.membership = deps.membership;
    this.logger = deps.logger ?? createLogger();
    this.renderer = deps.renderer ?? new NodeConfigRenderer();

    this.seeds = new SeedHostRegistry(this.leadership, {
      applicationName: this.options.applicationName,
      seedSize: this.options.seedSize,
      serviceDomain: this.options.serviceDomain,
      initialSeeding: deps.initialSeeding,
      store: deps.seedStore
    });

    const backend = deps.backend ?? new ElasticsearchClient({
      resolveEndpoint: () => {
        const host = this.seeds.ingressAddress;
        return host ? { host, port: this.options.advertisedPort } : undefined;
      },
      timeout: this.options.backendTimeout,
      logger: this.logger
    });

    this.reconciler = new ClusterReconciler({
      leadership: this.leadership,
      membership: this.membership,
      seeds: this.seeds,
      prober: new ClusterProber(backend, this.logger),
      logger: this.logger
    });

    this.reconciler.on('reconfigure-required', (event: ReconcilerEvents['reconfigure-required'][0]) => {
      this.publishNodeConfig(event.seeds);
    });
  }

  /**
   * Build an operator from a YAML options file
   */
  static async fromConfigFile(
    filePath: string,
    deps: Omit<SearchClusterOperatorDeps, 'options'>,
    environment?: string
  ): Promise<SearchClusterOperator> {
    const configuration = new OperatorConfiguration(environment);
    const options = await configuration.loadFromFile(filePath);
    return new SearchClusterOperator({ ...deps, options });
  }

  async start(): Promise<ReconciliationReport> {
    if (this.started) {
      throw new Error('Operator is already started');
    }

    if (!this.renderer.isLoaded()) {
      await this.renderer.loadTemplate();
    }

    this.started = true;
    this.logger.operator(`Operator started for ${this.membership.selfIdentity()} (cluster ${this.options.clusterName})`);

    this.publishNodeConfig(this.seeds.currentSeeds());
    this.startHealthTimer();

    return this.enqueue('config-changed');
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }

    this.stopped = true;
    this.stopHealthTimer();
    await this.queue;

    this.logger.operator('Operator stopped');
    this.emit('maintenance', { message: TERMINATING_MESSAGE });
  }

  peerJoined(unitId: string): Promise<ReconciliationReport> {
    this.membership.addPeer(unitId);
    return this.enqueue('peer-joined');
  }

  peerChanged(unitId: string, ingressAddress?: string): Promise<ReconciliationReport> {
    this.membership.addPeer(unitId);
    if (ingressAddress) {
      this.observedIngress = ingressAddress;
    }
    return this.enqueue('peer-changed');
  }

  peerDeparted(unitId: string): Promise<ReconciliationReport> {
    this.membership.removePeer(unitId);
    return this.enqueue('peer-departed');
  }

  configChanged(changes: ReconfigurableOptions): Promise<ReconciliationReport> {
    const previousInterval = this.options.healthCheckInterval;
    this.options = { ...this.options, ...changes };

    if (this.started && this.options.healthCheckInterval !== previousInterval) {
      this.stopHealthTimer();
      this.startHealthTimer();
    }

    this.publishNodeConfig(this.seeds.currentSeeds());
    return this.enqueue('config-changed');
  }

  healthTick(): Promise<ReconciliationReport> {
    return this.enqueue('health-tick');
  }

  getStatus(): ReconciliationStatus {
    return this.reconciler.getStatus();
  }

  getSeeds(): string[] {
    return this.seeds.currentSeeds();
  }

  getIngressAddress(): string | undefined {
    return this.seeds.ingressAddress;
  }

  getOptions(): OperatorOptions {
    return { ...this.options };
  }

  private enqueue(trigger: ReconcileTrigger): Promise<ReconciliationReport> {
    if (this.stopped) {
      return Promise.reject(new Error(`Operator is stopped, ignoring ${trigger}`));
    }

    const pass = this.queue.then(() => this.runPass(trigger));
    // A failed pass must not block the ones queued behind it
    this.queue = pass.catch(() => undefined);
    return pass;
  }

  private async runPass(trigger: ReconcileTrigger): Promise<ReconciliationReport> {
    let report: ReconciliationReport;

    // Followers drop ingress updates; a unit that becomes leader picks up the last one seen
    if (this.observedIngress) {
      this.seeds.updateIngressAddress(this.observedIngress);
    }

    try {
      report = await this.reconciler.reconcile(trigger);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Reconciliation pass for ${trigger} failed: ${reason}`);
      report = this.reconciler.recordFailure(trigger, reason);
    }

    const health: HealthReport = {
      status: report.status,
      message: describeReport(report),
      report
    };
    this.emit('health', health);

    return report;
  }

  private publishNodeConfig(seeds: string[]): void {
    if (!this.renderer.isLoaded()) {
      return;
    }

    const rendered: RenderedNodeConfig = {
      seeds: [...seeds],
      content: this.renderer.render({
        clusterName: this.options.clusterName,
        advertisedPort: this.options.advertisedPort,
        seeds
      })
    };

    this.logger.operator(`Node config rendered with ${seeds.length} seed host(s)`);
    this.emit('node-config', rendered);
  }

  private startHealthTimer(): void {
    this.healthTimer = setInterval(() => {
      this.healthTick().catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Health tick skipped: ${reason}`);
      });
    }, this.options.healthCheckInterval);

    this.healthTimer.unref();
  }

  private stopHealthTimer(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = undefined;
    }
  }
}

/**
 * Human-readable health message for a pass
 */
export function describeReport(report: ReconciliationReport): string {
  switch (report.status) {
    case ReconciliationStatus.CONVERGED:
      if (!report.isLeader) {
        return 'Unit is ready';
      }
      return `Cluster converged: ${report.expectedMembers} member(s), quorum ${report.desiredQuorum ?? 1}, ` +
        `tolerates ${toleratedFailures(report.expectedMembers)} failure(s)`;
    case ReconciliationStatus.WAITING_FOR_MEMBERS:
      return `Waiting for members: ${report.reason ?? 'cluster not reachable yet'}`;
    case ReconciliationStatus.DEGRADED:
      return `Cluster degraded: ${report.reason ?? 'unknown error'}`;
  }
}
