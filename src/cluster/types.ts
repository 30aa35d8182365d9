/**
 * Core types for the cluster reconciliation loop
 */

/**
 * Health state reported after every reconciliation pass
 */
export enum ReconciliationStatus {
  CONVERGED = 'Converged',
  WAITING_FOR_MEMBERS = 'WaitingForMembers',
  DEGRADED = 'Degraded'
}

/**
 * Signals that start a reconciliation pass
 */
export type ReconcileTrigger =
  | 'peer-joined'
  | 'peer-changed'
  | 'peer-departed'
  | 'health-tick'
  | 'config-changed';

/**
 * Answers whether this process may mutate shared state.
 * Queried once per pass and trusted for the rest of it.
 */
export interface LeadershipOracle {
  isLeader(): boolean;
}

/**
 * Orchestrator's view of the peer group
 */
export interface MembershipSource {
  peerCount(): number;
  selfIdentity(): string;
}

/**
 * Desired-state store for the seed host list
 */
export interface SeedStore {
  getSeeds(): string[];
  setSeeds(seeds: string[]): void;
  hasSeed(host: string): boolean;
}

/**
 * Result of a read against the backend.
 * `unknown` means the pass must be skipped without mutating anything.
 */
export type ProbeOutcome<T> =
  | { kind: 'known'; value: T }
  | { kind: 'unknown'; reason: string };

export type ApplyOutcome =
  | { ok: true }
  | { ok: false; reason: string };

/**
 * Full outcome of one reconciliation pass
 */
export interface ReconciliationReport {
  trigger: ReconcileTrigger;
  status: ReconciliationStatus;
  isLeader: boolean;
  expectedMembers: number;
  liveNodes?: number;
  desiredQuorum?: number;
  observedQuorum?: number;
  quorumWritten: boolean;
  seeds: string[];
  seedsChanged: boolean;
  reason?: string;
  timestamp: number;
}

export interface ReconcilerEvents {
  'status': [ReconciliationReport];
  'reconfigure-required': [{ seeds: string[]; previousCount: number }];
  'quorum-applied': [{ value: number; previous: number }];
}
