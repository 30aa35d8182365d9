import { EventEmitter } from 'events';
import { LeadershipOracle, SeedStore } from '../types';
import { InMemorySeedStore } from '../../persistence/memory/InMemorySeedStore';

/**
 * How the seed list is populated when the registry is created
 * - full: the first `seedSize` hosts up front
 * - empty: nothing until the first peer joins
 */
export type InitialSeeding = 'full' | 'empty';

export interface SeedHostRegistryOptions {
  /** Application name, used as the pod and service prefix */
  applicationName: string;

  /** Number of seed hosts the list grows toward */
  seedSize?: number;

  /** Optional DNS suffix appended to every seed host name */
  serviceDomain?: string;

  initialSeeding?: InitialSeeding;

  /** Desired-state store the list is kept in */
  store?: SeedStore;
}

/**
 * Leader-owned membership state: the seed host list and the ingress
 * address of the peer group.
 *
 * Seed hosts are derived from their ordinal alone so every replica computes
 * the same list without talking to the cluster. The list only ever grows,
 * and never past `seedSize` entries.
 */
export class SeedHostRegistry extends EventEmitter {
  private readonly applicationName: string;
  private readonly seedSize: number;
  private readonly serviceDomain?: string;
  private readonly store: SeedStore;
  private ingress?: string;

  constructor(
    private readonly leadership: LeadershipOracle,
    options: SeedHostRegistryOptions
  ) {
    super();

    if (!options.applicationName) {
      throw new Error('applicationName is required');
    }

    this.applicationName = options.applicationName;
    this.seedSize = options.seedSize ?? 3;
    this.serviceDomain = options.serviceDomain;
    this.store = options.store ?? new InMemorySeedStore();

    if (!Number.isInteger(this.seedSize) || this.seedSize < 1) {
      throw new Error(`seedSize must be a positive integer, got ${this.seedSize}`);
    }

    if ((options.initialSeeding ?? 'full') === 'full') {
      this.topUp();
    }
  }

  /**
   * Stable host name for the member at `ordinal`
   */
  seedHostAt(ordinal: number): string {
    if (!Number.isInteger(ordinal) || ordinal < 0) {
      throw new Error(`Seed ordinal must be a non-negative integer, got ${ordinal}`);
    }

    const host = `${this.applicationName}-${ordinal}.${this.applicationName}-endpoints`;
    return this.serviceDomain ? `${host}.${this.serviceDomain}` : host;
  }

  /**
   * Seed hosts recorded so far, in ordinal order
   */
  currentSeeds(): string[] {
    return this.store.getSeeds().slice(0, this.seedSize);
  }

  getSeedSize(): number {
    return this.seedSize;
  }

  isBootstrapComplete(): boolean {
    return this.currentSeeds().length >= this.seedSize;
  }

  /**
   * Top the seed list up to `seedSize` entries. Followers never mutate.
   * Returns true when the list grew.
   */
  onPeerJoined(): boolean {
    if (!this.leadership.isLeader()) {
      return false;
    }

    return this.topUp();
  }

  /**
   * Last ingress address observed for the peer group
   */
  get ingressAddress(): string | undefined {
    return this.ingress;
  }

  /**
   * Record a new ingress address. Followers never mutate.
   */
  updateIngressAddress(address: string): boolean {
    if (!this.leadership.isLeader() || !address || address === this.ingress) {
      return false;
    }

    const previous = this.ingress;
    this.ingress = address;
    this.emit('ingress-updated', { address, previous });
    return true;
  }

  private topUp(): boolean {
    const seeds = this.currentSeeds();
    const added: string[] = [];

    for (let ordinal = 0; seeds.length < this.seedSize; ordinal++) {
      const host = this.seedHostAt(ordinal);
      if (!this.store.hasSeed(host)) {
        seeds.push(host);
        added.push(host);
      }
    }

    if (added.length === 0) {
      return false;
    }

    this.store.setSeeds(seeds);
    this.emit('seeds-updated', { seeds: [...seeds], added });
    return true;
  }
}
