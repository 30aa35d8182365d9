import { EventEmitter } from 'events';
import { MembershipSource } from '../types';

/**
 * Orchestrator-side view of the peer group, fed by peer relation events
 */
export class PeerMembership extends EventEmitter implements MembershipSource {
  private peers = new Set<string>();

  constructor(private readonly localUnitId: string) {
    super();
  }

  selfIdentity(): string {
    return this.localUnitId;
  }

  peerCount(): number {
    return this.peers.size;
  }

  getPeers(): string[] {
    return Array.from(this.peers).sort();
  }

  /**
   * Returns false for self and for peers already known
   */
  addPeer(unitId: string): boolean {
    if (unitId === this.localUnitId || this.peers.has(unitId)) {
      return false;
    }

    this.peers.add(unitId);
    this.emit('member-joined', unitId);
    return true;
  }

  removePeer(unitId: string): boolean {
    const removed = this.peers.delete(unitId);
    if (removed) {
      this.emit('member-left', unitId);
    }
    return removed;
  }
}
