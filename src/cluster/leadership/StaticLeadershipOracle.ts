import { EventEmitter } from 'events';
import { LeadershipOracle } from '../types';

/**
 * Leadership flag set by the surrounding orchestration layer
 */
export class StaticLeadershipOracle extends EventEmitter implements LeadershipOracle {
  constructor(private leader: boolean = false) {
    super();
  }

  isLeader(): boolean {
    return this.leader;
  }

  setLeader(leader: boolean): void {
    if (this.leader === leader) return;

    this.leader = leader;
    this.emit(leader ? 'leader-elected' : 'leader-lost');
  }
}
