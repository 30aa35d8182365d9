import { ClusterBackend, FlatSettings } from '../../backend/types';
import { ApplyOutcome, ProbeOutcome } from '../types';
import { Logger, createLogger } from '../../common/logger';

export const MINIMUM_MASTER_NODES_SETTING = 'discovery.zen.minimum_master_nodes';

/**
 * Reads live cluster state and writes the quorum setting.
 *
 * Backend errors never escape: reads turn into `unknown` outcomes and writes
 * into failed outcomes, so callers can skip the pass and try again later.
 */
export class ClusterProber {
  private readonly logger: Logger;

  constructor(
    private readonly backend: ClusterBackend,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger();
  }

  async totalLiveNodes(): Promise<ProbeOutcome<number>> {
    try {
      const health = await this.backend.getHealth();
      return { kind: 'known', value: health.numberOfNodes };
    } catch (error) {
      const reason = describe(error);
      this.logger.backend(`Live node count unavailable: ${reason}`);
      return { kind: 'unknown', reason };
    }
  }

  async currentQuorumSetting(): Promise<ProbeOutcome<number>> {
    let transient: FlatSettings;
    let persistent: FlatSettings;

    try {
      ({ transient, persistent } = await this.backend.getSettings());
    } catch (error) {
      const reason = describe(error);
      this.logger.backend(`Quorum setting unavailable: ${reason}`);
      return { kind: 'unknown', reason };
    }

    // Transient settings take precedence over persistent ones
    const raw = transient[MINIMUM_MASTER_NODES_SETTING] ?? persistent[MINIMUM_MASTER_NODES_SETTING];

    if (raw === undefined || raw === null) {
      this.logger.warn(`${MINIMUM_MASTER_NODES_SETTING} not set on the backend, assuming 1`);
      return { kind: 'known', value: 1 };
    }

    const value = typeof raw === 'number' ? raw : Number(raw);
    if (!Number.isInteger(value) || value < 1) {
      const reason = `Unparseable ${MINIMUM_MASTER_NODES_SETTING} value: ${String(raw)}`;
      this.logger.warn(reason);
      return { kind: 'unknown', reason };
    }

    return { kind: 'known', value };
  }

  /**
   * Writes the persistent setting and resets any transient override, which
   * would otherwise keep shadowing the new value.
   */
  async applyQuorumSetting(value: number): Promise<ApplyOutcome> {
    try {
      const result = await this.backend.putSettings({
        persistent: { [MINIMUM_MASTER_NODES_SETTING]: value },
        transient: { [MINIMUM_MASTER_NODES_SETTING]: null }
      });
      if (!result.acknowledged) {
        return { ok: false, reason: `Backend did not acknowledge ${MINIMUM_MASTER_NODES_SETTING}=${value}` };
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: describe(error) };
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
