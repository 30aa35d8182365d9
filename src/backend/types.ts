/**
 * Backend management API consumed by the cluster prober
 */

/** Flat settings map, e.g. `{ "discovery.zen.minimum_master_nodes": "2" }` */
export type FlatSettings = Record<string, unknown>;

export interface ClusterHealth {
  clusterName?: string;
  status?: string;
  numberOfNodes: number;
}

export interface ClusterSettings {
  persistent: FlatSettings;
  transient: FlatSettings;
}

/**
 * Settings change sent to the backend; a `null` value resets the key
 */
export interface SettingsUpdate {
  persistent?: FlatSettings;
  transient?: FlatSettings;
}

export interface SettingsAcknowledgement {
  acknowledged: boolean;
}

export interface ClusterBackend {
  getHealth(): Promise<ClusterHealth>;
  getSettings(): Promise<ClusterSettings>;
  putSettings(update: SettingsUpdate): Promise<SettingsAcknowledgement>;
}

/**
 * Where the backend's management API can be reached
 */
export interface BackendEndpoint {
  host: string;
  port: number;
}

/**
 * Error raised for a failed backend request
 */
export class BackendRequestError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'BackendRequestError';
  }
}
