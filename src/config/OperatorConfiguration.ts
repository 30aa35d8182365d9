import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';

export const OPTION_KEYS = [
  'cluster-name',
  'seed-size',
  'advertised-port',
  'application-name',
  'service-domain',
  'backend-timeout',
  'health-check-interval'
] as const;

export type OptionKey = typeof OPTION_KEYS[number];

/**
 * Operator configuration file schema (keys as written in YAML).
 * `environments` maps an environment name to overrides of the same keys.
 */
export type RawOperatorConfig = Partial<Record<OptionKey, unknown>> & {
  environments?: unknown;
};

/**
 * Validated operator options
 */
export interface OperatorOptions {
  /** Name the search cluster is created with; not interpreted by the operator */
  clusterName: string;

  /** Number of seed hosts used for discovery */
  seedSize: number;

  /** Port of the backend management API */
  advertisedPort: number;

  /** Prefix for pod and service names */
  applicationName: string;

  /** DNS suffix appended to seed host names */
  serviceDomain?: string;

  /** Timeout of a single backend call (ms) */
  backendTimeout: number;

  /** Interval between periodic health passes (ms) */
  healthCheckInterval: number;
}

export const DEFAULT_OPERATOR_OPTIONS: Omit<OperatorOptions, 'clusterName'> = {
  seedSize: 3,
  advertisedPort: 9200,
  applicationName: 'elasticsearch',
  backendTimeout: 5000,
  healthCheckInterval: 30000
};

/**
 * Loads operator options from YAML with environment overrides
 */
export class OperatorConfiguration extends EventEmitter {
  private options: OperatorOptions | null = null;
  private configPath: string | null = null;

  constructor(private currentEnvironment: string = 'development') {
    super();
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<OperatorOptions> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      const options = this.parseFromYaml(yamlContent);
      this.options = options;
      this.configPath = filePath;

      this.emit('config-loaded', { filePath, options });
      return options;
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load operator configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into validated options
   */
  parseFromYaml(yamlContent: string): OperatorOptions {
    let parsed: unknown;
    try {
      parsed = yaml.load(yamlContent);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }

    if (!isRecord(parsed)) {
      throw new Error('Operator configuration must be a YAML mapping');
    }

    return OperatorConfiguration.resolve(this.applyEnvironmentOverrides(parsed));
  }

  /**
   * Validate raw options and fill in defaults
   */
  static resolve(raw: RawOperatorConfig): OperatorOptions {
    const clusterName = raw['cluster-name'];
    if (typeof clusterName !== 'string' || clusterName.trim() === '') {
      throw new Error('cluster-name is required');
    }

    const advertisedPort = positiveInteger(raw, 'advertised-port', DEFAULT_OPERATOR_OPTIONS.advertisedPort);
    if (advertisedPort > 65535) {
      throw new Error(`advertised-port must be a valid port, got ${advertisedPort}`);
    }

    return {
      clusterName,
      seedSize: positiveInteger(raw, 'seed-size', DEFAULT_OPERATOR_OPTIONS.seedSize),
      advertisedPort,
      applicationName: optionalString(raw, 'application-name') ?? DEFAULT_OPERATOR_OPTIONS.applicationName,
      serviceDomain: optionalString(raw, 'service-domain'),
      backendTimeout: positiveInteger(raw, 'backend-timeout', DEFAULT_OPERATOR_OPTIONS.backendTimeout),
      healthCheckInterval: positiveInteger(raw, 'health-check-interval', DEFAULT_OPERATOR_OPTIONS.healthCheckInterval)
    };
  }

  getOptions(): OperatorOptions | null {
    return this.options;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
  }

  private applyEnvironmentOverrides(raw: RawOperatorConfig): RawOperatorConfig {
    const { environments, ...base } = raw;
    const overrides = isRecord(environments) ? environments[this.currentEnvironment] : undefined;

    if (!isRecord(overrides)) {
      return base;
    }

    return { ...base, ...overrides };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInteger(raw: RawOperatorConfig, key: OptionKey, fallback: number): number {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, got ${String(value)}`);
  }

  return value;
}

function optionalString(raw: RawOperatorConfig, key: OptionKey): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string`);
  }

  return value;
}
