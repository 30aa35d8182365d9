import * as yaml from 'js-yaml';
import * as path from 'path';
import { promises as fs } from 'fs';

export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '../../config/elasticsearch.yml');

export const SEED_HOSTS_SETTING = 'discovery.zen.ping.unicast.hosts';

export interface NodeConfigInput {
  clusterName: string;
  advertisedPort: number;
  seeds: string[];
}

type NodeConfigDocument = Record<string, unknown>;

/**
 * Fills the static node configuration template with the cluster name,
 * HTTP port and seed host list.
 */
export class NodeConfigRenderer {
  private template: NodeConfigDocument | null = null;

  constructor(private readonly templatePath: string = DEFAULT_TEMPLATE_PATH) {}

  async loadTemplate(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.templatePath, 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read node config template ${this.templatePath}: ${errorMessage}`);
    }

    this.template = NodeConfigRenderer.parseTemplate(content);
  }

  static parseTemplate(content: string): NodeConfigDocument {
    const parsed = yaml.load(content);
    if (!isRecord(parsed)) {
      throw new Error('Node config template must be a YAML mapping');
    }
    return parsed;
  }

  isLoaded(): boolean {
    return this.template !== null;
  }

  /**
   * Build the node configuration document
   */
  build(input: NodeConfigInput): NodeConfigDocument {
    if (!this.template) {
      throw new Error('Node config template not loaded');
    }

    // Deep copy so renders never leak into the template
    const document: NodeConfigDocument = JSON.parse(JSON.stringify(this.template));

    document.cluster = { ...asRecord(document.cluster), name: input.clusterName };
    document.http = { ...asRecord(document.http), port: input.advertisedPort };
    document[SEED_HOSTS_SETTING] = [...input.seeds];

    return document;
  }

  render(input: NodeConfigInput): string {
    return yaml.dump(this.build(input), { indent: 2, lineWidth: 100 });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
