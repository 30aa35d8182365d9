import * as http from 'http';
import * as https from 'https';
import { CircuitBreaker } from './CircuitBreaker';
import {
  BackendEndpoint,
  BackendRequestError,
  ClusterBackend,
  ClusterHealth,
  ClusterSettings,
  SettingsAcknowledgement,
  SettingsUpdate
} from './types';
import { Logger, createLogger } from '../common/logger';

export interface ElasticsearchClientConfig {
  /** Resolved on every request; undefined while no address is known */
  resolveEndpoint: () => BackendEndpoint | undefined;
  useHttps?: boolean;
  timeout?: number;
  failureThreshold?: number;
  resetTimeout?: number;
  logger?: Logger;
}

type HttpMethod = 'GET' | 'PUT';

type RequestFn = (options: http.RequestOptions, callback: (res: http.IncomingMessage) => void) => http.ClientRequest;

/**
 * Cluster management client speaking the search backend's REST API
 */
export class ElasticsearchClient implements ClusterBackend {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly timeout: number;
  private readonly useHttps: boolean;

  constructor(private readonly config: ElasticsearchClientConfig) {
    this.timeout = config.timeout ?? 5000;
    this.useHttps = config.useHttps ?? false;
    this.logger = config.logger ?? createLogger();

    this.circuitBreaker = new CircuitBreaker({
      name: 'search-backend',
      timeout: this.timeout,
      failureThreshold: config.failureThreshold ?? 3,
      resetTimeout: config.resetTimeout ?? 30000,
      logger: this.logger
    });
  }

  async getHealth(): Promise<ClusterHealth> {
    const body = await this.request('GET', '/_cluster/health');

    if (!isRecord(body) || typeof body.number_of_nodes !== 'number' || !Number.isInteger(body.number_of_nodes)) {
      throw new BackendRequestError('Malformed cluster health response: number_of_nodes missing');
    }

    return {
      clusterName: typeof body.cluster_name === 'string' ? body.cluster_name : undefined,
      status: typeof body.status === 'string' ? body.status : undefined,
      numberOfNodes: body.number_of_nodes
    };
  }

  async getSettings(): Promise<ClusterSettings> {
    const body = await this.request('GET', '/_cluster/settings?flat_settings=true');

    if (!isRecord(body)) {
      throw new BackendRequestError('Malformed cluster settings response');
    }

    return {
      persistent: isRecord(body.persistent) ? body.persistent : {},
      transient: isRecord(body.transient) ? body.transient : {}
    };
  }

  async putSettings(update: SettingsUpdate): Promise<SettingsAcknowledgement> {
    const body = await this.request('PUT', '/_cluster/settings', update);

    return {
      acknowledged: isRecord(body) && body.acknowledged === true
    };
  }

  private request(method: HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    const endpoint = this.config.resolveEndpoint();
    if (!endpoint) {
      return Promise.reject(new BackendRequestError('No backend endpoint known yet'));
    }

    return this.circuitBreaker.execute(() => this.send(endpoint, method, path, payload));
  }

  private send(endpoint: BackendEndpoint, method: HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    const request: RequestFn = this.useHttps ? https.request : http.request;
    const postData = payload === undefined ? undefined : JSON.stringify(payload);

    const headers: http.OutgoingHttpHeaders = { Accept: 'application/json' };
    if (postData !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(postData);
    }

    this.logger.backend(`${method} ${endpoint.host}:${endpoint.port}${path}`);

    return new Promise((resolve, reject) => {
      const req = request({
        hostname: endpoint.host,
        port: endpoint.port,
        path,
        method,
        headers,
        timeout: this.timeout
      }, (res) => {
        let responseBody = '';

        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          responseBody += chunk;
        });

        res.on('end', () => {
          const statusCode = res.statusCode ?? 0;
          if (statusCode < 200 || statusCode >= 300) {
            reject(new BackendRequestError(`HTTP ${statusCode}: ${responseBody}`, statusCode));
            return;
          }

          try {
            resolve(JSON.parse(responseBody));
          } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            reject(new BackendRequestError(`Invalid JSON from ${path}: ${errorMessage}`, statusCode));
          }
        });
      });

      req.on('error', (error) => {
        reject(error);
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new BackendRequestError(`Request timeout after ${this.timeout}ms`));
      });

      if (postData !== undefined) {
        req.write(postData);
      }
      req.end();
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
