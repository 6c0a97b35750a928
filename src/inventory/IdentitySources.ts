import * as http from 'http';
import { IdentitySource } from './types';
import { InventoryError, describeCause } from '../common/errors';
import { BootstrapLogger, createLogger } from '../common/logger';

export class StaticIdentitySource implements IdentitySource {
  constructor(private readonly name: string) {}

  async getLocalName(): Promise<string> {
    return this.name;
  }
}

export interface Ec2MetadataConfig {
  endpoint?: string;
  timeout?: number;
  logger?: BootstrapLogger;
}

const TOKEN_PATH = '/latest/api/token';
const IDENTITY_PATH = '/latest/dynamic/instance-identity/document';
const TOKEN_TTL_SECONDS = '21600';

/**
 * Reads the instance id from the EC2 instance identity document.
 * Uses an IMDSv2 session token when the token endpoint answers, and falls
 * back to a plain IMDSv1 request otherwise.
 */
export class Ec2MetadataIdentitySource implements IdentitySource {
  private readonly endpoint: string;
  private readonly timeout: number;
  private readonly logger: BootstrapLogger;
  private readonly agent = new http.Agent({ keepAlive: false });

  constructor(config: Ec2MetadataConfig = {}) {
    this.endpoint = (config.endpoint ?? 'http://169.254.169.254').replace(/\/+$/, '');
    this.timeout = config.timeout ?? 5000;
    this.logger = config.logger ?? createLogger();
  }

  async getLocalName(): Promise<string> {
    const token = await this.fetchToken();
    const headers: http.OutgoingHttpHeaders = token ? { 'X-aws-ec2-metadata-token': token } : {};

    let document: { statusCode: number; body: string };
    try {
      document = await this.request('GET', IDENTITY_PATH, headers);
    } catch (error) {
      throw new InventoryError(`Instance metadata unavailable: ${describeCause(error)}`, error);
    }
    if (document.statusCode !== 200) {
      throw new InventoryError(`Instance metadata returned HTTP ${document.statusCode}`);
    }

    const instanceId = parseInstanceId(document.body);
    this.logger.inventory(`Local instance id ${instanceId}`);
    return instanceId;
  }

  private async fetchToken(): Promise<string | undefined> {
    try {
      const response = await this.request('PUT', TOKEN_PATH, {
        'X-aws-ec2-metadata-token-ttl-seconds': TOKEN_TTL_SECONDS
      });
      if (response.statusCode === 200 && response.body.length > 0) {
        return response.body;
      }
      this.logger.debug(`IMDSv2 token request returned HTTP ${response.statusCode}, using IMDSv1`);
    } catch (error) {
      this.logger.debug(`IMDSv2 token request failed, using IMDSv1: ${describeCause(error)}`);
    }
    return undefined;
  }

  private request(
    method: string,
    path: string,
    headers: http.OutgoingHttpHeaders
  ): Promise<{ statusCode: number; body: string }> {
    return new Promise((resolve, reject) => {
      const req = http.request(`${this.endpoint}${path}`, { method, headers, timeout: this.timeout, agent: this.agent }, (res) => {
        let body = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          body += chunk;
        });
        res.on('end', () => {
          clearTimeout(deadline);
          resolve({ statusCode: res.statusCode ?? 0, body });
        });
        res.on('error', (error) => {
          clearTimeout(deadline);
          reject(error);
        });
      });

      const deadline = setTimeout(() => {
        // Once the response has started, destroy() surfaces as a generic abort on res
        const error = new Error(`Request timeout after ${this.timeout}ms`);
        reject(error);
        req.destroy(error);
      }, this.timeout);
      deadline.unref();

      req.on('error', (error) => {
        clearTimeout(deadline);
        reject(error);
      });
      req.on('timeout', () => {
        req.destroy(new Error(`Request timeout after ${this.timeout}ms`));
      });
      req.end();
    });
  }
}

export function parseInstanceId(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new InventoryError(`Malformed instance identity document: ${describeCause(error)}`, error);
  }
  if (typeof parsed !== 'object' || parsed === null || !('instanceId' in parsed) || typeof parsed.instanceId !== 'string') {
    throw new InventoryError('Instance identity document has no instanceId');
  }
  return parsed.instanceId;
}
