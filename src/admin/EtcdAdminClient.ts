import * as http from 'http';
import * as https from 'https';
import { promises as fs } from 'fs';
import { IMemberAdminClient, MemberPayload, TlsMaterial } from './types';
import { Member } from '../membership/types';
import {
  AdminRequestFailedError,
  ConfigurationError,
  NoHealthyMemberError,
  UnreachableMemberError,
  describeCause
} from '../common/errors';
import { BootstrapLogger, createLogger } from '../common/logger';

export interface EtcdAdminClientConfig {
  /** Applied to every request, connect through last byte (ms) */
  timeout?: number;
  /** Prepended to `/members`; etcd's v2 API lives under `/v2` */
  adminPathPrefix?: string;
  tls?: TlsMaterial;
  logger?: BootstrapLogger;
}

export interface TlsFiles {
  caFile?: string;
  certFile?: string;
  keyFile?: string;
}

interface HttpResponse {
  statusCode: number;
  body: string;
}

/**
 * Client for the member-management HTTP API of one running etcd member.
 *
 * Transport errors are surfaced to the caller as-is; retry policy belongs to
 * whoever re-invokes the bootstrap run.
 */
export class EtcdAdminClient implements IMemberAdminClient {
  private readonly timeout: number;
  private readonly adminPathPrefix: string;
  private readonly logger: BootstrapLogger;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(config: EtcdAdminClientConfig = {}) {
    this.timeout = config.timeout ?? 5000;
    this.adminPathPrefix = trimTrailingSlash(config.adminPathPrefix ?? '/v2');
    this.logger = config.logger ?? createLogger();

    const tls = config.tls ?? {};
    this.httpAgent = new http.Agent({ keepAlive: false });
    this.httpsAgent = new https.Agent({
      keepAlive: false,
      ca: tls.ca,
      cert: tls.cert,
      key: tls.key
    });
  }

  /**
   * Create a client whose TLS material is read from PEM files.
   * A client certificate is only presented when both cert and key are given.
   */
  static async fromFiles(files: TlsFiles, config: Omit<EtcdAdminClientConfig, 'tls'> = {}): Promise<EtcdAdminClient> {
    const tls: TlsMaterial = {};
    try {
      if (files.certFile && files.keyFile) {
        tls.cert = await fs.readFile(files.certFile);
        tls.key = await fs.readFile(files.keyFile);
      }
      if (files.caFile) {
        tls.ca = await fs.readFile(files.caFile);
      }
    } catch (error) {
      throw new ConfigurationError(`Failed to load TLS material: ${describeCause(error)}`, error);
    }
    return new EtcdAdminClient({ ...config, tls });
  }

  async checkHealth(member: Member): Promise<boolean> {
    const url = `${trimTrailingSlash(member.clientURL)}/health`;
    this.logger.admin(`Checking member health at ${url}`);

    let response: HttpResponse;
    try {
      response = await this.request('GET', url);
    } catch (error) {
      // Unreachable members are a steady state, not an exception
      this.logger.admin(new UnreachableMemberError(url, error).message);
      return false;
    }

    if (!isSuccess(response.statusCode)) {
      this.logger.admin(`Unhealthy member ${member.name}: HTTP ${response.statusCode}`);
      return false;
    }

    const healthy = isHealthyPayload(response.body);
    if (healthy) {
      this.logger.admin(`Healthy member ${member.name}`);
    } else {
      this.logger.admin(`Unhealthy member ${member.name}: ${response.body.trim() || '<empty body>'}`);
    }
    return healthy;
  }

  /**
   * First healthy candidate wins. This is an ordering rule, not a load balancer:
   * later candidates are never probed once one answers.
   */
  async findHealthyMember(candidates: ReadonlyArray<Member>): Promise<Member> {
    for (const candidate of candidates) {
      if (await this.checkHealth(candidate)) {
        return candidate;
      }
    }
    throw new NoHealthyMemberError(candidates.length);
  }

  async listMembers(adminEndpoint: Member): Promise<Member[]> {
    const url = this.membersUrl(adminEndpoint);
    this.logger.admin(`Listing members using ${url}`);

    const response = await this.adminRequest('GET', url);
    let members: Member[];
    try {
      members = decodeMemberList(JSON.parse(response.body));
    } catch (error) {
      throw new AdminRequestFailedError(
        `Malformed member list from ${url}: ${describeCause(error)}`,
        'GET',
        url,
        response.statusCode,
        error
      );
    }

    this.logger.admin(`Found ${members.length} member(s): ${members.map(m => m.name || `<unstarted ${m.id}>`).join(', ')}`);
    return members;
  }

  async addMember(adminEndpoint: Member, newMember: Member): Promise<void> {
    const url = this.membersUrl(adminEndpoint);
    this.logger.admin(`Adding member ${newMember.name} (${newMember.peerURL})`);

    await this.adminRequest('POST', url, {
      name: newMember.name,
      peerURLs: [newMember.peerURL]
    });

    this.logger.admin(`Member ${newMember.name} added`);
  }

  async removeMember(adminEndpoint: Member, victim: Member): Promise<void> {
    const base = this.membersUrl(adminEndpoint);
    if (!victim.id) {
      throw new AdminRequestFailedError(
        `Cannot remove member ${victim.name}: no cluster id`,
        'DELETE',
        base
      );
    }

    const url = `${base}/${encodeURIComponent(victim.id)}`;
    this.logger.admin(`Removing member ${victim.name} (${victim.id})`);

    await this.adminRequest('DELETE', url);

    this.logger.admin(`Member ${victim.name} removed`);
  }

  private membersUrl(adminEndpoint: Member): string {
    return `${trimTrailingSlash(adminEndpoint.clientURL)}${this.adminPathPrefix}/members`;
  }

  /**
   * Request against a confirmed-healthy member; any failure is an AdminRequestFailedError
   */
  private async adminRequest(method: string, url: string, body?: unknown): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await this.request(method, url, body);
    } catch (error) {
      throw new AdminRequestFailedError(
        `${method} ${url} failed: ${describeCause(error)}`,
        method,
        url,
        undefined,
        error
      );
    }

    if (!isSuccess(response.statusCode)) {
      throw new AdminRequestFailedError(
        `${method} ${url} failed: HTTP ${response.statusCode} ${response.body.trim()}`.trim(),
        method,
        url,
        response.statusCode
      );
    }
    return response;
  }

  private request(method: string, url: string, body?: unknown): Promise<HttpResponse> {
    const target = new URL(url);
    const secure = target.protocol === 'https:';
    const payload = body === undefined ? undefined : JSON.stringify(body);

    const headers: http.OutgoingHttpHeaders = { Accept: 'application/json' };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(payload);
    }

    const options: https.RequestOptions = {
      method,
      headers,
      timeout: this.timeout,
      agent: secure ? this.httpsAgent : this.httpAgent
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        let responseBody = '';
        res.setEncoding('utf8');

        res.on('data', (chunk: string) => {
          responseBody += chunk;
        });

        res.on('end', () => {
          clearTimeout(deadline);
          resolve({ statusCode: res.statusCode ?? 0, body: responseBody });
        });

        res.on('error', (error) => {
          clearTimeout(deadline);
          reject(error);
        });
      };

      const req = secure
        ? https.request(target, options, onResponse)
        : http.request(target, options, onResponse);

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

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Healthy only when the payload explicitly asserts it. Malformed bodies are
 * common while a member is still starting, so they count as unhealthy.
 */
export function isHealthyPayload(body: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return false;
  }
  if (!isRecord(parsed)) {
    return false;
  }
  return parsed.health === 'true' || parsed.health === true;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function toMemberPayload(value: unknown, index: number): MemberPayload {
  if (!isRecord(value) || typeof value.id !== 'string') {
    throw new Error(`members[${index}] has no string id`);
  }
  return {
    id: value.id,
    name: typeof value.name === 'string' ? value.name : '',
    clientURLs: isStringArray(value.clientURLs) ? value.clientURLs : [],
    peerURLs: isStringArray(value.peerURLs) ? value.peerURLs : []
  };
}

/**
 * Decode `{"members": [...]}`. Only the first client and peer URL are kept;
 * members still joining may report none.
 */
export function decodeMemberList(body: unknown): Member[] {
  if (!isRecord(body) || !Array.isArray(body.members)) {
    throw new Error('expected an object with a members array');
  }
  return body.members.map((raw, index) => {
    const payload = toMemberPayload(raw, index);
    return {
      id: payload.id,
      name: payload.name,
      clientURL: payload.clientURLs[0] ?? '',
      peerURL: payload.peerURLs[0] ?? ''
    };
  });
}
