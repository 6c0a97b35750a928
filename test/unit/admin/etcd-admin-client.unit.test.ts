import * as http from 'http';
import * as https from 'https';
import * as path from 'path';
import { promises as fs } from 'fs';
import { TLSSocket } from 'tls';
import { EtcdAdminClient, decodeMemberList, isHealthyPayload } from '../../../src/admin/EtcdAdminClient';
import { AdminRequestFailedError, ConfigurationError, NoHealthyMemberError } from '../../../src/common/errors';
import { Member } from '../../../src/membership/types';
import { FakeEtcdServer } from '../../helpers/fakeEtcdServer';

describe('EtcdAdminClient', () => {
  let server: FakeEtcdServer;
  let client: EtcdAdminClient;
  let endpoint: Member;

  beforeEach(async () => {
    server = new FakeEtcdServer();
    const url = await server.start();
    endpoint = { name: 'node-a', clientURL: url, peerURL: 'http://127.0.0.1:2380' };
    client = new EtcdAdminClient({ timeout: 1000 });
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('checkHealth', () => {
    test('should report a member asserting health as healthy', async () => {
      await expect(client.checkHealth(endpoint)).resolves.toBe(true);
      expect(server.requests).toEqual([{ method: 'GET', path: '/health', body: '' }]);
    });

    test('should report health "false" as unhealthy', async () => {
      server.healthBody = '{"health":"false"}';
      await expect(client.checkHealth(endpoint)).resolves.toBe(false);
    });

    test('should report a malformed payload as unhealthy', async () => {
      server.healthBody = 'starting up';
      await expect(client.checkHealth(endpoint)).resolves.toBe(false);
    });

    test('should report a non-2xx status as unhealthy', async () => {
      server.healthStatus = 503;
      await expect(client.checkHealth(endpoint)).resolves.toBe(false);
    });

    test('should report an unreachable member as unhealthy', async () => {
      const url = endpoint.clientURL;
      await server.stop();

      await expect(client.checkHealth({ ...endpoint, clientURL: url })).resolves.toBe(false);
    });

    test('should report a timed-out member as unhealthy', async () => {
      server.hang = true;
      const impatient = new EtcdAdminClient({ timeout: 100 });

      await expect(impatient.checkHealth(endpoint)).resolves.toBe(false);
    });

    test('should tolerate a trailing slash in the client URL', async () => {
      await client.checkHealth({ ...endpoint, clientURL: `${endpoint.clientURL}/` });
      expect(server.requests[0].path).toBe('/health');
    });
  });

  describe('findHealthyMember', () => {
    test('should return the first healthy candidate without probing the rest', async () => {
      const down = await closedUrl();
      const candidates: Member[] = [
        { name: 'down', clientURL: down, peerURL: '' },
        endpoint,
        { ...endpoint, name: 'never-probed' }
      ];

      const healthy = await client.findHealthyMember(candidates);

      expect(healthy.name).toBe('node-a');
      expect(server.requests).toHaveLength(1);
    });

    test('should fail with NoHealthyMemberError when nobody is healthy', async () => {
      server.healthBody = '{"health":"false"}';

      await expect(client.findHealthyMember([endpoint])).rejects.toThrow(NoHealthyMemberError);
    });

    test('should fail with NoHealthyMemberError for an empty candidate list', async () => {
      await expect(client.findHealthyMember([])).rejects.toThrow('No healthy member found among 0 candidate(s)');
    });
  });

  describe('listMembers', () => {
    test('should decode members keeping only the first URL of each list', async () => {
      server.members = [
        { id: 'a1', name: 'node-a', clientURLs: ['http://10.0.0.1:2379', 'http://10.0.0.1:4001'], peerURLs: ['http://10.0.0.1:2380'] },
        { id: 'b2', name: '', clientURLs: [], peerURLs: ['http://10.0.0.2:2380'] }
      ];

      const members = await client.listMembers(endpoint);

      expect(members).toEqual([
        { id: 'a1', name: 'node-a', clientURL: 'http://10.0.0.1:2379', peerURL: 'http://10.0.0.1:2380' },
        { id: 'b2', name: '', clientURL: '', peerURL: 'http://10.0.0.2:2380' }
      ]);
      expect(server.requests).toEqual([{ method: 'GET', path: '/v2/members', body: '' }]);
    });

    test('should honour a custom admin path prefix', async () => {
      const v3ish = new EtcdAdminClient({ timeout: 1000, adminPathPrefix: '/' });

      await expect(v3ish.listMembers(endpoint)).rejects.toThrow(AdminRequestFailedError);
      expect(server.requests[0].path).toBe('/members');
    });

    test('should fail with AdminRequestFailedError on a non-2xx status', async () => {
      server.membersStatus = 500;

      const error = await client.listMembers(endpoint).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AdminRequestFailedError);
      expect(error).toMatchObject({ method: 'GET', statusCode: 500, code: 'ADMIN_REQUEST_FAILED' });
    });

    test('should fail with AdminRequestFailedError on a malformed body', async () => {
      server.membersBody = '{"members": "nope"}';

      await expect(client.listMembers(endpoint)).rejects.toThrow(
        `Malformed member list from ${endpoint.clientURL}/v2/members: expected an object with a members array`
      );
    });

    test('should fail with AdminRequestFailedError on timeout', async () => {
      server.hang = true;
      const impatient = new EtcdAdminClient({ timeout: 100 });

      await expect(impatient.listMembers(endpoint)).rejects.toThrow('Request timeout after 100ms');
    });
  });

  describe('addMember', () => {
    test('should post the name and peer URL as JSON', async () => {
      await client.addMember(endpoint, { name: 'node-b', clientURL: 'http://10.0.0.2:2379', peerURL: 'http://10.0.0.2:2380' });

      expect(server.requestsTo('POST', '/v2/members')).toEqual([
        { method: 'POST', path: '/v2/members', body: '{"name":"node-b","peerURLs":["http://10.0.0.2:2380"]}' }
      ]);
      expect(server.members).toHaveLength(1);
    });

    test('should fail when the cluster rejects the registration', async () => {
      server.addStatus = 409;

      await expect(
        client.addMember(endpoint, { name: 'node-b', clientURL: '', peerURL: 'http://10.0.0.2:2380' })
      ).rejects.toMatchObject({ method: 'POST', statusCode: 409 });
    });
  });

  describe('removeMember', () => {
    test('should delete by cluster id', async () => {
      server.members = [{ id: 'c3', name: 'node-c', clientURLs: [], peerURLs: [] }];

      await client.removeMember(endpoint, { id: 'c3', name: 'node-c', clientURL: '', peerURL: '' });

      expect(server.requestsTo('DELETE', '/v2/members')).toEqual([
        { method: 'DELETE', path: '/v2/members/c3', body: '' }
      ]);
      expect(server.members).toEqual([]);
    });

    test('should fail on a non-2xx status', async () => {
      await expect(
        client.removeMember(endpoint, { id: 'missing', name: 'ghost', clientURL: '', peerURL: '' })
      ).rejects.toMatchObject({ method: 'DELETE', statusCode: 404 });
    });

    test('should refuse to remove a member without an id', async () => {
      await expect(
        client.removeMember(endpoint, { name: 'node-c', clientURL: '', peerURL: '' })
      ).rejects.toThrow('Cannot remove member node-c: no cluster id');
      expect(server.requests).toEqual([]);
    });
  });

  describe('fromFiles', () => {
    test('should fail with ConfigurationError when a TLS file is missing', async () => {
      await expect(
        EtcdAdminClient.fromFiles({ caFile: '/nonexistent/ca.pem' })
      ).rejects.toThrow(ConfigurationError);
    });

    test('should build a plaintext client when no TLS files are given', async () => {
      const plain = await EtcdAdminClient.fromFiles({}, { timeout: 1000 });

      await expect(plain.checkHealth(endpoint)).resolves.toBe(true);
    });
  });
});

/**
 * Fixtures under test/fixtures/tls are a throwaway CA plus server (IP 127.0.0.1)
 * and client certificates signed by it.
 */
describe('EtcdAdminClient over mutual TLS', () => {
  const tlsDir = path.join(__dirname, '../../fixtures/tls');
  const files = {
    caFile: path.join(tlsDir, 'ca.pem'),
    certFile: path.join(tlsDir, 'client.pem'),
    keyFile: path.join(tlsDir, 'client-key.pem')
  };
  let server: https.Server;
  let endpoint: Member;
  let authorizedClients: boolean[];

  beforeEach(async () => {
    authorizedClients = [];
    server = https.createServer({
      key: await fs.readFile(path.join(tlsDir, 'server-key.pem')),
      cert: await fs.readFile(path.join(tlsDir, 'server.pem')),
      ca: await fs.readFile(files.caFile),
      requestCert: true,
      rejectUnauthorized: true
    }, (req, res) => {
      authorizedClients.push(req.socket instanceof TLSSocket && req.socket.authorized);
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{"health":"true"}');
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('TLS server has no port');
    }
    endpoint = { name: 'node-a', clientURL: `https://127.0.0.1:${address.port}`, peerURL: '' };
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  test('should verify the server against the CA and present the client certificate', async () => {
    const client = await EtcdAdminClient.fromFiles(files, { timeout: 2000 });

    await expect(client.checkHealth(endpoint)).resolves.toBe(true);
    expect(authorizedClients).toEqual([true]);
  });

  test('should report the member unhealthy when the server certificate is not trusted', async () => {
    const client = await EtcdAdminClient.fromFiles({ certFile: files.certFile, keyFile: files.keyFile }, { timeout: 2000 });

    await expect(client.checkHealth(endpoint)).resolves.toBe(false);
    expect(authorizedClients).toEqual([]);
  });

  test('should report the member unhealthy when no client certificate is presented', async () => {
    const client = await EtcdAdminClient.fromFiles({ caFile: files.caFile }, { timeout: 2000 });

    await expect(client.checkHealth(endpoint)).resolves.toBe(false);
    expect(authorizedClients).toEqual([]);
  });
});

describe('isHealthyPayload', () => {
  test('should accept the string and boolean forms of true', () => {
    expect(isHealthyPayload('{"health":"true"}')).toBe(true);
    expect(isHealthyPayload('{"health":true}')).toBe(true);
  });

  test('should reject anything else', () => {
    expect(isHealthyPayload('{"health":"false"}')).toBe(false);
    expect(isHealthyPayload('{}')).toBe(false);
    expect(isHealthyPayload('["true"]')).toBe(false);
    expect(isHealthyPayload('')).toBe(false);
  });
});

describe('decodeMemberList', () => {
  test('should reject members without a string id', () => {
    expect(() => decodeMemberList({ members: [{ name: 'x' }] })).toThrow('members[0] has no string id');
  });

  test('should default missing names and URL lists', () => {
    expect(decodeMemberList({ members: [{ id: 'z' }] })).toEqual([
      { id: 'z', name: '', clientURL: '', peerURL: '' }
    ]);
  });
});

/**
 * URL of a port that was just released, so connections are refused
 */
async function closedUrl(): Promise<string> {
  const probe = http.createServer();
  await new Promise<void>(resolve => probe.listen(0, '127.0.0.1', () => resolve()));
  const address = probe.address();
  await new Promise<void>(resolve => probe.close(() => resolve()));
  if (!address || typeof address === 'string') {
    throw new Error('probe server had no port');
  }
  return `http://127.0.0.1:${address.port}`;
}
