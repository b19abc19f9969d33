import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ApiServer, MAX_BODY_BYTES, parseCreateBody } from './api.js';
import { PeerMetrics } from './metrics.js';
import { parseSubnet } from './peers/cidr.js';
import { isPeerError } from './peers/errors.js';
import { PeerRegistry } from './peers/registry.js';
import { PeerService } from './peers/service.js';
import { FakeGateway, testKey } from './test-support/fake-gateway.js';
import { silentLog } from './test-support/silent-log.js';

const TOKEN = 'test-secret';

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null) {
    throw new Error('objet JSON attendu');
  }
  return Object.fromEntries(Object.entries(body));
}

describe('parseCreateBody', () => {
  function codeOf(text: string): string | undefined {
    try {
      parseCreateBody(text);
    } catch (error) {
      return isPeerError(error) ? error.code : 'not-a-peer-error';
    }
    return undefined;
  }

  it('maps snake_case fields and treats null as absent', () => {
    expect(parseCreateBody('')).toEqual({});
    expect(
      parseCreateBody(JSON.stringify({ public_key: 'k', allowed_ips: ['10.13.13.5/32'], persistent_keepalive: null }))
    ).toEqual({ publicKey: 'k', allowedIps: ['10.13.13.5/32'], persistentKeepalive: undefined });
  });

  it('rejects malformed bodies', () => {
    expect(codeOf('{')).toBe('InvalidRequest');
    expect(codeOf('[]')).toBe('InvalidRequest');
    expect(codeOf('{"allowed_ips": []}')).toBe('InvalidRequest');
    expect(codeOf('{"persistent_keepalive": 1.5}')).toBe('InvalidRequest');
    expect(codeOf('{"name": "laptop"}')).toBe('InvalidRequest');
  });
});

describe('ApiServer', () => {
  let dir: string;
  let gateway: FakeGateway;
  let service: PeerService;
  let metrics: PeerMetrics;
  let api: ApiServer;
  let baseUrl: string;

  function call(path: string, init: RequestInit = {}, token: string | null = TOKEN): Promise<Response> {
    const headers = new Headers(init.headers);
    if (token !== null) {
      headers.set('X-API-Token', token);
    }
    return fetch(`${baseUrl}${path}`, { ...init, headers });
  }

  function post(path: string, body: unknown): Promise<Response> {
    return call(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function peerPath(publicKey: string, suffix = ''): string {
    return `/peers/${encodeURIComponent(publicKey)}${suffix}`;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wgpeerd-api-'));
    gateway = new FakeGateway();
    service = new PeerService({
      registry: new PeerRegistry({ path: join(dir, 'peers.json'), log: silentLog }),
      gateway,
      subnet: parseSubnet('10.13.13.0/24'),
      server: { endpoint: 'vpn.example.test:51820', clientAllowedIps: ['0.0.0.0/0'] },
      log: silentLog,
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    });
    metrics = new PeerMetrics();
    api = new ApiServer({ service, gateway, metrics, token: TOKEN, version: '9.9.9', log: silentLog });

    const address = await api.start(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await api.stop();
    await rm(dir, { recursive: true, force: true });
  });

  describe('authentication', () => {
    it('rejects requests without a valid token', async () => {
      const missing = await call('/peers', {}, null);
      const wrong = await call('/peers', {}, 'test-secret-2');

      expect(missing.status).toBe(401);
      expect(await readJson(missing)).toEqual({ error: 'Unauthorized', detail: 'Token API invalide ou absent' });
      expect(wrong.status).toBe(401);
      await wrong.body?.cancel();
    });

    it('serves health and metrics without a token', async () => {
      const health = await call('/health', {}, null);
      expect(health.status).toBe(200);
      expect(await readJson(health)).toMatchObject({
        status: 'healthy',
        version: '9.9.9',
        wireguard_interface: 'wg-test',
        wireguard_available: true,
        peer_count: 0,
        live_peer_count: 0,
      });

      const scrape = await call('/metrics', {}, null);
      expect(scrape.status).toBe(200);
      expect(scrape.headers.get('content-type')).toContain('text/plain');
      expect(await scrape.text()).toContain('wgpeerd_peers_total 0\n');
    });
  });

  describe('POST /peers', () => {
    it('creates a peer with generated keys', async () => {
      const res = await post('/peers', {});

      expect(res.status).toBe(201);
      expect(await readJson(res)).toEqual({
        public_key: testKey(100),
        private_key: testKey(150),
        allowed_ips: ['10.13.13.2/32'],
        persistent_keepalive: null,
        key_origin: 'server',
        created_at: '2026-03-01T12:00:00.000Z',
      });
    });

    it('accepts an empty body', async () => {
      const res = await call('/peers', { method: 'POST' });
      expect(res.status).toBe(201);
      expect((await readJson(res)).allowed_ips).toEqual(['10.13.13.2/32']);
    });

    it('never returns a private key for a client key', async () => {
      const res = await post('/peers', { public_key: testKey(7), allowed_ips: ['10.13.13.40/32'], persistent_keepalive: 25 });
      const body = await readJson(res);

      expect(res.status).toBe(201);
      expect(body).not.toHaveProperty('private_key');
      expect(body).toMatchObject({ key_origin: 'client', allowed_ips: ['10.13.13.40/32'], persistent_keepalive: 25 });
    });

    it('returns the client configuration with format=config', async () => {
      const res = await post('/peers?format=config', {});

      expect(res.status).toBe(201);
      expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(await res.text()).toBe(
        [
          '[Interface]',
          `PrivateKey = ${testKey(150)}`,
          'Address = 10.13.13.2/32',
          '',
          '[Peer]',
          `PublicKey = ${testKey(200)}`,
          'Endpoint = vpn.example.test:51820',
          'AllowedIPs = 0.0.0.0/0',
          '',
        ].join('\n')
      );
    });

    it('maps domain errors to status codes', async () => {
      await post('/peers', { public_key: testKey(7) });

      const duplicate = await post('/peers', { public_key: testKey(7) });
      expect(duplicate.status).toBe(409);
      expect((await readJson(duplicate)).error).toBe('DuplicateKey');

      const conflict = await post('/peers', { public_key: testKey(8), allowed_ips: ['10.13.13.2/32'] });
      expect(conflict.status).toBe(409);
      expect((await readJson(conflict)).error).toBe('AddressConflict');

      const invalid = await call('/peers', { method: 'POST', body: '{"allowed_ips": "10.13.13.9"}' });
      expect(invalid.status).toBe(400);
      expect((await readJson(invalid)).error).toBe('InvalidRequest');

      const badFormat = await post('/peers?format=yaml', {});
      expect(badFormat.status).toBe(400);
      await badFormat.body?.cancel();
    });

    it('answers 502 when the interface fails', async () => {
      gateway.setUnavailable();
      const res = await post('/peers', { allowed_ips: ['10.13.13.5/32'] });

      expect(res.status).toBe(502);
      expect((await readJson(res)).error).toBe('InterfaceError');
      expect(service.count()).toBe(0);
    });

    it('rejects oversized bodies', async () => {
      const res = await call('/peers', { method: 'POST', body: 'x'.repeat(MAX_BODY_BYTES + 1) });

      expect(res.status).toBe(413);
      expect((await readJson(res)).error).toBe('PayloadTooLarge');
      expect(service.count()).toBe(0);
    });
  });

  describe('peer routes', () => {
    it('lists peers with live statistics', async () => {
      await post('/peers', { public_key: testKey(7) });

      const res = await call('/peers');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([
        {
          public_key: testKey(7),
          allowed_ips: ['10.13.13.2/32'],
          persistent_keepalive: null,
          key_origin: 'client',
          created_at: '2026-03-01T12:00:00.000Z',
          live: true,
          endpoint: null,
          latest_handshake: null,
          transfer_rx: 0,
          transfer_tx: 0,
        },
      ]);
    });

    it('decodes public keys in paths', async () => {
      const key = testKey(255);
      expect(key.startsWith('////')).toBe(true);
      await post('/peers', { public_key: key });

      const res = await call(peerPath(key));
      expect(res.status).toBe(200);
      expect((await readJson(res)).public_key).toBe(key);
    });

    it('renders configurations', async () => {
      await post('/peers', { public_key: testKey(7) });

      const server = await call(peerPath(testKey(7), '/config?format=server'));
      expect(server.status).toBe(200);
      expect(await server.text()).toBe(`[Peer]\nPublicKey = ${testKey(7)}\nAllowedIPs = 10.13.13.2/32\n`);

      const client = await call(peerPath(testKey(7), '/config'));
      expect((await client.text()).split('\n')[1]).toBe(`# PrivateKey = <clé privée correspondant à ${testKey(7)}>`);

      await post('/peers', {});
      const generatedPlain = await call(peerPath(testKey(100), '/config'));
      expect((await generatedPlain.text()).split('\n')[1]).toBe(
        `# PrivateKey = <clé privée correspondant à ${testKey(100)}>`
      );
      const generatedWithKey = await call(peerPath(testKey(100), '/config?include_private_key=true'));
      expect((await generatedWithKey.text()).split('\n')[1]).toBe(`PrivateKey = ${testKey(150)}`);

      const missing = await call(peerPath(testKey(7), '/config?include_private_key=true'));
      expect(missing.status).toBe(409);
      expect((await readJson(missing)).error).toBe('MissingCredential');

      const invalid = await call(peerPath(testKey(7), '/config?include_private_key=maybe'));
      expect(invalid.status).toBe(400);
      await invalid.body?.cancel();
    });

    it('answers 503 when the server key cannot be read', async () => {
      await post('/peers', { public_key: testKey(7) });
      gateway.setUnavailable();

      const res = await call(peerPath(testKey(7), '/config'));
      expect(res.status).toBe(503);
      expect((await readJson(res)).error).toBe('InterfaceUnavailable');
    });

    it('deletes peers', async () => {
      await post('/peers', { public_key: testKey(7) });

      const first = await call(peerPath(testKey(7)), { method: 'DELETE' });
      expect(first.status).toBe(204);
      expect(await first.text()).toBe('');

      const second = await call(peerPath(testKey(7)), { method: 'DELETE' });
      expect(second.status).toBe(404);
      expect((await readJson(second)).error).toBe('NotFound');

      const lookup = await call(peerPath(testKey(7)));
      expect(lookup.status).toBe(404);
      await lookup.body?.cancel();
    });

    it('rejects unknown routes and methods', async () => {
      const unknown = await call('/peerz');
      expect(unknown.status).toBe(404);
      await unknown.body?.cancel();

      const method = await call('/peers', { method: 'PUT' });
      expect(method.status).toBe(405);
      expect((await readJson(method)).error).toBe('MethodNotAllowed');
    });
  });

  it('records request metrics', async () => {
    await post('/peers', {});
    await call('/health', {}, null).then((res) => res.body?.cancel());

    const output = await (await call('/metrics', {}, null)).text();
    expect(output).toContain('wgpeerd_requests_total{method="POST",endpoint="/peers",status_code="201"} 1\n');
    expect(output).not.toContain('endpoint="/health"');
  });
});
