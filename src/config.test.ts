import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { getExampleConfig, loadConfig, parseConfig, validateConfig } from './config.js';

describe('parseConfig', () => {
  it('returns defaults for empty content', () => {
    expect(parseConfig('')).toEqual({
      api: { host: '0.0.0.0', port: 8008, token: undefined },
      wireguard: {
        interface: 'wg0',
        subnet: undefined,
        interfaceAddress: undefined,
        endpoint: '',
        serverPublicKey: undefined,
        commandTimeoutMs: 5000,
        clientAllowedIps: ['0.0.0.0/0', '::/0'],
        dns: [],
        clientKeepalive: 25,
        peerKeepalive: undefined,
      },
      storage: { path: '/config/peers.json', persistPrivateKeys: false },
      restoreOnStart: true,
      logging: { level: 'info' },
    });
  });

  it('maps snake_case keys', () => {
    const config = parseConfig(`
api:
  port: 9000
  token: test-secret
wireguard:
  interface: wg1
  subnet: 10.8.0.1/24
  endpoint: vpn.example.test:51820
  command_timeout_ms: 2000
  client_allowed_ips: [10.8.0.0/24]
  dns: [10.8.0.1]
  peer_keepalive: 15
storage:
  path: /tmp/wgpeerd/peers.json
  persist_private_keys: true
restore_on_start: false
logging:
  level: debug
`);

    expect(config.api).toEqual({ host: '0.0.0.0', port: 9000, token: 'test-secret' });
    expect(config.wireguard).toMatchObject({
      interface: 'wg1',
      subnet: '10.8.0.1/24',
      endpoint: 'vpn.example.test:51820',
      commandTimeoutMs: 2000,
      clientAllowedIps: ['10.8.0.0/24'],
      dns: ['10.8.0.1'],
      clientKeepalive: 25,
      peerKeepalive: 15,
    });
    expect(config.storage).toEqual({ path: '/tmp/wgpeerd/peers.json', persistPrivateKeys: true });
    expect(config.restoreOnStart).toBe(false);
    expect(config.logging.level).toBe('debug');
  });

  it('applies environment overrides over the file', () => {
    const config = parseConfig('api:\n  port: 9000\n', {
      API_TOKEN: 'test-secret',
      API_PORT: '8100',
      WG_INTERFACE: 'wg7',
      WG_SUBNET: '10.9.0.1/24',
      SERVER_ENDPOINT: 'vpn.example.test:51820',
      SERVER_PUBLIC_KEY: 'server-key',
      PEERS_FILE: '/data/peers.json',
      LOG_LEVEL: 'warn',
    });

    expect(config.api.port).toBe(8100);
    expect(config.api.token).toBe('test-secret');
    expect(config.wireguard.interface).toBe('wg7');
    expect(config.wireguard.subnet).toBe('10.9.0.1/24');
    expect(config.wireguard.endpoint).toBe('vpn.example.test:51820');
    expect(config.wireguard.serverPublicKey).toBe('server-key');
    expect(config.storage.path).toBe('/data/peers.json');
    expect(config.logging.level).toBe('warn');
  });

  it('rejects invalid environment values', () => {
    expect(() => parseConfig('', { API_PORT: 'http' })).toThrow('Configuration invalide: API_PORT=http');
    expect(() => parseConfig('', { LOG_LEVEL: 'verbose' })).toThrow('Configuration invalide: LOG_LEVEL=verbose');
  });

  it('rejects unknown keys and wrong types', () => {
    expect(() => parseConfig('clustre: {}\n')).toThrow(/Configuration invalide/);
    expect(() => parseConfig('api:\n  port: abc\n')).toThrow(/api\.port/);
    expect(() => parseConfig('wireguard: [\n')).toThrow(/Configuration invalide/);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wgpeerd-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fails on a missing explicit path', () => {
    const path = join(dir, 'absent.yml');
    expect(() => loadConfig(path, {})).toThrow(`Fichier de configuration non trouvé: ${path}`);
  });

  it('reads the token from token_file', async () => {
    const tokenPath = join(dir, 'api.token');
    const configPath = join(dir, 'config.yml');
    await writeFile(tokenPath, 'test-secret\n');
    await writeFile(configPath, `api:\n  token_file: ${tokenPath}\n`);

    expect(loadConfig(configPath, {}).api.token).toBe('test-secret');
  });
});

describe('validateConfig', () => {
  it('requires a token and an endpoint', () => {
    expect(validateConfig(parseConfig(''))).toEqual([
      'api.token (ou API_TOKEN) est requis',
      'wireguard.endpoint (ou SERVER_ENDPOINT) est requis',
    ]);
    expect(validateConfig(parseConfig(''), { requireToken: false })).toHaveLength(1);
  });

  it('checks the endpoint and subnet format', () => {
    const config = parseConfig('', {
      API_TOKEN: 'test-secret',
      SERVER_ENDPOINT: 'vpn.example.test',
      WG_SUBNET: '10.9.0.1',
    });
    const errors = validateConfig(config);

    expect(errors[0]).toBe('wireguard.endpoint invalide (attendu: host:port): vpn.example.test');
    expect(errors[1]).toMatch(/^wireguard\.subnet: /);
    expect(errors).toHaveLength(2);
  });

  it('accepts the example configuration with a token', () => {
    const example = getExampleConfig().replace('token_file: /etc/wgpeerd/api.token', 'token: test-secret');
    const config = parseConfig(example);

    expect(validateConfig(config)).toEqual([]);
    expect(config.wireguard.subnet).toBe('10.13.13.1/24');
    expect(config.wireguard.dns).toEqual(['10.13.13.1']);
  });
});
