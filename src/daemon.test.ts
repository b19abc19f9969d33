import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfig } from './config.js';
import { PeerDaemon } from './daemon.js';
import { FakeGateway, testKey } from './test-support/fake-gateway.js';
import { logger } from './utils/logger.js';

describe('PeerDaemon', () => {
  let dir: string;
  let gateway: FakeGateway;
  let daemon: PeerDaemon | null;

  function configYaml(extra = ''): string {
    return `
api:
  host: 127.0.0.1
  port: 0
  token: test-secret
wireguard:
  interface: wg-test
  endpoint: vpn.example.test:51820
storage:
  path: ${join(dir, 'peers.json')}
logging:
  level: error
${extra}`;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wgpeerd-daemon-'));
    gateway = new FakeGateway();
    daemon = null;
  });

  afterEach(async () => {
    await daemon?.stop();
    logger.setLevel('info');
    await rm(dir, { recursive: true, force: true });
  });

  it('restores the registry and serves the API', async () => {
    await writeFile(
      join(dir, 'peers.json'),
      JSON.stringify([{ public_key: testKey(7), allowed_ips: ['10.13.13.5/32'] }])
    );
    daemon = new PeerDaemon({ config: parseConfig(configYaml()), gateway });

    let announced = '';
    daemon.on('started', (address: string) => {
      announced = address;
    });
    await daemon.start();

    expect(gateway.calls).toEqual([`add ${testKey(7)} 10.13.13.5/32`]);
    const status = daemon.getStatus();
    expect(status).toMatchObject({
      running: true,
      interface: 'wg-test',
      subnet: '10.13.13.0/24',
      peers: 1,
    });
    expect(announced).toBe(status.listening);

    const res = await fetch(`http://${status.listening}/peers`, {
      method: 'POST',
      headers: { 'X-API-Token': 'test-secret' },
    });
    expect(res.status).toBe(201);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ allowed_ips: ['10.13.13.2/32'] });

    await daemon.stop();
    expect(daemon.getStatus()).toMatchObject({ running: false, listening: null });
  });

  it('skips the restore when disabled', async () => {
    await writeFile(
      join(dir, 'peers.json'),
      JSON.stringify([{ public_key: testKey(7), allowed_ips: ['10.13.13.5/32'] }])
    );
    daemon = new PeerDaemon({ config: parseConfig(configYaml('restore_on_start: false')), gateway });

    await daemon.start();

    expect(gateway.calls).toEqual([]);
  });

  it('uses the configured subnet', async () => {
    daemon = new PeerDaemon({
      config: parseConfig(configYaml().replace('  endpoint:', '  subnet: 10.20.0.1/28\n  endpoint:')),
      gateway,
    });

    await daemon.start();

    expect(daemon.getStatus().subnet).toBe('10.20.0.0/28');
  });

  it('refuses to start without a token', async () => {
    daemon = new PeerDaemon({ config: parseConfig(configYaml().replace('  token: test-secret\n', '')), gateway });

    await expect(daemon.start()).rejects.toThrow('api.token (ou API_TOKEN) est requis');
    expect(daemon.getStatus().running).toBe(false);
  });

  it('refuses to start on a corrupt registry', async () => {
    await writeFile(join(dir, 'peers.json'), '{ pas du json');
    daemon = new PeerDaemon({ config: parseConfig(configYaml()), gateway });

    await expect(daemon.start()).rejects.toMatchObject({ code: 'CorruptState' });
    expect(daemon.getStatus().listening).toBeNull();
  });
});
