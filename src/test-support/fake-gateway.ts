/**
 * @file test-support/fake-gateway.ts
 * @description Interface WireGuard en mémoire pour les tests
 */

import { PeerError } from '../peers/errors.js';
import type { InterfaceGateway } from '../peers/gateway.js';
import type { KeyPair, PeerRuntimeState } from '../peers/types.js';

type GatewayOperation = 'listPeers' | 'addPeer' | 'removePeer' | 'serverPublicKey' | 'generateKeyPair';

/**
 * Clé WireGuard déterministe (32 octets identiques, base64)
 */
export function testKey(byte: number): string {
  return Buffer.alloc(32, byte).toString('base64');
}

export class FakeGateway implements InterfaceGateway {
  readonly interfaceName = 'wg-test';
  skippedLines = 0;
  /** Peers présents sur l'interface */
  readonly peers = new Map<string, PeerRuntimeState>();
  /** Journal des appels mutants, ex: "add K 10.13.13.2/32" */
  readonly calls: string[] = [];
  serverKey = testKey(200);
  address = '10.13.13.1/24';

  private readonly failures = new Map<GatewayOperation, PeerError>();
  private nextKeyByte = 100;
  private unavailable = false;

  /** Simule une interface absente (toutes les opérations échouent) */
  setUnavailable(unavailable = true): void {
    this.unavailable = unavailable;
  }

  /** Fait échouer toutes les invocations suivantes d'une opération */
  failOn(operation: GatewayOperation, error: PeerError = new PeerError('InterfaceError', `${operation} échoué`)): void {
    this.failures.set(operation, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  async isAvailable(): Promise<boolean> {
    return !this.unavailable;
  }

  async listPeers(): Promise<PeerRuntimeState[]> {
    this.check('listPeers');
    return [...this.peers.values()].map((p) => ({ ...p, allowedIps: [...p.allowedIps] }));
  }

  async addPeer(publicKey: string, allowedIps: readonly string[], keepalive?: number): Promise<void> {
    this.check('addPeer');
    this.calls.push(`add ${publicKey} ${allowedIps.join(',')}`);
    this.peers.set(publicKey, {
      publicKey,
      allowedIps: [...allowedIps],
      transferRx: 0,
      transferTx: 0,
      persistentKeepalive: keepalive,
    });
  }

  async removePeer(publicKey: string): Promise<void> {
    this.check('removePeer');
    this.calls.push(`remove ${publicKey}`);
    this.peers.delete(publicKey);
  }

  async serverPublicKey(): Promise<string> {
    this.check('serverPublicKey');
    return this.serverKey;
  }

  async generateKeyPair(): Promise<KeyPair> {
    this.check('generateKeyPair');
    const byte = this.nextKeyByte++;
    return { privateKey: testKey(byte + 50), publicKey: testKey(byte) };
  }

  async interfaceAddress(): Promise<string> {
    if (this.unavailable) {
      throw new PeerError('InterfaceUnavailable', `Interface ${this.interfaceName} indisponible`);
    }
    return this.address;
  }

  private check(operation: GatewayOperation): void {
    if (this.unavailable) {
      throw new PeerError('InterfaceUnavailable', `Interface ${this.interfaceName} indisponible`);
    }
    const failure = this.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }
}
