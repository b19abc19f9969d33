/**
 * @file gateway.ts
 * @description Passerelle vers l'interface WireGuard (commande `wg`)
 *
 * Chaque opération lance un processus externe avec un délai borné.
 * Un échec (code non nul, délai dépassé) devient une PeerError
 * InterfaceError portant la sortie brute; jamais ignoré silencieusement.
 */

import { CommandError, type CommandRunner, DEFAULT_COMMAND_TIMEOUT_MS, runCommand } from '../utils/command.js';
import { logger, type ScopedLogger } from '../utils/logger.js';
import { PeerError } from './errors.js';
import type { KeyPair, PeerRuntimeState } from './types.js';

// ============================================
// Types
// ============================================

/**
 * Surface de contrôle de l'interface VPN.
 * Implémentée par WgGateway en production et par des doubles en test.
 */
export interface InterfaceGateway {
  readonly interfaceName: string;
  /** Lignes de dump ignorées depuis le démarrage */
  readonly skippedLines: number;
  isAvailable(): Promise<boolean>;
  listPeers(): Promise<PeerRuntimeState[]>;
  addPeer(publicKey: string, allowedIps: readonly string[], keepalive?: number): Promise<void>;
  removePeer(publicKey: string): Promise<void>;
  serverPublicKey(): Promise<string>;
  generateKeyPair(): Promise<KeyPair>;
  /** Adresse CIDR de l'interface, ex: 10.13.13.1/24 */
  interfaceAddress(): Promise<string>;
}

export interface DumpResult {
  interface?: {
    publicKey: string;
    listenPort: number;
  };
  peers: PeerRuntimeState[];
  /** Lignes non reconnues */
  skipped: number;
}

export interface WgGatewayOptions {
  interfaceName: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  log?: ScopedLogger;
}

// ============================================
// Parsing
// ============================================

const WG_KEY_PATTERN = /^[A-Za-z0-9+/]{42}[AEIMQUYcgkosw048]=$/;

export function isWireGuardKey(value: string): boolean {
  return WG_KEY_PATTERN.test(value);
}

function parseCounter(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  return Number(value);
}

/**
 * Parse une ligne peer du dump:
 * public-key, preshared-key, endpoint, allowed-ips, latest-handshake,
 * transfer-rx, transfer-tx, persistent-keepalive
 */
function parsePeerLine(fields: string[]): PeerRuntimeState | null {
  if (fields.length !== 8) return null;

  const [publicKey, , endpoint, allowedIps, handshake, rx, tx, keepalive] = fields;
  if (!isWireGuardKey(publicKey)) return null;

  const latestHandshake = parseCounter(handshake);
  const transferRx = parseCounter(rx);
  const transferTx = parseCounter(tx);
  if (latestHandshake === null || transferRx === null || transferTx === null) return null;

  let persistentKeepalive: number | undefined;
  if (keepalive !== 'off') {
    const parsed = parseCounter(keepalive);
    if (parsed === null) return null;
    persistentKeepalive = parsed;
  }

  return {
    publicKey,
    endpoint: endpoint !== '(none)' ? endpoint : undefined,
    allowedIps: allowedIps === '(none)' ? [] : allowedIps.split(','),
    latestHandshake: latestHandshake > 0 ? latestHandshake : undefined,
    transferRx,
    transferTx,
    persistentKeepalive,
  };
}

/**
 * Parse la sortie de `wg show <iface> dump`.
 * Première ligne = interface (private-key, public-key, listen-port, fwmark),
 * lignes suivantes = peers.
 */
export function parseDump(output: string): DumpResult {
  const lines = output.split('\n').filter((line) => line.trim() !== '');
  const result: DumpResult = { peers: [], skipped: 0 };

  lines.forEach((line, index) => {
    const fields = line.trim().split(/\s+/);

    // Ligne d'interface, même sans clé configurée ((none))
    if (index === 0 && fields.length === 4) {
      const listenPort = parseCounter(fields[2]);
      if (isWireGuardKey(fields[1]) && listenPort !== null) {
        result.interface = { publicKey: fields[1], listenPort };
      }
      return;
    }

    const peer = parsePeerLine(fields);
    if (peer) {
      result.peers.push(peer);
    } else {
      result.skipped++;
    }
  });

  return result;
}

// ============================================
// Gateway
// ============================================

const UNAVAILABLE_PATTERNS = [/No such device/i, /Unable to access interface/i, /does not exist/i];

/**
 * Implémentation via les binaires `wg` et `ip`
 */
export class WgGateway implements InterfaceGateway {
  readonly interfaceName: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly log: ScopedLogger;
  private skipped = 0;

  constructor(options: WgGatewayOptions) {
    this.interfaceName = options.interfaceName;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
    this.log = options.log ?? logger.child('gateway');
  }

  get skippedLines(): number {
    return this.skipped;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.wg(['show', this.interfaceName, 'dump']);
      return true;
    } catch (error) {
      if (error instanceof PeerError) {
        this.log.debug(`Interface ${this.interfaceName} indisponible: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async listPeers(): Promise<PeerRuntimeState[]> {
    const stdout = await this.wg(['show', this.interfaceName, 'dump']);
    const dump = parseDump(stdout);

    if (dump.skipped > 0) {
      this.skipped += dump.skipped;
      this.log.warn(`${dump.skipped} ligne(s) de dump ignorée(s) sur ${this.interfaceName}`);
    }

    return dump.peers;
  }

  async addPeer(publicKey: string, allowedIps: readonly string[], keepalive?: number): Promise<void> {
    const args = ['set', this.interfaceName, 'peer', publicKey, 'allowed-ips', allowedIps.join(',')];
    if (keepalive !== undefined) {
      args.push('persistent-keepalive', String(keepalive));
    }
    await this.wg(args);
    this.log.debug(`Peer ${publicKey} ajouté (${allowedIps.join(',')})`);
  }

  async removePeer(publicKey: string): Promise<void> {
    await this.wg(['set', this.interfaceName, 'peer', publicKey, 'remove']);
    this.log.debug(`Peer ${publicKey} retiré`);
  }

  async serverPublicKey(): Promise<string> {
    const key = (await this.wg(['show', this.interfaceName, 'public-key'])).trim();
    if (!isWireGuardKey(key)) {
      throw new PeerError('InterfaceError', `Clé publique serveur illisible sur ${this.interfaceName}`, {
        diagnostic: key,
      });
    }
    return key;
  }

  async generateKeyPair(): Promise<KeyPair> {
    const privateKey = (await this.wg(['genkey'])).trim();
    const publicKey = (await this.wg(['pubkey'], `${privateKey}\n`)).trim();
    return { privateKey, publicKey };
  }

  async interfaceAddress(): Promise<string> {
    const output = await this.exec('ip', ['-o', '-f', 'inet', 'addr', 'show', this.interfaceName]);
    const match = /\binet\s+(\d{1,3}(?:\.\d{1,3}){3}\/\d{1,2})/.exec(output);
    if (!match) {
      throw new PeerError('InterfaceError', `Aucune adresse IPv4 sur ${this.interfaceName}`, {
        diagnostic: output.trim(),
      });
    }
    return match[1];
  }

  // ============================================
  // Exécution
  // ============================================

  private wg(args: string[], input?: string): Promise<string> {
    return this.exec('wg', args, input);
  }

  private async exec(file: string, args: string[], input?: string): Promise<string> {
    try {
      const { stdout } = await this.runner(file, args, { timeoutMs: this.timeoutMs, input });
      return stdout;
    } catch (error) {
      throw this.toPeerError(error);
    }
  }

  private toPeerError(error: unknown): PeerError {
    if (!(error instanceof CommandError)) {
      return new PeerError('InterfaceError', `Erreur inattendue: ${String(error)}`, { cause: error });
    }

    const diagnostic = error.diagnostic;
    if (error.reason === 'not-found' || UNAVAILABLE_PATTERNS.some((p) => p.test(diagnostic))) {
      return new PeerError('InterfaceUnavailable', `Interface ${this.interfaceName} indisponible: ${diagnostic}`, {
        diagnostic,
        cause: error,
      });
    }

    this.log.error(`${error.command}: ${diagnostic}`);
    return new PeerError('InterfaceError', `Commande wg échouée: ${diagnostic}`, { diagnostic, cause: error });
  }
}
