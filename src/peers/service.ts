/**
 * @file service.ts
 * @description Orchestration du cycle de vie des peers
 *
 * Seul endroit qui prend le verrou de mutation. Trois sources de vérité:
 * l'interface WireGuard, le fichier du registre, la vue mémoire.
 *
 * Création: interface -> fichier -> mémoire
 * Suppression: interface -> fichier -> mémoire
 * Un échec avant la persistance laisse les trois sources inchangées; un échec
 * de persistance déclenche une compensation sur l'interface.
 *
 * Les lectures ne prennent pas le verrou: un peer en cours de création peut
 * apparaître absent, un peer en cours de suppression encore présent.
 */

import { Mutex } from '../utils/mutex.js';
import { logger, type ScopedLogger } from '../utils/logger.js';
import { allocate } from './allocator.js';
import {
  type AddressRange,
  type Subnet,
  blockRange,
  formatSubnet,
  numberToIp,
  parseCidr,
  rangeContains,
  rangesOverlap,
  formatCidr,
  reservedAddresses,
} from './cidr.js';
import { PeerError, errorMessage, isPeerError } from './errors.js';
import { type InterfaceGateway, isWireGuardKey } from './gateway.js';
import { PeerRegistry } from './registry.js';
import { type RenderOptions, renderClientConfig, renderPeerBlock } from './renderer.js';
import type {
  ConfigFormat,
  CreatePeerRequest,
  CreatedPeer,
  KeyPair,
  PeerRecord,
  PeerRuntimeState,
  PeerView,
  RestoreResult,
  ServerParams,
} from './types.js';

// ============================================
// Types
// ============================================

export interface ServerSettings {
  endpoint: string;
  /** Si absent, lue sur l'interface au premier rendu */
  publicKey?: string;
  clientAllowedIps: string[];
  dns?: string[];
  persistentKeepalive?: number;
}

export interface PeerServiceOptions {
  registry: PeerRegistry;
  gateway: InterfaceGateway;
  subnet: Subnet;
  server: ServerSettings;
  /** Keepalive appliqué aux nouveaux peers sans valeur explicite */
  defaultKeepalive?: number;
  log?: ScopedLogger;
  now?: () => Date;
}

const MAX_KEEPALIVE = 65535;

// ============================================
// Service
// ============================================

export class PeerService {
  private readonly registry: PeerRegistry;
  private readonly gateway: InterfaceGateway;
  readonly subnet: Subnet;
  private readonly server: ServerSettings;
  private readonly defaultKeepalive?: number;
  private readonly log: ScopedLogger;
  private readonly now: () => Date;
  private readonly mutationLock = new Mutex();
  private cachedServerKey?: string;

  constructor(options: PeerServiceOptions) {
    this.registry = options.registry;
    this.gateway = options.gateway;
    this.subnet = options.subnet;
    this.server = options.server;
    this.defaultKeepalive = options.defaultKeepalive;
    this.log = options.log ?? logger.child('peers');
    this.now = options.now ?? (() => new Date());
    this.cachedServerKey = options.server.publicKey;
  }

  get interfaceName(): string {
    return this.gateway.interfaceName;
  }

  /** Nombre de peers du registre */
  count(): number {
    return this.registry.size;
  }

  // ============================================
  // Mutations
  // ============================================

  /**
   * Crée un peer. Retourne la clé privée uniquement si générée ici.
   */
  async create(request: CreatePeerRequest = {}): Promise<CreatedPeer> {
    return this.mutationLock.runExclusive(async () => {
      if (request.publicKey !== undefined) {
        if (!isWireGuardKey(request.publicKey)) {
          throw new PeerError('InvalidRequest', `Clé publique WireGuard invalide: ${request.publicKey}`);
        }
        if (this.registry.has(request.publicKey)) {
          throw new PeerError('DuplicateKey', `Le peer ${request.publicKey} existe déjà`);
        }
      }

      const keepalive = this.resolveKeepalive(request.persistentKeepalive);
      const allowedIps = request.allowedIps !== undefined
        ? this.validateAllowedIps(request.allowedIps)
        : [`${allocate(this.subnet, this.inUse())}/32`];

      const keys: Pick<KeyPair, 'publicKey'> & Partial<KeyPair> = request.publicKey === undefined
        ? await this.newKeyPair()
        : { publicKey: request.publicKey };

      const peer: PeerRecord = {
        publicKey: keys.publicKey,
        privateKey: keys.privateKey,
        keyOrigin: keys.privateKey !== undefined ? 'server' : 'client',
        allowedIps,
        persistentKeepalive: keepalive,
        createdAt: this.now().toISOString(),
      };

      await this.interfaceCall('ajout du peer', () =>
        this.gateway.addPeer(peer.publicKey, peer.allowedIps, peer.persistentKeepalive)
      );

      try {
        await this.registry.persist([...this.registry.snapshot(), peer]);
      } catch (error) {
        await this.compensate(`création de ${peer.publicKey}`, error, () =>
          this.gateway.removePeer(peer.publicKey)
        );
      }

      this.registry.upsert(peer);
      this.log.info(`Peer ${peer.publicKey} créé (${allowedIps.join(', ')})`);
      return peer;
    });
  }

  /**
   * Supprime un peer: interface d'abord, puis fichier, puis mémoire
   */
  async delete(publicKey: string): Promise<void> {
    return this.mutationLock.runExclusive(async () => {
      const peer = this.registry.get(publicKey);
      if (!peer) {
        throw new PeerError('NotFound', `Peer ${publicKey} introuvable`);
      }

      await this.interfaceCall('retrait du peer', () => this.gateway.removePeer(publicKey));

      try {
        await this.registry.persist(this.registry.snapshot().filter((p) => p.publicKey !== publicKey));
      } catch (error) {
        await this.compensate(`suppression de ${publicKey}`, error, () =>
          this.gateway.addPeer(peer.publicKey, peer.allowedIps, peer.persistentKeepalive)
        );
      }

      this.registry.remove(publicKey);
      this.log.info(`Peer ${publicKey} supprimé`);
    });
  }

  /**
   * Rejoue sur l'interface les peers du registre qu'elle ne connaît pas
   * (redémarrage du conteneur, interface recréée).
   */
  async restore(): Promise<RestoreResult> {
    return this.mutationLock.runExclusive(async () => {
      const live = await this.liveState();
      const result: RestoreResult = { restored: 0, failed: 0 };

      for (const peer of this.registry.snapshot()) {
        const state = live.get(peer.publicKey);
        if (state && sameBlocks(state.allowedIps, peer.allowedIps)) continue;

        try {
          await this.gateway.addPeer(peer.publicKey, peer.allowedIps, peer.persistentKeepalive);
          result.restored++;
        } catch (error) {
          result.failed++;
          this.log.error(`Restauration de ${peer.publicKey} impossible: ${errorMessage(error)}`);
        }
      }

      this.log.info(`${result.restored} peer(s) restauré(s), ${result.failed} échec(s)`);
      return result;
    });
  }

  /**
   * Attend la fin de la mutation en cours (arrêt du démon)
   */
  async drain(): Promise<void> {
    await this.mutationLock.runExclusive(async () => undefined);
  }

  // ============================================
  // Lectures
  // ============================================

  async list(): Promise<PeerView[]> {
    const records = this.registry.snapshot();
    const live = await this.liveState();
    return records.map((record) => toView(record, live.get(record.publicKey)));
  }

  async get(publicKey: string): Promise<PeerView> {
    const record = this.requireRecord(publicKey);
    const live = await this.liveState();
    return toView(record, live.get(publicKey));
  }

  async renderConfig(publicKey: string, format: ConfigFormat = 'client', options: RenderOptions = {}): Promise<string> {
    const record = this.requireRecord(publicKey);
    if (format === 'server') {
      return renderPeerBlock(record);
    }
    return renderClientConfig(record, await this.serverParams(), options);
  }

  /**
   * Paramètres serveur; la clé publique est lue sur l'interface si non configurée
   */
  async serverParams(): Promise<ServerParams> {
    if (!this.cachedServerKey) {
      this.cachedServerKey = await this.gateway.serverPublicKey();
    }
    return {
      publicKey: this.cachedServerKey,
      endpoint: this.server.endpoint,
      clientAllowedIps: this.server.clientAllowedIps,
      dns: this.server.dns,
      persistentKeepalive: this.server.persistentKeepalive,
    };
  }

  // ============================================
  // Helpers
  // ============================================

  private requireRecord(publicKey: string): PeerRecord {
    const record = this.registry.get(publicKey);
    if (!record) {
      throw new PeerError('NotFound', `Peer ${publicKey} introuvable`);
    }
    return record;
  }

  private async newKeyPair(): Promise<KeyPair> {
    const keys = await this.interfaceCall('génération de clés', () => this.gateway.generateKeyPair());
    if (this.registry.has(keys.publicKey)) {
      throw new PeerError('DuplicateKey', `Le peer ${keys.publicKey} existe déjà`);
    }
    return keys;
  }

  private inUse(): string[] {
    return this.registry.snapshot().flatMap((p) => p.allowedIps);
  }

  private resolveKeepalive(value: number | undefined): number | undefined {
    const keepalive = value ?? this.defaultKeepalive;
    if (keepalive !== undefined && (!Number.isInteger(keepalive) || keepalive < 0 || keepalive > MAX_KEEPALIVE)) {
      throw new PeerError('InvalidRequest', `persistent_keepalive invalide: ${keepalive}`);
    }
    return keepalive;
  }

  /**
   * Normalise et vérifie les blocs demandés: dans le sous-réseau, hors
   * adresses réservées, sans chevauchement entre eux ni avec les peers existants.
   */
  private validateAllowedIps(requested: readonly string[]): string[] {
    if (requested.length === 0) {
      throw new PeerError('InvalidRequest', 'allowed_ips ne peut pas être vide');
    }

    const subnetRange = blockRange(this.subnet);
    const blocks = requested.map((value) => parseCidr(value));
    const ranges: AddressRange[] = blocks.map(blockRange);

    blocks.forEach((block, i) => {
      const cidr = formatCidr(block);
      if (!rangeContains(subnetRange, ranges[i])) {
        throw new PeerError('InvalidRequest', `${cidr} est hors du sous-réseau ${formatSubnet(this.subnet)}`);
      }
      for (const reserved of reservedAddresses(this.subnet)) {
        if (rangeContains(ranges[i], { start: reserved, end: reserved })) {
          throw new PeerError('AddressConflict', `${cidr} contient l'adresse réservée ${numberToIp(reserved)}`);
        }
      }
      for (let j = 0; j < i; j++) {
        if (rangesOverlap(ranges[i], ranges[j])) {
          throw new PeerError('InvalidRequest', `${cidr} chevauche ${formatCidr(blocks[j])}`);
        }
      }
    });

    for (const peer of this.registry.snapshot()) {
      for (const assigned of peer.allowedIps) {
        const assignedRange = blockRange(parseCidr(assigned));
        const clash = blocks.find((_, i) => rangesOverlap(ranges[i], assignedRange));
        if (clash) {
          throw new PeerError(
            'AddressConflict',
            `${formatCidr(clash)} chevauche ${assigned} (peer ${peer.publicKey})`
          );
        }
      }
    }

    return blocks.map(formatCidr);
  }

  /**
   * Appel à l'interface pendant une mutation: tout échec devient InterfaceError
   */
  private async interfaceCall<T>(action: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isPeerError(error, 'InterfaceError')) {
        throw error;
      }
      const diagnostic = isPeerError(error) ? error.diagnostic : undefined;
      throw new PeerError('InterfaceError', `Échec de ${action}: ${errorMessage(error)}`, {
        diagnostic,
        cause: error,
      });
    }
  }

  /**
   * Compensation best-effort après un échec de persistance.
   * Toujours en échec: PersistenceError si l'interface a été remise en état,
   * InconsistentState sinon (interface et registre divergent).
   */
  private async compensate(action: string, failure: unknown, undo: () => Promise<void>): Promise<never> {
    const persistError = isPeerError(failure)
      ? failure
      : new PeerError('PersistenceError', errorMessage(failure), { cause: failure });

    this.log.error(`Persistance échouée (${action}): ${persistError.message}`);

    try {
      await undo();
    } catch (undoError) {
      this.log.error(`Compensation impossible (${action}): ${errorMessage(undoError)}`);
      throw new PeerError(
        'InconsistentState',
        `${persistError.message}; l'interface n'a pas pu être remise en état: ${errorMessage(undoError)}`,
        { cause: persistError, diagnostic: isPeerError(undoError) ? undoError.diagnostic : undefined }
      );
    }

    this.log.warn(`Interface remise en état après l'échec (${action})`);
    throw persistError;
  }

  private async liveState(): Promise<Map<string, PeerRuntimeState>> {
    try {
      const peers = await this.gateway.listPeers();
      return new Map(peers.map((p) => [p.publicKey, p]));
    } catch (error) {
      if (!isPeerError(error)) throw error;
      this.log.warn(`Statistiques live indisponibles: ${error.message}`);
      return new Map();
    }
  }
}

// ============================================
// Fonctions utilitaires
// ============================================

function sameBlocks(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const sortedA = [...a].sort();
  const sortedB = [...b].sort();
  return sortedA.every((value, i) => value === sortedB[i]);
}

/**
 * Fusion registre + état live; statistiques null si le peer n'est pas rapporté
 */
export function toView(record: PeerRecord, state?: PeerRuntimeState): PeerView {
  return {
    publicKey: record.publicKey,
    keyOrigin: record.keyOrigin,
    allowedIps: [...record.allowedIps],
    persistentKeepalive: record.persistentKeepalive,
    createdAt: record.createdAt,
    live: state !== undefined,
    endpoint: state?.endpoint ?? null,
    latestHandshake: state?.latestHandshake ?? null,
    transferRx: state ? state.transferRx : null,
    transferTx: state ? state.transferTx : null,
  };
}
