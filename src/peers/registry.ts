/**
 * @file registry.ts
 * @description Registre des peers: vue mémoire + instantané JSON sur disque
 *
 * Chaque persist() écrit l'instantané complet dans un fichier temporaire du
 * même répertoire puis le renomme par-dessus la cible: un lecteur voit
 * toujours l'ancien ou le nouvel instantané, jamais un fichier partiel.
 */

import { mkdir, open, readFile, rename, rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { z } from 'zod';
import { logger, type ScopedLogger } from '../utils/logger.js';
import { parseCidr } from './cidr.js';
import { PeerError, errorMessage } from './errors.js';
import type { PeerRecord } from './types.js';

// ============================================
// Format disque
// ============================================

const StoredPeerSchema = z.object({
  public_key: z.string().min(1),
  private_key: z.string().min(1).optional(),
  key_origin: z.enum(['server', 'client']).optional(),
  allowed_ips: z.array(z.string().min(1)).min(1),
  persistent_keepalive: z.number().int().min(0).max(65535).optional(),
  created_at: z.string().optional(),
});

/** Ancien format: objet indexé par clé publique */
const LegacyEntrySchema = z.object({
  allowed_ips: z.array(z.string().min(1)).min(1),
});

const RegistryFileSchema = z.union([
  z.array(StoredPeerSchema),
  z.record(z.string(), LegacyEntrySchema),
]);

type StoredPeer = z.infer<typeof StoredPeerSchema>;

export interface PeerRegistryOptions {
  path: string;
  /** Conserver les clés privées générées sur disque (défaut: false) */
  persistPrivateKeys?: boolean;
  log?: ScopedLogger;
}

function copyRecord(record: PeerRecord): PeerRecord {
  return { ...record, allowedIps: [...record.allowedIps] };
}

// ============================================
// Registry
// ============================================

export class PeerRegistry {
  readonly path: string;
  private readonly persistPrivateKeys: boolean;
  private readonly log: ScopedLogger;
  private peers: Map<string, PeerRecord> = new Map();
  private tmpCounter = 0;

  constructor(options: PeerRegistryOptions) {
    this.path = options.path;
    this.persistPrivateKeys = options.persistPrivateKeys ?? false;
    this.log = options.log ?? logger.child('registry');
  }

  /**
   * Charge le registre depuis le disque et remplace la vue mémoire.
   * Fichier absent ou vide: registre vide (premier démarrage).
   * @throws PeerError CorruptState si le fichier existe mais est illisible
   */
  async load(): Promise<PeerRecord[]> {
    let content: string;
    let modifiedAt: Date;
    try {
      content = await readFile(this.path, 'utf-8');
      modifiedAt = (await stat(this.path)).mtime;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.log.info(`Aucun registre existant (${this.path}), démarrage à vide`);
        this.peers = new Map();
        return [];
      }
      throw new PeerError('CorruptState', `Lecture impossible de ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (content.trim() === '') {
      this.peers = new Map();
      return [];
    }

    const records = this.decode(content, modifiedAt.toISOString());
    const loaded = new Map<string, PeerRecord>();
    for (const record of records) {
      if (loaded.has(record.publicKey)) {
        throw new PeerError('CorruptState', `Clé publique dupliquée dans ${this.path}: ${record.publicKey}`);
      }
      this.checkBlocks(record);
      loaded.set(record.publicKey, record);
    }

    this.peers = loaded;
    this.log.info(`${loaded.size} peer(s) chargé(s) depuis ${this.path}`);
    return this.snapshot();
  }

  snapshot(): PeerRecord[] {
    return [...this.peers.values()].map(copyRecord);
  }

  get(publicKey: string): PeerRecord | undefined {
    const record = this.peers.get(publicKey);
    return record ? copyRecord(record) : undefined;
  }

  has(publicKey: string): boolean {
    return this.peers.has(publicKey);
  }

  get size(): number {
    return this.peers.size;
  }

  upsert(peer: PeerRecord): void {
    this.peers.set(peer.publicKey, copyRecord(peer));
  }

  remove(publicKey: string): boolean {
    return this.peers.delete(publicKey);
  }

  /**
   * Écrit atomiquement l'instantané (par défaut: la vue mémoire courante)
   * @throws PeerError PersistenceError
   */
  async persist(records: readonly PeerRecord[] = this.snapshot()): Promise<void> {
    const dir = dirname(this.path);
    const tmpPath = join(dir, `.${basename(this.path)}.${process.pid}.${++this.tmpCounter}.tmp`);
    const content = JSON.stringify(records.map((r) => this.encode(r)), null, 2) + '\n';

    try {
      await mkdir(dir, { recursive: true, mode: 0o700 });
      const handle = await open(tmpPath, 'w', 0o600);
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new PeerError('PersistenceError', `Écriture impossible de ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.log.debug(`${records.length} peer(s) persisté(s) dans ${this.path}`);
  }

  // ============================================
  // Conversion
  // ============================================

  private decode(content: string, fallbackDate: string): PeerRecord[] {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new PeerError('CorruptState', `JSON invalide dans ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = RegistryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
      throw new PeerError('CorruptState', `Registre invalide (${this.path}) - ${where}`);
    }

    if (Array.isArray(parsed.data)) {
      return parsed.data.map((stored) => this.fromStored(stored, fallbackDate));
    }

    return Object.entries(parsed.data).map(([publicKey, entry]): PeerRecord => ({
      publicKey,
      keyOrigin: 'client',
      allowedIps: entry.allowed_ips,
      createdAt: fallbackDate,
    }));
  }

  /**
   * Chaque bloc doit être un CIDR IPv4 exploitable par l'allocateur
   */
  private checkBlocks(record: PeerRecord): void {
    for (const block of record.allowedIps) {
      try {
        parseCidr(block);
      } catch (error) {
        throw new PeerError(
          'CorruptState',
          `Bloc invalide pour ${record.publicKey} dans ${this.path}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }
  }

  private fromStored(stored: StoredPeer, fallbackDate: string): PeerRecord {
    return {
      publicKey: stored.public_key,
      privateKey: stored.private_key,
      keyOrigin: stored.key_origin ?? (stored.private_key ? 'server' : 'client'),
      allowedIps: stored.allowed_ips,
      persistentKeepalive: stored.persistent_keepalive,
      createdAt: stored.created_at ?? fallbackDate,
    };
  }

  private encode(record: PeerRecord): StoredPeer {
    const stored: StoredPeer = {
      public_key: record.publicKey,
      key_origin: record.keyOrigin,
      allowed_ips: record.allowedIps,
      created_at: record.createdAt,
    };
    if (record.persistentKeepalive !== undefined) {
      stored.persistent_keepalive = record.persistentKeepalive;
    }
    if (this.persistPrivateKeys && record.privateKey) {
      stored.private_key = record.privateKey;
    }
    return stored;
  }
}
