/**
 * @file types.ts
 * @description Types du gestionnaire de peers WireGuard
 */

/**
 * Origine de la paire de clés
 * - server: générée par wgpeerd (clé privée connue, au moins à la création)
 * - client: l'appelant n'a fourni que sa clé publique
 */
export type KeyOrigin = 'server' | 'client';

/**
 * Peer enregistré (source de vérité persistée)
 */
export interface PeerRecord {
  publicKey: string;
  privateKey?: string;
  keyOrigin: KeyOrigin;
  allowedIps: string[];
  persistentKeepalive?: number;
  /** ISO-8601 */
  createdAt: string;
}

/**
 * État d'un peer tel que rapporté par `wg show <iface> dump`
 */
export interface PeerRuntimeState {
  publicKey: string;
  endpoint?: string;
  allowedIps: string[];
  /** Epoch en secondes, absent si aucun handshake */
  latestHandshake?: number;
  transferRx: number;
  transferTx: number;
  persistentKeepalive?: number;
}

/**
 * Vue retournée par list/get: champs publics + statistiques live
 */
export interface PeerView {
  publicKey: string;
  keyOrigin: KeyOrigin;
  allowedIps: string[];
  persistentKeepalive?: number;
  createdAt: string;
  /** false si l'interface ne rapporte pas ce peer */
  live: boolean;
  endpoint: string | null;
  latestHandshake: number | null;
  transferRx: number | null;
  transferTx: number | null;
}

/**
 * Demande de création (tous les champs optionnels)
 */
export interface CreatePeerRequest {
  publicKey?: string;
  allowedIps?: string[];
  persistentKeepalive?: number;
}

/**
 * Peer créé: inclut la clé privée si générée par le serveur
 */
export type CreatedPeer = PeerRecord;

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

/**
 * Paramètres serveur pour le rendu de configuration client
 */
export interface ServerParams {
  publicKey: string;
  /** host:port */
  endpoint: string;
  /** AllowedIPs côté client (trafic routé dans le tunnel) */
  clientAllowedIps: string[];
  dns?: string[];
  /** Keepalive par défaut si le peer n'en a pas */
  persistentKeepalive?: number;
}

export type ConfigFormat = 'client' | 'server';

export interface RestoreResult {
  restored: number;
  failed: number;
}
