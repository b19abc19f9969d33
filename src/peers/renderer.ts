/**
 * @file renderer.ts
 * @description Génération des blocs de configuration WireGuard
 */

import { PeerError } from './errors.js';
import type { PeerRecord, ServerParams } from './types.js';

export interface RenderOptions {
  /** Inclure la clé privée (défaut: non, ligne commentée à la place) */
  includePrivateKey?: boolean;
}

/**
 * Configuration client (format wg-quick) pour établir le tunnel.
 * La clé privée n'apparaît que sur demande explicite; MissingCredential si
 * elle est demandée mais inconnue.
 */
export function renderClientConfig(peer: PeerRecord, server: ServerParams, options: RenderOptions = {}): string {
  const includePrivateKey = options.includePrivateKey ?? false;

  let privateKeyLine: string;
  if (!includePrivateKey) {
    privateKeyLine = '# PrivateKey = <clé privée correspondant à ' + peer.publicKey + '>';
  } else if (peer.privateKey) {
    privateKeyLine = `PrivateKey = ${peer.privateKey}`;
  } else if (peer.keyOrigin === 'client') {
    throw new PeerError('MissingCredential', `La clé privée de ${peer.publicKey} n'a jamais été générée par le serveur`);
  } else {
    throw new PeerError('MissingCredential', `La clé privée de ${peer.publicKey} n'a pas été conservée`);
  }

  let config = `[Interface]
${privateKeyLine}
Address = ${peer.allowedIps.join(', ')}
`;
  if (server.dns && server.dns.length > 0) {
    config += `DNS = ${server.dns.join(', ')}\n`;
  }

  config += `
[Peer]
PublicKey = ${server.publicKey}
Endpoint = ${server.endpoint}
AllowedIPs = ${server.clientAllowedIps.join(', ')}
`;

  const keepalive = peer.persistentKeepalive ?? server.persistentKeepalive;
  if (keepalive) {
    config += `PersistentKeepalive = ${keepalive}\n`;
  }

  return config;
}

/**
 * Bloc [Peer] côté serveur (export/diagnostic). Jamais de clé privée.
 */
export function renderPeerBlock(peer: PeerRecord): string {
  let block = `[Peer]
PublicKey = ${peer.publicKey}
AllowedIPs = ${peer.allowedIps.join(', ')}
`;
  if (peer.persistentKeepalive) {
    block += `PersistentKeepalive = ${peer.persistentKeepalive}\n`;
  }
  return block;
}
