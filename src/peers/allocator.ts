/**
 * @file allocator.ts
 * @description Allocation de la prochaine adresse libre du sous-réseau
 *
 * Balayage linéaire par ordre croissant: O(hôtes + blocs utilisés).
 * Suffisant pour quelques milliers de peers; au-delà, tenir un index libre.
 */

import { PeerError } from './errors.js';
import {
  type AddressRange,
  type Subnet,
  blockRange,
  formatSubnet,
  hostRange,
  numberToIp,
  parseCidr,
  reservedAddresses,
} from './cidr.js';

/**
 * Trie et fusionne les plages occupées
 */
function mergeRanges(ranges: AddressRange[]): AddressRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  const merged: AddressRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

/**
 * Retourne la première adresse d'hôte non réservée et non couverte par inUse.
 *
 * @param inUse adresses ("10.0.0.2") ou blocs ("10.0.0.8/29") déjà attribués
 * @throws PeerError PoolExhausted si aucune adresse ne reste
 */
export function allocate(subnet: Subnet, inUse: Iterable<string>): string {
  const taken: AddressRange[] = reservedAddresses(subnet).map((n) => ({ start: n, end: n }));
  for (const entry of inUse) {
    taken.push(blockRange(parseCidr(entry)));
  }

  const hosts = hostRange(subnet);
  let candidate = hosts.start;

  for (const range of mergeRanges(taken)) {
    if (range.end < candidate) continue;
    if (range.start > candidate) break;
    candidate = range.end + 1;
  }

  if (candidate > hosts.end) {
    throw new PeerError('PoolExhausted', `Plus d'adresse disponible dans ${formatSubnet(subnet)}`);
  }

  return numberToIp(candidate);
}
