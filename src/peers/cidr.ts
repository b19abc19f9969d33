/**
 * @file cidr.ts
 * @description Calculs IPv4 / CIDR (adresses sous forme d'entiers non signés)
 */

import { PeerError } from './errors.js';

// ============================================
// Types
// ============================================

/** Bloc CIDR normalisé (network = adresse de réseau) */
export interface CidrBlock {
  network: number;
  prefix: number;
}

/** Plage inclusive d'adresses */
export interface AddressRange {
  start: number;
  end: number;
}

/** Sous-réseau géré: le bloc + l'adresse de l'interface WireGuard */
export interface Subnet extends CidrBlock {
  gateway: number;
}

// ============================================
// Adresses
// ============================================

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function ipToNumber(ip: string): number {
  const match = IPV4_PATTERN.exec(ip.trim());
  if (!match) {
    throw new PeerError('InvalidRequest', `Adresse IPv4 invalide: ${ip}`);
  }
  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(match[i]);
    if (octet > 255) {
      throw new PeerError('InvalidRequest', `Adresse IPv4 invalide: ${ip}`);
    }
    value = value * 256 + octet;
  }
  return value;
}

export function numberToIp(value: number): string {
  return [
    (value >>> 24) & 255,
    (value >>> 16) & 255,
    (value >>> 8) & 255,
    value & 255,
  ].join('.');
}

function prefixMask(prefix: number): number {
  return prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0;
}

function parsePrefix(raw: string, value: string): number {
  if (!/^\d{1,2}$/.test(raw)) {
    throw new PeerError('InvalidRequest', `Préfixe CIDR invalide: ${value}`);
  }
  const prefix = Number(raw);
  if (prefix > 32) {
    throw new PeerError('InvalidRequest', `Préfixe CIDR invalide: ${value}`);
  }
  return prefix;
}

// ============================================
// Blocs
// ============================================

/**
 * Parse un bloc CIDR. Une adresse seule vaut /32.
 * Les bits d'hôte doivent être à zéro (10.0.0.5/24 est refusé).
 */
export function parseCidr(value: string): CidrBlock {
  const [ip, rawPrefix, extra] = value.trim().split('/');
  if (extra !== undefined || ip === undefined) {
    throw new PeerError('InvalidRequest', `Bloc CIDR invalide: ${value}`);
  }
  const address = ipToNumber(ip);
  const prefix = rawPrefix === undefined ? 32 : parsePrefix(rawPrefix, value);
  const network = (address & prefixMask(prefix)) >>> 0;
  if (network !== address) {
    throw new PeerError('InvalidRequest', `Bits d'hôte non nuls dans ${value}`);
  }
  return { network, prefix };
}

export function formatCidr(block: CidrBlock): string {
  return `${numberToIp(block.network)}/${block.prefix}`;
}

/**
 * Forme canonique d'un bloc (10.0.0.2 -> 10.0.0.2/32)
 */
export function normalizeCidr(value: string): string {
  return formatCidr(parseCidr(value));
}

export function blockRange(block: CidrBlock): AddressRange {
  const size = 2 ** (32 - block.prefix);
  return { start: block.network, end: block.network + size - 1 };
}

export function rangesOverlap(a: AddressRange, b: AddressRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}

export function rangeContains(outer: AddressRange, inner: AddressRange): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function cidrsOverlap(a: string, b: string): boolean {
  return rangesOverlap(blockRange(parseCidr(a)), blockRange(parseCidr(b)));
}

// ============================================
// Sous-réseau géré
// ============================================

/**
 * Parse le sous-réseau géré.
 * "10.13.13.1/24" -> réseau 10.13.13.0/24, interface 10.13.13.1
 * "10.13.13.0/24" -> interface = premier hôte (10.13.13.1)
 */
export function parseSubnet(value: string, gateway?: string): Subnet {
  const [ip, rawPrefix, extra] = value.trim().split('/');
  if (ip === undefined || rawPrefix === undefined || extra !== undefined) {
    throw new PeerError('InvalidRequest', `Sous-réseau invalide (attendu: a.b.c.d/n): ${value}`);
  }
  const address = ipToNumber(ip);
  const prefix = parsePrefix(rawPrefix, value);
  const network = (address & prefixMask(prefix)) >>> 0;
  const block: CidrBlock = { network, prefix };

  let gatewayNum: number;
  if (gateway !== undefined) {
    gatewayNum = ipToNumber(gateway);
  } else if (address !== network) {
    gatewayNum = address;
  } else {
    gatewayNum = hostRange(block).start;
  }

  if (!rangeContains(blockRange(block), { start: gatewayNum, end: gatewayNum })) {
    throw new PeerError('InvalidRequest', `L'adresse d'interface ${numberToIp(gatewayNum)} est hors de ${value}`);
  }

  return { network, prefix, gateway: gatewayNum };
}

export function formatSubnet(subnet: Subnet): string {
  return formatCidr(subnet);
}

/**
 * Plage des adresses d'hôte (hors réseau/broadcast pour les préfixes <= 30)
 */
export function hostRange(block: CidrBlock): AddressRange {
  const range = blockRange(block);
  if (block.prefix >= 31) {
    return range;
  }
  return { start: range.start + 1, end: range.end - 1 };
}

/**
 * Adresses jamais attribuables: réseau, broadcast, interface
 */
export function reservedAddresses(subnet: Subnet): number[] {
  const reserved = new Set<number>([subnet.gateway]);
  if (subnet.prefix <= 30) {
    const range = blockRange(subnet);
    reserved.add(range.start);
    reserved.add(range.end);
  }
  return [...reserved].sort((a, b) => a - b);
}
