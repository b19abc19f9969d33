/**
 * @file index.ts
 * @description Exports du module peers
 */

export * from './types.js';
export { PeerError, isPeerError, errorMessage } from './errors.js';
export type { PeerErrorCode } from './errors.js';
export { allocate } from './allocator.js';
export {
  parseCidr,
  parseSubnet,
  formatCidr,
  formatSubnet,
  ipToNumber,
  numberToIp,
} from './cidr.js';
export type { CidrBlock, Subnet, AddressRange } from './cidr.js';
export { WgGateway, parseDump, isWireGuardKey } from './gateway.js';
export type { InterfaceGateway, DumpResult, WgGatewayOptions } from './gateway.js';
export { renderClientConfig, renderPeerBlock } from './renderer.js';
export type { RenderOptions } from './renderer.js';
export { PeerRegistry } from './registry.js';
export type { PeerRegistryOptions } from './registry.js';
export { PeerService, toView } from './service.js';
export type { PeerServiceOptions, ServerSettings } from './service.js';
