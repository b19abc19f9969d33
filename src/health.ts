/**
 * @file health.ts
 * @description État de santé du service (endpoint /health, sans auth)
 */

import type { InterfaceGateway } from './peers/gateway.js';
import { isPeerError } from './peers/errors.js';
import type { PeerService } from './peers/service.js';

// ============================================
// Types
// ============================================

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  version: string;
  uptime_seconds: number;
  wireguard_interface: string;
  wireguard_available: boolean;
  /** Peers du registre */
  peer_count: number;
  /** Peers rapportés par l'interface */
  live_peer_count: number;
}

export interface HealthReport {
  body: HealthStatus;
  httpStatus: 200 | 503;
}

// ============================================
// Check
// ============================================

/**
 * Sain si l'interface répond (même avec zéro peer), 503 sinon
 */
export async function checkHealth(
  service: PeerService,
  gateway: InterfaceGateway,
  version: string,
  startedAt: number,
  now: number = Date.now()
): Promise<HealthReport> {
  let available = false;
  let livePeers = 0;

  try {
    livePeers = (await gateway.listPeers()).length;
    available = true;
  } catch (error) {
    if (!isPeerError(error)) throw error;
  }

  return {
    body: {
      status: available ? 'healthy' : 'unhealthy',
      version,
      uptime_seconds: Math.round((now - startedAt) / 100) / 10,
      wireguard_interface: gateway.interfaceName,
      wireguard_available: available,
      peer_count: service.count(),
      live_peer_count: livePeers,
    },
    httpStatus: available ? 200 : 503,
  };
}
