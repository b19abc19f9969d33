/**
 * @file metrics.ts
 * @description Métriques Prometheus (prom-client)
 *
 * Registre dédié par instance: pas d'état global partagé entre serveurs.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { InterfaceGateway } from './peers/gateway.js';
import { isPeerError } from './peers/errors.js';
import { logger } from './utils/logger.js';

// ============================================
// Constants
// ============================================

const METRICS = {
  REQUESTS: 'wgpeerd_requests_total',
  REQUEST_DURATION: 'wgpeerd_request_duration_seconds',
  PEERS: 'wgpeerd_peers_total',
  PEER_RX: 'wgpeerd_peer_transfer_rx_bytes',
  PEER_TX: 'wgpeerd_peer_transfer_tx_bytes',
  PEER_HANDSHAKE: 'wgpeerd_peer_last_handshake_seconds',
  DUMP_SKIPPED: 'wgpeerd_dump_lines_skipped_total',
} as const;

const DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/** Chemins dynamiques remplacés pour limiter la cardinalité */
const PATH_PATTERNS: Array<[RegExp, string]> = [
  [/^\/peers\/[^/]+\/config$/, '/peers/{public_key}/config'],
  [/^\/peers\/[^/]+$/, '/peers/{public_key}'],
];

/** Routes non comptées */
const UNTRACKED_PATHS = new Set(['/metrics', '/health']);

export function normalizePath(path: string): string {
  for (const [pattern, replacement] of PATH_PATTERNS) {
    if (pattern.test(path)) return replacement;
  }
  return path;
}

// ============================================
// Metrics
// ============================================

export interface PeerMetricsOptions {
  /** Métriques Node.js par défaut (mémoire, event loop...) */
  defaultMetrics?: boolean;
  now?: () => number;
}

export class PeerMetrics {
  readonly registry = new Registry();
  private readonly now: () => number;
  private lastSkipped = 0;

  private readonly requests: Counter<'method' | 'endpoint' | 'status_code'>;
  private readonly requestDuration: Histogram<'method' | 'endpoint'>;
  private readonly peersTotal: Gauge;
  private readonly peerRx: Gauge<'public_key'>;
  private readonly peerTx: Gauge<'public_key'>;
  private readonly peerHandshake: Gauge<'public_key'>;
  private readonly dumpSkipped: Counter;

  constructor(options: PeerMetricsOptions = {}) {
    this.now = options.now ?? (() => Date.now() / 1000);

    if (options.defaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.requests = new Counter({
      name: METRICS.REQUESTS,
      help: 'Total HTTP requests',
      labelNames: ['method', 'endpoint', 'status_code'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: METRICS.REQUEST_DURATION,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'endpoint'],
      buckets: DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.peersTotal = new Gauge({
      name: METRICS.PEERS,
      help: 'Current number of WireGuard peers on the interface',
      registers: [this.registry],
    });

    this.peerRx = new Gauge({
      name: METRICS.PEER_RX,
      help: 'Received bytes for WireGuard peer',
      labelNames: ['public_key'],
      registers: [this.registry],
    });

    this.peerTx = new Gauge({
      name: METRICS.PEER_TX,
      help: 'Transmitted bytes for WireGuard peer',
      labelNames: ['public_key'],
      registers: [this.registry],
    });

    this.peerHandshake = new Gauge({
      name: METRICS.PEER_HANDSHAKE,
      help: 'Seconds since last handshake for WireGuard peer (-1 if none)',
      labelNames: ['public_key'],
      registers: [this.registry],
    });

    this.dumpSkipped = new Counter({
      name: METRICS.DUMP_SKIPPED,
      help: 'Unparsable lines skipped in wg dump output',
      registers: [this.registry],
    });
  }

  /**
   * Enregistre une requête HTTP (hors /health et /metrics)
   */
  observeRequest(method: string, path: string, statusCode: number, durationSeconds: number): void {
    if (UNTRACKED_PATHS.has(path)) return;
    const endpoint = normalizePath(path);
    this.requests.inc({ method, endpoint, status_code: String(statusCode) });
    this.requestDuration.observe({ method, endpoint }, durationSeconds);
  }

  /**
   * Rafraîchit les gauges par peer depuis l'interface
   */
  async refreshInterface(gateway: InterfaceGateway): Promise<void> {
    this.peerRx.reset();
    this.peerTx.reset();
    this.peerHandshake.reset();

    try {
      const peers = await gateway.listPeers();
      this.peersTotal.set(peers.length);

      const now = this.now();
      for (const peer of peers) {
        const labels = { public_key: peer.publicKey };
        this.peerRx.set(labels, peer.transferRx);
        this.peerTx.set(labels, peer.transferTx);
        this.peerHandshake.set(
          labels,
          peer.latestHandshake !== undefined ? Math.max(0, now - peer.latestHandshake) : -1
        );
      }
    } catch (error) {
      if (!isPeerError(error)) throw error;
      logger.debug(`Métriques interface indisponibles: ${error.message}`);
      this.peersTotal.set(0);
    }

    const current = gateway.skippedLines;
    if (current > this.lastSkipped) {
      this.dumpSkipped.inc(current - this.lastSkipped);
    }
    this.lastSkipped = Math.max(this.lastSkipped, current);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
