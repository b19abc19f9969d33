/**
 * @file api.ts
 * @description API HTTP de gestion des peers
 *
 * Endpoints:
 * - GET    /peers                     : Liste des peers (registre + stats live)
 * - POST   /peers                     : Création (?format=config pour la conf client)
 * - GET    /peers/{public_key}        : Un peer
 * - GET    /peers/{public_key}/config : Configuration (?format=client|server)
 * - DELETE /peers/{public_key}        : Suppression
 * - GET    /health                    : Santé (sans auth)
 * - GET    /metrics                   : Prometheus (sans auth)
 *
 * Toutes les autres routes exigent l'en-tête X-API-Token.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'http';
import type { AddressInfo } from 'net';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { checkHealth } from './health.js';
import type { PeerMetrics } from './metrics.js';
import { PeerError, type PeerErrorCode, errorMessage, isPeerError } from './peers/errors.js';
import type { InterfaceGateway } from './peers/gateway.js';
import { renderClientConfig } from './peers/renderer.js';
import type { PeerService } from './peers/service.js';
import type { ConfigFormat, CreatePeerRequest, PeerRecord, PeerView } from './peers/types.js';
import { logger, type ScopedLogger } from './utils/logger.js';

// ============================================
// Types
// ============================================

export interface ApiServerOptions {
  service: PeerService;
  gateway: InterfaceGateway;
  metrics: PeerMetrics;
  /** Token attendu dans X-API-Token */
  token: string;
  version: string;
  /** Début de l'uptime (ms epoch) */
  startedAt?: number;
  log?: ScopedLogger;
}

type ApiErrorCode = PeerErrorCode | 'Unauthorized' | 'MethodNotAllowed' | 'PayloadTooLarge' | 'InternalError';

/**
 * Erreur propre à la couche HTTP (hors taxonomie des peers)
 */
class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: ApiErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

// ============================================
// Constants
// ============================================

export const MAX_BODY_BYTES = 64 * 1024;

const TOKEN_HEADER = 'x-api-token';

const STATUS_BY_CODE: Record<PeerErrorCode, number> = {
  InvalidRequest: 400,
  NotFound: 404,
  DuplicateKey: 409,
  AddressConflict: 409,
  PoolExhausted: 409,
  MissingCredential: 409,
  InterfaceError: 502,
  InterfaceUnavailable: 503,
  CorruptState: 500,
  PersistenceError: 500,
  InconsistentState: 500,
};

const PEER_ROUTE = /^\/peers\/([^/]+)(\/config)?$/;

const CreatePeerBodySchema = z
  .object({
    public_key: z.string().min(1).nullish(),
    allowed_ips: z.array(z.string().min(1)).min(1).nullish(),
    persistent_keepalive: z.number().int().min(0).max(65535).nullish(),
  })
  .strict();

// ============================================
// Sérialisation (snake_case)
// ============================================

export function serializeRecord(peer: PeerRecord): Record<string, unknown> {
  return {
    public_key: peer.publicKey,
    ...(peer.privateKey !== undefined ? { private_key: peer.privateKey } : {}),
    allowed_ips: peer.allowedIps,
    persistent_keepalive: peer.persistentKeepalive ?? null,
    key_origin: peer.keyOrigin,
    created_at: peer.createdAt,
  };
}

export function serializeView(view: PeerView): Record<string, unknown> {
  return {
    public_key: view.publicKey,
    allowed_ips: view.allowedIps,
    persistent_keepalive: view.persistentKeepalive ?? null,
    key_origin: view.keyOrigin,
    created_at: view.createdAt,
    live: view.live,
    endpoint: view.endpoint,
    latest_handshake: view.latestHandshake,
    transfer_rx: view.transferRx,
    transfer_tx: view.transferTx,
  };
}

// ============================================
// Helpers
// ============================================

function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, text: string, contentType = 'text/plain; charset=utf-8'): void {
  res.writeHead(status, { 'Content-Type': contentType });
  res.end(text);
}

function sendError(res: ServerResponse, status: number, code: ApiErrorCode, detail: string): void {
  sendJson(res, status, { error: code, detail });
}

/**
 * Lit le corps de la requête. Au-delà de la limite, le reste est consommé
 * sans être conservé puis la requête est rejetée.
 */
async function readBody(req: IncomingMessage, limit: number = MAX_BODY_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8');
    size += buffer.length;
    if (size <= limit) {
      chunks.push(buffer);
    }
  }

  if (size > limit) {
    throw new ApiError(413, 'PayloadTooLarge', `Corps de requête trop volumineux (max ${limit} octets)`);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Valide le corps d'un POST /peers (vide = tout automatique)
 */
export function parseCreateBody(text: string): CreatePeerRequest {
  if (text.trim() === '') {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PeerError('InvalidRequest', `Corps JSON invalide: ${errorMessage(error)}`);
  }

  const parsed = CreatePeerBodySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(corps)'}: ${i.message}`);
    throw new PeerError('InvalidRequest', details.join('; '));
  }

  return {
    publicKey: parsed.data.public_key ?? undefined,
    allowedIps: parsed.data.allowed_ips ?? undefined,
    persistentKeepalive: parsed.data.persistent_keepalive ?? undefined,
  };
}

function parseFormat(value: string | null): ConfigFormat {
  if (value === null || value === 'client') return 'client';
  if (value === 'server') return 'server';
  throw new PeerError('InvalidRequest', `format invalide: ${value} (attendu: client ou server)`);
}

function parseBoolean(name: string, value: string | null): boolean | undefined {
  if (value === null) return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new PeerError('InvalidRequest', `${name} invalide: ${value}`);
}

function decodeKey(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    throw new PeerError('InvalidRequest', `Clé mal encodée dans l'URL: ${errorMessage(error)}`);
  }
}

// ============================================
// Server
// ============================================

export class ApiServer {
  private server: Server | null = null;
  private readonly service: PeerService;
  private readonly gateway: InterfaceGateway;
  private readonly metrics: PeerMetrics;
  private readonly token: string;
  private readonly version: string;
  private readonly startedAt: number;
  private readonly log: ScopedLogger;

  constructor(options: ApiServerOptions) {
    this.service = options.service;
    this.gateway = options.gateway;
    this.metrics = options.metrics;
    this.token = options.token;
    this.version = options.version;
    this.startedAt = options.startedAt ?? Date.now();
    this.log = options.log ?? logger.child('api');
  }

  /**
   * Démarre l'écoute; retourne l'adresse effective (port 0 = port libre)
   */
  start(port: number, host: string): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('API déjà démarrée'));
    }

    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.log.error(`Réponse impossible: ${errorMessage(error)}`);
        res.destroy();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Adresse d'écoute inattendue: ${String(address)}`));
          return;
        }
        this.log.info(`API en écoute sur ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.log.info('API arrêtée');
  }

  // ============================================
  // Traitement des requêtes
  // ============================================

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = process.hrtime.bigint();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');

    res.once('finish', () => {
      const seconds = Number(process.hrtime.bigint() - started) / 1e9;
      this.metrics.observeRequest(method, url.pathname, res.statusCode, seconds);
    });

    try {
      await this.route(req, res, method, url);
    } catch (error) {
      this.sendFailure(res, method, url.pathname, error);
    }
  }

  private async route(req: IncomingMessage, res: ServerResponse, method: string, url: URL): Promise<void> {
    const path = url.pathname;

    if (path === '/health' || path === '/metrics') {
      this.requireMethod(method, ['GET']);
      if (path === '/health') {
        const report = await checkHealth(this.service, this.gateway, this.version, this.startedAt);
        sendJson(res, report.httpStatus, report.body);
      } else {
        await this.metrics.refreshInterface(this.gateway);
        sendText(res, 200, await this.metrics.render(), this.metrics.contentType);
      }
      return;
    }

    if (!this.isAuthorized(req)) {
      this.log.debug(`Requête refusée (token) sur ${method} ${path}`);
      throw new ApiError(401, 'Unauthorized', 'Token API invalide ou absent');
    }

    if (path === '/peers') {
      this.requireMethod(method, ['GET', 'POST']);
      if (method === 'GET') {
        const peers = await this.service.list();
        sendJson(res, 200, peers.map(serializeView));
      } else {
        await this.createPeer(req, res, url);
      }
      return;
    }

    const match = PEER_ROUTE.exec(path);
    if (!match) {
      throw new ApiError(404, 'NotFound', `Route inconnue: ${path}`);
    }

    const publicKey = decodeKey(match[1]);

    if (match[2] !== undefined) {
      this.requireMethod(method, ['GET']);
      const format = parseFormat(url.searchParams.get('format'));
      const includePrivateKey = parseBoolean('include_private_key', url.searchParams.get('include_private_key'));
      const config = await this.service.renderConfig(publicKey, format, { includePrivateKey });
      sendText(res, 200, config);
      return;
    }

    this.requireMethod(method, ['GET', 'DELETE']);
    if (method === 'GET') {
      sendJson(res, 200, serializeView(await this.service.get(publicKey)));
    } else {
      await this.service.delete(publicKey);
      res.writeHead(204);
      res.end();
    }
  }

  private async createPeer(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const body = await readBody(req);
    const format = url.searchParams.get('format');
    if (format !== null && format !== 'json' && format !== 'config') {
      throw new PeerError('InvalidRequest', `format invalide: ${format} (attendu: json ou config)`);
    }

    const request = parseCreateBody(body);

    // Paramètres serveur résolus avant la création: un échec ici ne crée rien
    const server = format === 'config' ? await this.service.serverParams() : undefined;
    const peer = await this.service.create(request);

    if (server) {
      sendText(res, 201, renderClientConfig(peer, server, { includePrivateKey: peer.keyOrigin === 'server' }));
    } else {
      sendJson(res, 201, serializeRecord(peer));
    }
  }

  private requireMethod(method: string, allowed: readonly string[]): void {
    if (!allowed.includes(method)) {
      throw new ApiError(405, 'MethodNotAllowed', `Méthode ${method} non supportée`);
    }
  }

  private isAuthorized(req: IncomingMessage): boolean {
    const provided = req.headers[TOKEN_HEADER];
    if (typeof provided !== 'string') {
      return false;
    }
    return safeCompare(provided, this.token);
  }

  private sendFailure(res: ServerResponse, method: string, path: string, error: unknown): void {
    if (res.headersSent) {
      this.log.error(`Erreur après envoi des en-têtes (${method} ${path}): ${errorMessage(error)}`);
      res.end();
      return;
    }

    if (error instanceof ApiError) {
      sendError(res, error.status, error.code, error.message);
      return;
    }

    if (isPeerError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        this.log.error(`${method} ${path}: [${error.code}] ${error.message}`);
      }
      sendError(res, status, error.code, error.message);
      return;
    }

    this.log.error(`${method} ${path}: erreur inattendue`, error);
    sendError(res, 500, 'InternalError', 'Erreur interne');
  }
}
