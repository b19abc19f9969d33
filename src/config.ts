/**
 * @file config.ts
 * @description Parsing de la configuration YAML pour wgpeerd
 *
 * Ordre de priorité: variables d'environnement > fichier YAML > défauts.
 * Le fichier par défaut peut être absent (déploiement conteneur piloté par
 * l'environnement); un chemin explicite absent est une erreur.
 */

import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { LOG_LEVEL_NAMES, type LogLevel } from './utils/logger.js';
import { parseSubnet } from './peers/cidr.js';
import { errorMessage } from './peers/errors.js';

// ============================================
// Types
// ============================================

export interface ApiConfig {
  host: string;
  port: number;
  token?: string;
}

export interface WireGuardConfig {
  interface: string;
  /** CIDR géré, ex: 10.13.13.1/24. Lu sur l'interface si absent */
  subnet?: string;
  /** Adresse de l'interface si le sous-réseau est donné en adresse réseau */
  interfaceAddress?: string;
  /** host:port annoncé aux clients */
  endpoint: string;
  serverPublicKey?: string;
  commandTimeoutMs: number;
  clientAllowedIps: string[];
  dns: string[];
  /** Keepalive écrit dans les configurations client */
  clientKeepalive?: number;
  /** Keepalive appliqué côté serveur aux nouveaux peers */
  peerKeepalive?: number;
}

export interface StorageConfig {
  path: string;
  persistPrivateKeys: boolean;
}

export interface WgPeerdConfig {
  api: ApiConfig;
  wireguard: WireGuardConfig;
  storage: StorageConfig;
  restoreOnStart: boolean;
  logging: {
    level: LogLevel;
  };
}

export type Env = Record<string, string | undefined>;

// ============================================
// Constants
// ============================================

export const DEFAULT_CONFIG_PATH = '/etc/wgpeerd/config.yml';

const defaultConfig: WgPeerdConfig = {
  api: {
    host: '0.0.0.0',
    port: 8008,
  },
  wireguard: {
    interface: 'wg0',
    endpoint: '',
    commandTimeoutMs: 5000,
    clientAllowedIps: ['0.0.0.0/0', '::/0'],
    dns: [],
    clientKeepalive: 25,
  },
  storage: {
    path: '/config/peers.json',
    persistPrivateKeys: false,
  },
  restoreOnStart: true,
  logging: {
    level: 'info',
  },
};

// ============================================
// Schéma du fichier (snake_case)
// ============================================

const keepalive = z.number().int().min(0).max(65535);

const RawConfigSchema = z
  .object({
    api: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        token: z.string().min(1).optional(),
        token_file: z.string().min(1).optional(),
      })
      .optional(),
    wireguard: z
      .object({
        interface: z.string().min(1).optional(),
        subnet: z.string().min(1).optional(),
        interface_address: z.string().min(1).optional(),
        endpoint: z.string().min(1).optional(),
        server_public_key: z.string().min(1).optional(),
        command_timeout_ms: z.number().int().positive().optional(),
        client_allowed_ips: z.array(z.string().min(1)).min(1).optional(),
        dns: z.array(z.string().min(1)).optional(),
        client_keepalive: keepalive.optional(),
        peer_keepalive: keepalive.optional(),
      })
      .optional(),
    storage: z
      .object({
        path: z.string().min(1).optional(),
        persist_private_keys: z.boolean().optional(),
      })
      .optional(),
    restore_on_start: z.boolean().optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
      })
      .optional(),
  })
  .strict();

type RawConfig = z.infer<typeof RawConfigSchema>;

// ============================================
// Parsing
// ============================================

/**
 * Charge et parse la configuration YAML, puis applique l'environnement
 */
export function loadConfig(configPath?: string, env: Env = process.env): WgPeerdConfig {
  const path = configPath ?? DEFAULT_CONFIG_PATH;
  let content = '';

  if (existsSync(path)) {
    content = readFileSync(path, 'utf-8');
  } else if (configPath !== undefined) {
    throw new Error(`Fichier de configuration non trouvé: ${path}`);
  }

  return parseConfig(content, env);
}

/**
 * Parse un contenu YAML (vide = défauts)
 */
export function parseConfig(content: string, env: Env = {}): WgPeerdConfig {
  let raw: unknown;
  try {
    raw = content.trim() === '' ? {} : parseYaml(content);
  } catch (error) {
    throw new Error(`Configuration invalide: ${errorMessage(error)}`);
  }

  const parsed = RawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(racine)'}: ${i.message}`);
    throw new Error(`Configuration invalide: ${details.join('; ')}`);
  }

  return applyEnv(normalizeConfig(parsed.data), env);
}

/**
 * Normalise la configuration (snake_case -> camelCase, défauts)
 */
function normalizeConfig(raw: RawConfig): WgPeerdConfig {
  const wg: NonNullable<RawConfig['wireguard']> = raw.wireguard ?? {};

  let token = raw.api?.token;
  if (!token && raw.api?.token_file) {
    token = readTokenFile(raw.api.token_file);
  }

  return {
    api: {
      host: raw.api?.host ?? defaultConfig.api.host,
      port: raw.api?.port ?? defaultConfig.api.port,
      token,
    },
    wireguard: {
      interface: wg.interface ?? defaultConfig.wireguard.interface,
      subnet: wg.subnet,
      interfaceAddress: wg.interface_address,
      endpoint: wg.endpoint ?? defaultConfig.wireguard.endpoint,
      serverPublicKey: wg.server_public_key,
      commandTimeoutMs: wg.command_timeout_ms ?? defaultConfig.wireguard.commandTimeoutMs,
      clientAllowedIps: wg.client_allowed_ips ?? [...defaultConfig.wireguard.clientAllowedIps],
      dns: wg.dns ?? [],
      clientKeepalive: wg.client_keepalive ?? defaultConfig.wireguard.clientKeepalive,
      peerKeepalive: wg.peer_keepalive,
    },
    storage: {
      path: raw.storage?.path ?? defaultConfig.storage.path,
      persistPrivateKeys: raw.storage?.persist_private_keys ?? defaultConfig.storage.persistPrivateKeys,
    },
    restoreOnStart: raw.restore_on_start ?? defaultConfig.restoreOnStart,
    logging: {
      level: raw.logging?.level ?? defaultConfig.logging.level,
    },
  };
}

function readTokenFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (error) {
    throw new Error(`Lecture du token impossible (${path}): ${errorMessage(error)}`);
  }
}

/**
 * Surcharges par variables d'environnement (déploiement conteneur)
 */
function applyEnv(config: WgPeerdConfig, env: Env): WgPeerdConfig {
  const result: WgPeerdConfig = {
    ...config,
    api: { ...config.api },
    wireguard: { ...config.wireguard },
    storage: { ...config.storage },
    logging: { ...config.logging },
  };

  if (env.API_TOKEN) result.api.token = env.API_TOKEN;
  if (env.API_PORT) {
    const port = Number(env.API_PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Configuration invalide: API_PORT=${env.API_PORT}`);
    }
    result.api.port = port;
  }
  if (env.WG_INTERFACE) result.wireguard.interface = env.WG_INTERFACE;
  if (env.WG_SUBNET) result.wireguard.subnet = env.WG_SUBNET;
  if (env.SERVER_ENDPOINT) result.wireguard.endpoint = env.SERVER_ENDPOINT;
  if (env.SERVER_PUBLIC_KEY) result.wireguard.serverPublicKey = env.SERVER_PUBLIC_KEY;
  if (env.PEERS_FILE) result.storage.path = env.PEERS_FILE;
  if (env.LOG_LEVEL) {
    const level = z.enum(LOG_LEVEL_NAMES).safeParse(env.LOG_LEVEL);
    if (!level.success) {
      throw new Error(`Configuration invalide: LOG_LEVEL=${env.LOG_LEVEL}`);
    }
    result.logging.level = level.data;
  }

  return result;
}

// ============================================
// Validation
// ============================================

/**
 * Valide la configuration; retourne la liste des erreurs (vide si OK)
 */
export function validateConfig(config: WgPeerdConfig, options: { requireToken?: boolean } = {}): string[] {
  const errors: string[] = [];

  if (options.requireToken !== false && !config.api.token) {
    errors.push('api.token (ou API_TOKEN) est requis');
  }

  if (!config.wireguard.endpoint) {
    errors.push('wireguard.endpoint (ou SERVER_ENDPOINT) est requis');
  } else if (!/^.+:\d{1,5}$/.test(config.wireguard.endpoint)) {
    errors.push(`wireguard.endpoint invalide (attendu: host:port): ${config.wireguard.endpoint}`);
  }

  if (config.wireguard.subnet) {
    try {
      parseSubnet(config.wireguard.subnet, config.wireguard.interfaceAddress);
    } catch (error) {
      errors.push(`wireguard.subnet: ${errorMessage(error)}`);
    }
  }

  return errors;
}

/**
 * Crée un exemple de configuration
 */
export function getExampleConfig(): string {
  return `# Configuration wgpeerd
# Gestion des peers WireGuard d'un nœud VPN

api:
  host: 0.0.0.0
  port: 8008
  # Token attendu dans l'en-tête X-API-Token (ou variable API_TOKEN)
  token_file: /etc/wgpeerd/api.token

wireguard:
  interface: wg0
  # Sous-réseau géré; l'adresse d'hôte est celle de l'interface.
  # Lu sur l'interface (ip addr) si absent.
  subnet: 10.13.13.1/24
  # Endpoint annoncé aux clients
  endpoint: vpn.example.com:51820
  # Clé publique du serveur (lue via "wg show" si absente)
  # server_public_key: ...
  command_timeout_ms: 5000
  client_allowed_ips:
    - 0.0.0.0/0
    - "::/0"
  dns:
    - 10.13.13.1
  client_keepalive: 25

storage:
  path: /config/peers.json
  # Conserver les clés privées générées (permet de re-télécharger
  # la configuration client après redémarrage)
  persist_private_keys: false

# Rejouer les peers du registre sur l'interface au démarrage
restore_on_start: true

logging:
  level: info
`;
}
