/**
 * @file daemon.ts
 * @description Démon principal wgpeerd
 *
 * Ordre de démarrage: configuration -> interface -> registre -> sous-réseau
 * -> restauration -> API. Un registre corrompu bloque le démarrage plutôt
 * que d'être écrasé au premier POST.
 */

import { EventEmitter } from 'events';
import { ApiServer } from './api.js';
import { type WgPeerdConfig, loadConfig, validateConfig } from './config.js';
import { PeerMetrics } from './metrics.js';
import {
  type InterfaceGateway,
  type Subnet,
  PeerRegistry,
  PeerService,
  WgGateway,
  formatSubnet,
  parseSubnet,
} from './peers/index.js';
import { logger } from './utils/logger.js';
import { VERSION } from './version.js';

// ============================================
// Types
// ============================================

export interface DaemonOptions {
  configPath?: string;
  debug?: boolean;
  /** Configuration déjà chargée (tests, CLI) */
  config?: WgPeerdConfig;
  /** Remplace WgGateway (tests) */
  gateway?: InterfaceGateway;
}

export interface DaemonStatus {
  version: string;
  running: boolean;
  interface: string;
  subnet: string | null;
  peers: number;
  listening: string | null;
}

// ============================================
// Daemon
// ============================================

/**
 * Démon wgpeerd: câble les composants et expose l'API
 *
 * Événements: 'started' (adresse d'écoute), 'stopped'
 */
export class PeerDaemon extends EventEmitter {
  private readonly options: DaemonOptions;
  private readonly log = logger.child('daemon');
  private running = false;

  private config: WgPeerdConfig | null = null;
  private service: PeerService | null = null;
  private api: ApiServer | null = null;
  private listening: string | null = null;

  constructor(options: DaemonOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Démarre le démon
   */
  async start(): Promise<void> {
    if (this.running) return;

    const config = this.options.config ?? loadConfig(this.options.configPath);
    logger.setLevel(this.options.debug ? 'debug' : config.logging.level);

    const errors = validateConfig(config);
    if (errors.length > 0) {
      throw new Error(`Configuration invalide:\n  - ${errors.join('\n  - ')}`);
    }
    const token = config.api.token;
    if (!token) {
      throw new Error('Configuration invalide: api.token est requis');
    }

    this.log.info(`Démarrage de wgpeerd v${VERSION}`);

    const gateway = this.options.gateway ?? new WgGateway({
      interfaceName: config.wireguard.interface,
      timeoutMs: config.wireguard.commandTimeoutMs,
    });

    if (!(await gateway.isAvailable())) {
      this.log.warn(`Interface ${gateway.interfaceName} indisponible au démarrage`);
    }

    const registry = new PeerRegistry({
      path: config.storage.path,
      persistPrivateKeys: config.storage.persistPrivateKeys,
    });
    await registry.load();
    this.log.info(`${registry.size} peer(s) chargé(s) depuis ${config.storage.path}`);

    const subnet = await this.resolveSubnet(config, gateway);
    this.log.info(`Sous-réseau géré: ${formatSubnet(subnet)}`);

    const service = new PeerService({
      registry,
      gateway,
      subnet,
      server: {
        endpoint: config.wireguard.endpoint,
        publicKey: config.wireguard.serverPublicKey,
        clientAllowedIps: config.wireguard.clientAllowedIps,
        dns: config.wireguard.dns,
        persistentKeepalive: config.wireguard.clientKeepalive,
      },
      defaultKeepalive: config.wireguard.peerKeepalive,
    });

    if (config.restoreOnStart && registry.size > 0) {
      await service.restore();
    }

    const api = new ApiServer({
      service,
      gateway,
      metrics: new PeerMetrics({ defaultMetrics: true }),
      token,
      version: VERSION,
    });
    const address = await api.start(config.api.port, config.api.host);

    this.config = config;
    this.service = service;
    this.api = api;
    this.listening = `${address.address}:${address.port}`;
    this.running = true;

    this.log.info('wgpeerd démarré');
    this.emit('started', this.listening);
  }

  /**
   * Arrête le démon. Une mutation en cours n'est pas interrompue: on attend
   * qu'elle soit persistée avant de rendre la main.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.log.info('Arrêt de wgpeerd...');
    await this.api?.stop();
    await this.service?.drain();

    this.api = null;
    this.listening = null;
    this.running = false;

    this.log.info('wgpeerd arrêté');
    this.emit('stopped');
  }

  getStatus(): DaemonStatus {
    return {
      version: VERSION,
      running: this.running,
      interface: this.config?.wireguard.interface ?? '',
      subnet: this.service ? formatSubnet(this.service.subnet) : null,
      peers: this.service?.count() ?? 0,
      listening: this.listening,
    };
  }

  /**
   * Sous-réseau configuré, sinon lu sur l'interface
   */
  private async resolveSubnet(config: WgPeerdConfig, gateway: InterfaceGateway): Promise<Subnet> {
    if (config.wireguard.subnet) {
      return parseSubnet(config.wireguard.subnet, config.wireguard.interfaceAddress);
    }
    const address = await gateway.interfaceAddress();
    this.log.debug(`Adresse de ${gateway.interfaceName}: ${address}`);
    return parseSubnet(address);
  }
}
