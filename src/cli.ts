#!/usr/bin/env node
/**
 * @file cli.ts
 * @description CLI wgpeerd avec Commander.js
 */

import { Command } from 'commander';
import { serializeView } from './api.js';
import { PeerDaemon } from './daemon.js';
import { DEFAULT_CONFIG_PATH, type WgPeerdConfig, getExampleConfig, loadConfig, validateConfig } from './config.js';
import {
  type PeerRuntimeState,
  type PeerView,
  PeerRegistry,
  WgGateway,
  errorMessage,
  isPeerError,
  renderClientConfig,
  renderPeerBlock,
  toView,
} from './peers/index.js';
import { logger } from './utils/logger.js';
import { VERSION } from './version.js';

// ============================================
// Helpers
// ============================================

// Pas de valeur par défaut commander: un chemin explicite absent est une erreur,
// le chemin par défaut absent ne l'est pas
const CONFIG_OPTION_HELP = `Chemin de la configuration (défaut: ${DEFAULT_CONFIG_PATH})`;

function colorize(text: string, color: 'green' | 'red' | 'yellow' | 'gray' | 'cyan' | 'bold'): string {
  const colors: Record<string, string> = {
    green: '\x1b[32m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    gray: '\x1b[90m',
    cyan: '\x1b[36m',
    bold: '\x1b[1m',
  };
  return `${colors[color]}${text}\x1b[0m`;
}

function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

function fail(message: string): never {
  console.error(colorize('Erreur:', 'red'), message);
  process.exit(1);
}

function gatewayFor(config: WgPeerdConfig): WgGateway {
  return new WgGateway({
    interfaceName: config.wireguard.interface,
    timeoutMs: config.wireguard.commandTimeoutMs,
  });
}

async function loadRegistry(config: WgPeerdConfig): Promise<PeerRegistry> {
  const registry = new PeerRegistry({
    path: config.storage.path,
    persistPrivateKeys: config.storage.persistPrivateKeys,
  });
  await registry.load();
  return registry;
}

// ============================================
// Commands
// ============================================

async function runCommand(options: { config?: string; debug?: boolean }): Promise<void> {
  const daemon = new PeerDaemon({
    configPath: options.config,
    debug: options.debug,
  });

  const shutdown = (signal: string) => {
    logger.info(`Signal ${signal} reçu`);
    daemon
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Arrêt incomplet: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  try {
    await daemon.start();
  } catch (error) {
    fail(errorMessage(error));
  }
}

function configCheckCommand(options: { config?: string }): void {
  let config: WgPeerdConfig;
  try {
    config = loadConfig(options.config);
  } catch (error) {
    console.error(colorize('✗', 'red'), errorMessage(error));
    process.exit(1);
  }

  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error(colorize('✗', 'red'), 'Configuration invalide:');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  console.log(colorize('✓', 'green'), 'Configuration valide');
  console.log(`  Interface: ${config.wireguard.interface}`);
  console.log(`  Sous-réseau: ${config.wireguard.subnet ?? '(lu sur l\'interface)'}`);
  console.log(`  Endpoint: ${config.wireguard.endpoint}`);
  console.log(`  API: ${config.api.host}:${config.api.port}`);
  console.log(`  Registre: ${config.storage.path}`);
}

function configExampleCommand(): void {
  console.log(getExampleConfig());
}

async function peersCommand(options: { config?: string; json?: boolean }): Promise<void> {
  try {
    const config = loadConfig(options.config);
    const registry = await loadRegistry(config);
    const gateway = gatewayFor(config);

    let live = new Map<string, PeerRuntimeState>();
    try {
      live = new Map((await gateway.listPeers()).map((p) => [p.publicKey, p]));
    } catch (error) {
      if (!isPeerError(error)) throw error;
      console.error(colorize('⚠', 'yellow'), `Statistiques indisponibles: ${error.message}`);
    }

    const views = registry.snapshot().map((record) => toView(record, live.get(record.publicKey)));

    if (options.json) {
      console.log(JSON.stringify(views.map(serializeView), null, 2));
      return;
    }

    displayPeers(views);
  } catch (error) {
    fail(errorMessage(error));
  }
}

function displayPeers(views: readonly PeerView[]): void {
  if (views.length === 0) {
    console.log(colorize('Aucun peer', 'gray'));
    return;
  }

  for (const view of views) {
    const state = view.live ? colorize('● actif', 'green') : colorize('○ absent', 'gray');
    console.log(`${colorize(view.publicKey, 'bold')}  ${state}`);
    console.log(`  IPs: ${view.allowedIps.join(', ')}`);
    if (view.endpoint) {
      console.log(`  Endpoint: ${view.endpoint}`);
    }
    if (view.latestHandshake !== null) {
      console.log(`  Dernier handshake: ${new Date(view.latestHandshake * 1000).toLocaleString('fr-FR')}`);
    }
    if (view.transferRx !== null && view.transferTx !== null) {
      console.log(`  Transfert: ↓ ${formatBytes(view.transferRx)}  ↑ ${formatBytes(view.transferTx)}`);
    }
  }
}

async function renderCommand(
  publicKey: string,
  options: { config?: string; server?: boolean; privateKey?: boolean }
): Promise<void> {
  try {
    const config = loadConfig(options.config);
    const registry = await loadRegistry(config);
    const peer = registry.get(publicKey);
    if (!peer) {
      fail(`Peer ${publicKey} introuvable`);
    }

    if (options.server) {
      process.stdout.write(renderPeerBlock(peer));
      return;
    }

    const serverKey = config.wireguard.serverPublicKey ?? (await gatewayFor(config).serverPublicKey());
    const server = {
      publicKey: serverKey,
      endpoint: config.wireguard.endpoint,
      clientAllowedIps: config.wireguard.clientAllowedIps,
      dns: config.wireguard.dns,
      persistentKeepalive: config.wireguard.clientKeepalive,
    };
    process.stdout.write(renderClientConfig(peer, server, { includePrivateKey: options.privateKey === true }));
  } catch (error) {
    fail(errorMessage(error));
  }
}

// ============================================
// Main
// ============================================

const program = new Command();

program
  .name('wgpeerd')
  .description('Gestion des peers WireGuard d\'un nœud VPN')
  .version(VERSION, '-v, --version', 'Afficher la version')
  .option('--verbose', 'Activer les logs de debug')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      logger.setLevel('debug');
    }
  });

program
  .command('run')
  .description('Démarrer le démon wgpeerd (foreground)')
  .option('-c, --config <path>', CONFIG_OPTION_HELP)
  .option('-d, --debug', 'Mode debug')
  .action(runCommand);

program
  .command('config-check')
  .description('Vérifier la configuration')
  .option('-c, --config <path>', CONFIG_OPTION_HELP)
  .action(configCheckCommand);

program
  .command('config-example')
  .description('Afficher un exemple de configuration')
  .action(configExampleCommand);

program
  .command('peers')
  .description('Lister les peers du registre avec leur état')
  .option('-c, --config <path>', CONFIG_OPTION_HELP)
  .option('-j, --json', 'Sortie JSON')
  .action(peersCommand);

program
  .command('render <public-key>')
  .description('Afficher la configuration d\'un peer')
  .option('-c, --config <path>', CONFIG_OPTION_HELP)
  .option('--server', 'Bloc [Peer] côté serveur')
  .option('--private-key', 'Inclure la clé privée (si conservée)')
  .action(renderCommand);

program.parseAsync().catch((error: unknown) => fail(errorMessage(error)));
