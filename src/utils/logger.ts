/**
 * @file utils/logger.ts
 * @description Logger centralisé pour wgpeerd - compatible journald
 *
 * Le logger écrit sur stdout/stderr pour que journald (ou docker logs)
 * capture automatiquement. Pas d'écriture fichier directe.
 *
 * Utilisation :
 *   import { logger } from './utils/logger.js';
 *   logger.info('Démarrage du daemon');
 *   const log = logger.child('gateway');
 *   log.warn('Commande wg lente', { ms: 4200 });
 */

// ============================================
// Types
// ============================================

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export interface LoggerOptions {
  /** Niveau de log minimum (défaut: 'info') */
  level?: LogLevel;
  /** Activer les couleurs (défaut: auto-détecté) */
  colors?: boolean | null;
  /** Préfixe global pour tous les messages */
  prefix?: string;
}

/**
 * Logger d'un composant (préfixe fixe)
 */
export interface ScopedLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): ScopedLogger;
}

// ============================================
// Constants
// ============================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // Gris
  info: '\x1b[36m',    // Cyan
  warn: '\x1b[33m',    // Jaune
  error: '\x1b[31m',   // Rouge
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

// ============================================
// Logger State
// ============================================

let currentLevel: LogLevel = 'info';
let useColors: boolean | null = null; // null = auto-detect
let logPrefix = '';

// ============================================
// Helpers
// ============================================

/**
 * Formate la date au format YYYY-MM-DD HH:mm:ss
 */
function formatTimestamp(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

function shouldUseColors(): boolean {
  if (useColors !== null) return useColors;

  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;

  return process.stdout.isTTY === true;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

/**
 * Formate une ligne de log complète
 */
export function formatMessage(
  level: LogLevel,
  scopes: readonly string[],
  message: string,
  args: readonly unknown[],
  now: Date = new Date(),
  colors: boolean = shouldUseColors()
): string {
  const timestamp = formatTimestamp(now);
  const levelLabel = LEVEL_LABELS[level].padEnd(5);
  const allScopes = logPrefix ? [logPrefix, ...scopes] : scopes;
  const prefix = allScopes.map((s) => `[${s}] `).join('');
  const formattedArgs = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  const fullMessage = `${prefix}${message}${formattedArgs}`;

  if (colors) {
    const color = LEVEL_COLORS[level];
    return `${DIM}[${timestamp}]${RESET} ${color}${BOLD}[${levelLabel}]${RESET} ${fullMessage}`;
  }

  return `[${timestamp}] [${levelLabel}] ${fullMessage}`;
}

function write(level: LogLevel, scopes: readonly string[], message: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, scopes, message, args);
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

function createScoped(scopes: readonly string[]): ScopedLogger {
  return {
    debug: (message, ...args) => write('debug', scopes, message, args),
    info: (message, ...args) => write('info', scopes, message, args),
    warn: (message, ...args) => write('warn', scopes, message, args),
    error: (message, ...args) => write('error', scopes, message, args),
    child: (scope) => createScoped([...scopes, scope]),
  };
}

// ============================================
// Configuration Functions
// ============================================

function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Configure l'utilisation des couleurs
 * @param enabled true/false ou null pour auto-detect
 */
function setColors(enabled: boolean | null): void {
  useColors = enabled;
}

function setPrefix(prefix: string): void {
  logPrefix = prefix;
}

function configure(options: LoggerOptions): void {
  if (options.level !== undefined) {
    setLogLevel(options.level);
  }
  if (options.colors !== undefined) {
    setColors(options.colors);
  }
  if (options.prefix !== undefined) {
    setPrefix(options.prefix);
  }
}

// ============================================
// Exports
// ============================================

const root = createScoped([]);

/**
 * Logger principal avec méthodes de log
 */
export const logger = {
  ...root,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setColors,
  setPrefix,
  configure,
};

export { setLogLevel, getLogLevel, setColors, setPrefix, configure };

export default logger;
