/**
 * @file utils/logger.ts
 * @description Logger centralisé pour wgmgr
 *
 * Toutes les lignes de log partent sur stderr: stdout reste réservé aux
 * sorties de commande (noms de tunnels, JSON) exploitables par un script.
 *
 * Ne jamais logger le contenu d'une configuration WireGuard (clés privées):
 * uniquement des chemins, des noms et des codes de statut.
 *
 * Utilisation :
 *   import { logger } from './utils/logger.js';
 *   logger.info('Configuration enregistrée');
 *   logger.debug('wg-quick up home');
 */

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Niveau de log minimum (défaut: 'info') */
  level?: LogLevel;
  /** Activer les couleurs (défaut: auto-détecté) */
  colors?: boolean | null;
  /** Préfixe pour tous les messages */
  prefix?: string;
}

/** Destination des lignes formatées (remplaçable dans les tests) */
export type LogSink = (line: string) => void;

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
let sink: LogSink = (line) => console.error(line);

// ============================================
// Helpers
// ============================================

/**
 * Formate la date au format YYYY-MM-DD HH:mm:ss
 */
function formatTimestamp(): string {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

function shouldUseColors(): boolean {
  if (useColors !== null) return useColors;

  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;

  return process.stderr.isTTY === true;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
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
 * Formate un message de log
 */
export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const levelLabel = LEVEL_LABELS[level].padEnd(5);
  const prefix = logPrefix ? `[${logPrefix}] ` : '';
  const formattedArgs = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  const fullMessage = `${prefix}${message}${formattedArgs}`;
  const timestamp = formatTimestamp();

  if (shouldUseColors()) {
    const color = LEVEL_COLORS[level];
    return `${DIM}[${timestamp}]${RESET} ${color}${BOLD}[${levelLabel}]${RESET} ${fullMessage}`;
  }

  return `[${timestamp}] [${levelLabel}] ${fullMessage}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  sink(formatMessage(level, message, ...args));
}

// ============================================
// Logger Functions
// ============================================

/**
 * Détails techniques (désactivé par défaut)
 */
function debug(message: string, ...args: unknown[]): void {
  write('debug', message, args);
}

function info(message: string, ...args: unknown[]): void {
  write('info', message, args);
}

/**
 * Situations anormales mais non bloquantes (ex: source vide)
 */
function warn(message: string, ...args: unknown[]): void {
  write('warn', message, args);
}

function error(message: string, ...args: unknown[]): void {
  write('error', message, args);
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

/**
 * Redirige la sortie du logger et retourne la destination précédente
 */
function setSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
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

/**
 * Initialise le logger depuis les options CLI
 */
function initFromCLI(options: { verbose?: boolean }): void {
  if (options.verbose) {
    setLogLevel('debug');
    debug('Mode debug activé');
  }
}

// ============================================
// Exports
// ============================================

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setColors,
  setPrefix,
  setSink,
  configure,
  initFromCLI,
};

export default logger;
