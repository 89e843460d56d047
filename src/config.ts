/**
 * @file config.ts
 * @description Parsing de la configuration YAML de wgmgr
 */

import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { TunnelError } from './errors.js';
import { t } from './i18n.js';
import type { LogLevel } from './utils/logger.js';

// ============================================
// Types
// ============================================

export interface WgmgrConfig {
  wireguard: {
    /** Répertoire des fichiers <nom>.conf */
    configDir: string;
  };
  tools: {
    timeoutMs: number;
    decodeTimeoutMs: number;
    wgQuickTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    /** Répertoire des diagnostics wg-quick */
    diagnosticsDir: string;
  };
  lang?: string;
}

export const DEFAULT_CONFIG_PATH = '/etc/wgmgr/config.yml';

// ============================================
// Configuration par défaut
// ============================================

export const defaultConfig: WgmgrConfig = {
  wireguard: {
    configDir: '/etc/wireguard',
  },
  tools: {
    timeoutMs: 10000,
    decodeTimeoutMs: 10000,
    wgQuickTimeoutMs: 30000,
  },
  logging: {
    level: 'info',
    diagnosticsDir: '/var/log/wgmgr',
  },
};

// ============================================
// Helpers
// ============================================

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw invalid(`${key} doit être une section`);
  }
  return value;
}

function readString(raw: RawSection, key: string, fallback: string, path: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalid(`${path} doit être une chaîne non vide`);
  }
  return value;
}

function readTimeout(raw: RawSection, key: string, fallback: number, path: string): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw invalid(`${path} doit être un entier positif (ms)`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function invalid(error: string): TunnelError {
  return new TunnelError('ConfigInvalid', { params: { error } });
}

// ============================================
// Parsing
// ============================================

/**
 * Normalise la configuration brute (snake_case -> camelCase) et la valide
 */
export function normalizeConfig(raw: unknown): WgmgrConfig {
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw invalid('la racine doit être une section');
  }

  const wireguard = section(raw, 'wireguard');
  const tools = section(raw, 'tools');
  const logging = section(raw, 'logging');

  const level = readString(logging, 'level', defaultConfig.logging.level, 'logging.level');
  if (!isLogLevel(level)) {
    throw invalid(`logging.level inconnu: ${level}`);
  }

  const lang = raw.lang === undefined || raw.lang === null
    ? undefined
    : readString(raw, 'lang', 'fr', 'lang');

  return {
    wireguard: {
      configDir: readString(wireguard, 'config_dir', defaultConfig.wireguard.configDir, 'wireguard.config_dir'),
    },
    tools: {
      timeoutMs: readTimeout(tools, 'timeout_ms', defaultConfig.tools.timeoutMs, 'tools.timeout_ms'),
      decodeTimeoutMs: readTimeout(tools, 'decode_timeout_ms', defaultConfig.tools.decodeTimeoutMs, 'tools.decode_timeout_ms'),
      wgQuickTimeoutMs: readTimeout(tools, 'wg_quick_timeout_ms', defaultConfig.tools.wgQuickTimeoutMs, 'tools.wg_quick_timeout_ms'),
    },
    logging: {
      level,
      diagnosticsDir: readString(logging, 'diagnostics_dir', defaultConfig.logging.diagnosticsDir, 'logging.diagnostics_dir'),
    },
    lang,
  };
}

/**
 * Charge et parse la configuration YAML
 *
 * Sans chemin explicite, un fichier absent donne la configuration par défaut.
 * Un chemin explicite (option ou WGMGR_CONFIG) doit exister.
 */
export function loadConfig(configPath?: string): WgmgrConfig {
  const explicitPath = configPath ?? process.env.WGMGR_CONFIG;
  const path = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(path)) {
    if (explicitPath) {
      throw new TunnelError('ConfigInvalid', { params: { error: t('error.configNotFound', { path }) } });
    }
    return normalizeConfig({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TunnelError('ConfigInvalid', { params: { error: message }, cause: error });
  }

  return normalizeConfig(raw);
}

/**
 * Crée un exemple de configuration
 */
export function getExampleConfig(): string {
  return `# Configuration wgmgr
# Gestion des tunnels WireGuard locaux

wireguard:
  # Répertoire des configurations <nom>.conf (lu par wg-quick)
  config_dir: /etc/wireguard

# Délais maximum des commandes externes (ms)
tools:
  timeout_ms: 10000           # file, ip, wg
  decode_timeout_ms: 10000    # zbarimg
  wg_quick_timeout_ms: 30000  # wg-quick up/down

logging:
  level: info                 # debug, info, warn, error
  # stderr de wg-quick en cas d'échec
  diagnostics_dir: /var/log/wgmgr

# Langue (fr/en)
lang: fr
`;
}
