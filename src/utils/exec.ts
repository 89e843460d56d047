/**
 * @file utils/exec.ts
 * @description Exécution bornée des commandes externes (file, zbarimg, wg, wg-quick, ip)
 */

import { spawnSync } from 'child_process';
import { TunnelError, missingTool } from '../errors.js';
import { logger } from './logger.js';

// ============================================
// Types
// ============================================

export interface ToolResult {
  /** Code de sortie (null si tué par un signal) */
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface RunToolOptions {
  /** Délai maximum en ms avant de tuer la commande */
  timeoutMs: number;
  /** Indication d'installation si la commande est absente */
  installHint?: string;
}

/**
 * Capacité d'exécution d'une commande externe (remplaçable dans les tests)
 */
export interface ToolRunner {
  run(command: string, args: string[], options: RunToolOptions): ToolResult;
  isInstalled(command: string): boolean;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 10000;

// ============================================
// Implémentation
// ============================================

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Exécute une commande sans shell, avec timeout
 *
 * ENOENT devient MissingExternalTool, l'expiration ExternalToolTimeout.
 * Un code de sortie non nul n'est pas une exception: l'appelant décide.
 */
export function runTool(command: string, args: string[], options: RunToolOptions): ToolResult {
  logger.debug(`exec: ${command} ${args.join(' ')}`);

  const result = spawnSync(command, args, {
    encoding: 'utf-8',
    timeout: options.timeoutMs,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  if (result.error) {
    const code = errnoCode(result.error);
    if (code === 'ENOENT') {
      throw missingTool(command, options.installHint ?? command);
    }
    if (code === 'ETIMEDOUT') {
      throw new TunnelError('ExternalToolTimeout', {
        tool: command,
        params: { tool: command },
        cause: result.error,
      });
    }
    throw result.error;
  }

  logger.debug(`exec: ${command} -> ${result.status}`);

  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
  };
}

/**
 * Vérifie si une commande est disponible dans le PATH
 */
export function isToolInstalled(command: string): boolean {
  try {
    const result = spawnSync('which', [command], { stdio: 'pipe', timeout: DEFAULT_TOOL_TIMEOUT_MS });
    return result.status === 0;
  } catch {
    return false;
  }
}

export const systemToolRunner: ToolRunner = {
  run: runTool,
  isInstalled: isToolInstalled,
};
