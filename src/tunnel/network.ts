/**
 * @file tunnel/network.ts
 * @description État réseau de l'hôte: interfaces UP (ip) et interfaces WireGuard (wg)
 */

import { TunnelError, missingTool } from '../errors.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_TOOL_TIMEOUT_MS, systemToolRunner, type ToolRunner } from '../utils/exec.js';

const WG_INSTALL_HINT = 'apt install wireguard-tools';

function toolFailed(tool: string, status: number | null, stderr: string): TunnelError {
  // stderr de ip/wg ne contient que des noms d'interfaces
  logger.debug(`${tool}: ${stderr.trim()}`);
  return new TunnelError('ExternalToolFailed', { tool, params: { tool, status: String(status) } });
}

/**
 * Interfaces réseau administrativement UP
 */
export interface NetworkStateQuery {
  listUpInterfaces(): string[];
}

/**
 * Interfaces WireGuard présentes dans le noyau
 */
export interface WireGuardState {
  listWireGuardInterfaces(): string[];
}

/**
 * Parse la sortie de `ip -o link show up`
 *
 * Format: "3: wg0: <POINTOPOINT,NOARP,UP,LOWER_UP> mtu 1420 ..."
 * Les suffixes "@parent" (veth, vlan) sont retirés.
 */
export function parseIpLinkOutput(output: string): string[] {
  const names: string[] = [];

  for (const line of output.split('\n')) {
    const parts = line.split(': ');
    if (parts.length < 2) continue;

    const name = parts[1].trim().split('@')[0];
    if (name) {
      names.push(name);
    }
  }

  return names;
}

/**
 * Parse la sortie de `wg show interfaces` (noms séparés par des blancs)
 */
export function parseWgInterfaces(output: string): string[] {
  return output.split(/\s+/).filter((name) => name.length > 0);
}

export class SystemNetworkState implements NetworkStateQuery, WireGuardState {
  constructor(
    private readonly runner: ToolRunner = systemToolRunner,
    private readonly timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS
  ) {}

  listUpInterfaces(): string[] {
    const result = this.runner.run('ip', ['-o', 'link', 'show', 'up'], {
      timeoutMs: this.timeoutMs,
      installHint: 'apt install iproute2',
    });
    if (result.status !== 0) {
      throw toolFailed('ip', result.status, result.stderr);
    }
    return parseIpLinkOutput(result.stdout);
  }

  listWireGuardInterfaces(): string[] {
    if (!this.runner.isInstalled('wg')) {
      throw missingTool('wg', WG_INSTALL_HINT);
    }
    const result = this.runner.run('wg', ['show', 'interfaces'], {
      timeoutMs: this.timeoutMs,
      installHint: WG_INSTALL_HINT,
    });
    if (result.status !== 0) {
      throw toolFailed('wg', result.status, result.stderr);
    }
    return parseWgInterfaces(result.stdout);
  }
}
