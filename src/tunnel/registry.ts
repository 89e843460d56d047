/**
 * @file tunnel/registry.ts
 * @description Tunnels configurés (<configDir>/*.conf) et tunnel actif
 */

import { existsSync, readdirSync, type Dirent } from 'fs';
import { TunnelError } from '../errors.js';
import { CONF_EXTENSION } from '../names.js';
import type { NetworkStateQuery } from './network.js';

export interface InterfaceRegistryOptions {
  configDir: string;
  network: NetworkStateQuery;
}

export class InterfaceRegistry {
  private readonly configDir: string;
  private readonly network: NetworkStateQuery;

  constructor(options: InterfaceRegistryOptions) {
    this.configDir = options.configDir;
    this.network = options.network;
  }

  /**
   * Noms des configurations (fichiers .conf réguliers), triés
   * Relu à chaque appel: le disque fait foi.
   */
  listConfigured(): string[] {
    if (!existsSync(this.configDir)) {
      return [];
    }

    let entries: Dirent[];
    try {
      entries = readdirSync(this.configDir, { withFileTypes: true });
    } catch (error) {
      throw new TunnelError('ConfigDirUnreadable', { params: { path: this.configDir }, cause: error });
    }

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(CONF_EXTENSION))
      .map((entry) => entry.name.slice(0, -CONF_EXTENSION.length))
      .filter((name) => name.length > 0)
      .sort();
  }

  isConfigured(name: string): boolean {
    return this.listConfigured().includes(name);
  }

  /**
   * Premier tunnel configuré (ordre alphabétique) dont l'interface est UP
   *
   * Si plusieurs tunnels configurés sont UP, seul le premier est retourné.
   */
  findActive(): string | null {
    const up = new Set(this.network.listUpInterfaces());
    return this.listConfigured().find((name) => up.has(name)) ?? null;
  }
}
