/**
 * @file names.ts
 * @description Noms de tunnels et chemins des fichiers .conf
 */

import { join } from 'path';
import { TunnelError } from './errors.js';

export const CONF_EXTENSION = '.conf';

/**
 * Un nom ne doit pas permettre de sortir du répertoire de configuration
 */
export function isValidName(name: string): boolean {
  return name.length > 0
    && !name.includes('/')
    && !name.includes('\\')
    && !name.includes('..');
}

/**
 * Lève InvalidName avant toute I/O si le nom est refusé
 */
export function assertValidName(name: string): void {
  if (!isValidName(name)) {
    throw new TunnelError('InvalidName', { params: { name } });
  }
}

export function configPath(configDir: string, name: string): string {
  return join(configDir, `${name}${CONF_EXTENSION}`);
}
