/**
 * @file privilege.ts
 * @description Vérification des privilèges root
 */

import { TunnelError } from './errors.js';

export function isRoot(): boolean {
  return process.getuid?.() === 0;
}

/**
 * Échoue immédiatement sans privilèges: /etc/wireguard et wg-quick exigent root
 */
export function requireRoot(check: () => boolean = isRoot): void {
  if (!check()) {
    throw new TunnelError('InsufficientPrivilege');
  }
}
