/**
 * @file errors.ts
 * @description Taxonomie des erreurs wgmgr
 *
 * Les messages ne contiennent que des chemins, des noms de tunnels ou de
 * commandes: jamais le contenu d'une configuration.
 */

import { t } from './i18n.js';
import type { SyntaxViolation } from './import/validator.js';

// ============================================
// Types
// ============================================

export type TunnelErrorCode =
  | 'InsufficientPrivilege'
  | 'MissingExternalTool'
  | 'SourceNotFound'
  | 'InvalidName'
  | 'NoPayloadFound'
  | 'EmptySource'
  | 'SyntaxInvalid'
  | 'WriteFailed'
  | 'ActivationFailed'
  | 'DeactivationFailed'
  | 'ExternalToolTimeout'
  | 'ExternalToolFailed'
  | 'ConfigDirUnreadable'
  | 'ConfigInvalid';

export interface TunnelErrorDetails {
  /** Paramètres du message traduit ({path}, {name}, {tool}, {hint}...) */
  params?: Record<string, string | number>;
  /** Violations de syntaxe (SyntaxInvalid) */
  violations?: SyntaxViolation[];
  /** Fichier de diagnostic de l'outil externe (Activation/DeactivationFailed) */
  diagnosticsPath?: string;
  /** Commande externe concernée */
  tool?: string;
  cause?: unknown;
}

// ============================================
// Error
// ============================================

export class TunnelError extends Error {
  readonly code: TunnelErrorCode;
  readonly violations: SyntaxViolation[];
  readonly diagnosticsPath?: string;
  readonly tool?: string;

  constructor(code: TunnelErrorCode, details: TunnelErrorDetails = {}) {
    super(t(`error.${code}`, details.params), { cause: details.cause });
    this.name = 'TunnelError';
    this.code = code;
    this.violations = details.violations ?? [];
    this.diagnosticsPath = details.diagnosticsPath;
    this.tool = details.tool;
  }

  /**
   * L'erreur a-t-elle pour origine l'expiration d'une commande externe ?
   */
  get timedOut(): boolean {
    return this.code === 'ExternalToolTimeout'
      || (this.cause instanceof TunnelError && this.cause.code === 'ExternalToolTimeout');
  }
}

export function isTunnelError(error: unknown, code?: TunnelErrorCode): error is TunnelError {
  return error instanceof TunnelError && (code === undefined || error.code === code);
}

/**
 * Commande externe absente, avec indication d'installation
 */
export function missingTool(tool: string, hint: string): TunnelError {
  return new TunnelError('MissingExternalTool', { tool, params: { tool, hint } });
}
