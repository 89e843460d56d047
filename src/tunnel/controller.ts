/**
 * @file tunnel/controller.ts
 * @description Activation / désactivation des tunnels via wg-quick
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { TunnelError, isTunnelError, missingTool, type TunnelErrorCode } from '../errors.js';
import { t } from '../i18n.js';
import { assertValidName } from '../names.js';
import { systemToolRunner, type ToolRunner } from '../utils/exec.js';
import { logger } from '../utils/logger.js';

const WG_QUICK = 'wg-quick';
const WG_INSTALL_HINT = 'apt install wireguard-tools';

export const DEFAULT_WG_QUICK_TIMEOUT_MS = 30000;

export type TunnelAction = 'up' | 'down';

export interface TunnelControllerOptions {
  runner?: ToolRunner;
  timeoutMs?: number;
  /** Répertoire des diagnostics wg-quick (stderr) en cas d'échec */
  diagnosticsDir?: string;
}

export interface TunnelActionResult {
  name: string;
  action: TunnelAction;
}

const FAILURE_CODES: Record<TunnelAction, TunnelErrorCode> = {
  up: 'ActivationFailed',
  down: 'DeactivationFailed',
};

/**
 * Pilote wg-quick pour un tunnel configuré
 *
 * Ne modifie jamais le fichier .conf: wg-quick le lit lui-même.
 */
export class TunnelController {
  private readonly runner: ToolRunner;
  private readonly timeoutMs: number;
  private readonly diagnosticsDir?: string;

  constructor(options: TunnelControllerOptions = {}) {
    this.runner = options.runner ?? systemToolRunner;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WG_QUICK_TIMEOUT_MS;
    this.diagnosticsDir = options.diagnosticsDir;
  }

  activate(name: string): TunnelActionResult {
    return this.run('up', name);
  }

  deactivate(name: string): TunnelActionResult {
    return this.run('down', name);
  }

  private run(action: TunnelAction, name: string): TunnelActionResult {
    assertValidName(name);

    if (!this.runner.isInstalled(WG_QUICK)) {
      throw missingTool(WG_QUICK, WG_INSTALL_HINT);
    }

    const failureCode = FAILURE_CODES[action];
    logger.info(t(action === 'up' ? 'tunnel.activating' : 'tunnel.deactivating', { name }));

    let status: number | null;
    let stderr: string;
    try {
      ({ status, stderr } = this.runner.run(WG_QUICK, [action, name], {
        timeoutMs: this.timeoutMs,
        installHint: WG_INSTALL_HINT,
      }));
    } catch (error) {
      if (isTunnelError(error, 'ExternalToolTimeout')) {
        throw new TunnelError(failureCode, { tool: WG_QUICK, params: { name }, cause: error });
      }
      throw error;
    }

    if (status !== 0) {
      const diagnosticsPath = this.saveDiagnostics(action, name, status, stderr);
      throw new TunnelError(failureCode, {
        tool: WG_QUICK,
        params: { name },
        diagnosticsPath,
      });
    }

    logger.info(t(action === 'up' ? 'tunnel.activated' : 'tunnel.deactivated', { name }));
    return { name, action };
  }

  /**
   * Sauvegarde stderr de wg-quick pour consultation par l'administrateur
   *
   * Seul le chemin est remonté: la sortie n'est pas supposée affichable.
   */
  private saveDiagnostics(
    action: TunnelAction,
    name: string,
    status: number | null,
    stderr: string
  ): string | undefined {
    if (!this.diagnosticsDir) {
      return undefined;
    }

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const path = join(this.diagnosticsDir, `${WG_QUICK}-${action}-${name}-${stamp}.log`);

    try {
      if (!existsSync(this.diagnosticsDir)) {
        mkdirSync(this.diagnosticsDir, { recursive: true, mode: 0o700 });
      }
      writeFileSync(path, `# ${WG_QUICK} ${action} ${name}: exit ${status}\n${stderr}`, { mode: 0o600 });
      logger.debug(t('tunnel.diagnostics', { path }));
      return path;
    } catch (error) {
      logger.warn(`Diagnostic non enregistré: ${path}`, error);
      return undefined;
    }
  }
}
