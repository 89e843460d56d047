/**
 * @file import/qr.ts
 * @description Décodage des QR codes via zbarimg
 */

import { TunnelError, missingTool } from '../errors.js';
import { DEFAULT_TOOL_TIMEOUT_MS, systemToolRunner, type ToolRunner } from '../utils/exec.js';

const ZBARIMG = 'zbarimg';
const ZBAR_INSTALL_HINT = 'apt install zbar-tools';

/** Code de sortie de zbarimg quand aucun symbole n'est trouvé */
const ZBAR_NO_SYMBOL = 4;

/**
 * Extrait le contenu brut d'un QR code
 */
export interface QrDecoder {
  decode(path: string): string;
}

/**
 * Décodeur basé sur `zbarimg --quiet --raw`
 */
export class ZbarQrDecoder implements QrDecoder {
  constructor(
    private readonly runner: ToolRunner = systemToolRunner,
    private readonly timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS
  ) {}

  decode(path: string): string {
    // Vérifier la présence du décodeur avant toute extraction
    if (!this.runner.isInstalled(ZBARIMG)) {
      throw missingTool(ZBARIMG, ZBAR_INSTALL_HINT);
    }

    const result = this.runner.run(ZBARIMG, ['--quiet', '--raw', path], {
      timeoutMs: this.timeoutMs,
      installHint: ZBAR_INSTALL_HINT,
    });

    if (result.status !== 0) {
      // Hors "aucun symbole", garder le code de sortie pour le debug
      const cause = result.status === ZBAR_NO_SYMBOL
        ? undefined
        : new Error(`${ZBARIMG} exit ${result.status}: ${result.stderr.trim()}`);
      throw new TunnelError('NoPayloadFound', { tool: ZBARIMG, params: { path }, cause });
    }

    // zbarimg termine chaque symbole par un saut de ligne
    const payload = result.stdout.replace(/\r?\n$/, '');
    if (payload.trim() === '') {
      throw new TunnelError('NoPayloadFound', { tool: ZBARIMG, params: { path } });
    }

    return payload;
  }
}
