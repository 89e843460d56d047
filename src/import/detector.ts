/**
 * @file import/detector.ts
 * @description Détection du type de source (image QR ou texte) par type MIME
 */

import { accessSync, constants, statSync } from 'fs';
import { TunnelError } from '../errors.js';
import { DEFAULT_TOOL_TIMEOUT_MS, systemToolRunner, type ToolRunner } from '../utils/exec.js';

export type SourceType = 'image' | 'text';

/**
 * Donne le type MIME d'un fichier d'après son contenu (best effort)
 */
export interface MediaTypeInspector {
  mediaType(path: string): string;
}

/**
 * Inspecteur basé sur `file --mime-type -b`
 */
export class FileCommandInspector implements MediaTypeInspector {
  constructor(
    private readonly runner: ToolRunner = systemToolRunner,
    private readonly timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS
  ) {}

  mediaType(path: string): string {
    const result = this.runner.run('file', ['--mime-type', '-b', path], {
      timeoutMs: this.timeoutMs,
      installHint: 'apt install file',
    });
    // `file` sort en 0 même sur un type inconnu; sinon on retombe sur du texte
    return result.status === 0 ? result.stdout.trim() : 'application/octet-stream';
  }
}

/**
 * Vérifie que le chemin désigne un fichier régulier lisible
 */
export function assertReadableFile(path: string): void {
  try {
    if (!statSync(path).isFile()) {
      throw new TunnelError('SourceNotFound', { params: { path } });
    }
    accessSync(path, constants.R_OK);
  } catch (error) {
    if (error instanceof TunnelError) throw error;
    throw new TunnelError('SourceNotFound', { params: { path }, cause: error });
  }
}

/**
 * Classe la source: tout type `image/*` est une image, le reste du texte
 */
export function detectSourceType(path: string, inspector: MediaTypeInspector): SourceType {
  assertReadableFile(path);
  return inspector.mediaType(path).startsWith('image/') ? 'image' : 'text';
}
