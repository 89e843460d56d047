/**
 * @file import/importer.ts
 * @description Import d'une configuration WireGuard (QR ou texte) vers le répertoire de configuration
 *
 * Pipeline: nom -> type de source -> extraction -> validation -> écriture atomique.
 * Le contenu importé peut contenir une clé privée: il n'est jamais loggé,
 * jamais inclus dans une erreur, jamais réaffiché après écriture.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { randomBytes } from 'crypto';
import { basename, dirname, join } from 'path';
import { TunnelError } from '../errors.js';
import { t } from '../i18n.js';
import { assertValidName, configPath } from '../names.js';
import { logger } from '../utils/logger.js';
import { detectSourceType, type MediaTypeInspector, type SourceType } from './detector.js';
import type { QrDecoder } from './qr.js';
import { validateConfigSyntax } from './validator.js';

// ============================================
// Types
// ============================================

export interface ConfigImporterOptions {
  /** Répertoire des configurations (ex: /etc/wireguard) */
  configDir: string;
  inspector: MediaTypeInspector;
  decoder: QrDecoder;
}

/** Avertissement non bloquant */
export interface ImportWarning {
  code: 'EmptySource';
  message: string;
}

export interface ImportResult {
  name: string;
  /** Chemin du fichier écrit */
  path: string;
  sourceType: SourceType;
  warnings: ImportWarning[];
}

// ============================================
// Écriture atomique
// ============================================

/**
 * Écrit via un fichier temporaire dans le même répertoire puis rename
 *
 * Un lecteur concurrent ne voit jamais de fichier partiel. Deux imports
 * simultanés du même nom: le dernier rename gagne.
 */
export function writeFileAtomic(path: string, content: string | Buffer): void {
  const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

  try {
    writeFileSync(tmpPath, content, { mode: 0o600 });
    renameSync(tmpPath, path);
  } catch (error) {
    try {
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    } catch (cleanupError) {
      logger.warn(`Fichier temporaire non supprimé: ${tmpPath}`, cleanupError);
    }
    throw new TunnelError('WriteFailed', { params: { path }, cause: error });
  }
}

// ============================================
// Importer
// ============================================

export class ConfigImporter {
  private readonly configDir: string;
  private readonly inspector: MediaTypeInspector;
  private readonly decoder: QrDecoder;

  constructor(options: ConfigImporterOptions) {
    this.configDir = options.configDir;
    this.inspector = options.inspector;
    this.decoder = options.decoder;
  }

  /**
   * Importe `sourcePath` sous `<configDir>/<baseName>.conf`
   */
  import(sourcePath: string, baseName: string): ImportResult {
    assertValidName(baseName);

    const sourceType = detectSourceType(sourcePath, this.inspector);
    const warnings: ImportWarning[] = [];
    // Texte: les octets d'origine sont écrits tels quels, seule la validation décode
    let content: string | Buffer;
    let text: string;

    if (sourceType === 'image') {
      logger.info(t('import.detectedImage', { path: sourcePath }));
      text = this.decoder.decode(sourcePath);
      content = text;
    } else {
      logger.info(t('import.detectedText', { path: sourcePath }));
      content = this.readSource(sourcePath);
      text = content.toString('utf-8');
      if (content.length === 0) {
        // Non bloquant: la validation échouera probablement ensuite
        const message = t('import.emptySource', { path: sourcePath });
        logger.warn(message);
        warnings.push({ code: 'EmptySource', message });
      }
    }

    const validation = validateConfigSyntax(text);
    if (!validation.ok) {
      throw new TunnelError('SyntaxInvalid', { violations: validation.violations });
    }
    logger.debug(t('import.syntaxOk'));

    const target = configPath(this.configDir, baseName);
    this.ensureConfigDir(target);
    writeFileAtomic(target, content);

    logger.info(t('import.saved', { path: target }));

    return { name: baseName, path: target, sourceType, warnings };
  }

  private readSource(path: string): Buffer {
    try {
      return readFileSync(path);
    } catch (error) {
      throw new TunnelError('SourceNotFound', { params: { path }, cause: error });
    }
  }

  private ensureConfigDir(target: string): void {
    try {
      if (!existsSync(this.configDir)) {
        mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
      }
    } catch (error) {
      throw new TunnelError('WriteFailed', { params: { path: target }, cause: error });
    }
  }
}
