/**
 * @file import/validator.ts
 * @description Validation syntaxique des configurations WireGuard
 *
 * Validation purement syntaxique (forme des lignes), pas sémantique: les
 * directives inconnues sont acceptées, les clés et adresses ne sont pas
 * vérifiées. Pas d'I/O, même entrée => même résultat.
 */

import { t } from '../i18n.js';

// ============================================
// Types
// ============================================

export type ViolationKind = 'missing-interface' | 'malformed-section' | 'invalid-entry';

export interface SyntaxViolation {
  kind: ViolationKind;
  /** Message lisible (traduit) */
  message: string;
  /** Numéros de lignes concernés (1-based), affichables sans risque */
  lines: number[];
}

export interface ValidationResult {
  ok: boolean;
  violations: SyntaxViolation[];
}

/**
 * Ligne conservée après normalisation
 */
export interface NormalizedLine {
  /** Numéro de ligne dans le texte source (1-based) */
  number: number;
  text: string;
}

export type LineClass =
  | { kind: 'section'; name: string }
  | { kind: 'entry'; key: string; value: string }
  | { kind: 'invalid' };

/**
 * Section entre crochets et ses lignes (diagnostic uniquement)
 */
export interface ParsedSection {
  name: string;
  lines: NormalizedLine[];
}

export const INTERFACE_SECTION = 'Interface';

// ============================================
// Classification des lignes
// ============================================

function isIdentifierChar(char: string): boolean {
  return (char >= 'A' && char <= 'Z')
    || (char >= 'a' && char <= 'z')
    || (char >= '0' && char <= '9')
    || char === '_';
}

function isBlank(char: string): boolean {
  return char.trim() === '';
}

/**
 * Longueur de l'identifiant [A-Za-z0-9_]+ qui commence à `start`
 */
function identifierLength(text: string, start: number): number {
  let end = start;
  while (end < text.length && isIdentifierChar(text[end])) {
    end++;
  }
  return end - start;
}

/**
 * En-tête de section: "[" identifiant "]", rien avant ni après
 */
export function matchSectionHeader(line: string): string | null {
  if (line.length < 3 || line[0] !== '[' || line[line.length - 1] !== ']') {
    return null;
  }
  const length = identifierLength(line, 1);
  if (length === 0 || length !== line.length - 2) {
    return null;
  }
  return line.slice(1, -1);
}

/**
 * Entrée: identifiant, blancs, "=", blancs, valeur quelconque (éventuellement vide)
 */
export function matchEntry(line: string): { key: string; value: string } | null {
  const keyLength = identifierLength(line, 0);
  if (keyLength === 0) {
    return null;
  }

  let index = keyLength;
  while (index < line.length && isBlank(line[index])) {
    index++;
  }
  if (line[index] !== '=') {
    return null;
  }

  return {
    key: line.slice(0, keyLength),
    value: line.slice(index + 1).trim(),
  };
}

export function classifyLine(line: string): LineClass {
  const section = matchSectionHeader(line);
  if (section !== null) {
    return { kind: 'section', name: section };
  }

  const entry = matchEntry(line);
  if (entry) {
    return { kind: 'entry', ...entry };
  }

  return { kind: 'invalid' };
}

// ============================================
// Normalisation
// ============================================

/**
 * Supprime les lignes vides et les commentaires (#), trim des autres
 */
export function normalizeConfig(rawText: string): NormalizedLine[] {
  const result: NormalizedLine[] = [];

  rawText.split('\n').forEach((line, index) => {
    const text = line.trim();
    if (text === '' || text.startsWith('#')) {
      return;
    }
    result.push({ number: index + 1, text });
  });

  return result;
}

/**
 * Regroupe les lignes normalisées par section
 * Les lignes qui précèdent le premier en-tête sont ignorées.
 */
export function splitSections(rawText: string): ParsedSection[] {
  const sections: ParsedSection[] = [];
  let current: ParsedSection | null = null;

  for (const line of normalizeConfig(rawText)) {
    const classified = classifyLine(line.text);
    if (classified.kind === 'section') {
      current = { name: classified.name, lines: [] };
      sections.push(current);
    } else if (current) {
      current.lines.push(line);
    }
  }

  return sections;
}

// ============================================
// Validation
// ============================================

/**
 * Valide la syntaxe d'une configuration WireGuard
 *
 * Ordre des violations: section [Interface] absente, sections mal formées,
 * lignes "clé = valeur" invalides.
 */
export function validateConfigSyntax(rawText: string): ValidationResult {
  const lines = normalizeConfig(rawText);
  const classified = lines.map((line) => ({ line, class: classifyLine(line.text) }));
  const violations: SyntaxViolation[] = [];

  const hasInterface = classified.some(
    (c) => c.class.kind === 'section' && c.class.name === INTERFACE_SECTION
  );
  if (!hasInterface) {
    violations.push({
      kind: 'missing-interface',
      message: t('validate.missingInterface'),
      lines: [],
    });
  }

  // Un "[" hors d'un en-tête bien formé
  const malformed = classified
    .filter((c) => c.class.kind !== 'section' && c.line.text.includes('['))
    .map((c) => c.line.number);
  if (malformed.length > 0) {
    violations.push({
      kind: 'malformed-section',
      message: t('validate.malformedSection'),
      lines: malformed,
    });
  }

  const invalid = classified
    .filter((c) => c.class.kind === 'invalid')
    .map((c) => c.line.number);
  if (invalid.length > 0) {
    violations.push({
      kind: 'invalid-entry',
      message: t('validate.invalidEntry'),
      lines: invalid,
    });
  }

  return { ok: violations.length === 0, violations };
}
