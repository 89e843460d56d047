/**
 * @file i18n.ts
 * @description Internationalisation FR/EN pour wgmgr
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const currentDir = dirname(fileURLToPath(import.meta.url));

type Messages = Record<string, string>;

export type Lang = 'fr' | 'en';

let currentLang: Lang = 'fr';
let messages: Messages = {};

// Messages par défaut (français)
const defaultMessages: Messages = {
  // CLI
  'cli.error': 'Erreur:',
  'cli.cancelled': 'Choix invalide. Opération annulée.',

  // Status
  'status.connected': 'WireGuard: CONNECTÉ',
  'status.disconnected': 'WireGuard: DÉCONNECTÉ',
  'status.noActive': 'Aucun tunnel configuré n\'est actif',
  'status.noConfig': 'Aucune configuration WireGuard dans {dir}',

  // Sélection
  'select.available': 'Tunnels WireGuard disponibles',
  'select.activate': 'Tunnel à activer (numéro)',
  'select.deactivate': 'Tunnel à désactiver (numéro)',

  // Tunnel
  'tunnel.activating': 'Activation du tunnel {name}...',
  'tunnel.activated': 'Tunnel {name} activé',
  'tunnel.deactivating': 'Désactivation du tunnel {name}...',
  'tunnel.deactivated': 'Tunnel {name} désactivé',
  'tunnel.diagnostics': 'Diagnostic écrit dans {path}',

  // Import
  'import.detectedImage': 'Image QR détectée: {path}',
  'import.detectedText': 'Fichier texte détecté: {path}',
  'import.emptySource': 'Le fichier {path} est vide',
  'import.syntaxOk': 'Syntaxe de la configuration WireGuard: OK',
  'import.syntaxInvalid': 'Syntaxe de la configuration WireGuard invalide:',
  'import.saved': 'Configuration enregistrée dans {path}',
  'import.lines': 'lignes {lines}',

  // Validation
  'validate.missingInterface': 'Section [Interface] manquante',
  'validate.malformedSection': 'Sections mal formées (ex: "[[Section]" ou "[Section")',
  'validate.invalidEntry': 'Lignes au format "clé = valeur" invalide',

  // Errors
  'error.InsufficientPrivilege': 'Cette commande doit être exécutée en root (sudo)',
  'error.MissingExternalTool': 'La commande {tool} est introuvable. Installez-la avec: {hint}',
  'error.SourceNotFound': 'Le fichier source {path} n\'existe pas ou n\'est pas lisible',
  'error.InvalidName': 'Le nom {name} ne peut pas contenir "/", "\\" ou ".." et ne peut pas être vide',
  'error.NoPayloadFound': 'Aucun QR code valide dans {path} ou contenu vide',
  'error.EmptySource': 'Le fichier {path} est vide',
  'error.SyntaxInvalid': 'Configuration non enregistrée: erreurs de syntaxe',
  'error.WriteFailed': 'Impossible d\'enregistrer la configuration dans {path}',
  'error.ActivationFailed': 'Échec de l\'activation de {name}',
  'error.DeactivationFailed': 'Échec de la désactivation de {name}',
  'error.ExternalToolTimeout': 'La commande {tool} n\'a pas répondu à temps',
  'error.ExternalToolFailed': 'La commande {tool} a échoué (code {status})',
  'error.ConfigDirUnreadable': 'Impossible de lire le répertoire de configuration {path}',
  'error.ConfigInvalid': 'Configuration invalide: {error}',
  'error.configNotFound': 'Fichier de configuration non trouvé: {path}',
  'error.notConfigured': 'Aucune configuration nommée {name}',
};

/**
 * Résout les répertoires possibles des locales
 */
function localeDirs(): string[] {
  return [
    // Variable d'environnement
    process.env.WGMGR_LOCALES_DIR,
    // Installation système
    '/usr/lib/wgmgr/locales',
    // Développement (src/ ou dist/)
    join(currentDir, '..', 'locales'),
  ].filter((dir): dir is string => Boolean(dir));
}

function isLang(value: string | undefined): value is Lang {
  return value === 'fr' || value === 'en';
}

function isMessages(value: unknown): value is Messages {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every((message) => typeof message === 'string');
}

/**
 * Initialise l'i18n avec la langue spécifiée
 *
 * `fallback` (langue du fichier de configuration) ne s'applique que sans
 * option ni WGMGR_LANG.
 */
export function initI18n(lang?: string, fallback?: string): void {
  // Priorité: paramètre > env > configuration > défaut (fr)
  const requested = lang || process.env.WGMGR_LANG || fallback;
  currentLang = isLang(requested) ? requested : 'fr';

  try {
    for (const dir of localeDirs()) {
      const localePath = join(dir, `${currentLang}.json`);
      if (existsSync(localePath)) {
        const parsed: unknown = JSON.parse(readFileSync(localePath, 'utf-8'));
        messages = isMessages(parsed) ? parsed : defaultMessages;
        return;
      }
    }
    messages = defaultMessages;
  } catch {
    // Fichier de locale illisible: messages par défaut
    messages = defaultMessages;
  }
}

/**
 * Récupère un message traduit
 */
export function t(key: string, params?: Record<string, string | number>): string {
  let message = messages[key] || defaultMessages[key] || key;

  // Remplacer les paramètres {param}
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      message = message.replace(new RegExp(`\\{${k}\\}`, 'g'), () => String(v));
    }
  }

  return message;
}

/**
 * Récupère la langue courante
 */
export function getLang(): Lang {
  return currentLang;
}

initI18n();
