#!/usr/bin/env node
/**
 * @file cli.ts
 * @description CLI wgmgr avec Commander.js
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import * as readline from 'readline';
import { defaultConfig, loadConfig, getExampleConfig, type WgmgrConfig } from './config.js';
import { TunnelError } from './errors.js';
import { initI18n, t } from './i18n.js';
import { ConfigImporter } from './import/importer.js';
import { FileCommandInspector } from './import/detector.js';
import { ZbarQrDecoder } from './import/qr.js';
import { validateConfigSyntax, type SyntaxViolation } from './import/validator.js';
import { manageTunnels, type Prompter } from './manage.js';
import { requireRoot } from './privilege.js';
import { TunnelController } from './tunnel/controller.js';
import { SystemNetworkState } from './tunnel/network.js';
import { InterfaceRegistry } from './tunnel/registry.js';
import { systemToolRunner } from './utils/exec.js';
import { logger } from './utils/logger.js';

// ============================================
// Version
// ============================================

const VERSION = '1.0.0';

// ============================================
// Helpers
// ============================================

function colorize(text: string, color: 'green' | 'red' | 'yellow' | 'blue' | 'gray' | 'cyan' | 'bold'): string {
  if (process.env.NO_COLOR || !process.stdout.isTTY) {
    return text;
  }
  const colors: Record<string, string> = {
    green: '\x1b[32m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    gray: '\x1b[90m',
    cyan: '\x1b[36m',
    bold: '\x1b[1m',
  };
  return `${colors[color]}${text}\x1b[0m`;
}

/**
 * Affiche les violations de syntaxe (numéros de lignes uniquement, jamais leur contenu)
 */
function printViolations(violations: SyntaxViolation[]): void {
  for (const violation of violations) {
    const where = violation.lines.length > 0
      ? ` (${t('import.lines', { lines: violation.lines.join(', ') })})`
      : '';
    console.error(`  - ${violation.message}${where}`);
  }
}

/**
 * Point de sortie commun des erreurs de commande
 */
function fail(error: unknown): never {
  if (error instanceof TunnelError) {
    console.error(colorize(t('cli.error'), 'red'), error.message);
    if (error.code === 'SyntaxInvalid') {
      console.error(t('import.syntaxInvalid'));
      printViolations(error.violations);
    }
    if (error.diagnosticsPath) {
      console.error('  ' + t('tunnel.diagnostics', { path: error.diagnosticsPath }));
    }
    logger.debug(`code: ${error.code}`, error.cause ?? '');
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(colorize(t('cli.error'), 'red'), message);
  }
  process.exit(1);
}

/**
 * Exécute une commande et convertit toute erreur en code de sortie 1
 */
function guarded<A extends unknown[]>(action: (...args: A) => void | Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      fail(error);
    }
  };
}

// ============================================
// Services
// ============================================

// Remplacée par loadConfig() dans le hook preAction
let config: WgmgrConfig = defaultConfig;

function network(): SystemNetworkState {
  return new SystemNetworkState(systemToolRunner, config.tools.timeoutMs);
}

function registry(): InterfaceRegistry {
  return new InterfaceRegistry({ configDir: config.wireguard.configDir, network: network() });
}

function controller(): TunnelController {
  return new TunnelController({
    runner: systemToolRunner,
    timeoutMs: config.tools.wgQuickTimeoutMs,
    diagnosticsDir: config.logging.diagnosticsDir,
  });
}

function importer(): ConfigImporter {
  return new ConfigImporter({
    configDir: config.wireguard.configDir,
    inspector: new FileCommandInspector(systemToolRunner, config.tools.timeoutMs),
    decoder: new ZbarQrDecoder(systemToolRunner, config.tools.decodeTimeoutMs),
  });
}

// ============================================
// Prompt
// ============================================

/**
 * Sélection numérotée sur le terminal (choix invalide = annulation)
 */
const terminalPrompter: Prompter = {
  select(titleKey: string, choices: string[]): Promise<string | null> {
    console.log('');
    console.log(colorize(`--- ${t('select.available')} ---`, 'blue'));
    choices.forEach((choice, i) => console.log(`  ${i + 1}) ${choice}`));
    console.log('-----------------------------------');

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
      rl.question(`${t(titleKey)}: `, (answer) => {
        rl.close();
        const trimmed = answer.trim();
        const choice = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
        if (Number.isNaN(choice) || choice < 1 || choice > choices.length) {
          console.log(colorize(t('cli.cancelled'), 'yellow'));
          resolve(null);
          return;
        }
        resolve(choices[choice - 1]);
      });
    });
  },
};

// ============================================
// Commands
// ============================================

async function manageCommand(): Promise<void> {
  requireRoot();

  const state = network();
  const outcome = await manageTunnels({
    registry: new InterfaceRegistry({ configDir: config.wireguard.configDir, network: state }),
    controller: controller(),
    wireguard: state,
    prompter: terminalPrompter,
  });

  switch (outcome.action) {
    case 'activated':
      console.log(colorize('✓', 'green'), t('tunnel.activated', { name: outcome.name }));
      return;
    case 'deactivated':
      console.log(colorize('✓', 'green'), t('tunnel.deactivated', { name: outcome.name }));
      return;
    case 'none':
      console.log(t(outcome.connected ? 'status.connected' : 'status.disconnected'));
      if (outcome.reason === 'no-config') {
        console.error(colorize(t('cli.error'), 'red'), t('status.noConfig', { dir: config.wireguard.configDir }));
      }
      process.exit(1);
  }
}

async function importCommand(source: string, name: string, options: { json?: boolean }): Promise<void> {
  requireRoot();

  const result = importer().import(source, name);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(colorize('✓', 'green'), t('import.saved', { path: result.path }));
}

async function listCommand(options: { json?: boolean }): Promise<void> {
  requireRoot();

  const names = registry().listConfigured();

  if (options.json) {
    console.log(JSON.stringify({ tunnels: names }, null, 2));
    return;
  }

  for (const name of names) {
    console.log(name);
  }
}

async function activeCommand(options: { json?: boolean }): Promise<void> {
  requireRoot();

  const active = registry().findActive();

  if (options.json) {
    console.log(JSON.stringify({ active }, null, 2));
    return;
  }

  if (active) {
    console.log(active);
  }
}

async function upCommand(name: string): Promise<void> {
  requireRoot();

  if (!registry().isConfigured(name)) {
    throw new Error(t('error.notConfigured', { name }));
  }

  controller().activate(name);
  console.log(colorize('✓', 'green'), t('tunnel.activated', { name }));
}

async function downCommand(name: string | undefined): Promise<void> {
  requireRoot();

  const tunnels = registry();
  const target = name ?? tunnels.findActive();
  if (!target) {
    throw new Error(t('status.noActive'));
  }
  if (!tunnels.isConfigured(target)) {
    throw new Error(t('error.notConfigured', { name: target }));
  }

  controller().deactivate(target);
  console.log(colorize('✓', 'green'), t('tunnel.deactivated', { name: target }));
}

async function validateCommand(file: string): Promise<void> {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new TunnelError('SourceNotFound', { params: { path: file }, cause: error });
  }

  const result = validateConfigSyntax(content);
  if (!result.ok) {
    throw new TunnelError('SyntaxInvalid', { violations: result.violations });
  }
  console.log(colorize('✓', 'green'), t('import.syntaxOk'));
}

function configExampleCommand(): void {
  console.log(getExampleConfig());
}

// ============================================
// Main
// ============================================

const program = new Command();

program
  .name('wgmgr')
  .description('Gestionnaire de tunnels WireGuard')
  .version(VERSION, '-v, --version', 'Afficher la version')
  .option('--lang <lang>', 'Langue (fr/en)')
  .option('--verbose', 'Activer les logs de debug')
  .option('-c, --config <path>', 'Chemin de la configuration')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ lang?: string; verbose?: boolean; config?: string }>();
    try {
      config = loadConfig(opts.config);
    } catch (error) {
      fail(error);
    }
    initI18n(opts.lang, config.lang);
    logger.configure({ level: config.logging.level, prefix: 'wgmgr' });
    logger.initFromCLI({ verbose: opts.verbose });
  })
  .action(guarded(manageCommand));

program
  .command('manage')
  .description('Déconnecter le tunnel actif ou choisir un tunnel à connecter')
  .action(guarded(manageCommand));

program
  .command('import <source> <name>')
  .description('Importer une configuration (image QR ou fichier texte) sous <name>.conf')
  .option('-j, --json', 'Sortie JSON')
  .action(guarded(importCommand));

program
  .command('list')
  .description('Lister les tunnels configurés')
  .option('-j, --json', 'Sortie JSON')
  .action(guarded(listCommand));

program
  .command('active')
  .description('Afficher le tunnel actif')
  .option('-j, --json', 'Sortie JSON')
  .action(guarded(activeCommand));

program
  .command('up <name>')
  .description('Activer un tunnel')
  .action(guarded(upCommand));

program
  .command('down [name]')
  .description('Désactiver un tunnel (le tunnel actif par défaut)')
  .action(guarded(downCommand));

program
  .command('validate <file>')
  .description('Vérifier la syntaxe d\'une configuration sans l\'importer')
  .action(guarded(validateCommand));

program
  .command('config-example')
  .description('Afficher un exemple de configuration')
  .action(configExampleCommand);

program.parseAsync().catch(fail);
