/**
 * @file manage.ts
 * @description Bascule connexion/déconnexion (commande sans argument)
 *
 * - WireGuard actif: désactive le tunnel configuré actif, sinon demande lequel
 * - WireGuard inactif: demande quel tunnel activer
 */

import type { TunnelController } from './tunnel/controller.js';
import type { WireGuardState } from './tunnel/network.js';
import type { InterfaceRegistry } from './tunnel/registry.js';

/**
 * Sélection interactive d'un élément (null = annulé)
 * `titleKey` est une clé i18n, traduite par l'implémentation.
 */
export interface Prompter {
  select(titleKey: string, choices: string[]): Promise<string | null>;
}

export interface ManageContext {
  registry: InterfaceRegistry;
  controller: TunnelController;
  wireguard: WireGuardState;
  prompter: Prompter;
}

export type ManageOutcome =
  | { action: 'activated'; name: string }
  | { action: 'deactivated'; name: string; selected: boolean }
  | { action: 'none'; reason: 'no-config' | 'cancelled'; connected: boolean };

export async function manageTunnels(ctx: ManageContext): Promise<ManageOutcome> {
  const connected = ctx.wireguard.listWireGuardInterfaces().length > 0;

  if (connected) {
    const active = ctx.registry.findActive();
    if (active) {
      ctx.controller.deactivate(active);
      return { action: 'deactivated', name: active, selected: false };
    }

    // WireGuard tourne mais aucune interface ne correspond à une configuration
    const name = await selectConfigured(ctx, 'select.deactivate');
    if (name.kind !== 'selected') {
      return { action: 'none', reason: name.kind, connected };
    }
    ctx.controller.deactivate(name.value);
    return { action: 'deactivated', name: name.value, selected: true };
  }

  const name = await selectConfigured(ctx, 'select.activate');
  if (name.kind !== 'selected') {
    return { action: 'none', reason: name.kind, connected };
  }
  ctx.controller.activate(name.value);
  return { action: 'activated', name: name.value };
}

type Selection =
  | { kind: 'selected'; value: string }
  | { kind: 'no-config' }
  | { kind: 'cancelled' };

async function selectConfigured(ctx: ManageContext, titleKey: string): Promise<Selection> {
  const configured = ctx.registry.listConfigured();
  if (configured.length === 0) {
    return { kind: 'no-config' };
  }

  const value = await ctx.prompter.select(titleKey, configured);
  if (value === null || !configured.includes(value)) {
    return { kind: 'cancelled' };
  }
  return { kind: 'selected', value };
}
