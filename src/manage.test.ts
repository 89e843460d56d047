import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { manageTunnels, type ManageContext, type Prompter } from './manage.js';
import { TunnelController } from './tunnel/controller.js';
import { InterfaceRegistry } from './tunnel/registry.js';
import type { ToolResult, ToolRunner } from './utils/exec.js';

class RecordingWgQuick implements ToolRunner {
  calls: string[][] = [];
  run(_command: string, args: string[]): ToolResult {
    this.calls.push(args);
    return { status: 0, stdout: '', stderr: '' };
  }
  isInstalled(): boolean {
    return true;
  }
}

class ScriptedPrompter implements Prompter {
  prompts: Array<{ titleKey: string; choices: string[] }> = [];
  constructor(private readonly answer: string | null) {}
  async select(titleKey: string, choices: string[]): Promise<string | null> {
    this.prompts.push({ titleKey, choices });
    return this.answer;
  }
}

describe('manageTunnels', () => {
  let configDir: string;
  let wgQuick: RecordingWgQuick;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'wgmgr-manage-'));
    wgQuick = new RecordingWgQuick();
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  function conf(...names: string[]): void {
    for (const name of names) {
      writeFileSync(join(configDir, `${name}.conf`), '[Interface]\n');
    }
  }

  function context(options: { up: string[]; wireguard: string[]; prompter: Prompter }): ManageContext {
    return {
      registry: new InterfaceRegistry({ configDir, network: { listUpInterfaces: () => options.up } }),
      controller: new TunnelController({ runner: wgQuick }),
      wireguard: { listWireGuardInterfaces: () => options.wireguard },
      prompter: options.prompter,
    };
  }

  it('désactive le tunnel actif sans poser de question', async () => {
    conf('home', 'office');
    const prompter = new ScriptedPrompter(null);

    const outcome = await manageTunnels(context({ up: ['eth0', 'office'], wireguard: ['office'], prompter }));

    expect(outcome).toEqual({ action: 'deactivated', name: 'office', selected: false });
    expect(wgQuick.calls).toEqual([['down', 'office']]);
    expect(prompter.prompts).toEqual([]);
  });

  it('demande quel tunnel désactiver si aucune interface active n\'est configurée', async () => {
    conf('home', 'office');
    const prompter = new ScriptedPrompter('home');

    const outcome = await manageTunnels(context({ up: ['eth0', 'wg9'], wireguard: ['wg9'], prompter }));

    expect(outcome).toEqual({ action: 'deactivated', name: 'home', selected: true });
    expect(prompter.prompts).toEqual([{ titleKey: 'select.deactivate', choices: ['home', 'office'] }]);
    expect(wgQuick.calls).toEqual([['down', 'home']]);
  });

  it('active le tunnel choisi quand WireGuard est inactif', async () => {
    conf('office', 'home');
    const prompter = new ScriptedPrompter('office');

    const outcome = await manageTunnels(context({ up: ['eth0'], wireguard: [], prompter }));

    expect(outcome).toEqual({ action: 'activated', name: 'office' });
    expect(prompter.prompts).toEqual([{ titleKey: 'select.activate', choices: ['home', 'office'] }]);
    expect(wgQuick.calls).toEqual([['up', 'office']]);
  });

  it('ne fait rien si aucune configuration n\'existe', async () => {
    const prompter = new ScriptedPrompter('home');

    const outcome = await manageTunnels(context({ up: [], wireguard: [], prompter }));

    expect(outcome).toEqual({ action: 'none', reason: 'no-config', connected: false });
    expect(prompter.prompts).toEqual([]);
    expect(wgQuick.calls).toEqual([]);
  });

  it('annulation ou choix hors liste', async () => {
    conf('home');

    for (const answer of [null, 'other']) {
      const outcome = await manageTunnels(context({ up: [], wireguard: [], prompter: new ScriptedPrompter(answer) }));
      expect(outcome).toEqual({ action: 'none', reason: 'cancelled', connected: false });
    }
    const connected = await manageTunnels(context({ up: ['wg9'], wireguard: ['wg9'], prompter: new ScriptedPrompter(null) }));
    expect(connected).toEqual({ action: 'none', reason: 'cancelled', connected: true });
    expect(wgQuick.calls).toEqual([]);
  });
});
