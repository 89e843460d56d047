import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TunnelError } from '../errors.js';
import { logger, type LogSink } from '../utils/logger.js';
import type { RunToolOptions, ToolResult, ToolRunner } from '../utils/exec.js';
import { TunnelController } from './controller.js';

class FakeWgQuick implements ToolRunner {
  calls: Array<{ args: string[]; timeoutMs: number }> = [];
  installed = true;
  constructor(private readonly outcome: ToolResult | TunnelError) {}

  run(command: string, args: string[], options: RunToolOptions): ToolResult {
    expect(command).toBe('wg-quick');
    this.calls.push({ args, timeoutMs: options.timeoutMs });
    if (this.outcome instanceof TunnelError) throw this.outcome;
    return this.outcome;
  }

  isInstalled(command: string): boolean {
    return this.installed && command === 'wg-quick';
  }
}

function caught(fn: () => unknown): TunnelError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TunnelError) return error;
    throw error;
  }
  throw new Error('aucune erreur levée');
}

const OK: ToolResult = { status: 0, stdout: '', stderr: '[#] ip link add home type wireguard\n' };
const FAILED: ToolResult = { status: 1, stdout: '', stderr: 'RTNETLINK answers: File exists\n' };

describe('TunnelController', () => {
  let workDir: string;
  let previousSink: LogSink;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'wgmgr-ctl-'));
    previousSink = logger.setSink(() => undefined);
  });

  afterEach(() => {
    logger.setSink(previousSink);
    rmSync(workDir, { recursive: true, force: true });
  });

  it('active un tunnel via wg-quick up', () => {
    const runner = new FakeWgQuick(OK);
    const controller = new TunnelController({ runner, timeoutMs: 5000 });

    expect(controller.activate('home')).toEqual({ name: 'home', action: 'up' });
    expect(runner.calls).toEqual([{ args: ['up', 'home'], timeoutMs: 5000 }]);
  });

  it('désactive un tunnel via wg-quick down', () => {
    const runner = new FakeWgQuick(OK);

    expect(new TunnelController({ runner }).deactivate('home')).toEqual({ name: 'home', action: 'down' });
    expect(runner.calls).toEqual([{ args: ['down', 'home'], timeoutMs: 30000 }]);
  });

  it('ActivationFailed avec le chemin du diagnostic sur code de sortie non nul', () => {
    const diagnosticsDir = join(workDir, 'log');
    const controller = new TunnelController({ runner: new FakeWgQuick(FAILED), diagnosticsDir });

    const error = caught(() => controller.activate('home'));

    expect(error.code).toBe('ActivationFailed');
    expect(error.diagnosticsPath).toBeDefined();
    expect(readdirSync(diagnosticsDir)).toHaveLength(1);
    const path = error.diagnosticsPath ?? '';
    expect(path.startsWith(join(diagnosticsDir, 'wg-quick-up-home-'))).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe('# wg-quick up home: exit 1\nRTNETLINK answers: File exists\n');
    expect(error.message).not.toContain('RTNETLINK');
  });

  it('DeactivationFailed sans diagnostic si aucun répertoire n\'est configuré', () => {
    const error = caught(() => new TunnelController({ runner: new FakeWgQuick(FAILED) }).deactivate('home'));

    expect(error.code).toBe('DeactivationFailed');
    expect(error.diagnosticsPath).toBeUndefined();
  });

  it('traite l\'expiration du délai comme un échec de l\'opération', () => {
    const timeout = new TunnelError('ExternalToolTimeout', { tool: 'wg-quick', params: { tool: 'wg-quick' } });

    const up = caught(() => new TunnelController({ runner: new FakeWgQuick(timeout) }).activate('home'));
    const down = caught(() => new TunnelController({ runner: new FakeWgQuick(timeout) }).deactivate('home'));

    expect(up.code).toBe('ActivationFailed');
    expect(up.timedOut).toBe(true);
    expect(down.code).toBe('DeactivationFailed');
    expect(down.timedOut).toBe(true);
  });

  it('MissingExternalTool sans wg-quick', () => {
    const runner = new FakeWgQuick(OK);
    runner.installed = false;

    const error = caught(() => new TunnelController({ runner }).activate('home'));

    expect(error.code).toBe('MissingExternalTool');
    expect(error.tool).toBe('wg-quick');
    expect(runner.calls).toEqual([]);
  });

  it('refuse un nom qui sortirait du répertoire de configuration', () => {
    const runner = new FakeWgQuick(OK);

    const error = caught(() => new TunnelController({ runner }).activate('../../tmp/evil'));

    expect(error.code).toBe('InvalidName');
    expect(runner.calls).toEqual([]);
    expect(existsSync(join(workDir, 'log'))).toBe(false);
  });
});
