import { describe, expect, it } from 'vitest';
import { TunnelError } from '../errors.js';
import { isToolInstalled, runTool } from './exec.js';

const ABSENT = 'wgmgr-absent-tool';

function runError(fn: () => unknown): TunnelError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TunnelError) return error;
    throw error;
  }
  throw new Error('aucune erreur levée');
}

describe('runTool', () => {
  it('retourne stdout et le code de sortie', () => {
    const result = runTool(process.execPath, ['-e', "process.stdout.write('ok')"], { timeoutMs: 10000 });
    expect(result).toEqual({ status: 0, stdout: 'ok', stderr: '' });
  });

  it('un code non nul n\'est pas une exception', () => {
    const result = runTool(process.execPath, ['-e', "process.stderr.write('ko'); process.exit(3)"], { timeoutMs: 10000 });
    expect(result.status).toBe(3);
    expect(result.stderr).toBe('ko');
  });

  it('MissingExternalTool si la commande n\'existe pas', () => {
    const error = runError(() => runTool(ABSENT, [], { timeoutMs: 1000, installHint: 'apt install absent' }));

    expect(error.code).toBe('MissingExternalTool');
    expect(error.tool).toBe(ABSENT);
    expect(error.message).toContain('apt install absent');
  });

  it('ExternalToolTimeout si la commande dépasse le délai', () => {
    const error = runError(() => runTool(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], { timeoutMs: 200 }));

    expect(error.code).toBe('ExternalToolTimeout');
    expect(error.timedOut).toBe(true);
    expect(error.tool).toBe(process.execPath);
  });
});

describe('isToolInstalled', () => {
  it('faux pour une commande absente du PATH', () => {
    expect(isToolInstalled(ABSENT)).toBe(false);
  });
});
