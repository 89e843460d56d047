import { describe, expect, it } from 'vitest';
import { TunnelError } from './errors.js';
import { requireRoot } from './privilege.js';

describe('requireRoot', () => {
  it('échoue avec InsufficientPrivilege sans root', () => {
    try {
      requireRoot(() => false);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TunnelError);
      expect(error instanceof TunnelError && error.code).toBe('InsufficientPrivilege');
    }
  });

  it('laisse passer root', () => {
    expect(() => requireRoot(() => true)).not.toThrow();
  });
});
