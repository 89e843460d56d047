import { describe, expect, it } from 'vitest';
import { TunnelError } from './errors.js';
import { assertValidName, configPath, isValidName } from './names.js';

describe('isValidName', () => {
  it('accepte les noms simples', () => {
    for (const name of ['home', 'wg0', 'office-vpn', 'my.tunnel', 'a_b']) {
      expect(isValidName(name)).toBe(true);
    }
  });

  it('refuse séparateurs, .. et nom vide', () => {
    for (const name of ['', '../etc/passwd', 'a/b', 'a\\b', '..', 'x..y']) {
      expect(isValidName(name)).toBe(false);
    }
  });
});

describe('assertValidName', () => {
  it('lève InvalidName', () => {
    expect(() => assertValidName('a/b')).toThrow(TunnelError);
    expect(() => assertValidName('home')).not.toThrow();
  });
});

describe('configPath', () => {
  it('ajoute l\'extension .conf', () => {
    expect(configPath('/etc/wireguard', 'home')).toBe('/etc/wireguard/home.conf');
  });
});
