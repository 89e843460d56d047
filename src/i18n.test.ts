import { afterEach, describe, expect, it, vi } from 'vitest';
import { getLang, initI18n, t } from './i18n.js';

describe('i18n', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    initI18n('fr');
  });

  it('français par défaut', () => {
    initI18n('xx');
    expect(getLang()).toBe('fr');
    expect(t('tunnel.activated', { name: 'home' })).toBe('Tunnel home activé');
  });

  it('charge la locale anglaise', () => {
    initI18n('en');
    expect(getLang()).toBe('en');
    expect(t('error.ActivationFailed', { name: 'home' })).toBe('Failed to activate home');
  });

  it('retourne la clé inconnue telle quelle', () => {
    expect(t('unknown.key')).toBe('unknown.key');
  });

  it('insère les paramètres littéralement', () => {
    expect(t('tunnel.activated', { name: '$&$1' })).toBe('Tunnel $&$1 activé');
  });

  describe('priorité des langues', () => {
    it('WGMGR_LANG passe avant la langue de la configuration', () => {
      vi.stubEnv('WGMGR_LANG', 'en');
      initI18n(undefined, 'fr');
      expect(getLang()).toBe('en');
    });

    it('l\'option passe avant WGMGR_LANG', () => {
      vi.stubEnv('WGMGR_LANG', 'en');
      initI18n('fr', 'en');
      expect(getLang()).toBe('fr');
    });

    it('la configuration s\'applique sans option ni WGMGR_LANG', () => {
      vi.stubEnv('WGMGR_LANG', '');
      initI18n(undefined, 'en');
      expect(getLang()).toBe('en');
    });
  });
});
