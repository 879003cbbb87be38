import { describe, test, expect } from '@jest/globals';
import { friendlyDirectoryName, isProviderName, provider } from '../src/index.js';

describe('Directory presets', () => {
  test("should have Let's Encrypt staging configuration", () => {
    expect(provider.letsencrypt.staging).toEqual({
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Staging",
      environment: 'staging',
    });
  });

  test("should have Let's Encrypt production configuration", () => {
    expect(provider.letsencrypt.production).toEqual({
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Production",
      environment: 'production',
    });
  });

  test('marks CAs that only accept External Account Binding', () => {
    expect(provider.google.production?.externalAccountRequired).toBe(true);
    expect(provider.zerossl.production?.externalAccountRequired).toBe(true);
    expect(provider.zerossl.staging).toBeUndefined();
    expect(provider.buypass.production?.externalAccountRequired).toBeUndefined();
  });

  test('recognises bundled provider names', () => {
    expect(isProviderName('buypass')).toBe(true);
    expect(isProviderName('toString')).toBe(false);
    expect(isProviderName('example')).toBe(false);
  });

  test('names bundled directories by URL', () => {
    expect(friendlyDirectoryName('https://api.buypass.com/acme/directory')).toBe(
      'Buypass Production',
    );
    expect(friendlyDirectoryName('https://ca.test/directory')).toBeUndefined();
  });
});
