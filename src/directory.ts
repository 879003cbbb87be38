// Well-known ACME directories

import {
  LETSENCRYPT_PRODUCTION_DIRECTORY,
  LETSENCRYPT_STAGING_DIRECTORY,
} from './lib/constants/defaults.js';

/**
 * ACME directory entry for a specific environment
 */
export interface AcmeDirectoryEntry {
  /** The ACME directory URL for this environment */
  directoryUrl: string;
  /** Human-readable name for this directory */
  name: string;
  /** Environment type: staging or production */
  environment: 'staging' | 'production';
  /** The CA only accepts accounts created with External Account Binding */
  externalAccountRequired?: boolean;
}

export type AcmeProviderName = 'letsencrypt' | 'google' | 'buypass' | 'zerossl';

/**
 * Pre-configured directories of public certificate authorities.
 *
 * @example
 * ```typescript
 * import { provider } from 'acme-register';
 *
 * const stagingUrl = provider.letsencrypt.staging?.directoryUrl;
 * ```
 */
export const provider: Record<
  AcmeProviderName,
  Partial<Record<AcmeDirectoryEntry['environment'], AcmeDirectoryEntry>>
> = {
  letsencrypt: {
    staging: {
      directoryUrl: LETSENCRYPT_STAGING_DIRECTORY,
      name: "Let's Encrypt Staging",
      environment: 'staging',
    },
    production: {
      directoryUrl: LETSENCRYPT_PRODUCTION_DIRECTORY,
      name: "Let's Encrypt Production",
      environment: 'production',
    },
  },
  google: {
    staging: {
      directoryUrl: 'https://dv.acme-v02.test-api.pki.goog/directory',
      name: 'Google Trust Services Staging',
      environment: 'staging',
      externalAccountRequired: true,
    },
    production: {
      directoryUrl: 'https://dv.acme-v02.api.pki.goog/directory',
      name: 'Google Trust Services Production',
      environment: 'production',
      externalAccountRequired: true,
    },
  },
  buypass: {
    staging: {
      directoryUrl: 'https://api.test4.buypass.no/acme/directory',
      name: 'Buypass Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://api.buypass.com/acme/directory',
      name: 'Buypass Production',
      environment: 'production',
    },
  },
  zerossl: {
    production: {
      directoryUrl: 'https://acme.zerossl.com/v2/DV90',
      name: 'ZeroSSL Production',
      environment: 'production',
      externalAccountRequired: true,
    },
  },
};

export function isProviderName(value: string): value is AcmeProviderName {
  return Object.prototype.hasOwnProperty.call(provider, value);
}

/** Return the human-friendly name of a bundled directory URL */
export function friendlyDirectoryName(url: string): string | undefined {
  for (const environments of Object.values(provider)) {
    for (const entry of Object.values(environments)) {
      if (entry?.directoryUrl === url) return entry.name;
    }
  }
  return undefined;
}
