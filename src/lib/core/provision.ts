/**
 * End-to-end account provisioning
 *
 * validate contact → generate key → discover directory → register → persist.
 * Credentials are written only after the CA has returned an account URI, and not
 * at all once the run's signal has been aborted.
 */

import {
  DEFAULT_CREDENTIALS_PATH,
  DEFAULT_KEY_PATH,
  LETSENCRYPT_PRODUCTION_DIRECTORY,
  LETSENCRYPT_STAGING_DIRECTORY,
} from '../constants/defaults.js';
import { generateAccountKey } from '../crypto/account-key.js';
import { TermsNotAcceptedError } from '../errors/registration-errors.js';
import { FileCredentialStore, type CredentialStore } from '../persistence/credential-store.js';
import { AcmeHttpClient, type AcmeHttp } from '../transport/http-client.js';
import type { AcmeAccount, ExternalAccountBinding } from '../types/account.js';
import { AcmeDirectoryClient } from './acme-directory-client.js';
import { AccountRegistrar, type RegistrationState } from './account-registrar.js';
import { toMailtoContact } from './contact.js';
import {
  createAccountCredentials,
  type AccountCredentials,
  type CredentialsFormat,
} from './credentials.js';

export interface ProvisionAccountOptions {
  email: string;
  acceptTermsOfService: boolean;
  /** Use the Let's Encrypt staging directory; ignored when directoryUrl is set */
  staging?: boolean;
  directoryUrl?: string;
  /** Output path; defaults depend on the format */
  output?: string;
  format?: CredentialsFormat;
  overwrite?: boolean;
  externalAccountBinding?: ExternalAccountBinding;
  http?: AcmeHttp;
  store?: CredentialStore;
  signal?: AbortSignal;
  onStateChange?: (state: RegistrationState) => void;
}

export interface ProvisionAccountResult {
  credentials: AccountCredentials;
  account: AcmeAccount;
  directoryUrl: string;
  output: string;
  termsOfService?: string;
}

export function resolveDirectoryUrl(opts: { staging?: boolean; directoryUrl?: string }): string {
  if (opts.directoryUrl) return opts.directoryUrl;
  return opts.staging ? LETSENCRYPT_STAGING_DIRECTORY : LETSENCRYPT_PRODUCTION_DIRECTORY;
}

export function defaultOutputPath(format: CredentialsFormat): string {
  return format === 'key' ? DEFAULT_KEY_PATH : DEFAULT_CREDENTIALS_PATH;
}

/**
 * Register a new account key with a CA and persist its credentials
 */
export async function provisionAccount(
  options: ProvisionAccountOptions,
): Promise<ProvisionAccountResult> {
  const { signal } = options;
  const format = options.format ?? 'credentials';
  const output = options.output || defaultOutputPath(format);
  const directoryUrl = resolveDirectoryUrl(options);
  const http = options.http ?? new AcmeHttpClient();
  const store = options.store ?? new FileCredentialStore();

  toMailtoContact(options.email);
  if (options.acceptTermsOfService !== true) {
    throw new TermsNotAcceptedError();
  }

  const key = await generateAccountKey();
  const directory = await new AcmeDirectoryClient(http).fetchDirectory(directoryUrl, { signal });

  const registrar = new AccountRegistrar(http, { onStateChange: options.onStateChange });
  const account = await registrar.register({
    key,
    directory,
    contactEmail: options.email,
    acceptTermsOfService: options.acceptTermsOfService,
    externalAccountBinding: options.externalAccountBinding,
    signal,
  });

  const credentials = createAccountCredentials(account, key);
  signal?.throwIfAborted();
  await store.save(credentials, { path: output, format, overwrite: options.overwrite });

  return {
    credentials,
    account,
    directoryUrl,
    output,
    termsOfService: directory.meta?.termsOfService,
  };
}
