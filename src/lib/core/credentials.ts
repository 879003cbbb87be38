/**
 * Account credentials: the durable output of a registration
 *
 * One immutable `{uri, key}` value with two presentations: the JSON credentials
 * document issuance tooling reads, and the bare PEM key for callers that only
 * need the key.
 */

import { z } from 'zod';

import { encodeAccountKey } from '../crypto/account-key.js';
import { InputError, InvariantError } from '../errors/registration-errors.js';
import type { AccountKey, AcmeAccount } from '../types/account.js';

export interface AccountCredentials {
  /** Account URI assigned by the CA */
  readonly uri: string;
  /** PEM-encoded EC private key */
  readonly key: string;
}

/** Presentation of credentials on disk */
export type CredentialsFormat = 'credentials' | 'key';

const credentialsSchema = z.object({
  uri: z.string().min(1),
  key: z.string().includes('PRIVATE KEY'),
});

export function createAccountCredentials(
  account: Pick<AcmeAccount, 'uri'>,
  key: AccountKey,
): AccountCredentials {
  if (!account.uri) {
    throw new InvariantError('The account URI is empty.', { context: { missing: 'uri' } });
  }
  return Object.freeze({ uri: account.uri, key: encodeAccountKey(key) });
}

/** Compact JSON document `{"uri": ..., "key": ...}` */
export function formatCredentialsJson(credentials: AccountCredentials): string {
  return JSON.stringify({ uri: credentials.uri, key: credentials.key });
}

export function formatKeyPem(credentials: AccountCredentials): string {
  return credentials.key;
}

export function formatCredentials(
  credentials: AccountCredentials,
  format: CredentialsFormat,
): string {
  return format === 'key' ? formatKeyPem(credentials) : formatCredentialsJson(credentials);
}

/**
 * Parse a JSON credentials document written by {@link formatCredentialsJson}
 *
 * @throws {InputError} When the text is not JSON or lacks a uri / PEM key
 */
export function parseCredentials(text: string): AccountCredentials {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InputError('The account credentials are not valid JSON.', { cause: err });
  }

  const parsed = credentialsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError('The account credentials document is malformed.', {
      context: { issues: parsed.error.issues.map((issue) => issue.path.join('.')) },
      cause: parsed.error,
    });
  }
  return Object.freeze({ uri: parsed.data.uri, key: parsed.data.key });
}
