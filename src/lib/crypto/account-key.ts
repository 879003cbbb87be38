/**
 * ACME account key material
 *
 * Account keys are EC P-256 key pairs held as Node KeyObjects, which jose accepts
 * directly for JWK export and signing. The private key is persisted as a SEC1 PEM
 * block ("EC PRIVATE KEY"), the format issuance tooling reads back.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-11.1
 * @see https://datatracker.ietf.org/doc/html/rfc5915 (SEC1 EC private key structure)
 */

import { createPrivateKey, createPublicKey, generateKeyPair, type KeyObject } from 'node:crypto';
import * as jose from 'jose';

import { CryptoError } from '../errors/registration-errors.js';
import type { AccountKey } from '../types/account.js';

/** Curve used for every generated account key */
export const ACCOUNT_KEY_CURVE = 'P-256';

/**
 * Generate a fresh EC P-256 account key pair
 *
 * Uses the asynchronous key generator so concurrent registrations do not block the
 * event loop; Node's CSPRNG is safe to share across them.
 *
 * @throws {CryptoError} When key generation fails
 */
export function generateAccountKey(): Promise<AccountKey> {
  return new Promise((resolve, reject) => {
    generateKeyPair('ec', { namedCurve: ACCOUNT_KEY_CURVE }, (err, publicKey, privateKey) => {
      if (err) {
        reject(new CryptoError('An error occurred when generating an account key.', { cause: err }));
        return;
      }
      resolve({ privateKey, publicKey });
    });
  });
}

/**
 * Serialize the private key as a SEC1 PEM block
 *
 * @throws {CryptoError} When the key cannot be exported
 */
export function encodeAccountKey(key: AccountKey): string {
  try {
    const pem = key.privateKey.export({ format: 'pem', type: 'sec1' });
    return typeof pem === 'string' ? pem : pem.toString('utf8');
  } catch (err) {
    throw new CryptoError('An error occurred when marshalling the account key data.', {
      cause: err,
    });
  }
}

/**
 * Load an account key from PEM (SEC1 or PKCS#8)
 *
 * @throws {CryptoError} When the text is not an EC private key
 */
export function decodeAccountKey(pem: string): AccountKey {
  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey({ key: pem, format: 'pem' });
  } catch (err) {
    throw new CryptoError('The account key could not be parsed as a PEM private key.', {
      cause: err,
    });
  }

  if (privateKey.asymmetricKeyType !== 'ec') {
    throw new CryptoError(
      `Unsupported account key type: ${privateKey.asymmetricKeyType ?? 'unknown'}`,
      { context: { keyType: privateKey.asymmetricKeyType } },
    );
  }

  return { privateKey, publicKey: createPublicKey(privateKey) };
}

/** Public JWK of the account key, as embedded in anonymous request headers */
export async function exportAccountJwk(key: AccountKey): Promise<jose.JWK> {
  return jose.exportJWK(key.publicKey);
}

/**
 * RFC 7638 SHA-256 thumbprint of the account public key
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7638
 */
export async function accountKeyThumbprint(key: AccountKey): Promise<string> {
  return jose.calculateJwkThumbprint(await exportAccountJwk(key), 'sha256');
}

/**
 * Detect the JWS algorithm matching an account key's curve
 *
 * @returns JWS algorithm identifier (e.g., 'ES256')
 */
export async function detectJwsAlgorithm(publicKey: KeyObject): Promise<string> {
  const jwk = await jose.exportJWK(publicKey);

  if (jwk.kty === 'EC') {
    switch (jwk.crv) {
      case 'P-256':
        return 'ES256';
      case 'P-384':
        return 'ES384';
      case 'P-521':
        return 'ES512';
      default:
        throw new CryptoError(`Unsupported EC curve: ${jwk.crv}`, { context: { crv: jwk.crv } });
    }
  }

  throw new CryptoError(`Unsupported key type: ${jwk.kty}`, { context: { kty: jwk.kty } });
}
