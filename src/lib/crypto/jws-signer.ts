/**
 * ACME request signing
 *
 * Builds the flattened JWS envelopes that carry every ACME POST body. Signing is a
 * pure function of its inputs: the caller owns the nonce and supplies a fresh one
 * for every request.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 * @see https://datatracker.ietf.org/doc/html/rfc7515
 */

import * as jose from 'jose';

import { SigningError } from '../errors/registration-errors.js';
import type {
  AccountKey,
  AcmeProtectedHeader,
  ExternalAccountBinding,
  JwsEnvelope,
} from '../types/account.js';
import { detectJwsAlgorithm } from './account-key.js';

export interface SignRequestInput {
  key: AccountKey;
  /** Target URL; must equal the URL the envelope is POSTed to */
  url: string;
  /** Unused replay nonce */
  nonce: string;
  /** JSON payload, or null for an empty payload (POST-as-GET) */
  payload: unknown;
  /** Account URI; when absent the public JWK is embedded instead */
  kid?: string | null;
}

export interface SignExternalAccountBindingInput {
  key: AccountKey;
  /** The newAccount URL the outer request is POSTed to */
  url: string;
  binding: ExternalAccountBinding;
}

function encodePayload(payload: unknown): Uint8Array {
  if (payload === null || payload === undefined) return new Uint8Array(0);
  return new TextEncoder().encode(JSON.stringify(payload));
}

function toEnvelope(jws: jose.FlattenedJWS): JwsEnvelope {
  if (jws.protected === undefined) {
    throw new SigningError('The signed envelope has no protected header.');
  }
  return { protected: jws.protected, payload: jws.payload, signature: jws.signature };
}

function assertSigningKey(key: AccountKey | undefined): asserts key is AccountKey {
  if (!key || !key.privateKey || !key.publicKey) {
    throw new SigningError('An account key is required to sign a request.');
  }
  if (key.privateKey.type !== 'private' || key.privateKey.asymmetricKeyType !== 'ec') {
    throw new SigningError('The account key must be an EC private key.', {
      context: { type: key.privateKey.type, keyType: key.privateKey.asymmetricKeyType },
    });
  }
}

/**
 * Sign an ACME request
 *
 * Requests made before the account exists (newAccount) embed the public JWK;
 * requests on behalf of a registered account embed its URI as `kid`.
 *
 * @throws {SigningError} When the key, nonce or URL is missing or invalid
 */
export async function signRequest(input: SignRequestInput): Promise<JwsEnvelope> {
  const { key, url, nonce, payload, kid } = input;
  assertSigningKey(key);
  if (!nonce) {
    throw new SigningError('A replay nonce is required to sign a request.', { context: { url } });
  }
  if (!url) {
    throw new SigningError('A target URL is required to sign a request.');
  }

  try {
    const header: AcmeProtectedHeader = { alg: await detectJwsAlgorithm(key.publicKey), nonce, url };
    if (kid) {
      header.kid = kid;
    } else {
      header.jwk = await jose.exportJWK(key.publicKey);
    }

    const jws = await new jose.FlattenedSign(encodePayload(payload))
      .setProtectedHeader({ ...header })
      .sign(key.privateKey);
    return toEnvelope(jws);
  } catch (err) {
    if (err instanceof SigningError) throw err;
    throw new SigningError(`An error occurred when signing the request to ${url}.`, {
      context: { url },
      cause: err,
    });
  }
}

/**
 * Create the External Account Binding JWS for a newAccount request
 *
 * The inner JWS is MAC'd with the CA-issued HMAC key over the account public JWK.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3.4
 */
export async function signExternalAccountBinding(
  input: SignExternalAccountBindingInput,
): Promise<JwsEnvelope> {
  const { key, url, binding } = input;
  assertSigningKey(key);
  if (!binding.kid || !binding.hmacKey) {
    throw new SigningError('External Account Binding requires both a key id and an HMAC key.');
  }

  try {
    const jwk = await jose.exportJWK(key.publicKey);
    const jws = await new jose.FlattenedSign(encodePayload(jwk))
      .setProtectedHeader({ alg: 'HS256', kid: binding.kid, url })
      .sign(jose.base64url.decode(binding.hmacKey));
    return toEnvelope(jws);
  } catch (err) {
    if (err instanceof SigningError) throw err;
    throw new SigningError('An error occurred when signing the External Account Binding.', {
      cause: err,
    });
  }
}
