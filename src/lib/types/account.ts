/**
 * RFC 8555 ACME Account Types
 *
 * Type definitions for account registration according to RFC 8555 Section 7.3
 */

import type { KeyObject } from 'node:crypto';
import type { JWK } from 'jose';

/**
 * Account key pair bound to one registration run
 *
 * Account keys are used exclusively for ACME authentication and are never reused
 * for certificates or across certificate authorities.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-11.1
 */
export interface AccountKey {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

/**
 * ACME Account Status
 */
export type AcmeAccountStatus = 'valid' | 'deactivated' | 'revoked';

/**
 * Flattened JWS serialization sent as the body of every ACME POST
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7515#section-7.2.2
 */
export interface JwsEnvelope {
  protected: string;
  payload: string;
  signature: string;
}

/**
 * Protected header of an ACME request. Exactly one of `jwk` and `kid` is set.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 */
export interface AcmeProtectedHeader {
  alg: string;
  nonce: string;
  url: string;
  jwk?: JWK;
  kid?: string;
}

/**
 * External Account Binding parameters for CA pre-authorization
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3.4
 */
export interface ExternalAccountBinding {
  /** Key identifier provided by the CA */
  kid: string;
  /** HMAC key (base64url encoded) provided by the CA */
  hmacKey: string;
}

/**
 * Payload of a newAccount request
 */
export interface RegistrationRequest {
  contact: string[];
  termsOfServiceAgreed: boolean;
  externalAccountBinding?: JwsEnvelope;
}

/**
 * Payload of a newAccount lookup (RFC 8555 Section 7.3.1)
 */
export interface ExistingAccountLookup {
  onlyReturnExisting: true;
}

/**
 * The CA's view of the registrant
 *
 * `created` tells a freshly created account (HTTP 201) from one the key had already
 * registered (HTTP 200). `replayNonce` is the nonce the CA issued with the response,
 * ready for the caller's next signed request.
 */
export interface AcmeAccount {
  uri: string;
  created: boolean;
  status?: AcmeAccountStatus;
  contact?: string[];
  termsOfServiceAgreed?: boolean;
  orders?: string;
  replayNonce?: string;
}

/**
 * ACME Problem Details according to RFC 7807
 */
export interface AcmeProblemDetails {
  /** Problem type URI */
  type: string;
  /** Human-readable problem description */
  detail: string;
  /** HTTP status code */
  status?: number;
  /** Problem instance URI */
  instance?: string;
  /** Nested problems of a compound error */
  subproblems?: AcmeProblemDetails[];
}
