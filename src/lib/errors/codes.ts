/**
 * ACME Error Codes (RFC 8555)
 *
 * Error type URNs a CA may return in problem documents (RFC 7807) while an account is
 * being created or looked up. All ACME error types use the URN namespace
 * "urn:ietf:params:acme:error:" followed by the specific error type identifier.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.7 | RFC 8555 Section 6.7 - Errors}
 */

const prefix = 'urn:ietf:params:acme:error:';

export const ACME_ERROR = {
  /** The request specified an account that does not exist */
  accountDoesNotExist: `${prefix}accountDoesNotExist`,

  /** The client sent an unacceptable anti-replay nonce */
  badNonce: `${prefix}badNonce`,

  /** The JWS was signed by a public key the server does not support */
  badPublicKey: `${prefix}badPublicKey`,

  /** The JWS was signed with an algorithm the server does not support */
  badSignatureAlgorithm: `${prefix}badSignatureAlgorithm`,

  /**
   * The request must include a value for the "externalAccountBinding" field
   *
   * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-7.3.4 | RFC 8555 Section 7.3.4}
   */
  externalAccountRequired: `${prefix}externalAccountRequired`,

  /** A contact URL for an account was invalid */
  invalidContact: `${prefix}invalidContact`,

  /** The request message was malformed */
  malformed: `${prefix}malformed`,

  /** The request exceeds a rate limit */
  rateLimited: `${prefix}rateLimited`,

  /** The server experienced an internal error */
  serverInternal: `${prefix}serverInternal`,

  /** The client lacks sufficient authorization */
  unauthorized: `${prefix}unauthorized`,

  /** A contact URL for an account used an unsupported protocol scheme */
  unsupportedContact: `${prefix}unsupportedContact`,

  /**
   * Visit the "instance" URL and take actions specified there
   *
   * Typically returned when the Terms of Service changed and must be agreed to again.
   */
  userActionRequired: `${prefix}userActionRequired`,
} as const;

export type AcmeErrorType = (typeof ACME_ERROR)[keyof typeof ACME_ERROR];

const KNOWN_TYPES: ReadonlySet<string> = new Set(Object.values(ACME_ERROR));

export function isKnownAcmeErrorType(type: string): type is AcmeErrorType {
  return KNOWN_TYPES.has(type);
}
