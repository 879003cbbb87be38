/**
 * RFC 8555 ACME Directory Types
 *
 * Type definitions and the validating schema for the directory document
 * described in RFC 8555 Section 7.1.1.
 */

import { z } from 'zod';

/**
 * ACME Directory metadata as defined in RFC 8555
 */
export const acmeDirectoryMetaSchema = z
  .object({
    /** URL of the terms of service */
    termsOfService: z.string().optional(),
    /** Website URL for the ACME server */
    website: z.string().optional(),
    /** CAA identities for this ACME server */
    caaIdentities: z.array(z.string()).optional(),
    /** Whether external account binding is required */
    externalAccountRequired: z.boolean().optional(),
  })
  .passthrough();

/**
 * ACME Directory structure
 *
 * Only `newNonce` and `newAccount` are needed to register an account; the other
 * endpoints are kept for the issuance tooling that consumes the credentials.
 */
export const acmeDirectorySchema = z
  .object({
    /** URL for new nonce requests (RFC 8555 Section 7.2) */
    newNonce: z.string().url(),
    /** URL for new account registration (RFC 8555 Section 7.3) */
    newAccount: z.string().url(),
    /** URL for new order creation (RFC 8555 Section 7.4) */
    newOrder: z.string().optional(),
    /** URL for new authorization (optional, RFC 8555 Section 7.5) */
    newAuthz: z.string().optional(),
    /** URL for certificate revocation (RFC 8555 Section 7.6) */
    revokeCert: z.string().optional(),
    /** URL for key change operations (RFC 8555 Section 7.3.5) */
    keyChange: z.string().optional(),
    /** Optional metadata about the ACME server */
    meta: acmeDirectoryMetaSchema.optional(),
  })
  .passthrough();

export type AcmeDirectoryMeta = z.infer<typeof acmeDirectoryMetaSchema>;
export type AcmeDirectory = z.infer<typeof acmeDirectorySchema>;

/** Directory entries that must be present before registration proceeds */
export const REQUIRED_DIRECTORY_ENTRIES = ['newNonce', 'newAccount'] as const;
