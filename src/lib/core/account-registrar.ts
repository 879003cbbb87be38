/**
 * RFC 8555 ACME Account Registration
 *
 * Implements the newAccount exchange (RFC 8555 Section 7.3): a JWS-signed request
 * carrying the account's public JWK, a mailto: contact and the Terms of Service
 * agreement. The CA answers 201 for a new account and 200 for a key it already
 * knows; both carry the account URI in the Location header and both are success.
 *
 * A registration run moves through
 * `Unregistered → NonceAcquired → RequestSigned → Submitted → Registered | Failed`.
 * Nothing is retried: the first failure ends the run.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
 */

import { z } from 'zod';

import { signExternalAccountBinding, signRequest } from '../crypto/jws-signer.js';
import { ACME_ERROR } from '../errors/codes.js';
import { parseProblemDetails } from '../errors/problem.js';
import {
  AcmeRegistrationError,
  InputError,
  InvariantError,
  RegistrationError,
  TermsNotAcceptedError,
} from '../errors/registration-errors.js';
import type { AcmeHttp, ParsedResponseData } from '../transport/http-client.js';
import type {
  AccountKey,
  AcmeAccount,
  ExistingAccountLookup,
  ExternalAccountBinding,
  JwsEnvelope,
  RegistrationRequest,
} from '../types/account.js';
import type { AcmeDirectory } from '../types/directory.js';
import { debugAccount } from '../utils/debug.js';
import { headerValue } from '../utils/index.js';
import { AcmeDirectoryClient, readReplayNonce } from './acme-directory-client.js';
import { toMailtoContact } from './contact.js';

export type RegistrationState =
  | 'Unregistered'
  | 'NonceAcquired'
  | 'RequestSigned'
  | 'Submitted'
  | 'Registered'
  | 'Failed';

export interface AccountRegistrarOptions {
  /** Called on every state transition of a run */
  onStateChange?: (state: RegistrationState) => void;
}

export interface RegisterAccountInput {
  key: AccountKey;
  directory: AcmeDirectory;
  contactEmail: string;
  /** Must be true; registration never agrees to the Terms of Service implicitly */
  acceptTermsOfService: boolean;
  /** Required when the directory sets meta.externalAccountRequired */
  externalAccountBinding?: ExternalAccountBinding;
  /** Unused nonce from a previous response; fetched from newNonce when absent */
  nonce?: string;
  signal?: AbortSignal;
}

export interface FindExistingAccountInput {
  key: AccountKey;
  directory: AcmeDirectory;
  nonce?: string;
  signal?: AbortSignal;
}

const accountBodySchema = z
  .object({
    status: z.enum(['valid', 'deactivated', 'revoked']).optional(),
    contact: z.array(z.string()).optional(),
    termsOfServiceAgreed: z.boolean().optional(),
    orders: z.string().optional(),
  })
  .passthrough();

/**
 * Orchestrates the newAccount exchange for one account key
 *
 * Instances hold no per-run state and can serve concurrent registrations.
 */
export class AccountRegistrar {
  private readonly directoryClient: AcmeDirectoryClient;

  constructor(
    private readonly http: AcmeHttp,
    private readonly opts: AccountRegistrarOptions = {},
  ) {
    this.directoryClient = new AcmeDirectoryClient(http);
  }

  /**
   * Register the account key with the CA, or return the account it already has
   *
   * @throws {InputError} Malformed contact email, or EAB required but not supplied
   * @throws {TermsNotAcceptedError} acceptTermsOfService is not true (no network call is made)
   * @throws {NonceError} The newNonce endpoint did not yield a nonce
   * @throws {SigningError} The request could not be signed
   * @throws {RegistrationError} The CA rejected the request or could not be reached
   * @throws {InvariantError} A success response carried no account URI
   */
  async register(input: RegisterAccountInput): Promise<AcmeAccount> {
    const { key, directory, signal } = input;
    const transition = this.createTransition(directory.newAccount);

    try {
      const contact = toMailtoContact(input.contactEmail);
      if (input.acceptTermsOfService !== true) {
        throw new TermsNotAcceptedError(directory.meta?.termsOfService);
      }
      if (directory.meta?.externalAccountRequired && !input.externalAccountBinding) {
        throw InputError.externalAccountBindingRequired(directory.newAccount);
      }

      const nonce = input.nonce ?? (await this.directoryClient.fetchNonce(directory, { signal }));
      transition('NonceAcquired');

      const payload: RegistrationRequest = { contact: [contact], termsOfServiceAgreed: true };
      if (input.externalAccountBinding) {
        payload.externalAccountBinding = await signExternalAccountBinding({
          key,
          url: directory.newAccount,
          binding: input.externalAccountBinding,
        });
      }

      const envelope = await signRequest({ key, url: directory.newAccount, nonce, payload });
      transition('RequestSigned');

      const res = await this.submit(directory.newAccount, envelope, signal);
      transition('Submitted');

      const account = this.toAccount(directory.newAccount, res);
      debugAccount(
        'account %s uri=%s',
        account.created ? 'created' : 'already registered',
        account.uri,
      );
      transition('Registered');
      return account;
    } catch (err) {
      transition('Failed');
      throw err;
    }
  }

  /**
   * Look up the account bound to a key without creating one
   *
   * @returns The existing account, or null when the CA reports accountDoesNotExist
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3.1
   */
  async findExisting(input: FindExistingAccountInput): Promise<AcmeAccount | null> {
    const { key, directory, signal } = input;
    const nonce = input.nonce ?? (await this.directoryClient.fetchNonce(directory, { signal }));
    const payload: ExistingAccountLookup = { onlyReturnExisting: true };
    const envelope = await signRequest({ key, url: directory.newAccount, nonce, payload });
    const res = await this.submit(directory.newAccount, envelope, signal);

    const problem = parseProblemDetails(res.body);
    if (res.statusCode >= 400 && problem?.type === ACME_ERROR.accountDoesNotExist) {
      debugAccount('no account bound to this key at %s', directory.newAccount);
      return null;
    }
    return this.toAccount(directory.newAccount, res);
  }

  private createTransition(url: string): (state: RegistrationState) => void {
    let current: RegistrationState = 'Unregistered';
    return (next) => {
      debugAccount('%s -> %s url=%s', current, next, url);
      current = next;
      this.opts.onStateChange?.(next);
    };
  }

  private async submit(
    url: string,
    envelope: JwsEnvelope,
    signal: AbortSignal | undefined,
  ): Promise<ParsedResponseData> {
    try {
      return await this.http.post(url, envelope, {
        headers: { 'Content-Type': 'application/jose+json' },
        signal,
      });
    } catch (err) {
      if (err instanceof AcmeRegistrationError) throw err;
      throw new RegistrationError(`An error occurred when registering the account at ${url}.`, {
        context: { url },
        cause: err,
      });
    }
  }

  private toAccount(url: string, res: ParsedResponseData): AcmeAccount {
    if (res.statusCode !== 200 && res.statusCode !== 201) {
      throw RegistrationError.rejected(url, res.statusCode, parseProblemDetails(res.body));
    }

    const uri = headerValue(res.headers, 'location');
    if (!uri) {
      throw InvariantError.noAccountUri(res.statusCode);
    }

    const body = accountBodySchema.safeParse(res.body);
    const fields: z.infer<typeof accountBodySchema> = body.success ? body.data : {};
    return {
      uri,
      created: res.statusCode === 201,
      status: fields.status,
      contact: fields.contact,
      termsOfServiceAgreed: fields.termsOfServiceAgreed,
      orders: fields.orders,
      replayNonce: readReplayNonce(res),
    };
  }
}
