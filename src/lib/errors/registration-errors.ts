/**
 * Typed errors for the account-registration flow
 *
 * Every failure is terminal for a single registration attempt. Each class carries a
 * stable `code`, a `context` record for diagnostics and, where one exists, the
 * underlying `cause`. Nothing in the core logs or exits on error; the CLI decides
 * how an error is presented.
 */

import type { AcmeProblemDetails } from '../types/account.js';

export interface RegistrationErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for all registration errors
 */
export abstract class AcmeRegistrationError extends Error {
  abstract readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(message: string, options: RegistrationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid caller input: contact email, output path, CLI options
 */
export class InputError extends AcmeRegistrationError {
  readonly code = 'INPUT_ERROR';

  static emptyEmail(): InputError {
    return new InputError('The email address is empty.', { context: { input: '' } });
  }

  static invalidEmail(email: string, cause?: unknown): InputError {
    return new InputError(`The email address is invalid: ${email}`, {
      context: { input: email },
      cause,
    });
  }

  static externalAccountBindingRequired(directoryUrl: string): InputError {
    return new InputError(
      'The certificate authority requires External Account Binding; supply an EAB key id and HMAC key.',
      { context: { input: directoryUrl } },
    );
  }
}

/**
 * Key generation, encoding or decoding failure
 */
export class CryptoError extends AcmeRegistrationError {
  readonly code = 'CRYPTO_ERROR';
}

/**
 * Directory discovery failure: unreachable CA, malformed document, missing endpoints
 */
export class DirectoryError extends AcmeRegistrationError {
  readonly code = 'DIRECTORY_ERROR';

  static missingEndpoints(directoryUrl: string, missing: string[]): DirectoryError {
    return new DirectoryError(
      `The ACME directory at ${directoryUrl} is missing required entries: ${missing.join(', ')}`,
      { context: { directoryUrl, missing } },
    );
  }
}

/**
 * Replay-nonce acquisition failure
 */
export class NonceError extends AcmeRegistrationError {
  readonly code = 'NONCE_ERROR';

  static missingHeader(url: string, statusCode: number): NonceError {
    return new NonceError(`No Replay-Nonce header in response from ${url}`, {
      context: { url, statusCode },
    });
  }
}

/**
 * Malformed signing input: missing key, empty nonce or URL
 */
export class SigningError extends AcmeRegistrationError {
  readonly code = 'SIGNING_ERROR';
}

/**
 * The CA rejected the account request
 *
 * `problem` is the RFC 7807 document the CA returned, when it returned one.
 */
export class RegistrationError extends AcmeRegistrationError {
  readonly code = 'REGISTRATION_ERROR';
  readonly status?: number;
  readonly problem?: AcmeProblemDetails;

  constructor(
    message: string,
    options: RegistrationErrorOptions & { status?: number; problem?: AcmeProblemDetails } = {},
  ) {
    super(message, options);
    this.status = options.status;
    this.problem = options.problem;
  }

  static rejected(url: string, status: number, problem?: AcmeProblemDetails): RegistrationError {
    const reason = problem ? `${problem.detail} (${problem.type})` : `HTTP ${status}`;
    return new RegistrationError(`The CA rejected the account request: ${reason}`, {
      status,
      problem,
      context: { url },
    });
  }
}

/**
 * Registration was attempted without accepting the CA's Terms of Service
 */
export class TermsNotAcceptedError extends AcmeRegistrationError {
  readonly code = 'TERMS_NOT_ACCEPTED';

  constructor(termsOfService?: string) {
    super(
      termsOfService
        ? `The Terms of Service must be accepted before registering: ${termsOfService}`
        : 'The Terms of Service must be accepted before registering.',
      { context: { termsOfService } },
    );
  }
}

/**
 * A success response lacked data the flow depends on
 */
export class InvariantError extends AcmeRegistrationError {
  readonly code = 'INVARIANT_ERROR';

  static noAccountUri(statusCode: number): InvariantError {
    return new InvariantError('The account URI is empty: no Location header in the response.', {
      context: { statusCode, missing: 'location_header' },
    });
  }
}

/**
 * Credentials could not be written
 */
export class PersistenceError extends AcmeRegistrationError {
  readonly code = 'PERSISTENCE_ERROR';

  static exists(path: string): PersistenceError {
    return new PersistenceError(`Refusing to overwrite existing file: ${path}`, {
      context: { path },
    });
  }
}

export function isAcmeRegistrationError(error: unknown): error is AcmeRegistrationError {
  return error instanceof AcmeRegistrationError;
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

export function isRegistrationError(error: unknown): error is RegistrationError {
  return error instanceof RegistrationError;
}

export function isTermsNotAcceptedError(error: unknown): error is TermsNotAcceptedError {
  return error instanceof TermsNotAcceptedError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
