/**
 * acme-register library exports
 */

// Registration flow
export {
  AccountRegistrar,
  type AccountRegistrarOptions,
  type RegisterAccountInput,
  type FindExistingAccountInput,
  type RegistrationState,
} from './core/account-registrar.js';
export {
  AcmeDirectoryClient,
  readReplayNonce,
  type DirectoryRequestOptions,
} from './core/acme-directory-client.js';
export { toMailtoContact } from './core/contact.js';
export {
  createAccountCredentials,
  formatCredentials,
  formatCredentialsJson,
  formatKeyPem,
  parseCredentials,
  type AccountCredentials,
  type CredentialsFormat,
} from './core/credentials.js';
export {
  provisionAccount,
  resolveDirectoryUrl,
  defaultOutputPath,
  type ProvisionAccountOptions,
  type ProvisionAccountResult,
} from './core/provision.js';

// Key material and signing
export {
  ACCOUNT_KEY_CURVE,
  generateAccountKey,
  encodeAccountKey,
  decodeAccountKey,
  exportAccountJwk,
  accountKeyThumbprint,
  detectJwsAlgorithm,
} from './crypto/account-key.js';
export {
  signRequest,
  signExternalAccountBinding,
  type SignRequestInput,
  type SignExternalAccountBindingInput,
} from './crypto/jws-signer.js';

// Persistence
export {
  FileCredentialStore,
  type CredentialStore,
  type SaveCredentialsOptions,
} from './persistence/credential-store.js';

// Transport
export {
  AcmeHttpClient,
  type AcmeHttp,
  type AcmeHttpClientOptions,
  type AcmeRequestOptions,
  type ParsedResponseData,
} from './transport/http-client.js';

// Errors
export {
  AcmeRegistrationError,
  InputError,
  CryptoError,
  DirectoryError,
  NonceError,
  SigningError,
  RegistrationError,
  TermsNotAcceptedError,
  InvariantError,
  PersistenceError,
  isAcmeRegistrationError,
  isInputError,
  isRegistrationError,
  isTermsNotAcceptedError,
  isPersistenceError,
  type RegistrationErrorOptions,
} from './errors/registration-errors.js';
export { ACME_ERROR, isKnownAcmeErrorType, type AcmeErrorType } from './errors/codes.js';
export { parseProblemDetails } from './errors/problem.js';

// Types
export type {
  AccountKey,
  AcmeAccount,
  AcmeAccountStatus,
  AcmeProblemDetails,
  AcmeProtectedHeader,
  ExistingAccountLookup,
  ExternalAccountBinding,
  JwsEnvelope,
  RegistrationRequest,
} from './types/account.js';
export {
  acmeDirectorySchema,
  REQUIRED_DIRECTORY_ENTRIES,
  type AcmeDirectory,
  type AcmeDirectoryMeta,
} from './types/directory.js';

// Defaults
export * from './constants/defaults.js';
