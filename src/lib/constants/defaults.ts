/**
 * Default configuration constants for acme-register
 *
 * Centralized defaults for transport, directory selection and credential output.
 * These values are used as fallbacks when no explicit configuration is provided.
 */

// Directory selection
export const LETSENCRYPT_PRODUCTION_DIRECTORY = 'https://acme-v02.api.letsencrypt.org/directory';
export const LETSENCRYPT_STAGING_DIRECTORY =
  'https://acme-staging-v02.api.letsencrypt.org/directory';

// Transport defaults
export const HTTP_TIMEOUT_MS = 30_000; // 30 seconds

// Credential output defaults
export const DEFAULT_CREDENTIALS_PATH = 'account_credentials.json';
export const DEFAULT_KEY_PATH = 'account_key.pem';
export const CREDENTIALS_FILE_MODE = 0o600;

// Environment variable consulted by the CLI when --email is omitted
export const EMAIL_ENV_VAR = 'ACME_EMAIL';
