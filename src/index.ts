/**
 * acme-register - ACME (RFC 8555) account provisioning
 *
 * Main entry point of the library
 */

export {
  provider,
  friendlyDirectoryName,
  isProviderName,
  type AcmeDirectoryEntry,
  type AcmeProviderName,
} from './directory.js';

export * from './lib/index.js';
