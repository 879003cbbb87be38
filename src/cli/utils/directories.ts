import { InputError, isProviderName, provider, resolveDirectoryUrl } from '../../index.js';

/**
 * Resolve the ACME directory URL from CLI flags.
 *
 * `--directory` wins, then `--provider` (production unless `--staging`), then
 * Let's Encrypt production or staging.
 */
export function resolveCliDirectory(opts: {
  staging?: boolean;
  directory?: string;
  provider?: string;
}): string {
  if (opts.directory) return opts.directory;
  if (opts.provider) {
    if (!isProviderName(opts.provider)) {
      throw new InputError(`Unknown ACME provider: ${opts.provider}`, {
        context: { input: opts.provider, known: Object.keys(provider) },
      });
    }
    const environment = opts.staging ? 'staging' : 'production';
    const entry = provider[opts.provider][environment];
    if (!entry) {
      throw new InputError(`Provider ${opts.provider} has no ${environment} directory.`, {
        context: { input: opts.provider },
      });
    }
    return entry.directoryUrl;
  }
  return resolveDirectoryUrl({ staging: opts.staging });
}
