import { confirm } from '@inquirer/prompts';
import { existsSync } from 'fs';
import { z } from 'zod';

import {
  defaultOutputPath,
  friendlyDirectoryName,
  InputError,
  provisionAccount,
  toMailtoContact,
  type AcmeHttp,
  type CredentialStore,
  type ExternalAccountBinding,
  type ProvisionAccountResult,
  type RegistrationState,
} from '../../index.js';
import { createSpinner, heading, kv, render } from '../logger.js';
import { resolveCliDirectory } from '../utils/directories.js';

const registerOptionsSchema = z.object({
  email: z.string().default(''),
  staging: z.boolean().default(false),
  directory: z.string().url().optional(),
  provider: z.string().optional(),
  output: z.string().min(1).optional(),
  keyOnly: z.boolean().default(false),
  force: z.boolean().default(false),
  agreeTos: z.boolean().default(false),
  eabKid: z.string().min(1).optional(),
  eabHmacKey: z.string().min(1).optional(),
});

/** Options accepted by the register command. */
export type RegisterCommandOptions = z.input<typeof registerOptionsSchema>;

/** Collaborators the command builds by default; replaced in tests. */
export interface RegisterCommandDeps {
  http?: AcmeHttp;
  store?: CredentialStore;
  /** Asks a yes/no question; defaults to an interactive prompt on a TTY */
  confirm?: (message: string) => Promise<boolean>;
}

const STATE_MESSAGES: Record<RegistrationState, string> = {
  Unregistered: 'Preparing registration...',
  NonceAcquired: 'Replay nonce acquired, signing request...',
  RequestSigned: 'Submitting account request...',
  Submitted: 'Reading CA response...',
  Registered: 'Account registered',
  Failed: 'Registration failed',
};

async function promptConfirm(message: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false;
  return confirm({ message, default: false });
}

function parseOptions(options: RegisterCommandOptions) {
  const parsed = registerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join('.') ?? 'options';
    throw new InputError(`Invalid value for --${field}.`, { cause: parsed.error });
  }
  return parsed.data;
}

function externalAccountBinding(opts: {
  eabKid?: string;
  eabHmacKey?: string;
}): ExternalAccountBinding | undefined {
  if (!opts.eabKid && !opts.eabHmacKey) return undefined;
  if (!opts.eabKid || !opts.eabHmacKey) {
    throw new InputError('--eab-kid and --eab-hmac-key must be given together.');
  }
  return { kid: opts.eabKid, hmacKey: opts.eabHmacKey };
}

/**
 * Generate an account key, register it with the CA and write the credentials.
 *
 * @returns The provisioning result, or undefined when the user declined to overwrite
 */
export async function handleRegister(
  options: RegisterCommandOptions,
  deps: RegisterCommandDeps = {},
): Promise<ProvisionAccountResult | undefined> {
  const opts = parseOptions(options);
  toMailtoContact(opts.email);
  const ask = deps.confirm ?? promptConfirm;
  const directoryUrl = resolveCliDirectory(opts);
  const directoryName = friendlyDirectoryName(directoryUrl) ?? directoryUrl;
  const format = opts.keyOnly ? 'key' : 'credentials';
  const output = opts.output ?? defaultOutputPath(format);
  const eab = externalAccountBinding(opts);

  let overwrite = opts.force;
  if (!overwrite && existsSync(output)) {
    overwrite = await ask(`File exists at ${output}. Overwrite?`);
    if (!overwrite) {
      render.warn('Cancelled');
      return undefined;
    }
  }

  const acceptTermsOfService =
    opts.agreeTos || (await ask(`Do you agree to the Terms of Service of ${directoryName}?`));

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  const spinner = createSpinner().start(`Registering account with ${directoryName}...`);
  try {
    const result = await provisionAccount({
      email: opts.email,
      acceptTermsOfService,
      directoryUrl,
      output,
      format,
      overwrite,
      externalAccountBinding: eab,
      http: deps.http,
      store: deps.store,
      signal: controller.signal,
      onStateChange: (state: RegistrationState) => spinner.update(STATE_MESSAGES[state]),
    });

    spinner.succeed(
      result.account.created ? 'Account created' : 'Account already registered for this key',
    );
    heading('ACME account');
    kv('Directory', directoryName);
    kv('Account URI', result.account.uri);
    kv(format === 'key' ? 'Key file' : 'Credentials file', result.output);
    if (result.termsOfService) {
      render.info(`Terms of Service: ${result.termsOfService}`);
    }
    return result;
  } catch (err) {
    spinner.fail('Registration failed');
    throw err;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
