import { Command, Option } from 'commander';

import { EMAIL_ENV_VAR } from '../index.js';
import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleRegister, type RegisterCommandOptions } from './commands/register.js';
import { handleError } from './utils/errors.js';

/** Build a Commander program instance for the acme-register CLI. */
export function createCli(): Command {
  const program = new Command();
  const pkg = getPackageInfo();

  program
    .name('acme-register')
    .description('Register an ACME account and save its credentials')
    .version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.ACME_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.ACME_CLI_TEST) return; // allow tests to assert on rendered errors
    process.exit(1);
  }

  program
    .command('register')
    .description('Generate an account key and register it with an ACME certificate authority')
    .addOption(
      new Option('-e, --email <email>', 'Contact email for the account').env(EMAIL_ENV_VAR),
    )
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--directory <url>', 'Custom ACME directory URL')
    .option('--provider <name>', 'Bundled CA: letsencrypt, google, buypass or zerossl')
    .option('-o, --output <path>', 'Output path for the credentials')
    .option('--key-only', 'Write only the PEM account key instead of the JSON credentials')
    .option('--force', 'Overwrite an existing output file without asking')
    .option('--agree-tos', "Agree to the CA's Terms of Service")
    .option('--eab-kid <kid>', 'External Account Binding key identifier')
    .option('--eab-hmac-key <key>', 'External Account Binding HMAC key (base64url)')
    .action(async (opts: RegisterCommandOptions) => {
      try {
        await handleRegister(opts);
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** Parse arguments and return the program. */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  await program.parseAsync(argv, { from: 'user' });
  return program;
}
