import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { handleRegister } from '../../src/cli/commands/register.js';
import { InputError, TermsNotAcceptedError } from '../../src/index.js';
import { CA, createMockCa, json, type MockHttpClient } from '../utils/mock-http.js';

function caWithAccount(): MockHttpClient {
  return createMockCa().on(
    'POST',
    CA.newAccount,
    json(201, { status: 'valid' }, { location: CA.accountUri, 'replay-nonce': 'nonce-after' }),
  );
}

describe('register command', () => {
  let dir: string;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'acme-register-cli-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  test('registers and writes the credentials file', async () => {
    const output = join(dir, 'account_credentials.json');
    const http = caWithAccount();

    const result = await handleRegister(
      { email: 'ops@example.com', directory: CA.directoryUrl, output, agreeTos: true },
      { http },
    );

    expect(result?.account.uri).toBe(CA.accountUri);
    const written: unknown = JSON.parse(await readFile(output, 'utf-8'));
    expect(written).toEqual({ uri: CA.accountUri, key: result?.credentials.key });
    expect((await stat(output)).mode & 0o777).toBe(0o600);
    const printed = logSpy.mock.calls.map((c) => c.join(' ')).join('\n');
    expect(printed).toContain(`  Account URI: ${CA.accountUri}`);
    expect(printed).toContain(`  Credentials file: ${output}`);
  });

  test('writes only the PEM key with keyOnly', async () => {
    const output = join(dir, 'account_key.pem');

    const result = await handleRegister(
      {
        email: 'ops@example.com',
        directory: CA.directoryUrl,
        output,
        keyOnly: true,
        agreeTos: true,
      },
      { http: caWithAccount() },
    );

    expect(await readFile(output, 'utf-8')).toBe(result?.credentials.key);
  });

  test('asks before overwriting and stops when declined', async () => {
    const output = join(dir, 'account_credentials.json');
    await writeFile(output, 'previous');
    const http = caWithAccount();
    const confirm = jest.fn(async (_message: string) => false);

    const result = await handleRegister(
      { email: 'ops@example.com', directory: CA.directoryUrl, output, agreeTos: true },
      { http, confirm },
    );

    expect(result).toBeUndefined();
    expect(confirm).toHaveBeenCalledWith(`File exists at ${output}. Overwrite?`);
    expect(http.calls).toHaveLength(0);
    expect(await readFile(output, 'utf-8')).toBe('previous');
  });

  test('asks for overwrite and Terms of Service agreement when not given as flags', async () => {
    const output = join(dir, 'account_credentials.json');
    await writeFile(output, 'previous');
    const confirm = jest.fn(async (_message: string) => true);

    await handleRegister(
      { email: 'ops@example.com', directory: CA.directoryUrl, output },
      { http: caWithAccount(), confirm },
    );

    expect(confirm.mock.calls.map((c) => c[0])).toEqual([
      `File exists at ${output}. Overwrite?`,
      'Do you agree to the Terms of Service of https://ca.test/directory?',
    ]);
    expect(JSON.parse(await readFile(output, 'utf-8'))).toHaveProperty('uri', CA.accountUri);
  });

  test('force skips the overwrite question', async () => {
    const output = join(dir, 'account_credentials.json');
    await writeFile(output, 'previous');
    const confirm = jest.fn(async (_message: string) => true);

    await handleRegister(
      { email: 'ops@example.com', directory: CA.directoryUrl, output, force: true, agreeTos: true },
      { http: caWithAccount(), confirm },
    );

    expect(confirm).not.toHaveBeenCalled();
    expect(await readFile(output, 'utf-8')).not.toBe('previous');
  });

  test('declined Terms of Service end the run without a request', async () => {
    const output = join(dir, 'account_credentials.json');
    const http = caWithAccount();

    await expect(
      handleRegister(
        { email: 'ops@example.com', directory: CA.directoryUrl, output },
        { http, confirm: async () => false },
      ),
    ).rejects.toThrow(TermsNotAcceptedError);
    expect(http.calls).toHaveLength(0);
    await expect(stat(output)).rejects.toHaveProperty('code', 'ENOENT');
  });

  test('rejects a bad email before asking any question', async () => {
    const output = join(dir, 'account_credentials.json');
    await writeFile(output, 'previous');
    const http = caWithAccount();
    const confirm = jest.fn(async (_message: string) => true);

    await expect(
      handleRegister({ email: 'ops@', directory: CA.directoryUrl, output }, { http, confirm }),
    ).rejects.toThrow(new InputError('The email address is invalid: ops@'));
    expect(confirm).not.toHaveBeenCalled();
    expect(http.calls).toHaveLength(0);
    expect(await readFile(output, 'utf-8')).toBe('previous');
  });

  test('requires both EAB values', async () => {
    await expect(
      handleRegister(
        { email: 'ops@example.com', directory: CA.directoryUrl, eabKid: 'kid-1', agreeTos: true },
        { http: caWithAccount() },
      ),
    ).rejects.toThrow(new InputError('--eab-kid and --eab-hmac-key must be given together.'));
  });

  test('rejects a directory that is not a URL', async () => {
    await expect(
      handleRegister({ email: 'ops@example.com', directory: 'not a url', agreeTos: true }),
    ).rejects.toThrow('Invalid value for --directory.');
  });
});
