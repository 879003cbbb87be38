import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { handleError } from '../../src/cli/utils/errors.js';
import {
  ACME_ERROR,
  PersistenceError,
  RegistrationError,
  TermsNotAcceptedError,
} from '../../src/index.js';

describe('CLI error handling', () => {
  let errSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    errSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errSpy.mockRestore();
  });

  function output(): string {
    return errSpy.mock.calls.map((c) => c.join(' ')).join('\n');
  }

  test('explains how to accept the Terms of Service', () => {
    handleError(new TermsNotAcceptedError('https://ca.test/terms.pdf'));

    expect(output()).toContain(
      'Terms of Service not accepted: The Terms of Service must be accepted before registering: https://ca.test/terms.pdf',
    );
    expect(output()).toContain('Re-run with --agree-tos to accept them.');
  });

  test('shows the CA problem and its reference', () => {
    handleError(
      RegistrationError.rejected('https://ca.test/acme/new-acct', 400, {
        type: ACME_ERROR.invalidContact,
        detail: 'contact domain is not allowed',
        instance: 'https://ca.test/docs/contacts',
      }),
    );

    expect(output()).toContain(
      'Registration failed: The CA rejected the account request: contact domain is not allowed (urn:ietf:params:acme:error:invalidContact)',
    );
    expect(output()).toContain('See https://ca.test/docs/contacts');
  });

  test('prints the underlying cause of library errors', () => {
    handleError(
      new PersistenceError('An error occurred when writing the account credentials to out.json.', {
        cause: new Error('EACCES: permission denied'),
      }),
    );

    expect(output()).toContain(
      'Error: An error occurred when writing the account credentials to out.json.',
    );
    expect(output()).toContain('Caused by: EACCES: permission denied');
  });

  test('prints plain errors and unknown values', () => {
    handleError(new Error('boom failure'));
    handleError(42);

    expect(output()).toContain('Error: boom failure');
    expect(errSpy.mock.calls[1]).toEqual(['Unknown error:', 42]);
  });
});
