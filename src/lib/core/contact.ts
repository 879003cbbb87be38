import emailAddresses from 'email-addresses';

import { InputError } from '../errors/registration-errors.js';

/**
 * Validate a contact email and return its `mailto:` URI
 *
 * The address is parsed as an RFC 5322 mailbox and must be a bare addr-spec
 * (`ops@example.com`); display-name and angle-bracket forms such as
 * `Ops <ops@example.com>` are rejected since they cannot follow `mailto:`.
 *
 * @throws {InputError} When the address is empty or malformed
 */
export function toMailtoContact(email: string): string {
  if (!email) {
    throw InputError.emptyEmail();
  }
  const parsed = emailAddresses.parseOneAddress({ input: email, rfc6532: true });
  if (!parsed || parsed.type !== 'mailbox' || parsed.name !== null || parsed.address !== email) {
    throw InputError.invalidEmail(email);
  }
  return `mailto:${parsed.address}`;
}
