import { randomInt } from 'crypto';

export const SECRET_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*()-_=+';

/**
 * Random secret for database roles and the Odoo master password.
 * `randomInt` is backed by the OS CSPRNG and avoids modulo bias.
 */
export function generateSecret(length = 16, alphabet = SECRET_ALPHABET): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Secret length must be a positive integer, got ${length}`);
  }

  let secret = '';
  for (let i = 0; i < length; i++) {
    secret += alphabet[randomInt(alphabet.length)];
  }
  return secret;
}
