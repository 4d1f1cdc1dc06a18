import bcrypt from 'bcryptjs';
import { CONFIG } from '../config.js';
import { badRequest } from '../errors.js';
import { PASSWORD_MAX_BYTES } from '../../../shared/config.js';

const tooLong = (plain: string) => Buffer.byteLength(plain, 'utf8') > PASSWORD_MAX_BYTES;

/**
 * Salted bcrypt hash of a credential. The salt is embedded in the result, so
 * the returned string alone is enough to verify later.
 *
 * bcrypt ignores everything past the first 72 bytes of the plaintext, so
 * longer credentials are refused instead of silently truncated.
 */
export async function hashPassword(plain: string, rounds: number = CONFIG.BCRYPT_ROUNDS): Promise<string> {
  if (tooLong(plain)) throw badRequest(`Password must be at most ${PASSWORD_MAX_BYTES} bytes`);
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(plain, salt);
}

/** Constant-time check of `plain` against a hash made by {@link hashPassword}. */
export async function verifyPassword(plain: string, storedHash: string): Promise<boolean> {
  // Nothing that long was ever hashed; a prefix match must not count.
  if (tooLong(plain)) return verifyAgainstDecoy(plain);
  return bcrypt.compare(plain, storedHash);
}

let decoyHash: Promise<string> | undefined;

/**
 * Burn one comparison for an identity that does not exist, so a miss takes
 * as long as a wrong password.
 */
export async function verifyAgainstDecoy(plain: string): Promise<false> {
  decoyHash ??= hashPassword('decoy-credential');
  await bcrypt.compare(plain, await decoyHash);
  return false;
}
