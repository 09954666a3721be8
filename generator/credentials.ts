import * as crypto from 'crypto'

// Synthetic accounts only
const SCRYPT_COST = 1024
const KEY_LENGTH = 32

/**
 * Credential hash in `scrypt$<N>$<saltHex>$<hashHex>` form.
 * The salt is derived from the user id so repeated runs write identical rows.
 */
export function hashPassword(password: string, userId: string): string {
  const salt = crypto.createHash('sha256').update(userId).digest().subarray(0, 16)
  const hash = crypto.scryptSync(password, salt, KEY_LENGTH, { N: SCRYPT_COST, r: 8, p: 1 })
  return `scrypt$${SCRYPT_COST}$${salt.toString('hex')}$${hash.toString('hex')}`
}
