import argon2 from 'argon2';

// argon2id with the library's default cost; salt is random per call and embedded in the hash
export function hashPassword(password: string) {
  return argon2.hash(password, { type: argon2.argon2id });
}

/**
 * Checks `password` against an encoded argon2 hash. A well-formed hash that
 * does not match resolves to false; only a malformed hash rejects.
 */
export function verifyPassword(hash: string, password: string) {
  return argon2.verify(hash, password);
}
