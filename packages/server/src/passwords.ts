import argon2 from "argon2";
import bcrypt from "bcrypt";
import type { HashOptions } from "./config.js";

const BCRYPT_PREFIX = /^\$2[aby]\$/;

/**
 * Argon2id password hashing. Both libraries hash on libuv's thread pool, so
 * a slow hash never holds up the event loop.
 *
 * Verification reads the cost parameters from the stored hash itself, and
 * still accepts bcrypt hashes written before the store moved to Argon2.
 */
export class PasswordHasher {
  constructor(private readonly options: HashOptions) {}

  hash(password: string): Promise<string> {
    return argon2.hash(password, {
      type: argon2.argon2id,
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
      parallelism: this.options.parallelism,
      hashLength: 32,
    });
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (passwordHash.startsWith("$argon2")) {
      try {
        return await argon2.verify(passwordHash, password);
      } catch (error) {
        console.warn("[auth] unreadable argon2 hash:", error instanceof Error ? error.message : error);
        return false;
      }
    }
    if (BCRYPT_PREFIX.test(passwordHash)) {
      return bcrypt.compare(password, passwordHash);
    }
    return false;
  }
}
