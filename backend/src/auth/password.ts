import bcrypt from 'bcryptjs';

/** Opaque hash/verify capability; callers never look inside a hash. */
export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hashed: string): Promise<boolean>;
}

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly rounds: number) {}

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.rounds);
  }

  async verify(plain: string, hashed: string): Promise<boolean> {
    // A malformed stored hash is a mismatch, not a server error.
    try {
      return await bcrypt.compare(plain, hashed);
    } catch {
      return false;
    }
  }
}
