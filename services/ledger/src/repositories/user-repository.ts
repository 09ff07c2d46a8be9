import type { User, UserSettings, UserWithSecrets } from '../domain/models';

export interface CreateUserInput {
  email: string;
  username: string | null;
  passwordHash: string;
  emailVerified: boolean;
  milkPricePerLitre: number;
  currency: string;
  currencySymbol: string;
}

export class UniqueConstraintError extends Error {
  constructor(readonly constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'UniqueConstraintError';
  }
}

export interface UserRepository {
  /** Throws UniqueConstraintError when the email is taken. */
  createUser(input: CreateUserInput): Promise<User>;
  findUserByEmail(email: string): Promise<UserWithSecrets | null>;
  findUserById(id: number): Promise<User | null>;
  updateSettings(id: number, settings: Partial<UserSettings>): Promise<User | null>;
  markEmailVerified(id: number): Promise<User | null>;
  /** Unconditional write; false when the user does not exist. */
  setRefreshTokenHash(id: number, tokenHash: string | null): Promise<boolean>;
  /**
   * Compare-and-swap: replaces the stored digest with `next` only while it
   * still equals `expected`. Returns whether the swap happened.
   */
  swapRefreshTokenHash(id: number, expected: string, next: string): Promise<boolean>;
}
