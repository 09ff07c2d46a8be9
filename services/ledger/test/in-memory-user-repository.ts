import type { User, UserSettings, UserWithSecrets } from '../src/domain/models';
import {
  UniqueConstraintError,
  type CreateUserInput,
  type UserRepository,
} from '../src/repositories/user-repository';

export class InMemoryUserRepository implements UserRepository {
  private users = new Map<number, UserWithSecrets>();

  private emailIndex = new Map<string, number>();

  private nextId = 1;

  async createUser(input: CreateUserInput): Promise<User> {
    if (this.emailIndex.has(input.email)) {
      throw new UniqueConstraintError('users_email_key');
    }

    const user: UserWithSecrets = {
      id: this.nextId++,
      email: input.email,
      username: input.username,
      emailVerified: input.emailVerified,
      milkPricePerLitre: input.milkPricePerLitre,
      currency: input.currency,
      currencySymbol: input.currencySymbol,
      createdAt: new Date(),
      passwordHash: input.passwordHash,
      refreshTokenHash: null,
    };

    this.users.set(user.id, user);
    this.emailIndex.set(user.email, user.id);

    return toUser(user);
  }

  async findUserByEmail(email: string): Promise<UserWithSecrets | null> {
    const id = this.emailIndex.get(email);
    const user = id === undefined ? undefined : this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserById(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? toUser(user) : null;
  }

  async updateSettings(id: number, settings: Partial<UserSettings>): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) {
      return null;
    }

    user.milkPricePerLitre = settings.milkPricePerLitre ?? user.milkPricePerLitre;
    user.currency = settings.currency ?? user.currency;
    user.currencySymbol = settings.currencySymbol ?? user.currencySymbol;

    return toUser(user);
  }

  async markEmailVerified(id: number): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) {
      return null;
    }

    user.emailVerified = true;
    return toUser(user);
  }

  async setRefreshTokenHash(id: number, tokenHash: string | null): Promise<boolean> {
    const user = this.users.get(id);
    if (!user) {
      return false;
    }

    user.refreshTokenHash = tokenHash;
    return true;
  }

  async swapRefreshTokenHash(id: number, expected: string, next: string): Promise<boolean> {
    // Compare and write happen in the same tick, so concurrent callers serialise.
    const user = this.users.get(id);
    if (!user || user.refreshTokenHash !== expected) {
      return false;
    }

    user.refreshTokenHash = next;
    return true;
  }

  storedRefreshTokenHash(id: number) {
    return this.users.get(id)?.refreshTokenHash ?? null;
  }
}

function toUser(record: UserWithSecrets): User {
  const { passwordHash, refreshTokenHash, ...user } = record;
  return { ...user };
}
