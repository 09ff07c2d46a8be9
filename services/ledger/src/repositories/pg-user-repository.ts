import { DatabaseError, type Pool } from 'pg';

import type { User, UserSettings, UserWithSecrets } from '../domain/models';
import {
  UniqueConstraintError,
  type CreateUserInput,
  type UserRepository,
} from './user-repository';

const UNIQUE_VIOLATION = '23505';

const USER_COLUMNS = `id, email, username, email_verified, milk_price_per_litre, currency,
  currency_symbol, created_at`;

interface UserRow {
  id: number;
  email: string;
  username: string | null;
  email_verified: boolean;
  milk_price_per_litre: string;
  currency: string;
  currency_symbol: string;
  created_at: Date;
}

interface UserWithSecretsRow extends UserRow {
  password_hash: string;
  refresh_token_hash: string | null;
}

function mapUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    emailVerified: row.email_verified,
    milkPricePerLitre: Number(row.milk_price_per_litre),
    currency: row.currency,
    currencySymbol: row.currency_symbol,
    createdAt: row.created_at,
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async createUser(input: CreateUserInput): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users
           (email, username, password_hash, email_verified, milk_price_per_litre, currency, currency_symbol)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${USER_COLUMNS}`,
        [
          input.email,
          input.username,
          input.passwordHash,
          input.emailVerified,
          input.milkPricePerLitre,
          input.currency,
          input.currencySymbol,
        ],
      );

      return mapUser(result.rows[0]);
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new UniqueConstraintError(error.constraint ?? 'users_email_key');
      }

      throw error;
    }
  }

  async findUserByEmail(email: string): Promise<UserWithSecrets | null> {
    const result = await this.pool.query<UserWithSecretsRow>(
      `SELECT ${USER_COLUMNS}, password_hash, refresh_token_hash FROM users WHERE email = $1`,
      [email],
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      ...mapUser(row),
      passwordHash: row.password_hash,
      refreshTokenHash: row.refresh_token_hash,
    };
  }

  async findUserById(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async updateSettings(id: number, settings: Partial<UserSettings>): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users
          SET milk_price_per_litre = COALESCE($2, milk_price_per_litre),
              currency = COALESCE($3, currency),
              currency_symbol = COALESCE($4, currency_symbol)
        WHERE id = $1
        RETURNING ${USER_COLUMNS}`,
      [
        id,
        settings.milkPricePerLitre ?? null,
        settings.currency ?? null,
        settings.currencySymbol ?? null,
      ],
    );
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async markEmailVerified(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users SET email_verified = TRUE WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async setRefreshTokenHash(id: number, tokenHash: string | null): Promise<boolean> {
    const result = await this.pool.query(
      'UPDATE users SET refresh_token_hash = $2 WHERE id = $1',
      [id, tokenHash],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async swapRefreshTokenHash(id: number, expected: string, next: string): Promise<boolean> {
    // Single-statement conditional update; Postgres row locking serialises racing swaps.
    const result = await this.pool.query(
      `UPDATE users SET refresh_token_hash = $3
        WHERE id = $1 AND refresh_token_hash = $2`,
      [id, expected, next],
    );
    return (result.rowCount ?? 0) === 1;
  }
}
