import { SUPPORTED_CURRENCIES, findCurrency, type Currency } from '../domain/currencies';
import type { UserSettings } from '../domain/models';
import { invalidInput, notFound } from '../errors';
import { PRICE_DECIMALS, hasAtMostDecimals } from '../lib/money';
import type { UserRepository } from '../repositories/user-repository';

// Bounded by the column types in db/schema.sql.
export const MAX_MILK_PRICE_PER_LITRE = 99_999.99;
export const MAX_CURRENCY_SYMBOL_LENGTH = 5;

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export interface SettingsView {
  settings: UserSettings;
  currencies: readonly Currency[];
}

export class SettingsService {
  constructor(private readonly repository: UserRepository) {}

  async getSettings(userId: number): Promise<SettingsView> {
    const user = await this.repository.findUserById(userId);
    if (!user) {
      throw notFound('SETTINGS_USER_NOT_FOUND', 'User not found.');
    }

    return {
      settings: {
        milkPricePerLitre: user.milkPricePerLitre,
        currency: user.currency,
        currencySymbol: user.currencySymbol,
      },
      currencies: SUPPORTED_CURRENCIES,
    };
  }

  /**
   * Applies a partial update. Every stored record is re-priced at the new
   * price the next time a report is generated.
   */
  async updateSettings(userId: number, input: Partial<UserSettings>): Promise<UserSettings> {
    const update: Partial<UserSettings> = {};

    if (input.milkPricePerLitre !== undefined) {
      const price = input.milkPricePerLitre;
      if (
        !Number.isFinite(price) ||
        price < 0 ||
        price > MAX_MILK_PRICE_PER_LITRE ||
        !hasAtMostDecimals(price, PRICE_DECIMALS)
      ) {
        throw invalidInput(
          'SETTINGS_INVALID_PRICE',
          `Milk price must be between 0 and ${MAX_MILK_PRICE_PER_LITRE} with at most two decimals.`,
        );
      }
      update.milkPricePerLitre = price;
    }

    if (input.currency !== undefined) {
      update.currency = input.currency.trim().toUpperCase();
      if (!CURRENCY_CODE_PATTERN.test(update.currency)) {
        throw invalidInput('SETTINGS_INVALID_CURRENCY', 'Currency must be a three-letter code.');
      }
      const known = findCurrency(update.currency);
      if (known && input.currencySymbol === undefined) {
        update.currencySymbol = known.symbol;
      }
    }

    if (input.currencySymbol !== undefined) {
      const symbol = input.currencySymbol.trim();
      const length = Array.from(symbol).length;
      if (length === 0 || length > MAX_CURRENCY_SYMBOL_LENGTH) {
        throw invalidInput(
          'SETTINGS_INVALID_SYMBOL',
          `Currency symbol must be 1 to ${MAX_CURRENCY_SYMBOL_LENGTH} characters.`,
        );
      }
      update.currencySymbol = symbol;
    }

    const user = await this.repository.updateSettings(userId, update);
    if (!user) {
      throw notFound('SETTINGS_USER_NOT_FOUND', 'User not found.');
    }

    return {
      milkPricePerLitre: user.milkPricePerLitre,
      currency: user.currency,
      currencySymbol: user.currencySymbol,
    };
  }
}
