import { describe, expect, it } from 'vitest';

import { SettingsService } from '../src/services/settings-service';
import { InMemoryUserRepository } from './in-memory-user-repository';
import { seedUser } from './helpers';

async function setup() {
  const users = new InMemoryUserRepository();
  const user = await seedUser(users);
  return { service: new SettingsService(users), user };
}

describe('SettingsService', () => {
  it('returns the current settings with the supported currencies', async () => {
    const { service, user } = await setup();

    const view = await service.getSettings(user.id);

    expect(view.settings).toEqual({ milkPricePerLitre: 50, currency: 'INR', currencySymbol: '₹' });
    expect(view.currencies.map((currency) => currency.code)).toEqual([
      'INR',
      'USD',
      'EUR',
      'GBP',
      'JPY',
      'AUD',
      'CAD',
      'CHF',
      'CNY',
      'AED',
    ]);
  });

  it('fills in the symbol of a known currency', async () => {
    const { service, user } = await setup();

    const settings = await service.updateSettings(user.id, { currency: 'usd' });

    expect(settings).toEqual({ milkPricePerLitre: 50, currency: 'USD', currencySymbol: '$' });
  });

  it('keeps an explicit symbol', async () => {
    const { service, user } = await setup();

    const settings = await service.updateSettings(user.id, {
      currency: 'EUR',
      currencySymbol: 'EUR ',
    });

    expect(settings.currencySymbol).toBe('EUR');
  });

  it('updates only the price when only the price is given', async () => {
    const { service, user } = await setup();

    const settings = await service.updateSettings(user.id, { milkPricePerLitre: 0 });

    expect(settings).toEqual({ milkPricePerLitre: 0, currency: 'INR', currencySymbol: '₹' });
  });

  it('rejects negative prices and sub-minor precision', async () => {
    const { service, user } = await setup();

    await expect(service.updateSettings(user.id, { milkPricePerLitre: -1 })).rejects.toMatchObject({
      kind: 'InvalidInput',
      code: 'SETTINGS_INVALID_PRICE',
    });
    await expect(
      service.updateSettings(user.id, { milkPricePerLitre: 12.345 }),
    ).rejects.toMatchObject({ code: 'SETTINGS_INVALID_PRICE' });
  });

  it('caps the price at the stored precision', async () => {
    const { service, user } = await setup();

    await expect(
      service.updateSettings(user.id, { milkPricePerLitre: 99_999.99 }),
    ).resolves.toMatchObject({ milkPricePerLitre: 99_999.99 });
    await expect(
      service.updateSettings(user.id, { milkPricePerLitre: 100_000 }),
    ).rejects.toMatchObject({ kind: 'InvalidInput', code: 'SETTINGS_INVALID_PRICE' });
  });

  it('validates the currency code and symbol length', async () => {
    const { service, user } = await setup();

    await expect(service.updateSettings(user.id, { currency: 'US' })).rejects.toMatchObject({
      code: 'SETTINGS_INVALID_CURRENCY',
    });
    await expect(
      service.updateSettings(user.id, { currencySymbol: 'ABCDEF' }),
    ).rejects.toMatchObject({ code: 'SETTINGS_INVALID_SYMBOL' });
    await expect(service.updateSettings(user.id, { currencySymbol: '   ' })).rejects.toMatchObject(
      { code: 'SETTINGS_INVALID_SYMBOL' },
    );
    await expect(
      service.updateSettings(user.id, { currency: 'AED' }),
    ).resolves.toMatchObject({ currency: 'AED', currencySymbol: 'د.إ' });
  });

  it('fails with NotFound for an unknown user', async () => {
    const { service } = await setup();

    await expect(service.getSettings(42)).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
