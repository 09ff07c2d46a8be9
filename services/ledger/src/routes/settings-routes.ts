import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import type { UserSettings } from '../domain/models';
import { requireAuthUser } from '../plugins/authz';
import { numericField } from '../plugins/validation';

const UpdateSettingsSchema = z
  .object({
    milk_price_per_litre: numericField.optional(),
    currency: z.string().min(3).max(3).optional(),
    currency_symbol: z.string().min(1).max(5).optional(),
  })
  .strict();

export const settingsRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/api/settings',
    fastify.withAuth(async (request) => {
      const user = requireAuthUser(request);
      const view = await fastify.settingsService.getSettings(user.id);

      return {
        settings: serializeSettings(view.settings),
        currencies: view.currencies.map((currency) => ({
          code: currency.code,
          symbol: currency.symbol,
          name: currency.name,
        })),
      };
    }),
  );

  fastify.put(
    '/api/settings',
    fastify.withAuth(
      fastify.withValidation({ body: UpdateSettingsSchema }, async (request) => {
        const user = requireAuthUser(request);
        const { body } = request.validated;
        const settings = await fastify.settingsService.updateSettings(user.id, {
          milkPricePerLitre: body.milk_price_per_litre,
          currency: body.currency,
          currencySymbol: body.currency_symbol,
        });

        return {
          message: 'Settings updated.',
          settings: serializeSettings(settings),
        };
      }),
    ),
  );
};

function serializeSettings(settings: UserSettings) {
  return {
    milk_price_per_litre: settings.milkPricePerLitre,
    currency: settings.currency,
    currency_symbol: settings.currencySymbol,
  };
}
