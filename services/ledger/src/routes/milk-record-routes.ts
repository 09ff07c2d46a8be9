import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import type { MonthlyReport, PricedMilkRecord } from '../domain/models';
import { toDisplayDate } from '../lib/calendar-date';
import { requireAuthUser } from '../plugins/authz';
import { numericField } from '../plugins/validation';

const RecordParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const CreateRecordSchema = z
  .object({
    milk_qty: numericField,
    date: z.string().optional(),
  })
  .strict();

const UpdateRecordSchema = z
  .object({
    milk_qty: numericField.optional(),
    date: z.string().optional(),
  })
  .strict()
  .refine((data) => data.milk_qty !== undefined || data.date !== undefined, {
    message: 'Provide milk_qty or date',
    path: ['milk_qty'],
  });

export const milkRecordRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/api/milk/records',
    fastify.withAuth(async (request) => {
      const user = requireAuthUser(request);
      const { report } = await fastify.milkRecordsService.getReport(user.id);
      return serializeReport(report);
    }),
  );

  fastify.post(
    '/api/milk/records',
    fastify.withAuth(
      fastify.withValidation({ body: CreateRecordSchema }, async (request, reply) => {
        const user = requireAuthUser(request);
        const { body } = request.validated;
        const record = await fastify.milkRecordsService.addRecord(user.id, {
          quantity: body.milk_qty,
          date: body.date,
        });

        return reply.code(201).send({
          message: 'Record added.',
          record: serializeRecord(record),
        });
      }),
    ),
  );

  fastify.get(
    '/api/milk/records/:id',
    fastify.withAuth(
      fastify.withValidation({ params: RecordParamsSchema }, async (request) => {
        const user = requireAuthUser(request);
        const { params } = request.validated;
        const record = await fastify.milkRecordsService.getRecord(user.id, params.id);

        return { record: serializeRecord(record) };
      }),
    ),
  );

  fastify.put(
    '/api/milk/records/:id',
    fastify.withAuth(
      fastify.withValidation(
        { params: RecordParamsSchema, body: UpdateRecordSchema },
        async (request) => {
          const user = requireAuthUser(request);
          const { params, body } = request.validated;
          const record = await fastify.milkRecordsService.updateRecord(user.id, params.id, {
            quantity: body.milk_qty,
            date: body.date,
          });

          return {
            message: 'Record updated.',
            record: serializeRecord(record),
          };
        },
      ),
    ),
  );

  fastify.delete(
    '/api/milk/records/:id',
    fastify.withAuth(
      fastify.withValidation({ params: RecordParamsSchema }, async (request) => {
        const user = requireAuthUser(request);
        const { params } = request.validated;
        await fastify.milkRecordsService.deleteRecord(user.id, params.id);

        return { message: 'Record deleted.' };
      }),
    ),
  );
};

function serializeRecord(record: PricedMilkRecord) {
  return {
    id: record.id,
    date: toDisplayDate(record.date),
    milk_qty: record.quantity,
    cost: record.cost,
  };
}

export function serializeReport(report: MonthlyReport) {
  const monthlyData: Record<string, ReturnType<typeof serializeRecord>[]> = {};
  const monthlyTotals: Record<string, number> = {};

  for (const month of report.months) {
    monthlyData[month.key] = month.records.map(serializeRecord);
    monthlyTotals[month.key] = month.total;
  }

  return {
    monthly_data: monthlyData,
    monthly_totals: monthlyTotals,
    total_records: report.totalRecords,
    total_cost: report.totalCost,
    months: report.months.map((month) => month.key),
  };
}
