import type {
  MilkRecord,
  MonthBucket,
  MonthlyReport,
  PricedMilkRecord,
} from '../domain/models';
import { monthKeyOf } from '../lib/calendar-date';
import { costUnits, minorToAmount, unitsToMinor } from '../lib/money';

export function priceRecord(record: MilkRecord, unitPrice: number): PricedMilkRecord {
  return {
    ...record,
    cost: minorToAmount(unitsToMinor(costUnits(record.quantity, unitPrice))),
  };
}

interface Accumulator {
  key: string;
  year: number;
  month: number;
  records: PricedMilkRecord[];
  units: number;
}

/**
 * Groups records into calendar months, pricing every record at `unitPrice`.
 * Month totals are summed exactly and rounded once per month.
 */
export function computeMonthlyReport(
  records: readonly MilkRecord[],
  unitPrice: number,
): MonthlyReport {
  const buckets = new Map<string, Accumulator>();

  for (const record of records) {
    const month = monthKeyOf(record.date);
    let bucket = buckets.get(month.key);

    if (!bucket) {
      bucket = { ...month, records: [], units: 0 };
      buckets.set(month.key, bucket);
    }

    bucket.records.push(priceRecord(record, unitPrice));
    bucket.units += costUnits(record.quantity, unitPrice);
  }

  const months: MonthBucket[] = [];
  let totalMinor = 0;

  const ordered = Array.from(buckets.values()).sort(
    (a, b) => a.year - b.year || a.month - b.month,
  );

  for (const bucket of ordered) {
    const minor = unitsToMinor(bucket.units);
    totalMinor += minor;
    months.push({
      key: bucket.key,
      year: bucket.year,
      month: bucket.month,
      records: bucket.records.sort(compareRecords),
      total: minorToAmount(minor),
    });
  }

  return {
    months,
    totalRecords: records.length,
    totalCost: minorToAmount(totalMinor),
  };
}

function compareRecords(a: MilkRecord, b: MilkRecord) {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }

  return a.id - b.id;
}
