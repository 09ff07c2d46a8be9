import type {
  MilkRecordPatch,
  MonthlyReport,
  PricedMilkRecord,
  User,
} from '../domain/models';
import { invalidInput, notFound } from '../errors';
import { isIsoDate, isoDateOf } from '../lib/calendar-date';
import { QUANTITY_DECIMALS, hasAtMostDecimals } from '../lib/money';
import type { Clock } from '../lib/token-codec';
import type { MilkRecordRepository } from '../repositories/milk-record-repository';
import type { UserRepository } from '../repositories/user-repository';
import { computeMonthlyReport, priceRecord } from './report-engine';

export const MAX_DAILY_QUANTITY = 1000;

export interface AddRecordInput {
  quantity: number;
  date?: string;
}

export interface MilkRecordsServiceDependencies {
  records: MilkRecordRepository;
  users: UserRepository;
  clock: Clock;
}

export interface ReportResult {
  user: User;
  report: MonthlyReport;
}

export class MilkRecordsService {
  private readonly records: MilkRecordRepository;

  private readonly users: UserRepository;

  private readonly clock: Clock;

  constructor(dependencies: MilkRecordsServiceDependencies) {
    this.records = dependencies.records;
    this.users = dependencies.users;
    this.clock = dependencies.clock;
  }

  async getReport(userId: number): Promise<ReportResult> {
    const user = await this.requireUser(userId);
    const records = await this.records.listRecords(userId);

    return { user, report: computeMonthlyReport(records, user.milkPricePerLitre) };
  }

  async addRecord(userId: number, input: AddRecordInput): Promise<PricedMilkRecord> {
    const user = await this.requireUser(userId);
    const date = input.date ?? isoDateOf(this.clock.now());

    assertQuantity(input.quantity);
    assertDate(date);

    const record = await this.records.createRecord(userId, { date, quantity: input.quantity });
    return priceRecord(record, user.milkPricePerLitre);
  }

  async getRecord(userId: number, recordId: number): Promise<PricedMilkRecord> {
    const user = await this.requireUser(userId);
    const record = await this.records.findRecordById(userId, recordId);
    if (!record) {
      throw notFound('RECORDS_NOT_FOUND', 'Record not found.');
    }

    return priceRecord(record, user.milkPricePerLitre);
  }

  async updateRecord(
    userId: number,
    recordId: number,
    patch: MilkRecordPatch,
  ): Promise<PricedMilkRecord> {
    const user = await this.requireUser(userId);

    if (patch.quantity !== undefined) {
      assertQuantity(patch.quantity);
    }

    if (patch.date !== undefined) {
      assertDate(patch.date);
    }

    const record = await this.records.updateRecord(userId, recordId, patch);
    if (!record) {
      throw notFound('RECORDS_NOT_FOUND', 'Record not found.');
    }

    return priceRecord(record, user.milkPricePerLitre);
  }

  async deleteRecord(userId: number, recordId: number): Promise<void> {
    const deleted = await this.records.deleteRecord(userId, recordId);
    if (!deleted) {
      throw notFound('RECORDS_NOT_FOUND', 'Record not found.');
    }
  }

  private async requireUser(userId: number) {
    const user = await this.users.findUserById(userId);
    if (!user) {
      throw notFound('RECORDS_USER_NOT_FOUND', 'User not found.');
    }
    return user;
  }
}

function assertQuantity(quantity: number) {
  if (
    !Number.isFinite(quantity) ||
    quantity < 0 ||
    quantity > MAX_DAILY_QUANTITY ||
    !hasAtMostDecimals(quantity, QUANTITY_DECIMALS)
  ) {
    throw invalidInput(
      'RECORDS_INVALID_QUANTITY',
      `Milk quantity must be between 0 and ${MAX_DAILY_QUANTITY} litres with at most three decimals.`,
    );
  }
}

function assertDate(date: string) {
  if (!isIsoDate(date)) {
    throw invalidInput('RECORDS_INVALID_DATE', 'Date must be a calendar day in YYYY-MM-DD form.');
  }
}
