import type { MilkRecord, MilkRecordDraft, MilkRecordPatch } from '../domain/models';

/** Every operation is scoped to the owning user; records of other users are invisible. */
export interface MilkRecordRepository {
  createRecord(userId: number, draft: MilkRecordDraft): Promise<MilkRecord>;
  findRecordById(userId: number, recordId: number): Promise<MilkRecord | null>;
  listRecords(userId: number): Promise<MilkRecord[]>;
  updateRecord(userId: number, recordId: number, patch: MilkRecordPatch): Promise<MilkRecord | null>;
  deleteRecord(userId: number, recordId: number): Promise<boolean>;
}
