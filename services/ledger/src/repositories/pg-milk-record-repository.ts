import type { Pool } from 'pg';

import type { MilkRecord, MilkRecordDraft, MilkRecordPatch } from '../domain/models';
import type { MilkRecordRepository } from './milk-record-repository';

const RECORD_COLUMNS = 'id, user_id, delivered_on, quantity';

interface MilkRecordRow {
  id: number;
  user_id: number;
  delivered_on: string;
  quantity: string;
}

function mapRecord(row: MilkRecordRow): MilkRecord {
  return {
    id: row.id,
    userId: row.user_id,
    date: row.delivered_on,
    quantity: Number(row.quantity),
  };
}

export class PgMilkRecordRepository implements MilkRecordRepository {
  constructor(private readonly pool: Pool) {}

  async createRecord(userId: number, draft: MilkRecordDraft): Promise<MilkRecord> {
    const result = await this.pool.query<MilkRecordRow>(
      `INSERT INTO milk_records (user_id, delivered_on, quantity)
       VALUES ($1, $2, $3)
       RETURNING ${RECORD_COLUMNS}`,
      [userId, draft.date, draft.quantity],
    );

    return mapRecord(result.rows[0]);
  }

  async findRecordById(userId: number, recordId: number): Promise<MilkRecord | null> {
    const result = await this.pool.query<MilkRecordRow>(
      `SELECT ${RECORD_COLUMNS} FROM milk_records WHERE id = $1 AND user_id = $2`,
      [recordId, userId],
    );
    const row = result.rows[0];
    return row ? mapRecord(row) : null;
  }

  async listRecords(userId: number): Promise<MilkRecord[]> {
    const result = await this.pool.query<MilkRecordRow>(
      `SELECT ${RECORD_COLUMNS} FROM milk_records WHERE user_id = $1`,
      [userId],
    );
    return result.rows.map(mapRecord);
  }

  async updateRecord(
    userId: number,
    recordId: number,
    patch: MilkRecordPatch,
  ): Promise<MilkRecord | null> {
    const result = await this.pool.query<MilkRecordRow>(
      `UPDATE milk_records
          SET delivered_on = COALESCE($3, delivered_on),
              quantity = COALESCE($4, quantity)
        WHERE id = $1 AND user_id = $2
        RETURNING ${RECORD_COLUMNS}`,
      [recordId, userId, patch.date ?? null, patch.quantity ?? null],
    );
    const row = result.rows[0];
    return row ? mapRecord(row) : null;
  }

  async deleteRecord(userId: number, recordId: number): Promise<boolean> {
    const result = await this.pool.query(
      'DELETE FROM milk_records WHERE id = $1 AND user_id = $2',
      [recordId, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }
}
