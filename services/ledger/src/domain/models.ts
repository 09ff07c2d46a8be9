export interface User {
  id: number;
  email: string;
  username: string | null;
  emailVerified: boolean;
  milkPricePerLitre: number;
  currency: string;
  currencySymbol: string;
  createdAt: Date;
}

export interface UserWithSecrets extends User {
  passwordHash: string;
  refreshTokenHash: string | null;
}

export interface UserSettings {
  milkPricePerLitre: number;
  currency: string;
  currencySymbol: string;
}

/** A single delivery. `date` is a calendar day in ISO form (YYYY-MM-DD). */
export interface MilkRecord {
  id: number;
  userId: number;
  date: string;
  quantity: number;
}

export interface MilkRecordDraft {
  date: string;
  quantity: number;
}

export interface MilkRecordPatch {
  date?: string;
  quantity?: number;
}

export interface PricedMilkRecord extends MilkRecord {
  cost: number;
}

export interface MonthBucket {
  /** Display key, MM-YYYY. */
  key: string;
  year: number;
  month: number;
  records: PricedMilkRecord[];
  total: number;
}

export interface MonthlyReport {
  /** Buckets in chronological order. */
  months: MonthBucket[];
  totalRecords: number;
  totalCost: number;
}
