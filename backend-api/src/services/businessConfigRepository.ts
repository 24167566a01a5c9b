import type { BusinessConfigData } from '@aircargo/shared';

export type BusinessConfigRow = {
  id: bigint;
  userId: string;
  configData: BusinessConfigData;
  createdAt: number;
  updatedAt: number;
};

export interface BusinessConfigRepository {
  findByUser(userId: string): Promise<BusinessConfigRow | null>;
  /** Inserts unless the user already has a row; returns false when one exists. */
  insertIfAbsent(row: BusinessConfigRow): Promise<boolean>;
  /** Replaces the payload; returns the updated row, or null when the user has none. */
  updateByUser(userId: string, patch: { configData: BusinessConfigData; updatedAt: number }): Promise<BusinessConfigRow | null>;
}
