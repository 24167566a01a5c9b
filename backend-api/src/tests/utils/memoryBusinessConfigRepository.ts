import type { BusinessConfigData } from '@aircargo/shared';

import type { BusinessConfigRepository, BusinessConfigRow } from '../../services/businessConfigRepository.js';

/** In-process stand-in for the business_configs table (unique on user id). */
export class MemoryBusinessConfigRepository implements BusinessConfigRepository {
  private readonly rows = new Map<string, BusinessConfigRow>();

  async findByUser(userId: string): Promise<BusinessConfigRow | null> {
    const row = this.rows.get(userId);
    return row ? { ...row } : null;
  }

  async insertIfAbsent(row: BusinessConfigRow): Promise<boolean> {
    if (this.rows.has(row.userId)) return false;
    this.rows.set(row.userId, { ...row });
    return true;
  }

  async updateByUser(
    userId: string,
    patch: { configData: BusinessConfigData; updatedAt: number },
  ): Promise<BusinessConfigRow | null> {
    const row = this.rows.get(userId);
    if (!row) return null;
    const next = { ...row, ...patch };
    this.rows.set(userId, next);
    return { ...next };
  }
}
