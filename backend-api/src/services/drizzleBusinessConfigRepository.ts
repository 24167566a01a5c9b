import { eq } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';

import type { BusinessConfigData } from '@aircargo/shared';

import { businessConfigs } from '../database/schema.js';
import type { BusinessConfigRepository, BusinessConfigRow } from './businessConfigRepository.js';

export class DrizzleBusinessConfigRepository<H extends PgQueryResultHKT> implements BusinessConfigRepository {
  constructor(private readonly db: PgDatabase<H>) {}

  async findByUser(userId: string): Promise<BusinessConfigRow | null> {
    const rows = await this.db.select().from(businessConfigs).where(eq(businessConfigs.userId, userId)).limit(1);
    return rows[0] ?? null;
  }

  async insertIfAbsent(row: BusinessConfigRow): Promise<boolean> {
    // The unique index on user_id decides concurrent initialisations.
    const inserted = await this.db
      .insert(businessConfigs)
      .values(row)
      .onConflictDoNothing({ target: businessConfigs.userId })
      .returning({ id: businessConfigs.id });
    return inserted.length > 0;
  }

  async updateByUser(
    userId: string,
    patch: { configData: BusinessConfigData; updatedAt: number },
  ): Promise<BusinessConfigRow | null> {
    const rows = await this.db.update(businessConfigs).set(patch).where(eq(businessConfigs.userId, userId)).returning();
    return rows[0] ?? null;
  }
}
