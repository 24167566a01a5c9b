import { and, asc, count, countDistinct, desc, eq, inArray, type SQL } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';

import { dictOptions, dictTypes } from '../database/schema.js';
import type {
  DictionaryRepository,
  DictOptionFilter,
  DictOptionPatch,
  DictOptionRow,
  DictTypeFilter,
  DictTypePatch,
  DictTypeRow,
  Page,
} from './dictionaryRepository.js';

// Both the pooled database and a transaction handle satisfy PgDatabase<H>.
export class DrizzleDictionaryRepository<H extends PgQueryResultHKT> implements DictionaryRepository {
  constructor(private readonly db: PgDatabase<H>) {}

  async transaction<T>(fn: (repo: DictionaryRepository) => Promise<T>): Promise<T> {
    return await this.db.transaction(async (tx) => fn(new DrizzleDictionaryRepository<H>(tx)));
  }

  async findTypeByKey(type: string, opts?: { forUpdate?: boolean }): Promise<DictTypeRow | null> {
    const q = this.db.select().from(dictTypes).where(eq(dictTypes.type, type)).limit(1);
    const rows = opts?.forUpdate ? await q.for('update') : await q;
    return rows[0] ?? null;
  }

  async findTypeById(id: bigint, opts?: { forUpdate?: boolean }): Promise<DictTypeRow | null> {
    const q = this.db.select().from(dictTypes).where(eq(dictTypes.id, id)).limit(1);
    const rows = opts?.forUpdate ? await q.for('update') : await q;
    return rows[0] ?? null;
  }

  async listTypes(filter: DictTypeFilter, page: Page): Promise<{ total: number; rows: DictTypeRow[] }> {
    const conds: SQL[] = [];
    if (filter.type !== undefined) conds.push(eq(dictTypes.type, filter.type));
    if (filter.status !== undefined) conds.push(eq(dictTypes.status, filter.status));
    const where = conds.length > 0 ? and(...conds) : undefined;

    const totalRows = await this.db.select({ total: count() }).from(dictTypes).where(where);
    const rows = await this.db
      .select()
      .from(dictTypes)
      .where(where)
      .orderBy(desc(dictTypes.createdAt), desc(dictTypes.id))
      .limit(page.limit)
      .offset(page.offset);
    return { total: Number(totalRows[0]?.total ?? 0), rows };
  }

  async insertType(row: DictTypeRow): Promise<void> {
    await this.db.insert(dictTypes).values(row);
  }

  async updateType(id: bigint, patch: DictTypePatch): Promise<void> {
    await this.db.update(dictTypes).set(patch).where(eq(dictTypes.id, id));
  }

  async deleteType(id: bigint): Promise<void> {
    await this.db.delete(dictTypes).where(eq(dictTypes.id, id));
  }

  async findGroupRows(groupId: bigint): Promise<DictOptionRow[]> {
    return await this.db.select().from(dictOptions).where(eq(dictOptions.groupId, groupId)).orderBy(asc(dictOptions.id));
  }

  async findGroupRowsByLabel(dictTypeId: bigint, label: string): Promise<DictOptionRow[]> {
    return await this.db
      .select()
      .from(dictOptions)
      .where(and(eq(dictOptions.dictTypeId, dictTypeId), eq(dictOptions.label, label)))
      .orderBy(asc(dictOptions.id));
  }

  private optionConds(filter: DictOptionFilter): SQL[] {
    const conds: SQL[] = [];
    if (filter.dictTypeId !== undefined) conds.push(eq(dictOptions.dictTypeId, filter.dictTypeId));
    if (filter.status !== undefined) conds.push(eq(dictOptions.status, filter.status));
    return conds;
  }

  async listGroupIds(filter: DictOptionFilter, page: Page): Promise<{ total: number; groupIds: bigint[] }> {
    const conds = this.optionConds(filter);
    const where = conds.length > 0 ? and(...conds) : undefined;

    const totalRows = await this.db.select({ total: countDistinct(dictOptions.groupId) }).from(dictOptions).where(where);
    const rows = await this.db
      .selectDistinct({ groupId: dictOptions.groupId })
      .from(dictOptions)
      .where(where)
      .orderBy(desc(dictOptions.groupId))
      .limit(page.limit)
      .offset(page.offset);
    return { total: Number(totalRows[0]?.total ?? 0), groupIds: rows.map((r) => r.groupId) };
  }

  async findRowsByGroupIds(groupIds: bigint[], filter: DictOptionFilter): Promise<DictOptionRow[]> {
    if (groupIds.length === 0) return [];
    const conds = [inArray(dictOptions.groupId, groupIds), ...this.optionConds(filter)];
    return await this.db
      .select()
      .from(dictOptions)
      .where(and(...conds))
      .orderBy(asc(dictOptions.id));
  }

  async insertOptions(rows: DictOptionRow[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(dictOptions).values(rows);
  }

  async updateOptions(ids: bigint[], patch: DictOptionPatch): Promise<void> {
    if (ids.length === 0) return;
    await this.db.update(dictOptions).set(patch).where(inArray(dictOptions.id, ids));
  }

  async deleteOptions(ids: bigint[]): Promise<number> {
    if (ids.length === 0) return 0;
    const deleted = await this.db.delete(dictOptions).where(inArray(dictOptions.id, ids)).returning({ id: dictOptions.id });
    return deleted.length;
  }

  async deleteOptionsByType(dictTypeId: bigint): Promise<number> {
    const deleted = await this.db
      .delete(dictOptions)
      .where(eq(dictOptions.dictTypeId, dictTypeId))
      .returning({ id: dictOptions.id });
    return deleted.length;
  }
}
