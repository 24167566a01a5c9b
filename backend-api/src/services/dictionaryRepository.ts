export type DictTypeRow = {
  id: bigint;
  name: string;
  type: string;
  status: boolean;
  createdAt: number;
  updatedAt: number;
};

export type DictOptionRow = {
  id: bigint;
  groupId: bigint;
  dictTypeId: bigint;
  label: string;
  value: string;
  status: boolean;
  createdAt: number;
  updatedAt: number;
};

export type Page = { offset: number; limit: number };

export type DictTypeFilter = { type?: string; status?: boolean };

export type DictOptionFilter = { dictTypeId?: bigint; status?: boolean };

export type DictTypePatch = { name?: string; type?: string; status?: boolean; updatedAt: number };

export type DictOptionPatch = { label?: string; status?: boolean; updatedAt: number };

/**
 * Storage seam for dictionary types and option rows.
 *
 * Option rows are always returned ordered by `id` ascending, which is
 * insertion order since ids come from the snowflake generator.
 */
export interface DictionaryRepository {
  /** Runs `fn` atomically; any throw rolls back every write made through the handed-in repository. */
  transaction<T>(fn: (repo: DictionaryRepository) => Promise<T>): Promise<T>;

  /** `forUpdate` locks the type row until the surrounding transaction ends. */
  findTypeByKey(type: string, opts?: { forUpdate?: boolean }): Promise<DictTypeRow | null>;
  findTypeById(id: bigint, opts?: { forUpdate?: boolean }): Promise<DictTypeRow | null>;
  listTypes(filter: DictTypeFilter, page: Page): Promise<{ total: number; rows: DictTypeRow[] }>;
  insertType(row: DictTypeRow): Promise<void>;
  updateType(id: bigint, patch: DictTypePatch): Promise<void>;
  deleteType(id: bigint): Promise<void>;

  findGroupRows(groupId: bigint): Promise<DictOptionRow[]>;
  findGroupRowsByLabel(dictTypeId: bigint, label: string): Promise<DictOptionRow[]>;
  /** Returns group ids, newest first, with the total number of matching groups. */
  listGroupIds(filter: DictOptionFilter, page: Page): Promise<{ total: number; groupIds: bigint[] }>;
  findRowsByGroupIds(groupIds: bigint[], filter: DictOptionFilter): Promise<DictOptionRow[]>;
  insertOptions(rows: DictOptionRow[]): Promise<void>;
  updateOptions(ids: bigint[], patch: DictOptionPatch): Promise<void>;
  /** Returns the number of deleted rows. */
  deleteOptions(ids: bigint[]): Promise<number>;
  deleteOptionsByType(dictTypeId: bigint): Promise<number>;
}
