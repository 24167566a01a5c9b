import {
  DictErrorCode,
  dedupeOptionValues,
  enabledToStatus,
  type DictFailure,
  type DictImportFile,
  type DictOptionGroupDto,
  type DictResult,
  type DictTypeDto,
} from '@aircargo/shared';

import { toPersistenceError } from '../errors.js';
import { logInfo } from '../utils/logger.js';
import type { IdGenerator } from '../utils/snowflake.js';
import type { DictionaryRepository, DictOptionRow, DictTypeRow } from './dictionaryRepository.js';

export type DictOptionGroup = {
  groupId: bigint;
  dictTypeId: bigint;
  dictType: string;
  label: string;
  values: string[];
  enabled: boolean;
  createdAt: number;
  updatedAt: number;
};

export type GroupInput = { dictType: string; label: string; values: string[]; enabled: boolean };

export type GroupPatch = { label?: string; values?: string[]; enabled?: boolean };

export type ListArgs = { page: number; pageSize: number; enabled?: boolean };

type TypeInput = { name: string; type: string; enabled: boolean };

type TypePatch = { name?: string; newType?: string; enabled?: boolean };

// Reconciliation target: what the group's member rows must look like afterwards.
type GroupTarget = { label: string; values?: string[]; enabled: boolean };

export type DictionaryServiceDeps = {
  repo: DictionaryRepository;
  ids: IdGenerator;
  now?: () => number;
};

function fail(code: DictErrorCode, error: string): DictFailure {
  return { ok: false, code, error };
}

function notFound(error: string) {
  return fail(DictErrorCode.NotFound, error);
}

function checkPage(args: ListArgs): DictFailure | null {
  if (!Number.isInteger(args.page) || args.page < 1) return fail(DictErrorCode.InvalidArgument, 'page must be >= 1');
  if (!Number.isInteger(args.pageSize) || args.pageSize < 1) {
    return fail(DictErrorCode.InvalidArgument, 'page_size must be >= 1');
  }
  return null;
}

function toGroup(dictType: DictTypeRow, rows: DictOptionRow[]): DictOptionGroup | null {
  const first = rows[0];
  if (!first) return null;
  return {
    groupId: first.groupId,
    dictTypeId: dictType.id,
    dictType: dictType.type,
    label: first.label,
    values: rows.map((r) => r.value),
    enabled: first.status,
    createdAt: Math.min(...rows.map((r) => r.createdAt)),
    updatedAt: Math.max(...rows.map((r) => r.updatedAt)),
  };
}

export function dictTypePayload(row: DictTypeRow): DictTypeDto {
  return {
    id: row.id.toString(),
    name: row.name,
    type: row.type,
    status: enabledToStatus(row.status),
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

export function dictOptionGroupPayload(group: DictOptionGroup): DictOptionGroupDto {
  return {
    id: group.groupId.toString(),
    dict_type_id: group.dictTypeId.toString(),
    dict_type: group.dictType,
    label: group.label,
    value: [...group.values],
    status: enabledToStatus(group.enabled),
    created_at: group.createdAt,
    updated_at: group.updatedAt,
  };
}

/**
 * Dictionary types and their option groups.
 *
 * A group is the set of option rows sharing one `group_id`; `(type, label)` is its
 * natural key. Every write runs in a single repository transaction and locks the
 * owning type row first, so concurrent writers on one type are serialised.
 */
export class DictionaryService {
  private readonly repo: DictionaryRepository;
  private readonly ids: IdGenerator;
  private readonly now: () => number;

  constructor(deps: DictionaryServiceDeps) {
    this.repo = deps.repo;
    this.ids = deps.ids;
    this.now = deps.now ?? Date.now;
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw toPersistenceError(e);
    }
  }

  // ---- types ----

  async createType(input: TypeInput): Promise<DictResult<{ dictType: DictTypeRow }>> {
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const existing = await repo.findTypeByKey(input.type);
        if (existing) return fail(DictErrorCode.Conflict, `dictionary type already exists: ${input.type}`);
        const dictType = await this.insertType(repo, input);
        return { ok: true as const, dictType };
      }),
    );
  }

  async createOrUpdateType(input: TypeInput): Promise<{ ok: true; dictType: DictTypeRow; created: boolean }> {
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const existing = await repo.findTypeByKey(input.type, { forUpdate: true });
        if (!existing) {
          const dictType = await this.insertType(repo, input);
          return { ok: true as const, dictType, created: true };
        }
        const ts = this.now();
        await repo.updateType(existing.id, { name: input.name, status: input.enabled, updatedAt: ts });
        return {
          ok: true as const,
          dictType: { ...existing, name: input.name, status: input.enabled, updatedAt: ts },
          created: false,
        };
      }),
    );
  }

  async getType(type: string): Promise<DictResult<{ dictType: DictTypeRow }>> {
    return await this.guard(async () => {
      const dictType = await this.repo.findTypeByKey(type);
      if (!dictType) return notFound(`dictionary type not found: ${type}`);
      return { ok: true as const, dictType };
    });
  }

  async listTypes(args: ListArgs & { type?: string }): Promise<DictResult<{ total: number; items: DictTypeRow[] }>> {
    const bad = checkPage(args);
    if (bad) return bad;
    return await this.guard(async () => {
      const { total, rows } = await this.repo.listTypes(
        {
          ...(args.type !== undefined ? { type: args.type } : {}),
          ...(args.enabled !== undefined ? { status: args.enabled } : {}),
        },
        { offset: (args.page - 1) * args.pageSize, limit: args.pageSize },
      );
      return { ok: true as const, total, items: rows };
    });
  }

  async updateType(type: string, patch: TypePatch): Promise<DictResult<{ dictType: DictTypeRow }>> {
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const existing = await repo.findTypeByKey(type, { forUpdate: true });
        if (!existing) return notFound(`dictionary type not found: ${type}`);
        if (patch.newType !== undefined && patch.newType !== existing.type) {
          const taken = await repo.findTypeByKey(patch.newType);
          if (taken) return fail(DictErrorCode.Conflict, `dictionary type already exists: ${patch.newType}`);
        }
        const ts = this.now();
        const next: DictTypeRow = {
          ...existing,
          name: patch.name ?? existing.name,
          type: patch.newType ?? existing.type,
          status: patch.enabled ?? existing.status,
          updatedAt: ts,
        };
        await repo.updateType(existing.id, { name: next.name, type: next.type, status: next.status, updatedAt: ts });
        return { ok: true as const, dictType: next };
      }),
    );
  }

  async deleteType(type: string): Promise<DictResult<{ deletedOptions: number }>> {
    const r = await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const existing = await repo.findTypeByKey(type, { forUpdate: true });
        if (!existing) return notFound(`dictionary type not found: ${type}`);
        const deletedOptions = await repo.deleteOptionsByType(existing.id);
        await repo.deleteType(existing.id);
        return { ok: true as const, deletedOptions };
      }),
    );
    if (r.ok) logInfo('dictionary type deleted', { type, deletedOptions: r.deletedOptions });
    return r;
  }

  // ---- option groups ----

  async getGroup(groupId: bigint): Promise<DictResult<{ group: DictOptionGroup }>> {
    return await this.guard(async () => {
      const rows = await this.repo.findGroupRows(groupId);
      const first = rows[0];
      if (!first) return notFound(`dictionary option not found: ${groupId}`);
      const dictType = await this.repo.findTypeById(first.dictTypeId);
      const group = dictType ? toGroup(dictType, rows) : null;
      if (!group) return notFound(`dictionary option not found: ${groupId}`);
      return { ok: true as const, group };
    });
  }

  async createGroup(input: GroupInput): Promise<DictResult<{ group: DictOptionGroup }>> {
    const values = dedupeOptionValues(input.values);
    if (values.length === 0) return fail(DictErrorCode.InvalidArgument, 'value must contain at least one item');
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const dictType = await repo.findTypeByKey(input.dictType, { forUpdate: true });
        if (!dictType) return notFound(`dictionary type not found: ${input.dictType}`);
        const existing = await repo.findGroupRowsByLabel(dictType.id, input.label);
        if (existing.length > 0) {
          return fail(DictErrorCode.Conflict, `option label already exists in ${input.dictType}: ${input.label}`);
        }
        const group = await this.insertGroup(repo, dictType, input.label, values, input.enabled);
        return { ok: true as const, group };
      }),
    );
  }

  async upsertGroup(input: GroupInput): Promise<DictResult<{ group: DictOptionGroup; created: boolean }>> {
    const values = dedupeOptionValues(input.values);
    if (values.length === 0) return fail(DictErrorCode.InvalidArgument, 'value must contain at least one item');
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const dictType = await repo.findTypeByKey(input.dictType, { forUpdate: true });
        if (!dictType) return notFound(`dictionary type not found: ${input.dictType}`);
        const existing = await repo.findGroupRowsByLabel(dictType.id, input.label);
        if (existing.length === 0) {
          const group = await this.insertGroup(repo, dictType, input.label, values, input.enabled);
          return { ok: true as const, group, created: true };
        }
        const group = await this.reconcile(repo, dictType, existing, { label: input.label, values, enabled: input.enabled });
        return { ok: true as const, group, created: false };
      }),
    );
  }

  async updateGroupById(groupId: bigint, patch: GroupPatch): Promise<DictResult<{ group: DictOptionGroup }>> {
    const values = patch.values === undefined ? undefined : dedupeOptionValues(patch.values);
    if (values !== undefined && values.length === 0) {
      return fail(DictErrorCode.InvalidArgument, 'value must contain at least one item');
    }
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const peek = await repo.findGroupRows(groupId);
        const peekFirst = peek[0];
        if (!peekFirst) return notFound(`dictionary option not found: ${groupId}`);
        const dictType = await repo.findTypeById(peekFirst.dictTypeId, { forUpdate: true });
        // Re-read under the type lock: another writer may have changed the group meanwhile.
        const rows = dictType ? await repo.findGroupRows(groupId) : [];
        const current = rows[0];
        if (!dictType || !current) return notFound(`dictionary option not found: ${groupId}`);

        const label = patch.label ?? current.label;
        if (label !== current.label) {
          const clash = await repo.findGroupRowsByLabel(dictType.id, label);
          if (clash.some((r) => r.groupId !== groupId)) {
            return fail(DictErrorCode.Conflict, `option label already exists in ${dictType.type}: ${label}`);
          }
        }
        const group = await this.reconcile(repo, dictType, rows, {
          label,
          enabled: patch.enabled ?? current.status,
          ...(values !== undefined ? { values } : {}),
        });
        return { ok: true as const, group };
      }),
    );
  }

  async deleteGroup(groupId: bigint): Promise<DictResult<{ deletedOptions: number }>> {
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const peek = await repo.findGroupRows(groupId);
        const first = peek[0];
        if (!first) return notFound(`dictionary option not found: ${groupId}`);
        await repo.findTypeById(first.dictTypeId, { forUpdate: true });
        const rows = await repo.findGroupRows(groupId);
        if (rows.length === 0) return notFound(`dictionary option not found: ${groupId}`);
        const deletedOptions = await repo.deleteOptions(rows.map((r) => r.id));
        return { ok: true as const, deletedOptions };
      }),
    );
  }

  async deleteGroupByTypeLabel(type: string, label: string): Promise<DictResult<{ deletedOptions: number }>> {
    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const dictType = await repo.findTypeByKey(type, { forUpdate: true });
        if (!dictType) return notFound(`dictionary type not found: ${type}`);
        const rows = await repo.findGroupRowsByLabel(dictType.id, label);
        if (rows.length === 0) return notFound(`dictionary option not found: ${type}/${label}`);
        const deletedOptions = await repo.deleteOptions(rows.map((r) => r.id));
        return { ok: true as const, deletedOptions };
      }),
    );
  }

  /**
   * Lists option groups, newest first. Filters apply to member rows before grouping,
   * and pagination applies to groups. An unknown `dictType` is `not_found`.
   */
  async listGroups(
    args: ListArgs & { dictType?: string },
  ): Promise<DictResult<{ total: number; items: DictOptionGroup[] }>> {
    const bad = checkPage(args);
    if (bad) return bad;
    return await this.guard(async () => {
      const typesById = new Map<bigint, DictTypeRow>();
      let dictTypeId: bigint | undefined;
      if (args.dictType !== undefined) {
        const dictType = await this.repo.findTypeByKey(args.dictType);
        if (!dictType) return notFound(`dictionary type not found: ${args.dictType}`);
        typesById.set(dictType.id, dictType);
        dictTypeId = dictType.id;
      }
      const filter = {
        ...(dictTypeId !== undefined ? { dictTypeId } : {}),
        ...(args.enabled !== undefined ? { status: args.enabled } : {}),
      };
      const { total, groupIds } = await this.repo.listGroupIds(filter, {
        offset: (args.page - 1) * args.pageSize,
        limit: args.pageSize,
      });
      const rows = await this.repo.findRowsByGroupIds(groupIds, filter);

      const rowsByGroup = new Map<bigint, DictOptionRow[]>();
      for (const r of rows) {
        const list = rowsByGroup.get(r.groupId);
        if (list) list.push(r);
        else rowsByGroup.set(r.groupId, [r]);
      }

      const items: DictOptionGroup[] = [];
      for (const gid of groupIds) {
        const groupRows = rowsByGroup.get(gid) ?? [];
        const first = groupRows[0];
        if (!first) continue;
        let dictType = typesById.get(first.dictTypeId);
        if (!dictType) {
          dictType = (await this.repo.findTypeById(first.dictTypeId)) ?? undefined;
          if (!dictType) continue;
          typesById.set(dictType.id, dictType);
        }
        const group = toGroup(dictType, groupRows);
        if (group) items.push(group);
      }
      return { ok: true as const, total, items };
    });
  }

  /**
   * Loads a dictionary file: one type plus a flat list of `{ label, value, status }`
   * options, grouped by label in first-seen order.
   */
  async importDictionary(
    file: DictImportFile,
    opts: { updateIfExists: boolean; clearOptions: boolean },
  ): Promise<{
    ok: true;
    dictType: DictTypeRow;
    typeCreated: boolean;
    created: number;
    updated: number;
    skipped: number;
    cleared: number;
  }> {
    const byLabel = new Map<string, { values: string[]; enabled: boolean }>();
    for (const o of file.options) {
      const g = byLabel.get(o.label);
      if (g) g.values.push(o.value);
      else byLabel.set(o.label, { values: [o.value], enabled: o.status === 1 });
    }

    return await this.guard(() =>
      this.repo.transaction(async (repo) => {
        const input = { name: file.dict_type.name, type: file.dict_type.type, enabled: file.dict_type.status === 1 };
        let dictType = await repo.findTypeByKey(input.type, { forUpdate: true });
        const typeCreated = !dictType;
        if (!dictType) {
          dictType = await this.insertType(repo, input);
        } else if (opts.updateIfExists) {
          const ts = this.now();
          await repo.updateType(dictType.id, { name: input.name, status: input.enabled, updatedAt: ts });
          dictType = { ...dictType, name: input.name, status: input.enabled, updatedAt: ts };
        }

        const cleared = opts.clearOptions ? await repo.deleteOptionsByType(dictType.id) : 0;

        let created = 0;
        let updated = 0;
        let skipped = 0;
        // Counts are per distinct (label, value), not per group.
        for (const [label, g] of byLabel) {
          const values = dedupeOptionValues(g.values);
          const existing = await repo.findGroupRowsByLabel(dictType.id, label);
          const head = existing[0];
          if (!head) {
            await this.insertGroup(repo, dictType, label, values, g.enabled);
            created += values.length;
            continue;
          }
          const have = new Set(existing.map((r) => r.value));
          const fresh = values.filter((v) => !have.has(v));
          created += fresh.length;
          if (opts.updateIfExists) {
            const merged = dedupeOptionValues([...existing.map((r) => r.value), ...values]);
            await this.reconcile(repo, dictType, existing, { label, values: merged, enabled: g.enabled });
            updated += values.length - fresh.length;
          } else {
            // Existing rows stay as they are; new values join the group with its current status.
            const ts = this.now();
            await repo.insertOptions(
              fresh.map((value) => ({
                id: this.ids.nextId(),
                groupId: head.groupId,
                dictTypeId: dictType.id,
                label,
                value,
                status: head.status,
                createdAt: ts,
                updatedAt: ts,
              })),
            );
            skipped += values.length - fresh.length;
          }
        }
        return { ok: true as const, dictType, typeCreated, created, updated, skipped, cleared };
      }),
    );
  }

  // ---- internals ----

  private async insertType(repo: DictionaryRepository, input: TypeInput): Promise<DictTypeRow> {
    const ts = this.now();
    const row: DictTypeRow = {
      id: this.ids.nextId(),
      name: input.name,
      type: input.type,
      status: input.enabled,
      createdAt: ts,
      updatedAt: ts,
    };
    await repo.insertType(row);
    return row;
  }

  private async insertGroup(
    repo: DictionaryRepository,
    dictType: DictTypeRow,
    label: string,
    values: string[],
    enabled: boolean,
  ): Promise<DictOptionGroup> {
    const ts = this.now();
    const groupId = this.ids.nextId();
    const rows: DictOptionRow[] = values.map((value) => ({
      id: this.ids.nextId(),
      groupId,
      dictTypeId: dictType.id,
      label,
      value,
      status: enabled,
      createdAt: ts,
      updatedAt: ts,
    }));
    await repo.insertOptions(rows);
    return {
      groupId,
      dictTypeId: dictType.id,
      dictType: dictType.type,
      label,
      values: [...values],
      enabled,
      createdAt: ts,
      updatedAt: ts,
    };
  }

  // Brings an already-located, non-empty group in line with `target`.
  private async reconcile(
    repo: DictionaryRepository,
    dictType: DictTypeRow,
    rows: DictOptionRow[],
    target: GroupTarget,
  ): Promise<DictOptionGroup> {
    const first = rows[0];
    if (!first) throw new Error('reconcile called with an empty group');
    const groupId = first.groupId;
    const ts = this.now();
    const patch = { label: target.label, status: target.enabled, updatedAt: ts };

    if (target.values === undefined) {
      await repo.updateOptions(
        rows.map((r) => r.id),
        patch,
      );
    } else {
      const wanted = new Set(target.values);
      const have = new Set(rows.map((r) => r.value));
      const stale = rows.filter((r) => !wanted.has(r.value)).map((r) => r.id);
      const kept = rows.filter((r) => wanted.has(r.value)).map((r) => r.id);
      const fresh = target.values.filter((v) => !have.has(v));

      // Delete first so a relabelled group never collides with its own old rows.
      await repo.deleteOptions(stale);
      await repo.updateOptions(kept, patch);
      await repo.insertOptions(
        fresh.map((value) => ({
          id: this.ids.nextId(),
          groupId,
          dictTypeId: dictType.id,
          label: target.label,
          value,
          status: target.enabled,
          createdAt: ts,
          updatedAt: ts,
        })),
      );
    }

    const after = toGroup(dictType, await repo.findGroupRows(groupId));
    if (!after) throw new Error(`group ${groupId} vanished during reconcile`);
    return after;
  }
}
