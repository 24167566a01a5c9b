import {
  DictErrorCode,
  type BusinessConfigData,
  type BusinessConfigDto,
  type DictFailure,
  type DictResult,
} from '@aircargo/shared';

import { toPersistenceError } from '../errors.js';
import type { IdGenerator } from '../utils/snowflake.js';
import type { BusinessConfigRepository, BusinessConfigRow } from './businessConfigRepository.js';

export type BusinessConfigServiceDeps = {
  repo: BusinessConfigRepository;
  ids: IdGenerator;
  now?: () => number;
};

const notInitialized: DictFailure = {
  ok: false,
  code: DictErrorCode.NotFound,
  error: 'business config is not initialized',
};

export function businessConfigPayload(row: BusinessConfigRow): BusinessConfigDto {
  return {
    id: row.id.toString(),
    user_id: row.userId,
    config_data: row.configData,
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

// Per-user business parameters; one row per user, initialised once, then replaced as a whole.
export class BusinessConfigService {
  private readonly repo: BusinessConfigRepository;
  private readonly ids: IdGenerator;
  private readonly now: () => number;

  constructor(deps: BusinessConfigServiceDeps) {
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

  async initialize(userId: string, configData: BusinessConfigData): Promise<DictResult<{ config: BusinessConfigRow }>> {
    return await this.guard(async () => {
      const ts = this.now();
      const row: BusinessConfigRow = { id: this.ids.nextId(), userId, configData, createdAt: ts, updatedAt: ts };
      if (!(await this.repo.insertIfAbsent(row))) {
        return { ok: false as const, code: DictErrorCode.Conflict, error: 'business config is already initialized' };
      }
      return { ok: true as const, config: row };
    });
  }

  async getCurrent(userId: string): Promise<DictResult<{ config: BusinessConfigRow }>> {
    return await this.guard(async () => {
      const config = await this.repo.findByUser(userId);
      if (!config) return notInitialized;
      return { ok: true as const, config };
    });
  }

  async updateCurrent(userId: string, configData: BusinessConfigData): Promise<DictResult<{ config: BusinessConfigRow }>> {
    return await this.guard(async () => {
      const config = await this.repo.updateByUser(userId, { configData, updatedAt: this.now() });
      if (!config) return notInitialized;
      return { ok: true as const, config };
    });
  }
}
