import { describe, expect, it } from 'vitest';

import { PersistenceError } from '../errors.js';
import type { BusinessConfigRepository } from '../services/businessConfigRepository.js';
import { BusinessConfigService, businessConfigPayload } from '../services/businessConfigService.js';
import { SnowflakeGenerator } from '../utils/snowflake.js';
import { MemoryBusinessConfigRepository } from './utils/memoryBusinessConfigRepository.js';

function makeService(repo: BusinessConfigRepository = new MemoryBusinessConfigRepository()) {
  let nowMs = 1_750_000_000_000;
  const ids = new SnowflakeGenerator({ regionId: 0, workerId: 3 });
  return new BusinessConfigService({ repo, ids, now: () => (nowMs += 1000) });
}

describe('BusinessConfigService', () => {
  it('keeps created_at and bumps updated_at on update', async () => {
    const service = makeService();
    const init = await service.initialize('u1', { a: 1 });
    if (!init.ok) throw new Error(init.error);

    const updated = await service.updateCurrent('u1', { b: [1, 2] });
    if (!updated.ok) throw new Error(updated.error);
    expect(updated.config.id).toBe(init.config.id);
    expect(updated.config.createdAt).toBe(init.config.createdAt);
    expect(updated.config.updatedAt).toBe(init.config.createdAt + 1000);
    expect(businessConfigPayload(updated.config)).toMatchObject({ user_id: 'u1', config_data: { b: [1, 2] } });
  });

  it('reports conflict and not_found by code', async () => {
    const service = makeService();
    expect(await service.getCurrent('u1')).toEqual({
      ok: false,
      code: 'not_found',
      error: 'business config is not initialized',
    });
    await service.initialize('u1', {});
    const again = await service.initialize('u1', {});
    expect(again.ok ? null : again.code).toBe('conflict');
  });

  it('wraps storage failures', async () => {
    const broken: BusinessConfigRepository = {
      findByUser: async () => {
        throw new Error('connection reset');
      },
      insertIfAbsent: async () => true,
      updateByUser: async () => null,
    };
    await expect(makeService(broken).getCurrent('u1')).rejects.toBeInstanceOf(PersistenceError);
  });
});
