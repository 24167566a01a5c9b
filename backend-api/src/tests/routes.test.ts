import { beforeAll, beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';

import { createApp } from '../app.js';
import { signAccessToken } from '../auth/jwt.js';
import { BusinessConfigService } from '../services/businessConfigService.js';
import { DictionaryService } from '../services/dictionaryService.js';
import { SnowflakeGenerator } from '../utils/snowflake.js';
import { MemoryBusinessConfigRepository } from './utils/memoryBusinessConfigRepository.js';
import { MemoryDictionaryRepository } from './utils/memoryDictionaryRepository.js';

let adminToken = '';
let userToken = '';

beforeAll(async () => {
  process.env.AIRCARGO_JWT_SECRET = 'test-secret-test-secret-test-secret';
  adminToken = await signAccessToken({ id: 'u-admin', username: 'admin', role: 'admin' });
  userToken = await signAccessToken({ id: 'u-user', username: 'clerk', role: 'user' });
});

describe('backend routes', () => {
  let repo: MemoryDictionaryRepository;
  let app: ReturnType<typeof createApp>;

  const admin = () => `Bearer ${adminToken}`;

  beforeEach(() => {
    repo = new MemoryDictionaryRepository();
    const ids = new SnowflakeGenerator({ regionId: 1, workerId: 1 });
    const dictionary = new DictionaryService({ repo, ids });
    const businessConfig = new BusinessConfigService({ repo: new MemoryBusinessConfigRepository(), ids });
    app = createApp({ dictionary, businessConfig });
  });

  async function seedType() {
    const res = await request(app)
      .put('/dict-types')
      .set('Authorization', admin())
      .send({ name: 'Freight code', type: 'freight_code' });
    expect(res.status).toBe(200);
    return res;
  }

  it('GET /health returns ok', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.service).toBe('aircargo-backend-api');
  });

  it('rejects requests without a valid bearer token', async () => {
    const missing = await request(app).get('/dict-types');
    expect(missing.status).toBe(401);
    expect(missing.body).toEqual({ ok: false, error: 'missing bearer token' });

    const bad = await request(app).get('/dict-types').set('Authorization', 'Bearer not-a-jwt');
    expect(bad.status).toBe(401);
    expect(bad.body).toEqual({ ok: false, error: 'invalid token' });
  });

  it('allows reads but not writes for non-admin users', async () => {
    const list = await request(app).get('/dict-types').set('Authorization', `Bearer ${userToken}`);
    expect(list.status).toBe(200);
    expect(list.body).toEqual({ ok: true, total: 0, items: [] });

    const write = await request(app)
      .post('/dict-types')
      .set('Authorization', `Bearer ${userToken}`)
      .send({ name: 'Freight code', type: 'freight_code' });
    expect(write.status).toBe(403);
    expect(write.body).toEqual({ ok: false, error: 'admin only' });
  });

  it('PUT /dict-types upserts and POST /dict-types conflicts', async () => {
    const created = await seedType();
    expect(created.body.created).toBe(true);
    expect(created.body.item.type).toBe('freight_code');
    expect(created.body.item.status).toBe(1);
    expect(typeof created.body.item.id).toBe('string');

    const again = await request(app)
      .put('/dict-types')
      .set('Authorization', admin())
      .send({ name: 'Rate codes', type: 'freight_code', status: 0 });
    expect(again.body.created).toBe(false);
    expect(again.body.item.id).toBe(created.body.item.id);
    expect(again.body.item.status).toBe(0);

    const strict = await request(app)
      .post('/dict-types')
      .set('Authorization', admin())
      .send({ name: 'Freight code', type: 'freight_code' });
    expect(strict.status).toBe(409);
    expect(strict.body.code).toBe('conflict');
  });

  it('creates, upserts and lists option groups', async () => {
    await seedType();

    const created = await request(app)
      .post('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'rate', value: ['M', 'N', 'M'] });
    expect(created.status).toBe(200);
    expect(created.body.item.value).toEqual(['M', 'N']);
    expect(created.body.item.dict_type).toBe('freight_code');

    const upserted = await request(app)
      .put('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'rate', value: ['N', 'X'], status: 1 });
    expect(upserted.status).toBe(200);
    expect(upserted.body.created).toBe(false);
    expect(upserted.body.item.id).toBe(created.body.item.id);
    expect(upserted.body.item.value).toEqual(['N', 'X']);

    const list = await request(app)
      .get('/dict-options')
      .query({ dict_type: 'freight_code', page: '1', page_size: '10' })
      .set('Authorization', admin());
    expect(list.status).toBe(200);
    expect(list.body.total).toBe(1);
    expect(list.body.items[0].value).toEqual(['N', 'X']);

    const one = await request(app).get(`/dict-options/${created.body.item.id}`).set('Authorization', admin());
    expect(one.status).toBe(200);
    expect(one.body.item.label).toBe('rate');
  });

  it('maps not_found and invalid input to 404 and 400', async () => {
    const unknownType = await request(app)
      .get('/dict-options')
      .query({ dict_type: 'unknown' })
      .set('Authorization', admin());
    expect(unknownType.status).toBe(404);
    expect(unknownType.body).toEqual({ ok: false, code: 'not_found', error: 'dictionary type not found: unknown' });

    const nonString = await request(app)
      .post('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'rate', value: [1, 2] });
    expect(nonString.status).toBe(400);
    expect(nonString.body.code).toBe('invalid_argument');

    const badId = await request(app).get('/dict-options/abc').set('Authorization', admin());
    expect(badId.status).toBe(400);
    expect(badId.body).toEqual({ ok: false, code: 'invalid_argument', error: 'bad id' });

    const missingGroup = await request(app).delete('/dict-options/12345').set('Authorization', admin());
    expect(missingGroup.status).toBe(404);
  });

  it('relabels, deletes by label and deletes the type', async () => {
    await seedType();
    const created = await request(app)
      .post('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'rate', value: ['M', 'N'] });
    await request(app)
      .post('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'general', value: ['Q'] });

    const patched = await request(app)
      .patch(`/dict-options/${created.body.item.id}`)
      .set('Authorization', admin())
      .send({ label: 'minimum', status: 0 });
    expect(patched.status).toBe(200);
    expect(patched.body.item.label).toBe('minimum');
    expect(patched.body.item.status).toBe(0);

    const byLabel = await request(app)
      .delete('/dict-options/by-label')
      .query({ dict_type: 'freight_code', label: 'general' })
      .set('Authorization', admin());
    expect(byLabel.body).toEqual({ ok: true, deletedOptions: 1 });

    const dropped = await request(app).delete('/dict-types/freight_code').set('Authorization', admin());
    expect(dropped.body).toEqual({ ok: true, deletedOptions: 2 });
    expect(repo.allOptionRows()).toEqual([]);
  });

  it('answers 400 on malformed json', async () => {
    const res = await request(app)
      .post('/dict-types')
      .set('Authorization', admin())
      .set('Content-Type', 'application/json')
      .send('{"name":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'invalid json' });
  });

  it('surfaces storage failures as 500 and keeps data unchanged', async () => {
    await seedType();
    repo.failNext('insertOptions');
    const res = await request(app)
      .post('/dict-options')
      .set('Authorization', admin())
      .send({ dict_type: 'freight_code', label: 'rate', value: ['M'] });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ ok: false, error: 'storage failure: injected insertOptions failure' });
    expect(repo.allOptionRows()).toEqual([]);
  });
});

describe('business config routes', () => {
  let app: ReturnType<typeof createApp>;

  const user = () => `Bearer ${userToken}`;
  const airline = { shenzhen_air: { booking: { business_default: { origin_station: 'SZX', package: '' } } } };

  beforeEach(() => {
    const ids = new SnowflakeGenerator({ regionId: 1, workerId: 2 });
    app = createApp({
      dictionary: new DictionaryService({ repo: new MemoryDictionaryRepository(), ids }),
      businessConfig: new BusinessConfigService({ repo: new MemoryBusinessConfigRepository(), ids }),
    });
  });

  it('requires a token', async () => {
    const res = await request(app).get('/config/current');
    expect(res.status).toBe(401);
  });

  it('answers 404 before initialisation', async () => {
    const get = await request(app).get('/config/current').set('Authorization', user());
    expect(get.status).toBe(404);
    expect(get.body).toEqual({ ok: false, code: 'not_found', error: 'business config is not initialized' });

    const put = await request(app).put('/config/current').set('Authorization', user()).send({ config_data: airline });
    expect(put.status).toBe(404);
  });

  it('initialises once per user and stores the payload as given', async () => {
    const init = await request(app).post('/config/initialize').set('Authorization', user()).send({ config_data: airline });
    expect(init.status).toBe(200);
    expect(init.body.item.user_id).toBe('u-user');
    expect(init.body.item.config_data).toEqual(airline);
    expect(typeof init.body.item.id).toBe('string');

    const again = await request(app).post('/config/initialize').set('Authorization', user()).send({ config_data: {} });
    expect(again.status).toBe(409);
    expect(again.body.code).toBe('conflict');

    // another user is independent
    const other = await request(app).get('/config/current').set('Authorization', `Bearer ${adminToken}`);
    expect(other.status).toBe(404);
  });

  it('replaces the payload on PUT', async () => {
    await request(app).post('/config/initialize').set('Authorization', user()).send({ config_data: airline });
    const next = { china_southern_air: { print: { printer_config: [{ document_type: 'awb', printer_name: 'P1' }] } } };

    const put = await request(app).put('/config/current').set('Authorization', user()).send({ config_data: next });
    expect(put.status).toBe(200);
    expect(put.body.item.config_data).toEqual(next);

    const get = await request(app).get('/config/current').set('Authorization', user());
    expect(get.body.item.config_data).toEqual(next);
    expect(get.body.item.id).toBe(put.body.item.id);
  });

  it('rejects a payload that is not an object', async () => {
    const res = await request(app).post('/config/initialize').set('Authorization', user()).send({ config_data: ['a'] });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('invalid_argument');
  });
});
