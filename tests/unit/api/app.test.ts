import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../src/app.js';
import { parseEnv } from '../../../src/infra/env.js';
import { InMemoryConfigStore } from '../../../src/infra/store/InMemoryConfigStore.js';
import { StorageError } from '../../../src/domain/errors.js';
import { logger } from '../../../src/infra/logger.js';
import { createSqliteFixture, type StoreFixture } from '../../helpers/stores.js';

const loginRoute = {
  http_method: 'POST',
  http_pattern: '/v1/user/login',
  backend_name: 'account',
  backend_service: 'user.v1.UserService',
  backend_method: 'Login',
};

describe('HTTP API', () => {
  let store: InMemoryConfigStore;
  let app: Express;

  beforeEach(() => {
    store = new InMemoryConfigStore();
    app = createApp(parseEnv({ NODE_ENV: 'test' }), store);
  });

  async function seedBackend(): Promise<void> {
    await request(app)
      .post('/api/v1/backends')
      .send({ name: 'account', addr: '127.0.0.1:50051' })
      .expect(201);
  }

  describe('probes', () => {
    it('answers /health', async () => {
      const res = await request(app).get('/health').expect(200);
      expect(res.body.status).toBe('ok');
    });

    it('reports ready while the store answers', async () => {
      const res = await request(app).get('/ready').expect(200);
      expect(res.body).toEqual({ status: 'ready' });
    });

    it('reports not ready when the store fails', async () => {
      vi.spyOn(store, 'ping').mockRejectedValue(new StorageError('Query failed'));
      const warn = vi.spyOn(logger, 'warn');

      const res = await request(app).get('/ready').expect(503);

      expect(res.body).toEqual({ status: 'not-ready' });
      expect(warn).toHaveBeenCalledWith(
        'Readiness check failed',
        expect.objectContaining({ error: 'Query failed', code: 'STORAGE_ERROR' })
      );
      warn.mockRestore();
    });
  });

  describe('backends', () => {
    it('creates a backend and returns the wire form', async () => {
      const res = await request(app)
        .post('/api/v1/backends')
        .set('X-Operator', 'alice')
        .send({ name: 'account', addr: '127.0.0.1:50051' })
        .expect(201);

      expect(res.body).toMatchObject({
        id: 1,
        name: 'account',
        addr: '127.0.0.1:50051',
        description: null,
        enabled: true,
      });
      expect(typeof res.body.created_at).toBe('string');
    });

    it('returns 409 for a duplicate name', async () => {
      await seedBackend();
      const res = await request(app)
        .post('/api/v1/backends')
        .send({ name: 'account', addr: 'b:2' })
        .expect(409);
      expect(res.body).toEqual({
        error: 'CONFLICT',
        message: 'Backend already exists',
        details: { name: 'account' },
      });
    });

    it('returns 400 with the missing fields', async () => {
      const res = await request(app)
        .post('/api/v1/backends')
        .send({ name: 'account' })
        .expect(400);
      expect(res.body).toEqual({
        error: 'VALIDATION_ERROR',
        message: 'addr is required',
        details: { fields: ['addr'] },
      });
    });

    it('returns 404 for an unknown name', async () => {
      const res = await request(app).get('/api/v1/backends/missing').expect(404);
      expect(res.body.error).toBe('NOT_FOUND');
      expect(res.body.message).toBe('Backend not found (name=missing)');
    });

    it('updates partially and soft deletes', async () => {
      await seedBackend();

      const updated = await request(app)
        .put('/api/v1/backends/account')
        .send({ addr: '127.0.0.1:9999' })
        .expect(200);
      expect(updated.body).toMatchObject({ addr: '127.0.0.1:9999', enabled: true });

      await request(app).delete('/api/v1/backends/account').expect(204);

      const fetched = await request(app).get('/api/v1/backends/account').expect(200);
      expect(fetched.body.enabled).toBe(false);
    });

    it('filters the list on enabled', async () => {
      await seedBackend();
      await request(app)
        .post('/api/v1/backends')
        .send({ name: 'billing', addr: 'b:1', enabled: false })
        .expect(201);

      const all = await request(app).get('/api/v1/backends').expect(200);
      expect(all.body.map((b: { name: string }) => b.name)).toEqual(['account', 'billing']);

      const enabled = await request(app).get('/api/v1/backends?enabled=TRUE').expect(200);
      expect(enabled.body.map((b: { name: string }) => b.name)).toEqual(['account']);

      const disabled = await request(app).get('/api/v1/backends?enabled=0').expect(200);
      expect(disabled.body.map((b: { name: string }) => b.name)).toEqual(['billing']);
    });

    it('rejects an unparseable enabled filter', async () => {
      const res = await request(app).get('/api/v1/backends?enabled=maybe').expect(400);
      expect(res.body.message).toBe('Invalid enabled parameter');
    });
  });

  describe('routes', () => {
    it('returns 400 INVALID_REFERENCE for an unknown backend', async () => {
      const res = await request(app).post('/api/v1/routes').send(loginRoute).expect(400);
      expect(res.body.error).toBe('INVALID_REFERENCE');
      expect(res.body.message).toBe('Backend account not found or disabled');
    });

    it('creates, updates and deletes a route', async () => {
      await seedBackend();

      const created = await request(app).post('/api/v1/routes').send(loginRoute).expect(201);
      expect(created.body).toMatchObject({ ...loginRoute, timeout_ms: 5000, enabled: true });

      const id: number = created.body.id;
      const updated = await request(app)
        .put(`/api/v1/routes/${id}`)
        .send({ timeout_ms: 2500 })
        .expect(200);
      expect(updated.body.timeout_ms).toBe(2500);

      await request(app).delete(`/api/v1/routes/${id}`).expect(204);
      const fetched = await request(app).get(`/api/v1/routes/${id}`).expect(200);
      expect(fetched.body.enabled).toBe(false);
    });

    it('rejects a malformed id', async () => {
      const res = await request(app).get('/api/v1/routes/abc').expect(400);
      expect(res.body.message).toBe('Invalid route id');
      await request(app).get('/api/v1/routes/0').expect(400);
    });

    it('returns 404 for an unknown id', async () => {
      await request(app).get('/api/v1/routes/42').expect(404);
    });
  });

  describe('history', () => {
    it('returns the page envelope with parsed snapshots', async () => {
      await request(app)
        .post('/api/v1/backends')
        .set('X-Operator', '  alice  ')
        .send({ name: 'account', addr: '127.0.0.1:50051' })
        .expect(201);
      await request(app)
        .put('/api/v1/backends/account')
        .send({ addr: '127.0.0.1:9999' })
        .expect(200);

      const res = await request(app)
        .get('/api/v1/history?config_type=backend&config_id=1')
        .expect(200);

      expect(res.body.total).toBe(2);
      expect(res.body.limit).toBe(50);
      expect(res.body.offset).toBe(0);
      expect(res.body.items[0]).toMatchObject({
        config_type: 'backend',
        config_id: 1,
        operation: 'UPDATE',
        operator: null,
      });
      expect(res.body.items[0].old_value.addr).toBe('127.0.0.1:50051');
      expect(res.body.items[0].new_value.addr).toBe('127.0.0.1:9999');
      expect(res.body.items[1]).toMatchObject({
        operation: 'CREATE',
        operator: 'alice',
        old_value: null,
      });
    });

    it('normalizes limit and offset', async () => {
      const over = await request(app).get('/api/v1/history?limit=500&offset=-3').expect(200);
      expect(over.body).toEqual({ items: [], total: 0, limit: 50, offset: 0 });

      const fallback = await request(app).get('/api/v1/history?limit=abc').expect(200);
      expect(fallback.body.limit).toBe(50);

      const exponent = await request(app).get('/api/v1/history?limit=1e2').expect(200);
      expect(exponent.body.limit).toBe(50);
    });

    it('rejects an unknown config type', async () => {
      const res = await request(app).get('/api/v1/history?config_type=cluster').expect(400);
      expect(res.body.message).toBe('Invalid history query');
    });
  });

  it('maps malformed JSON to 400 INVALID_JSON', async () => {
    const res = await request(app)
      .post('/api/v1/backends')
      .set('Content-Type', 'application/json')
      .send('{"name":')
      .expect(400);
    expect(res.body).toEqual({ error: 'INVALID_JSON', message: 'Invalid JSON in request body' });
  });

  it('hides unexpected errors outside development', async () => {
    vi.spyOn(store, 'listBackends').mockRejectedValue(new Error('boom'));
    const res = await request(app).get('/api/v1/backends').expect(500);
    expect(res.body).toEqual({
      error: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  it('keeps storage details out of the response', async () => {
    vi.spyOn(store, 'listRoutes').mockRejectedValue(
      new StorageError('Query failed', { sql: 'SELECT 1' })
    );
    const res = await request(app).get('/api/v1/routes').expect(500);
    expect(res.body).toEqual({ error: 'STORAGE_ERROR', message: 'Query failed' });
  });

  it('answers unknown paths with 404', async () => {
    const res = await request(app).get('/api/v1/nothing').expect(404);
    expect(res.body).toEqual({
      error: 'NOT_FOUND',
      message: 'The requested resource was not found',
    });
  });
});

describe('HTTP API on SQLite', () => {
  let fixture: StoreFixture;
  let app: Express;

  beforeEach(async () => {
    fixture = await createSqliteFixture();
    app = createApp(parseEnv({ NODE_ENV: 'test' }), fixture.store);
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('resolves an out-of-range offset to the first page', async () => {
    await request(app)
      .post('/api/v1/backends')
      .send({ name: 'account', addr: '127.0.0.1:50051' })
      .expect(201);

    const res = await request(app).get('/api/v1/history?offset=99999999999999999999').expect(200);

    expect(res.body.offset).toBe(0);
    expect(res.body.limit).toBe(50);
    expect(res.body.total).toBe(1);
    expect(res.body.items).toHaveLength(1);
  });
});
