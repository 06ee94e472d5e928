import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryConfigStore } from '../../../src/infra/store/InMemoryConfigStore.js';
import { AuditRecorder } from '../../../src/services/AuditRecorder.js';
import { BackendService } from '../../../src/services/BackendService.js';
import { toBackendJson } from '../../../src/domain/entities/Backend.js';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../../../src/domain/errors.js';

describe('BackendService', () => {
  let store: InMemoryConfigStore;
  let service: BackendService;

  beforeEach(() => {
    store = new InMemoryConfigStore();
    service = new BackendService(store, new AuditRecorder(store));
  });

  async function history() {
    return (await store.getHistory({ limit: 100, offset: 0 })).items;
  }

  it('creates a backend enabled by default and records CREATE', async () => {
    const created = await service.createBackend(
      { name: 'account', addr: '127.0.0.1:50051' },
      { operator: 'alice' }
    );

    expect(created).toMatchObject({ name: 'account', addr: '127.0.0.1:50051', enabled: true });

    const entries = await history();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      configType: 'backend',
      configId: created.id,
      operation: 'CREATE',
      oldValue: null,
      operator: 'alice',
    });
    expect(JSON.parse(entries[0].newValue ?? 'null')).toEqual(toBackendJson(created));
  });

  it('rejects a duplicate name without touching the row or history', async () => {
    await service.createBackend({ name: 'account', addr: 'a:1' }, {});

    await expect(
      service.createBackend({ name: 'account', addr: 'b:2', enabled: false }, {})
    ).rejects.toBeInstanceOf(ConflictError);

    const existing = await store.getBackendByName('account');
    expect(existing).toMatchObject({ addr: 'a:1', enabled: true });
    expect(await history()).toHaveLength(1);
  });

  it('rejects an invalid payload before any write', async () => {
    await expect(service.createBackend({ name: 'account' }, {})).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(await store.listBackends()).toEqual([]);
    expect(await history()).toEqual([]);
  });

  it('preserves enabled on a partial update and records before/after', async () => {
    await service.createBackend({ name: 'account', addr: '127.0.0.1:50051' }, {});
    const before = await service.getBackend('account');

    const updated = await service.updateBackend('account', { addr: '127.0.0.1:9999' }, {});

    expect(updated).toMatchObject({ addr: '127.0.0.1:9999', enabled: true });

    const [latest] = await history();
    expect(latest.operation).toBe('UPDATE');
    expect(latest.operator).toBeNull();
    expect(JSON.parse(latest.oldValue ?? 'null')).toEqual(toBackendJson(before));
    expect(JSON.parse(latest.newValue ?? 'null')).toEqual(toBackendJson(updated));
  });

  it('disables on an explicit enabled false', async () => {
    await service.createBackend({ name: 'account', addr: '127.0.0.1:50051' }, {});

    const updated = await service.updateBackend(
      'account',
      { addr: '127.0.0.1:9999', enabled: false },
      {}
    );

    expect(updated.enabled).toBe(false);
  });

  it('never renames through an update', async () => {
    await service.createBackend({ name: 'account', addr: 'a:1' }, {});

    const updated = await service.updateBackend('account', { name: 'billing', addr: 'a:2' }, {});

    expect(updated.name).toBe('account');
    expect(await store.getBackendByName('billing')).toBeNull();
  });

  it('fails with NotFound for a missing backend', async () => {
    await expect(service.getBackend('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.updateBackend('missing', { addr: 'a:1' }, {})).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(service.deleteBackend('missing', {})).rejects.toBeInstanceOf(NotFoundError);
    expect(await history()).toEqual([]);
  });

  it('soft deletes, records the pre-delete snapshot and allows a repeat', async () => {
    const created = await service.createBackend({ name: 'account', addr: 'a:1' }, {});

    await service.deleteBackend('account', { operator: 'bob' });
    await service.deleteBackend('account', { operator: 'bob' });

    const found = await service.getBackend('account');
    expect(found.enabled).toBe(false);

    const entries = await history();
    expect(entries.map((e) => e.operation)).toEqual(['DELETE', 'DELETE', 'CREATE']);
    expect(entries[1].newValue).toBeNull();
    expect(JSON.parse(entries[1].oldValue ?? 'null')).toEqual(toBackendJson(created));
  });

  it('keeps the mutation when history cannot be written', async () => {
    vi.spyOn(store, 'createHistory').mockRejectedValue(new StorageError('disk full'));

    const created = await service.createBackend({ name: 'account', addr: 'a:1' }, {});

    expect(created.name).toBe('account');
    expect(await store.getBackendByName('account')).not.toBeNull();
  });

  it('propagates storage failures of the mutation itself', async () => {
    vi.spyOn(store, 'createBackend').mockRejectedValue(new StorageError('Execute failed'));

    await expect(service.createBackend({ name: 'account', addr: 'a:1' }, {})).rejects.toThrow(
      'Execute failed'
    );
    expect(await history()).toEqual([]);
  });
});
