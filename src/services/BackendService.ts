import type { ConfigStore } from '../infra/store/ConfigStore.js';
import type { AuditRecorder, OperationContext } from './AuditRecorder.js';
import { toBackendJson, type Backend } from '../domain/entities/Backend.js';
import { buildNewBackend, mergeBackend } from '../domain/configMerge.js';
import { ConflictError, NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * BackendService - validate, persist, then audit backend changes
 */
export class BackendService {
  constructor(
    private store: ConfigStore,
    private audit: AuditRecorder
  ) {}

  listBackends(enabled?: boolean): Promise<Backend[]> {
    return this.store.listBackends(enabled);
  }

  async getBackend(name: string): Promise<Backend> {
    const backend = await this.store.getBackendByName(name);
    if (!backend) {
      throw new NotFoundError('Backend', { name });
    }
    return backend;
  }

  async createBackend(payload: unknown, context: OperationContext): Promise<Backend> {
    const input = buildNewBackend(payload);

    const existing = await this.store.getBackendByName(input.name);
    if (existing) {
      throw new ConflictError('Backend already exists', { name: input.name });
    }

    const created = await this.store.createBackend(input);
    logger.info('Backend created', { id: created.id, name: created.name });

    await this.audit.record({
      configType: 'backend',
      configId: created.id,
      operation: 'CREATE',
      before: null,
      after: toBackendJson(created),
      context,
    });
    return created;
  }

  async updateBackend(name: string, payload: unknown, context: OperationContext): Promise<Backend> {
    const existing = await this.getBackend(name);
    const merged = mergeBackend(existing, payload);

    const updated = await this.store.updateBackend(name, {
      addr: merged.addr,
      description: merged.description,
      enabled: merged.enabled,
    });
    logger.info('Backend updated', { id: updated.id, name, enabled: updated.enabled });

    await this.audit.record({
      configType: 'backend',
      configId: updated.id,
      operation: 'UPDATE',
      before: toBackendJson(existing),
      after: toBackendJson(updated),
      context,
    });
    return updated;
  }

  /**
   * Soft delete; deleting an already disabled backend succeeds
   */
  async deleteBackend(name: string, context: OperationContext): Promise<void> {
    const existing = await this.getBackend(name);

    await this.store.deleteBackend(name);
    logger.info('Backend disabled', { id: existing.id, name });

    await this.audit.record({
      configType: 'backend',
      configId: existing.id,
      operation: 'DELETE',
      before: toBackendJson(existing),
      after: null,
      context,
    });
  }
}
