import type { ConfigStore } from '../infra/store/ConfigStore.js';
import type { AuditRecorder, OperationContext } from './AuditRecorder.js';
import type { ReferenceValidator } from './ReferenceValidator.js';
import { toRouteJson, type Route } from '../domain/entities/Route.js';
import { buildNewRoute, mergeRoute } from '../domain/configMerge.js';
import { NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * RouteService - validate references, persist, then audit route changes
 */
export class RouteService {
  constructor(
    private store: ConfigStore,
    private audit: AuditRecorder,
    private references: ReferenceValidator
  ) {}

  listRoutes(enabled?: boolean): Promise<Route[]> {
    return this.store.listRoutes(enabled);
  }

  async getRoute(id: number): Promise<Route> {
    const route = await this.store.getRouteById(id);
    if (!route) {
      throw new NotFoundError('Route', { id });
    }
    return route;
  }

  async createRoute(payload: unknown, context: OperationContext): Promise<Route> {
    const input = buildNewRoute(payload);
    await this.references.assertUsableBackend(input.backendName);

    const created = await this.store.createRoute(input);
    logger.info('Route created', {
      id: created.id,
      method: created.httpMethod,
      pattern: created.httpPattern,
      backendName: created.backendName,
    });

    await this.audit.record({
      configType: 'route',
      configId: created.id,
      operation: 'CREATE',
      before: null,
      after: toRouteJson(created),
      context,
    });
    return created;
  }

  /**
   * The backend reference is only re-checked when backend_name changes, so a
   * route whose backend was disabled later can still have other fields edited
   */
  async updateRoute(id: number, payload: unknown, context: OperationContext): Promise<Route> {
    const existing = await this.getRoute(id);
    const merged = mergeRoute(existing, payload);

    if (merged.backendName !== existing.backendName) {
      await this.references.assertUsableBackend(merged.backendName);
    }

    const updated = await this.store.updateRoute(id, {
      httpMethod: merged.httpMethod,
      httpPattern: merged.httpPattern,
      backendName: merged.backendName,
      backendService: merged.backendService,
      backendMethod: merged.backendMethod,
      timeoutMs: merged.timeoutMs,
      description: merged.description,
      enabled: merged.enabled,
    });
    logger.info('Route updated', { id, enabled: updated.enabled });

    await this.audit.record({
      configType: 'route',
      configId: id,
      operation: 'UPDATE',
      before: toRouteJson(existing),
      after: toRouteJson(updated),
      context,
    });
    return updated;
  }

  async deleteRoute(id: number, context: OperationContext): Promise<void> {
    const existing = await this.getRoute(id);

    await this.store.deleteRoute(id);
    logger.info('Route disabled', { id });

    await this.audit.record({
      configType: 'route',
      configId: id,
      operation: 'DELETE',
      before: toRouteJson(existing),
      after: null,
      context,
    });
  }
}
