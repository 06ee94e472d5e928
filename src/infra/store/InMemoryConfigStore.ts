import type { ConfigStore } from './ConfigStore.js';
import type { Backend, BackendChanges, NewBackend } from '../../domain/entities/Backend.js';
import type { NewRoute, Route, RouteChanges } from '../../domain/entities/Route.js';
import type {
  ConfigHistory,
  HistoryPage,
  HistoryQuery,
  NewConfigHistory,
} from '../../domain/entities/ConfigHistory.js';
import { ConflictError, NotFoundError } from '../../domain/errors.js';

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * ConfigStore kept in process memory, for tests and throwaway local runs.
 * Records are copied on the way in and out so callers never share state
 * with the store.
 */
export class InMemoryConfigStore implements ConfigStore {
  private backends = new Map<string, Backend>();
  private routes = new Map<number, Route>();
  private history: ConfigHistory[] = [];
  private nextBackendId = 1;
  private nextRouteId = 1;
  private nextHistoryId = 1;

  async listBackends(enabled?: boolean): Promise<Backend[]> {
    return [...this.backends.values()]
      .filter((backend) => enabled === undefined || backend.enabled === enabled)
      .sort((a, b) => compareText(a.name, b.name))
      .map((backend) => structuredClone(backend));
  }

  async getBackendByName(name: string): Promise<Backend | null> {
    const backend = this.backends.get(name);
    return backend ? structuredClone(backend) : null;
  }

  async createBackend(backend: NewBackend): Promise<Backend> {
    if (this.backends.has(backend.name)) {
      throw new ConflictError('Unique constraint violated', { name: backend.name });
    }
    const now = new Date();
    const created: Backend = {
      ...backend,
      id: this.nextBackendId++,
      createdAt: now,
      updatedAt: now,
    };
    this.backends.set(created.name, created);
    return structuredClone(created);
  }

  async updateBackend(name: string, changes: BackendChanges): Promise<Backend> {
    const existing = this.backends.get(name);
    if (!existing) {
      throw new NotFoundError('Backend', { name });
    }
    const updated: Backend = {
      ...existing,
      addr: changes.addr,
      description: changes.description,
      enabled: changes.enabled,
      updatedAt: new Date(),
    };
    this.backends.set(name, updated);
    return structuredClone(updated);
  }

  async deleteBackend(name: string): Promise<void> {
    const existing = this.backends.get(name);
    if (!existing) {
      throw new NotFoundError('Backend', { name });
    }
    this.backends.set(name, { ...existing, enabled: false, updatedAt: new Date() });
  }

  async listRoutes(enabled?: boolean): Promise<Route[]> {
    return [...this.routes.values()]
      .filter((route) => enabled === undefined || route.enabled === enabled)
      .sort(
        (a, b) =>
          compareText(a.httpMethod, b.httpMethod) ||
          compareText(a.httpPattern, b.httpPattern) ||
          a.id - b.id
      )
      .map((route) => structuredClone(route));
  }

  async getRouteById(id: number): Promise<Route | null> {
    const route = this.routes.get(id);
    return route ? structuredClone(route) : null;
  }

  async createRoute(route: NewRoute): Promise<Route> {
    const now = new Date();
    const created: Route = {
      ...route,
      id: this.nextRouteId++,
      createdAt: now,
      updatedAt: now,
    };
    this.routes.set(created.id, created);
    return structuredClone(created);
  }

  async updateRoute(id: number, changes: RouteChanges): Promise<Route> {
    const existing = this.routes.get(id);
    if (!existing) {
      throw new NotFoundError('Route', { id });
    }
    const updated: Route = {
      ...changes,
      id,
      createdAt: existing.createdAt,
      updatedAt: new Date(),
    };
    this.routes.set(id, updated);
    return structuredClone(updated);
  }

  async deleteRoute(id: number): Promise<void> {
    const existing = this.routes.get(id);
    if (!existing) {
      throw new NotFoundError('Route', { id });
    }
    this.routes.set(id, { ...existing, enabled: false, updatedAt: new Date() });
  }

  async createHistory(entry: NewConfigHistory): Promise<ConfigHistory> {
    const created: ConfigHistory = { ...entry, id: this.nextHistoryId++, createdAt: new Date() };
    this.history.push(created);
    return structuredClone(created);
  }

  async getHistory(query: HistoryQuery): Promise<HistoryPage> {
    const matching = this.history
      .filter(
        (entry) =>
          (query.configType === undefined || entry.configType === query.configType) &&
          (query.configId === undefined || entry.configId === query.configId)
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);

    return {
      items: matching
        .slice(query.offset, query.offset + query.limit)
        .map((entry) => structuredClone(entry)),
      total: matching.length,
    };
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.backends.clear();
    this.routes.clear();
    this.history = [];
  }
}
