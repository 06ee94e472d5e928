import type { Backend, BackendChanges, NewBackend } from '../../domain/entities/Backend.js';
import type { NewRoute, Route, RouteChanges } from '../../domain/entities/Route.js';
import type {
  ConfigHistory,
  HistoryPage,
  HistoryQuery,
  NewConfigHistory,
} from '../../domain/entities/ConfigHistory.js';

/**
 * Persistence capability set for gateway configuration.
 *
 * The store is the only component that writes backends, routes and history.
 * Lookups resolve to null when nothing matches; mutations keyed on a missing
 * row reject with NotFoundError, duplicate backend names with ConflictError,
 * and any storage failure with StorageError. Nothing here retries.
 */
export interface ConfigStore {
  /** Ordered by name ascending */
  listBackends(enabled?: boolean): Promise<Backend[]>;
  getBackendByName(name: string): Promise<Backend | null>;
  createBackend(backend: NewBackend): Promise<Backend>;
  /** Touches addr, description and enabled only; refreshes updatedAt */
  updateBackend(name: string, changes: BackendChanges): Promise<Backend>;
  /** Soft delete: enabled=false, row kept */
  deleteBackend(name: string): Promise<void>;

  /** Ordered by (httpMethod, httpPattern) ascending */
  listRoutes(enabled?: boolean): Promise<Route[]>;
  getRouteById(id: number): Promise<Route | null>;
  createRoute(route: NewRoute): Promise<Route>;
  updateRoute(id: number, changes: RouteChanges): Promise<Route>;
  deleteRoute(id: number): Promise<void>;

  /** Append-only */
  createHistory(entry: NewConfigHistory): Promise<ConfigHistory>;
  /** Newest first; total counts every row matching the filters */
  getHistory(query: HistoryQuery): Promise<HistoryPage>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
