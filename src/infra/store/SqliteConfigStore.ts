import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { ConfigStore } from './ConfigStore.js';
import type { Backend, BackendChanges, NewBackend } from '../../domain/entities/Backend.js';
import type { NewRoute, Route, RouteChanges } from '../../domain/entities/Route.js';
import type {
  ConfigHistory,
  ConfigOperation,
  ConfigType,
  HistoryPage,
  HistoryQuery,
  NewConfigHistory,
} from '../../domain/entities/ConfigHistory.js';
import { NotFoundError, StorageError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type BackendRow = {
  id: number;
  name: string;
  addr: string;
  description: string | null;
  enabled: number;
  created_at: string;
  updated_at: string;
};

type RouteRow = {
  id: number;
  http_method: string;
  http_pattern: string;
  backend_name: string;
  backend_service: string;
  backend_method: string;
  timeout_ms: number;
  description: string | null;
  enabled: number;
  created_at: string;
  updated_at: string;
};

type HistoryRow = {
  id: number;
  config_type: ConfigType;
  config_id: number | null;
  operation: ConfigOperation;
  old_value: string | null;
  new_value: string | null;
  operator: string | null;
  created_at: string;
};

const BACKEND_COLUMNS = 'id, name, addr, description, enabled, created_at, updated_at';
const ROUTE_COLUMNS = `id, http_method, http_pattern, backend_name, backend_service,
  backend_method, timeout_ms, description, enabled, created_at, updated_at`;

/**
 * ConfigStore backed by SQLite
 * Each method is a single round trip through the shared DatabaseAdapter
 */
export class SqliteConfigStore implements ConfigStore {
  constructor(private db: DatabaseAdapter) {}

  async listBackends(enabled?: boolean): Promise<Backend[]> {
    const rows =
      enabled === undefined
        ? this.db.query<BackendRow>(`SELECT ${BACKEND_COLUMNS} FROM backends ORDER BY name`)
        : this.db.query<BackendRow>(
            `SELECT ${BACKEND_COLUMNS} FROM backends WHERE enabled = ? ORDER BY name`,
            [enabled ? 1 : 0]
          );
    return rows.map((row) => this.mapRowToBackend(row));
  }

  async getBackendByName(name: string): Promise<Backend | null> {
    const row = this.db.queryOne<BackendRow>(
      `SELECT ${BACKEND_COLUMNS} FROM backends WHERE name = ? LIMIT 1`,
      [name]
    );
    return row ? this.mapRowToBackend(row) : null;
  }

  async createBackend(backend: NewBackend): Promise<Backend> {
    const now = new Date().toISOString();
    const sql = `
      INSERT INTO backends (name, addr, description, enabled, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `;

    const result = this.db.execute(sql, [
      backend.name,
      backend.addr,
      backend.description,
      backend.enabled ? 1 : 0,
      now,
      now,
    ]);

    logger.debug('Backend created', { id: result.lastInsertRowid, name: backend.name });
    return this.requireBackend(backend.name);
  }

  async updateBackend(name: string, changes: BackendChanges): Promise<Backend> {
    const sql = `
      UPDATE backends
      SET addr = ?, description = ?, enabled = ?, updated_at = ?
      WHERE name = ?
    `;

    const result = this.db.execute(sql, [
      changes.addr,
      changes.description,
      changes.enabled ? 1 : 0,
      new Date().toISOString(),
      name,
    ]);

    if (result.changes === 0) {
      throw new NotFoundError('Backend', { name });
    }

    logger.debug('Backend updated', { name, enabled: changes.enabled });
    return this.requireBackend(name);
  }

  async deleteBackend(name: string): Promise<void> {
    const result = this.db.execute(
      'UPDATE backends SET enabled = 0, updated_at = ? WHERE name = ?',
      [new Date().toISOString(), name]
    );

    if (result.changes === 0) {
      throw new NotFoundError('Backend', { name });
    }

    logger.debug('Backend disabled', { name });
  }

  async listRoutes(enabled?: boolean): Promise<Route[]> {
    const rows =
      enabled === undefined
        ? this.db.query<RouteRow>(
            `SELECT ${ROUTE_COLUMNS} FROM routes ORDER BY http_method, http_pattern, id`
          )
        : this.db.query<RouteRow>(
            `SELECT ${ROUTE_COLUMNS} FROM routes WHERE enabled = ?
             ORDER BY http_method, http_pattern, id`,
            [enabled ? 1 : 0]
          );
    return rows.map((row) => this.mapRowToRoute(row));
  }

  async getRouteById(id: number): Promise<Route | null> {
    const row = this.db.queryOne<RouteRow>(
      `SELECT ${ROUTE_COLUMNS} FROM routes WHERE id = ? LIMIT 1`,
      [id]
    );
    return row ? this.mapRowToRoute(row) : null;
  }

  async createRoute(route: NewRoute): Promise<Route> {
    const now = new Date().toISOString();
    const sql = `
      INSERT INTO routes (
        http_method, http_pattern, backend_name, backend_service, backend_method,
        timeout_ms, description, enabled, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    const result = this.db.execute(sql, [
      route.httpMethod,
      route.httpPattern,
      route.backendName,
      route.backendService,
      route.backendMethod,
      route.timeoutMs,
      route.description,
      route.enabled ? 1 : 0,
      now,
      now,
    ]);

    logger.debug('Route created', { id: result.lastInsertRowid, backendName: route.backendName });
    return this.requireRoute(result.lastInsertRowid);
  }

  async updateRoute(id: number, changes: RouteChanges): Promise<Route> {
    const sql = `
      UPDATE routes
      SET http_method = ?, http_pattern = ?, backend_name = ?, backend_service = ?,
          backend_method = ?, timeout_ms = ?, description = ?, enabled = ?, updated_at = ?
      WHERE id = ?
    `;

    const result = this.db.execute(sql, [
      changes.httpMethod,
      changes.httpPattern,
      changes.backendName,
      changes.backendService,
      changes.backendMethod,
      changes.timeoutMs,
      changes.description,
      changes.enabled ? 1 : 0,
      new Date().toISOString(),
      id,
    ]);

    if (result.changes === 0) {
      throw new NotFoundError('Route', { id });
    }

    logger.debug('Route updated', { id, enabled: changes.enabled });
    return this.requireRoute(id);
  }

  async deleteRoute(id: number): Promise<void> {
    const result = this.db.execute('UPDATE routes SET enabled = 0, updated_at = ? WHERE id = ?', [
      new Date().toISOString(),
      id,
    ]);

    if (result.changes === 0) {
      throw new NotFoundError('Route', { id });
    }

    logger.debug('Route disabled', { id });
  }

  async createHistory(entry: NewConfigHistory): Promise<ConfigHistory> {
    const createdAt = new Date();
    const sql = `
      INSERT INTO config_history (config_type, config_id, operation, old_value, new_value, operator, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `;

    const result = this.db.execute(sql, [
      entry.configType,
      entry.configId,
      entry.operation,
      entry.oldValue,
      entry.newValue,
      entry.operator,
      createdAt.toISOString(),
    ]);

    return { ...entry, id: result.lastInsertRowid, createdAt };
  }

  async getHistory(query: HistoryQuery): Promise<HistoryPage> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.configType !== undefined) {
      conditions.push('config_type = ?');
      values.push(query.configType);
    }

    if (query.configId !== undefined) {
      conditions.push('config_id = ?');
      values.push(query.configId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const count = this.db.queryOne<{ total: number }>(
      `SELECT COUNT(*) AS total FROM config_history ${where}`,
      values
    );

    const rows = this.db.query<HistoryRow>(
      `
      SELECT id, config_type, config_id, operation, old_value, new_value, operator, created_at
      FROM config_history
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
      `,
      [...values, query.limit, query.offset]
    );

    return {
      items: rows.map((row) => this.mapRowToHistory(row)),
      total: count?.total ?? 0,
    };
  }

  async ping(): Promise<void> {
    this.db.queryOne('SELECT 1 AS ok');
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private requireBackend(name: string): Backend {
    const row = this.db.queryOne<BackendRow>(
      `SELECT ${BACKEND_COLUMNS} FROM backends WHERE name = ? LIMIT 1`,
      [name]
    );
    if (!row) {
      throw new StorageError('Backend row missing after write', { name });
    }
    return this.mapRowToBackend(row);
  }

  private requireRoute(id: number): Route {
    const row = this.db.queryOne<RouteRow>(
      `SELECT ${ROUTE_COLUMNS} FROM routes WHERE id = ? LIMIT 1`,
      [id]
    );
    if (!row) {
      throw new StorageError('Route row missing after write', { id });
    }
    return this.mapRowToRoute(row);
  }

  private mapRowToBackend(row: BackendRow): Backend {
    return {
      id: row.id,
      name: row.name,
      addr: row.addr,
      description: row.description,
      enabled: row.enabled === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private mapRowToRoute(row: RouteRow): Route {
    return {
      id: row.id,
      httpMethod: row.http_method,
      httpPattern: row.http_pattern,
      backendName: row.backend_name,
      backendService: row.backend_service,
      backendMethod: row.backend_method,
      timeoutMs: row.timeout_ms,
      description: row.description,
      enabled: row.enabled === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private mapRowToHistory(row: HistoryRow): ConfigHistory {
    return {
      id: row.id,
      configType: row.config_type,
      configId: row.config_id,
      operation: row.operation,
      oldValue: row.old_value,
      newValue: row.new_value,
      operator: row.operator,
      createdAt: new Date(row.created_at),
    };
  }
}
