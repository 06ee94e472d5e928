/**
 * ConfigHistory entity - immutable record of one configuration mutation
 * Snapshots are stored serialized; the store never interprets them
 */
export const CONFIG_TYPES = ['backend', 'route'] as const;
export type ConfigType = (typeof CONFIG_TYPES)[number];

export type ConfigOperation = 'CREATE' | 'UPDATE' | 'DELETE';

export interface ConfigHistory {
  id: number; // Auto-increment, monotonically increasing
  configType: ConfigType;
  configId: number | null;
  operation: ConfigOperation;
  oldValue: string | null;
  newValue: string | null;
  operator: string | null;
  createdAt: Date;
}

export type NewConfigHistory = Omit<ConfigHistory, 'id' | 'createdAt'>;

export interface HistoryQuery {
  configType?: ConfigType;
  configId?: number;
  limit: number;
  offset: number;
}

export interface HistoryPage {
  items: ConfigHistory[];
  total: number;
}

/**
 * Factory for a history row; snapshots are serialized here so a
 * non-serializable value fails before anything reaches the store
 */
export function createConfigHistory(params: {
  configType: ConfigType;
  configId: number | null;
  operation: ConfigOperation;
  oldValue?: unknown;
  newValue?: unknown;
  operator?: string | null;
}): NewConfigHistory {
  return {
    configType: params.configType,
    configId: params.configId,
    operation: params.operation,
    oldValue: serializeSnapshot(params.oldValue),
    newValue: serializeSnapshot(params.newValue),
    operator: params.operator ?? null,
  };
}

function serializeSnapshot(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return JSON.stringify(value);
}

export function parseSnapshot(value: string | null): unknown {
  return value === null ? null : JSON.parse(value);
}

export interface ConfigHistoryJson {
  id: number;
  config_type: ConfigType;
  config_id: number | null;
  operation: ConfigOperation;
  old_value: unknown;
  new_value: unknown;
  operator: string | null;
  created_at: string;
}

export function toConfigHistoryJson(entry: ConfigHistory): ConfigHistoryJson {
  return {
    id: entry.id,
    config_type: entry.configType,
    config_id: entry.configId,
    operation: entry.operation,
    old_value: parseSnapshot(entry.oldValue),
    new_value: parseSnapshot(entry.newValue),
    operator: entry.operator,
    created_at: entry.createdAt.toISOString(),
  };
}
