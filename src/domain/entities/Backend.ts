/**
 * Backend entity - a named upstream service endpoint routes can point at
 * The name is the lookup key and never changes after creation
 */
export interface Backend {
  id: number;
  name: string;
  addr: string;
  description: string | null;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewBackend = Omit<Backend, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Fields an update may touch; name and id are immutable
 */
export type BackendChanges = Pick<Backend, 'addr' | 'description' | 'enabled'>;

export interface BackendJson {
  id: number;
  name: string;
  addr: string;
  description: string | null;
  enabled: boolean;
  created_at: string;
  updated_at: string;
}

export function toBackendJson(backend: Backend): BackendJson {
  return {
    id: backend.id,
    name: backend.name,
    addr: backend.addr,
    description: backend.description,
    enabled: backend.enabled,
    created_at: backend.createdAt.toISOString(),
    updated_at: backend.updatedAt.toISOString(),
  };
}
