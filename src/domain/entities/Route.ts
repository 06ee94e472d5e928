/**
 * Route entity - maps an inbound HTTP method + pattern to a backend RPC method
 */
export interface Route {
  id: number;
  httpMethod: string;
  httpPattern: string;
  backendName: string;
  backendService: string;
  backendMethod: string;
  timeoutMs: number;
  description: string | null;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewRoute = Omit<Route, 'id' | 'createdAt' | 'updatedAt'>;

export type RouteChanges = NewRoute;

export const DEFAULT_ROUTE_TIMEOUT_MS = 5000;

/**
 * Unset or non-positive timeouts fall back to the default
 */
export function normalizeTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return DEFAULT_ROUTE_TIMEOUT_MS;
  }
  return timeoutMs;
}

export interface RouteJson {
  id: number;
  http_method: string;
  http_pattern: string;
  backend_name: string;
  backend_service: string;
  backend_method: string;
  timeout_ms: number;
  description: string | null;
  enabled: boolean;
  created_at: string;
  updated_at: string;
}

export function toRouteJson(route: Route): RouteJson {
  return {
    id: route.id,
    http_method: route.httpMethod,
    http_pattern: route.httpPattern,
    backend_name: route.backendName,
    backend_service: route.backendService,
    backend_method: route.backendMethod,
    timeout_ms: route.timeoutMs,
    description: route.description,
    enabled: route.enabled,
    created_at: route.createdAt.toISOString(),
    updated_at: route.updatedAt.toISOString(),
  };
}
