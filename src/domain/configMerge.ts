import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { Backend, NewBackend } from './entities/Backend.js';
import { normalizeTimeout, type NewRoute, type Route } from './entities/Route.js';

/**
 * Payload decoding and update-merge policy for backends and routes.
 *
 * Payloads are decoded with every key optional, so a key missing from the
 * JSON body stays missing in the decoded patch. That keeps "omitted" apart
 * from "explicitly false" for `enabled`. Keys not in the schema (name on
 * update, id, timestamps) are stripped, which is how identity fields stay
 * pinned to the existing record.
 */

const backendPayloadSchema = z.object({
  name: z.string().optional(),
  addr: z.string().optional(),
  description: z.string().nullable().optional(),
  enabled: z.boolean().optional(),
});

const backendPatchSchema = backendPayloadSchema.omit({ name: true });

const routePayloadSchema = z.object({
  http_method: z.string().optional(),
  http_pattern: z.string().optional(),
  backend_name: z.string().optional(),
  backend_service: z.string().optional(),
  backend_method: z.string().optional(),
  timeout_ms: z.number().int().optional(),
  description: z.string().nullable().optional(),
  enabled: z.boolean().optional(),
});

export type BackendPayload = z.infer<typeof backendPayloadSchema>;
export type BackendPatch = z.infer<typeof backendPatchSchema>;
export type RoutePayload = z.infer<typeof routePayloadSchema>;

function decode<S extends z.ZodTypeAny>(schema: S, payload: unknown, entity: string): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${entity} payload`, parsed.error.flatten());
  }
  return parsed.data;
}

function requireFields(fields: Record<string, string>): void {
  const missing = Object.entries(fields)
    .filter(([, value]) => value.trim().length === 0)
    .map(([field]) => field);

  if (missing.length > 0) {
    const verb = missing.length === 1 ? 'is' : 'are';
    throw new ValidationError(`${missing.join(', ')} ${verb} required`, { fields: missing });
  }
}

export function assertValidBackend(backend: Pick<Backend, 'name' | 'addr'>): void {
  requireFields({ name: backend.name, addr: backend.addr });
}

export function assertValidRoute(
  route: Pick<Route, 'httpMethod' | 'httpPattern' | 'backendName' | 'backendService' | 'backendMethod'>
): void {
  requireFields({
    http_method: route.httpMethod,
    http_pattern: route.httpPattern,
    backend_name: route.backendName,
    backend_service: route.backendService,
    backend_method: route.backendMethod,
  });
}

/**
 * Decode a create payload; enabled defaults to true when omitted
 */
export function buildNewBackend(payload: unknown): NewBackend {
  const input = decode(backendPayloadSchema, payload, 'backend');
  const backend: NewBackend = {
    name: input.name ?? '',
    addr: input.addr ?? '',
    description: input.description ?? null,
    enabled: input.enabled !== undefined ? input.enabled : true,
  };
  assertValidBackend(backend);
  return backend;
}

export function mergeBackend(existing: Backend, payload: unknown): Backend {
  const patch = decode(backendPatchSchema, payload, 'backend');
  const merged: Backend = {
    id: existing.id,
    name: existing.name,
    addr: patch.addr !== undefined ? patch.addr : existing.addr,
    description: patch.description !== undefined ? patch.description : existing.description,
    enabled: patch.enabled !== undefined ? patch.enabled : existing.enabled,
    createdAt: existing.createdAt,
    updatedAt: existing.updatedAt,
  };
  assertValidBackend(merged);
  return merged;
}

/**
 * Decode a create payload; timeout_ms defaults to 5000, enabled to true
 */
export function buildNewRoute(payload: unknown): NewRoute {
  const input = decode(routePayloadSchema, payload, 'route');
  const route: NewRoute = {
    httpMethod: input.http_method ?? '',
    httpPattern: input.http_pattern ?? '',
    backendName: input.backend_name ?? '',
    backendService: input.backend_service ?? '',
    backendMethod: input.backend_method ?? '',
    timeoutMs: normalizeTimeout(input.timeout_ms),
    description: input.description ?? null,
    enabled: input.enabled !== undefined ? input.enabled : true,
  };
  assertValidRoute(route);
  return route;
}

export function mergeRoute(existing: Route, payload: unknown): Route {
  const patch = decode(routePayloadSchema, payload, 'route');
  const merged: Route = {
    id: existing.id,
    httpMethod: patch.http_method ?? existing.httpMethod,
    httpPattern: patch.http_pattern ?? existing.httpPattern,
    backendName: patch.backend_name ?? existing.backendName,
    backendService: patch.backend_service ?? existing.backendService,
    backendMethod: patch.backend_method ?? existing.backendMethod,
    timeoutMs: normalizeTimeout(patch.timeout_ms ?? existing.timeoutMs),
    description: patch.description !== undefined ? patch.description : existing.description,
    enabled: patch.enabled !== undefined ? patch.enabled : existing.enabled,
    createdAt: existing.createdAt,
    updatedAt: existing.updatedAt,
  };
  assertValidRoute(merged);
  return merged;
}
