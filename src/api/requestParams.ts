import type { Request } from 'express';
import { z } from 'zod';
import { CONFIG_TYPES, type ConfigType } from '../domain/entities/ConfigHistory.js';
import { ValidationError } from '../domain/errors.js';

const TRUE_VALUES = ['1', 't', 'T', 'true', 'True', 'TRUE'];
const FALSE_VALUES = ['0', 'f', 'F', 'false', 'False', 'FALSE'];

/**
 * ?enabled= filter; absent or empty means no filter
 */
export function parseEnabledFilter(value: unknown): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  if (typeof value === 'string') {
    if (TRUE_VALUES.includes(value)) return true;
    if (FALSE_VALUES.includes(value)) return false;
  }
  throw new ValidationError('Invalid enabled parameter', { enabled: value });
}

export function parseRouteId(value: string): number {
  const id = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Invalid route id', { id: value });
  }
  return id;
}

/**
 * Operator identity from the X-Operator header, null when missing or blank
 */
export function getOperator(req: Request): string | null {
  const operator = req.get('X-Operator')?.trim();
  return operator ? operator : null;
}

const emptyAsMissing = (value: unknown) => (value === '' ? undefined : value);

const historyQuerySchema = z.object({
  config_type: z.preprocess(emptyAsMissing, z.enum(CONFIG_TYPES).optional()),
  config_id: z.preprocess(
    emptyAsMissing,
    z
      .string()
      .regex(/^\d+$/, { message: 'config_id must be a non-negative integer' })
      .transform(Number)
      .optional()
  ),
  limit: z.preprocess(emptyAsMissing, z.string().optional()),
  offset: z.preprocess(emptyAsMissing, z.string().optional()),
});

function toCount(value: string | undefined): number | undefined {
  return value !== undefined && /^\d+$/.test(value) ? Number(value) : undefined;
}

export interface HistoryQueryParams {
  configType?: ConfigType;
  configId?: number;
  limit?: number;
  offset?: number;
}

/**
 * Filters must be well formed. limit and offset that are not plain digit
 * strings are dropped and resolved to their defaults by the pagination rules
 */
export function parseHistoryQuery(query: unknown): HistoryQueryParams {
  const parsed = historyQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError('Invalid history query', parsed.error.flatten());
  }
  const { config_type, config_id, limit, offset } = parsed.data;
  return {
    configType: config_type,
    configId: config_id,
    limit: toCount(limit),
    offset: toCount(offset),
  };
}
