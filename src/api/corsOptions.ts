import type { CorsOptions } from 'cors';
import type { Env } from '../infra/env.js';

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * A "*" anywhere in the origin list allows every origin; otherwise only
 * listed origins are echoed back
 */
export function createCorsOptions(env: Env): CorsOptions {
  const origins = splitList(env.CORS_ALLOWED_ORIGINS);

  return {
    origin: origins.length === 0 || origins.includes('*') ? '*' : origins,
    methods: splitList(env.CORS_ALLOWED_METHODS),
    allowedHeaders: splitList(env.CORS_ALLOWED_HEADERS),
    credentials: env.CORS_ALLOW_CREDENTIALS,
    maxAge: 3600,
    optionsSuccessStatus: 200,
  };
}
