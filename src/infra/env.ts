import { z, ZodError } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8081),

  // Storage
  CONFIG_STORE: z.enum(['sqlite', 'memory']).default('sqlite'),
  SQLITE_DB_PATH: z.string().min(1).default('./data/gateway-admin.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // CORS
  CORS_ALLOWED_ORIGINS: z.string().default('*'),
  CORS_ALLOWED_METHODS: z.string().default('GET,POST,PUT,DELETE,OPTIONS,PATCH'),
  CORS_ALLOWED_HEADERS: z
    .string()
    .default('Content-Type,Authorization,X-Requested-With,X-Operator'),
  CORS_ALLOW_CREDENTIALS: booleanFlag,

  // Shutdown
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment record; throws ZodError on invalid input
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
