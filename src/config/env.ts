import { z } from 'zod';
import winston from 'winston';

// Orchestrator configuration schema with Zod validation
export const ConfigSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'debug', 'verbose'])
    .default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
  // Per-tenant deployment directories and snapshots live under this root
  DEPLOY_STATE_DIR: z.string().min(1).default('/opt/tenants'),
  // Shared PostgreSQL server
  SHARED_DB_HOST: z.string().min(1).default('localhost'),
  SHARED_DB_PORT: z.coerce.number().int().positive().default(5432),
  SHARED_DB_SERVICE_HOST: z.string().min(1).optional(),
  SHARED_DB_ADMIN_USER: z.string().min(1).default('postgres'),
  SHARED_DB_ADMIN_PASSWORD: z
    .string()
    .min(1, 'SHARED_DB_ADMIN_PASSWORD is required'),
  SHARED_DB_COMPOSE_FILE: z
    .string()
    .min(1)
    .default('docker-compose.postgres.yml'),
  SHARED_DB_PROJECT: z.string().min(1).default('shared-postgres'),
  DB_READY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(15),
  DB_READY_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
  // Service lifecycle
  STOP_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  IMAGE_PULL_ATTEMPTS: z.coerce.number().int().positive().default(3),
  IMAGE_PULL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10000),
  // Health polling; {tenant} in HEALTH_URL is replaced with the tenant name
  HEALTH_URL: z.string().min(1).default('http://localhost:8000/health'),
  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  HEALTH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(3000),
  HEALTH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DOCKER_BIN: z.string().min(1).default('docker'),
});

export type Config = z.infer<typeof ConfigSchema>;

// Create a temporary logger for config loading phase
const configLogger = winston.createLogger({
  level: 'error',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.json(),
    }),
  ],
});

// Load and validate environment configuration
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      configLogger.error('Environment configuration validation failed', {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      throw new Error('Environment configuration validation failed');
    }
    throw error;
  }
}

/**
 * Host written into tenant connection strings. Containers usually reach the
 * shared server under a different name than the orchestrator does.
 */
export function serviceDatabaseHost(config: Config): string {
  return config.SHARED_DB_SERVICE_HOST ?? config.SHARED_DB_HOST;
}
