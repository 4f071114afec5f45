import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { IANAZone } from 'luxon';
import { z } from 'zod';

const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

loadDotenv();

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    return value !== 'false';
  });

const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().optional(),
    DATABASE_MAX_POOL: z.coerce.number().int().positive().optional(),
    PERSISTENCE_DRIVER: z.enum(['postgres', 'in-memory']).optional(),
    SCHEDULE_TIME_ZONE: z
      .string()
      .default('UTC')
      .refine((zone) => IANAZone.isValidZone(zone), {
        message: 'SCHEDULE_TIME_ZONE must be a valid IANA time zone'
      }),
    LOG_LEVEL: z.string().default('info'),
    MIGRATIONS_DIR: z.string().optional(),
    SERVICE_NAME: z.string().default('officehours-appointments'),
    EVENT_BUS_URL: z.string().optional(),
    EVENT_BUS_DRIVER: z.enum(['in-memory', 'rabbitmq']).optional(),
    EVENT_BUS_EXCHANGE: z.string().optional(),
    TRACING_EXPORT_JSON: booleanFlag,
    JWT_SECRET: z.string().min(8, 'JWT_SECRET must be at least 8 characters').default('change-me'),
    METRICS_ENABLED: booleanFlag
  })
  .transform((values) => ({
    ...values,
    DATABASE_URL: values.DATABASE_URL || undefined,
    MIGRATIONS_DIR: values.MIGRATIONS_DIR ?? DEFAULT_MIGRATIONS_DIR,
    METRICS_ENABLED: values.METRICS_ENABLED ?? true,
    DATABASE_MAX_POOL: values.DATABASE_MAX_POOL ?? 10,
    PERSISTENCE_DRIVER:
      values.PERSISTENCE_DRIVER ?? (values.DATABASE_URL ? 'postgres' : 'in-memory'),
    EVENT_BUS_DRIVER:
      values.EVENT_BUS_DRIVER ??
      (values.EVENT_BUS_URL && values.EVENT_BUS_URL.startsWith('amqp')
        ? 'rabbitmq'
        : 'in-memory'),
    EVENT_BUS_EXCHANGE: values.EVENT_BUS_EXCHANGE ?? 'officehours.events',
    TRACING_EXPORT_JSON: values.TRACING_EXPORT_JSON ?? false
  }))
  .superRefine((values, ctx) => {
    if (values.PERSISTENCE_DRIVER === 'postgres' && !values.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when PERSISTENCE_DRIVER is postgres'
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super('Invalid configuration');
    this.name = 'ConfigError';
  }
}

let cachedConfig: AppConfig | null = null;

function parseEnvironment(
  source: NodeJS.ProcessEnv,
  { exitOnError }: { exitOnError: boolean }
): AppConfig {
  const result = configSchema.safeParse(source);

  if (!result.success) {
    if (exitOnError) {
      // eslint-disable-next-line no-console
      console.error('Invalid configuration', result.error.flatten().fieldErrors);
      process.exit(1);
    }

    throw new ConfigError(result.error.issues);
  }

  return Object.freeze(result.data);
}

export function loadConfig(overrides?: Partial<NodeJS.ProcessEnv>): AppConfig {
  if (overrides) {
    return parseEnvironment(
      {
        ...process.env,
        ...overrides
      },
      { exitOnError: false }
    );
  }

  if (!cachedConfig) {
    cachedConfig = parseEnvironment(process.env, { exitOnError: true });
  }

  return cachedConfig;
}

export const config = loadConfig();
