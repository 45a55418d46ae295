/**
 * Centralized Configuration for the Payment Orchestrator
 *
 * Every environment variable the service reads is declared here and
 * validated with zod before use.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, FieldError } from '../errors';

dotenv.config();

// =============================================================================
// ENVIRONMENT SCHEMA
// =============================================================================

export const KNOWN_PROVIDERS = ['stripe', 'xendit', 'razorpay', 'airwallex'] as const;

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      Array.from(
        new Set(
          value
            .split(',')
            .map((item) => item.trim().toLowerCase())
            .filter((item) => item.length > 0)
        )
      )
    );

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  SERVICE_NAME: z.string().default('payment-service'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Database
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().min(1).default('payments'),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_SSL: z.enum(['true', 'false', 'require']).default('false'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),

  // Providers
  PROVIDER_ORDER: commaList(KNOWN_PROVIDERS.join(',')).refine((names) => names.length > 0, {
    message: 'at least one provider must be listed',
  }),
  PROVIDER_AVAILABILITY_TIMEOUT_MS: z.coerce.number().int().min(1).default(2000),

  // Webhook secrets
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  XENDIT_WEBHOOK_SECRET: z.string().optional(),
  RAZORPAY_WEBHOOK_SECRET: z.string().optional(),
  AIRWALLEX_WEBHOOK_SECRET: z.string().optional(),

  // Circuit breaker
  CIRCUIT_BREAKER_MAX_FAILURES: z.coerce.number().int().min(1).default(5),
  CIRCUIT_BREAKER_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  CIRCUIT_BREAKER_HALF_OPEN_MAX: z.coerce.number().int().min(1).default(3),

  // Compensation
  COMPENSATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  // Alerting
  ALERT_CHANNELS: commaList('log').pipe(z.array(z.enum(['log', 'webhook']))),
  ALERT_WEBHOOK_URL: z.string().url().optional(),
});

// =============================================================================
// VALIDATION
// =============================================================================

export type EnvConfig = z.infer<typeof envSchema>;

let validatedConfig: EnvConfig | null = null;

/**
 * Validate an environment. Throws ConfigurationError listing every issue.
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues: FieldError[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    reportIssues('Configuration Validation Failed', issues);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const issues = [...crossFieldIssues(parsed.data), ...productionIssues(parsed.data)];
  if (issues.length > 0) {
    reportIssues('Configuration requirements not met', issues);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return parsed.data;
}

function crossFieldIssues(cfg: EnvConfig): FieldError[] {
  const issues: FieldError[] = [];

  if (cfg.ALERT_CHANNELS.includes('webhook') && !cfg.ALERT_WEBHOOK_URL) {
    issues.push({ field: 'ALERT_WEBHOOK_URL', message: 'required when the webhook alert channel is enabled' });
  }

  return issues;
}

/**
 * Additional validation for production environment
 */
function productionIssues(cfg: EnvConfig): FieldError[] {
  if (cfg.NODE_ENV !== 'production') {
    return [];
  }

  const issues: FieldError[] = [];
  const secrets = webhookSecretsOf(cfg);

  for (const provider of cfg.PROVIDER_ORDER) {
    if (!secrets[provider]) {
      issues.push({
        field: `${provider.toUpperCase()}_WEBHOOK_SECRET`,
        message: 'required in production for every enabled provider',
      });
    }
  }

  if (cfg.DB_SSL === 'false') {
    issues.push({ field: 'DB_SSL', message: 'must be enabled in production' });
  }

  if (!cfg.DB_PASSWORD) {
    issues.push({ field: 'DB_PASSWORD', message: 'is required in production' });
  }

  return issues;
}

function reportIssues(heading: string, issues: FieldError[]): void {
  console.error(`\n❌ ${heading}:\n`);
  issues.forEach((issue) => {
    console.error(`  • ${issue.field}: ${issue.message}`);
  });
  console.error('\n');
}

/**
 * Get validated configuration for the current process
 */
export function getConfig(): EnvConfig {
  if (!validatedConfig) {
    validatedConfig = validateConfig(process.env);
  }
  return validatedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads process.env
 */
export function resetConfig(): void {
  validatedConfig = null;
}

// =============================================================================
// COMPUTED CONFIG OBJECTS
// =============================================================================

function webhookSecretsOf(cfg: EnvConfig): Record<string, string | undefined> {
  return {
    stripe: cfg.STRIPE_WEBHOOK_SECRET,
    xendit: cfg.XENDIT_WEBHOOK_SECRET,
    razorpay: cfg.RAZORPAY_WEBHOOK_SECRET,
    airwallex: cfg.AIRWALLEX_WEBHOOK_SECRET,
  };
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: false | { rejectUnauthorized: boolean };
  pool: { min: number; max: number };
}

export interface AppConfig {
  server: {
    nodeEnv: EnvConfig['NODE_ENV'];
    serviceName: string;
    logLevel: EnvConfig['LOG_LEVEL'];
  };
  database: DatabaseConfig;
  providers: {
    order: string[];
    availabilityTimeoutMs: number;
    webhookSecrets: Record<string, string | undefined>;
  };
  circuitBreaker: {
    maxFailures: number;
    timeout: number;
    halfOpenMax: number;
  };
  compensation: {
    timeoutMs: number;
  };
  alerting: {
    channels: Array<'log' | 'webhook'>;
    webhookUrl?: string;
  };
}

/**
 * Nested view of a validated environment
 */
export function buildAppConfig(cfg: EnvConfig): AppConfig {
  return {
    server: {
      nodeEnv: cfg.NODE_ENV,
      serviceName: cfg.SERVICE_NAME,
      logLevel: cfg.LOG_LEVEL,
    },
    database: {
      host: cfg.DB_HOST,
      port: cfg.DB_PORT,
      database: cfg.DB_NAME,
      user: cfg.DB_USER,
      password: cfg.DB_PASSWORD,
      ssl: cfg.DB_SSL === 'true' || cfg.DB_SSL === 'require'
        ? { rejectUnauthorized: cfg.NODE_ENV === 'production' }
        : false,
      pool: {
        min: cfg.DB_POOL_MIN,
        max: cfg.DB_POOL_MAX,
      },
    },
    providers: {
      order: cfg.PROVIDER_ORDER,
      availabilityTimeoutMs: cfg.PROVIDER_AVAILABILITY_TIMEOUT_MS,
      webhookSecrets: webhookSecretsOf(cfg),
    },
    circuitBreaker: {
      maxFailures: cfg.CIRCUIT_BREAKER_MAX_FAILURES,
      timeout: cfg.CIRCUIT_BREAKER_TIMEOUT_MS,
      halfOpenMax: cfg.CIRCUIT_BREAKER_HALF_OPEN_MAX,
    },
    compensation: {
      timeoutMs: cfg.COMPENSATION_TIMEOUT_MS,
    },
    alerting: {
      channels: cfg.ALERT_CHANNELS,
      webhookUrl: cfg.ALERT_WEBHOOK_URL,
    },
  };
}

/**
 * Structured configuration for the current process
 */
export function getAppConfig(): AppConfig {
  return buildAppConfig(getConfig());
}
