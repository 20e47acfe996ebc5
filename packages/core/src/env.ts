import { z } from 'zod';

/**
 * Environment Variable Validation
 * Parses process.env once per call; every value has a usable default except
 * the reasoning service key, whose absence disables that triage tier.
 */

const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Reasoning service (OpenAI) config
const ReasoningEnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  REASONING_MODEL: z.string().min(1).default('gpt-4o-mini'),
  /** Upper bound for one reasoning call, in milliseconds */
  REASONING_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(20000),
});

// Triage data config
const TriageEnvSchema = z.object({
  /** Directory holding symptom-patterns.json and pattern-assessments.json */
  PATTERN_LIBRARY_DIR: z.string().optional(),
  /** Comma separated image labels that raise a complaint to at least HIGH */
  SERIOUS_SKIN_CONDITIONS: z
    .string()
    .optional()
    .default('MANGE,RINGWORM')
    .transform((v) =>
      v
        .split(',')
        .map((label) => label.trim().toUpperCase())
        .filter((label) => label.length > 0)
    ),
  IMAGE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
});

// Queue config
const QueueEnvSchema = z.object({
  DEFAULT_AVG_WAIT_MINUTES: z.coerce.number().int().positive().default(15),
  CLINIC_TIMEZONE: z
    .string()
    .default('UTC')
    .refine((tz) => isKnownTimeZone(tz), { message: 'Unknown IANA time zone' }),
});

export const AppEnvSchema = ServerEnvSchema.merge(ReasoningEnvSchema)
  .merge(TriageEnvSchema)
  .merge(QueueEnvSchema);

export type AppEnv = z.infer<typeof AppEnvSchema>;

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate environment variables
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = AppEnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): AppEnv {
  return validateEnv(process.env);
}

/**
 * Check if a specific secret is configured
 */
export function hasSecret(name: string): boolean {
  const value = process.env[name];
  return value !== undefined && value !== '';
}

/**
 * Log secrets status (without revealing values)
 */
export function logSecretsStatus(logger: { info: (obj: object, msg: string) => void }): void {
  const secrets = ['OPENAI_API_KEY'];

  const status = secrets.reduce<Record<string, string>>((acc, name) => {
    acc[name] = hasSecret(name) ? 'configured' : 'missing';
    return acc;
  }, {});

  logger.info(status, 'Secrets status');
}
