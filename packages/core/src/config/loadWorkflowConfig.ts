import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/ConfigurationError.js';

const positiveInteger = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? String(fallback) : value))
    .pipe(z.coerce.number().int().positive());

const envSchema = z.object({
  SIGNATURES_QUEUE_PREPROCESS_BATCH_SIZE: positiveInteger(100),
  SIGNATURES_QUEUE_PREFIX: z
    .string()
    .trim()
    .regex(/^\w*$/, 'may only contain letters, digits and underscores')
    .default(''),
  SIGNATURES_QUEUE_LEASE_SECONDS: positiveInteger(3600),
  SIGNATURES_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'notice', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

/** Settings read from the environment. */
export interface WorkflowConfig {
  /** Maximum number of items claimed per queue per run. */
  readonly batchSize: number;
  /** Prepended to every queue base name. */
  readonly queuePrefix: string;
  /** Lease requested for each claim. */
  readonly leaseSeconds: number;
  readonly logLevel: z.infer<typeof envSchema>['SIGNATURES_LOG_LEVEL'];
}

/**
 * Read workflow settings from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadWorkflowConfig(env: NodeJS.ProcessEnv = process.env): WorkflowConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  return {
    batchSize: parsed.data.SIGNATURES_QUEUE_PREPROCESS_BATCH_SIZE,
    queuePrefix: parsed.data.SIGNATURES_QUEUE_PREFIX,
    leaseSeconds: parsed.data.SIGNATURES_QUEUE_LEASE_SECONDS,
    logLevel: parsed.data.SIGNATURES_LOG_LEVEL,
  };
}
