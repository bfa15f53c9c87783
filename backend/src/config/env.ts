/**
 * Environment configuration
 *
 * Parsed once at boot. Anything invalid stops the process before a port is opened.
 */

import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const probability = z.coerce.number().gt(0).lt(1);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    DEBUG: booleanFlag,
    CORS_ORIGINS: z.string().min(1).default('*'),

    MODELS_DIR: z.string().min(1).default(path.resolve('backend', 'models')),
    SURVIVAL_MODEL_FILE: z.string().min(1).default('survival_prediction_model.json'),
    DRUG_RESPONSE_MODEL_FILE: z.string().min(1).default('drug_response_model.json'),

    // Death-probability bands for the survival risk category
    RISK_LOW_BELOW: probability.default(0.1),
    RISK_MEDIUM_BELOW: probability.default(0.3),

    // Response-probability bands for the drug-response category
    RESPONSE_PARTIAL_ABOVE: probability.default(0.5),
    RESPONSE_COMPLETE_ABOVE: probability.default(0.8),
  })
  .refine((e) => e.RISK_LOW_BELOW < e.RISK_MEDIUM_BELOW, {
    message: 'RISK_LOW_BELOW must be lower than RISK_MEDIUM_BELOW',
    path: ['RISK_LOW_BELOW'],
  })
  .refine((e) => e.RESPONSE_PARTIAL_ABOVE < e.RESPONSE_COMPLETE_ABOVE, {
    message: 'RESPONSE_PARTIAL_ABOVE must be lower than RESPONSE_COMPLETE_ABOVE',
    path: ['RESPONSE_PARTIAL_ABOVE'],
  })
  .transform((e) => ({
    ...e,
    LOG_LEVEL: e.LOG_LEVEL ?? (e.DEBUG ? 'debug' : 'info'),
  }));

export type Env = z.output<typeof EnvSchema>;

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'EnvValidationError';
  }
}

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new EnvValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
