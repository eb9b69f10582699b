import { z } from 'zod';
import { LAYOUT_DEFAULTS, plateSizeParamSchema } from '@wellgrid/shared';

const envSchema = z.object({
  PORT: z.coerce.number().int().default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  /** Comma-separated list of allowed browser origins */
  FRONTEND_URL: z.string().min(1).default('http://localhost:3000'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().int().min(1).max(200).default(50),
  DEFAULT_PLATE_SIZE: plateSizeParamSchema.default(LAYOUT_DEFAULTS.PLATE_SIZE),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
