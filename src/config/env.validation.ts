import { z } from 'zod';

const precision = z.enum(['seconds', 'milliseconds']);

const envSchema = z
  .object({
    FFMPEG_COMMAND: z.string().min(1).default('ffmpeg'),
    FFMPEG_FALLBACK: z
      .enum(['true', 'false'])
      .default('true')
      .transform((value) => value === 'true'),
    SINGLE_TIMESTAMP_PRECISION: precision.default('milliseconds'),
    BATCH_TIMESTAMP_PRECISION: precision.default('seconds'),
    LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  })
  .passthrough();

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
