import { z } from 'zod';
import { logLevelSchema } from './config';

// ============================================================================
// ENV SCHEMA (.env file)
// ============================================================================

export const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional(),
  GEYSER_X_TOKEN: z.string().trim().min(1).optional(),
});

export type EnvSchema = z.infer<typeof envSchema>;
