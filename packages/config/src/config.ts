import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

const optionalSecretSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const commitmentSchema = z.enum(['processed', 'confirmed', 'finalized']);

export type CommitmentName = z.infer<typeof commitmentSchema>;

// ============================================================================
// CONFIG SCHEMA (config.json)
// ============================================================================

export const telemetrySchema = z
  .object({
    logLevel: logLevelSchema.default('info'),
    traceErrors: z.boolean().default(false),
  })
  .strict();

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

export const raceSchema = z
  .object({
    maxSlots: z.number().int().min(1).max(1_000_000).default(360),
    stopAtMax: z.boolean().default(false),
    commitment: commitmentSchema.default('processed'),
    warmupSlots: z.number().int().min(0).default(10),
  })
  .strict();

export type RaceConfig = z.infer<typeof raceSchema>;

export const retrySchema = z
  .object({
    initialDelayMs: z.number().int().min(0).max(60_000).default(500),
    multiplier: z.number().min(1).max(10).default(1.5),
    maxDelayMs: z.number().int().min(0).max(600_000).default(60_000),
    maxAttempts: z.number().int().min(1).nullable().default(null),
  })
  .strict()
  .refine((retry) => retry.maxDelayMs >= retry.initialDelayMs, {
    message: 'maxDelayMs must be >= initialDelayMs',
    path: ['maxDelayMs'],
  });

export type RetryConfig = z.infer<typeof retrySchema>;

export const reporterSchema = z
  .object({
    summaryIntervalMs: z.number().int().min(1_000).max(3_600_000).default(30_000),
  })
  .strict();

export type ReporterConfig = z.infer<typeof reporterSchema>;

const streamFileSchema = z
  .object({
    name: z.string().trim().min(1),
    endpoint: z.string().trim().url(),
    accessToken: optionalSecretSchema,
    accessTokenEnv: z.string().trim().min(1).optional(),
  })
  .strict();

export type StreamFileConfig = z.infer<typeof streamFileSchema>;

export const streamSchema = z
  .object({
    id: z.number().int().min(0),
    name: z.string().trim().min(1),
    endpoint: z.string().trim().url(),
    accessToken: z.string().optional(),
  })
  .strict();

export type StreamConfig = z.infer<typeof streamSchema>;

function uniqueNames<T extends { name: string }>(streams: T[], ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  streams.forEach((stream, index) => {
    if (seen.has(stream.name)) {
      ctx.addIssue({ code: 'custom', message: `Duplicate stream name "${stream.name}"`, path: [index, 'name'] });
    }
    seen.add(stream.name);
  });
}

// ============================================================================
// MAIN CONFIG SCHEMAS
// ============================================================================

export const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetrySchema.default({ logLevel: 'info', traceErrors: false }),
    race: raceSchema.default({ maxSlots: 360, stopAtMax: false, commitment: 'processed', warmupSlots: 10 }),
    retry: retrySchema.default({ initialDelayMs: 500, multiplier: 1.5, maxDelayMs: 60_000, maxAttempts: null }),
    reporter: reporterSchema.default({ summaryIntervalMs: 30_000 }),
    streams: z.array(streamFileSchema).min(1, 'At least one stream must be configured').superRefine(uniqueNames),
  })
  .strict();

export type ConfigFileSchema = z.infer<typeof configFileSchema>;

export const configSchema = configFileSchema
  .extend({
    streams: z.array(streamSchema).min(1, 'At least one stream must be configured').superRefine(uniqueNames),
  })
  .strict();

export type ConfigSchema = z.infer<typeof configSchema>;
