import { z } from "zod";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const nemwebSchema = z.object({
  base_url: z.string().url().optional(),
  listing_timeout_ms: positiveInt.optional(),
  download_timeout_ms: positiveInt.optional(),
  user_agent: z.string().min(1).optional(),
});

const retrySchema = z.object({
  max_attempts: positiveInt.optional(),
  base_delay_ms: nonNegativeInt.optional(),
  max_delay_ms: nonNegativeInt.optional(),
});

const pollingSchema = z.object({
  realtime_seconds: z.number().positive().optional(),
  five_minute_seconds: z.number().positive().optional(),
  predispatch_seconds: z.number().positive().optional(),
  jitter_ratio: z.number().min(0).max(1).optional(),
});

const forecastSchema = z.object({
  five_minute_periods: positiveInt.optional(),
  predispatch_periods: positiveInt.optional(),
});

export const configDocumentSchema = z.object({
  nem_region: z.string().trim().min(1),
  extra_regions: z.array(z.string().trim().min(1)).optional(),
  nemweb: nemwebSchema.optional(),
  retry: retrySchema.optional(),
  polling: pollingSchema.optional(),
  staleness: z.object({failure_threshold: positiveInt.optional()}).optional(),
  forecast: forecastSchema.optional(),
  store: z.object({history_depth: positiveInt.optional()}).optional(),
  shutdown: z.object({grace_period_ms: nonNegativeInt.optional()}).optional(),
  logging: z.object({level: z.string().optional()}).optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function parseConfigDocument(input: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}
