import { z } from "zod";

export const forecastKindSchema = z.enum(["realtime", "five_minute", "predispatch", "merged"]);
export type ForecastKind = z.infer<typeof forecastKindSchema>;

export const currentPricePayloadSchema = z.object({
  region: z.string(),
  price: z.number().nullable(),
  price_mwh: z.number().nullable(),
  price_cents: z.number().nullable(),
  timestamp: z.string().nullable(),
  last_update: z.string().nullable(),
  stale: z.boolean(),
  source: z.enum(["DISPATCH", "P5MIN"]).nullable(),
});
export type CurrentPricePayload = z.infer<typeof currentPricePayloadSchema>;

export const forecastPayloadSchema = z.object({
  region: z.string(),
  kind: forecastKindSchema,
  unit: z.literal("$/kWh"),
  forecast: z.array(z.number()),
  timestamps: z.array(z.string()),
  forecast_dict: z.record(z.number()),
  forecast_cents: z.array(z.number()),
  forecast_mwh: z.array(z.number()),
  forecast_length: z.number().int().nonnegative(),
  generated_at: z.string().nullable(),
  last_update: z.string().nullable(),
  stale: z.boolean(),
});
export type ForecastPayload = z.infer<typeof forecastPayloadSchema>;

export const peakPayloadSchema = z.object({
  region: z.string(),
  kind: forecastKindSchema,
  price: z.number().nullable(),
  price_mwh: z.number().nullable(),
  timestamp: z.string().nullable(),
  stale: z.boolean(),
});
export type PeakPayload = z.infer<typeof peakPayloadSchema>;

export const spikeInfoSchema = z.object({
  region: z.string(),
  is_spike: z.boolean(),
  is_negative: z.boolean(),
  spike_ratio: z.number(),
  spike_magnitude: z.number(),
  current_price: z.number().nullable(),
  avg_price: z.number().nullable(),
  samples: z.number().int().nonnegative(),
});
export type SpikeInfo = z.infer<typeof spikeInfoSchema>;

const productStatusSchema = z.object({
  version: z.number().int().nonnegative(),
  points: z.number().int().nonnegative(),
  source_file: z.string().nullable(),
  generated_at: z.string().nullable(),
  last_update: z.string().nullable(),
  last_attempt: z.string().nullable(),
  last_outcome: z.enum(["updated", "unchanged", "not_found", "failed", "cancelled"]).nullable(),
  stale: z.boolean(),
  consecutive_failures: z.number().int().nonnegative(),
  last_error: z.string().nullable(),
  dropped_ticks: z.number().int().nonnegative(),
  recent_files: z.array(z.string()),
});

export const regionStatusSchema = z.object({
  region: z.string(),
  name: z.string(),
  time_zone: z.string(),
  stale: z.boolean(),
  last_update: z.string().nullable(),
  products: z.object({
    realtime: productStatusSchema,
    five_minute: productStatusSchema,
    predispatch: productStatusSchema,
  }),
});
export type RegionStatus = z.infer<typeof regionStatusSchema>;
