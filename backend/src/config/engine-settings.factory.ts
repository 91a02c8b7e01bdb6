import { Injectable } from "@nestjs/common";

import type { EngineSettings } from "@nemcast/domain";
import type { ConfigDocument } from "./schemas";

export const DEFAULT_NEMWEB_BASE_URL = "https://nemweb.com.au";

const DEFAULTS = {
  listingTimeoutMs: 30_000,
  downloadTimeoutMs: 60_000,
  userAgent: "nemcast/0.1",
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
  realtimeSeconds: 5,
  fiveMinuteSeconds: 30,
  predispatchSeconds: 300,
  jitterRatio: 0.2,
  failureThreshold: 3,
  fiveMinutePeriods: 12,
  predispatchPeriods: 96,
  historyDepth: 3,
  gracePeriodMs: 5_000,
} as const;

function normaliseRegions(selected: string, extra: string[] | undefined): string[] {
  const ordered = [selected, ...(extra ?? [])].map((code) => code.trim().toUpperCase());
  return [...new Set(ordered)].filter((code) => code.length > 0);
}

@Injectable()
export class EngineSettingsFactory {
  create(config: ConfigDocument): EngineSettings {
    const nemweb = config.nemweb ?? {};
    const retry = config.retry ?? {};
    const polling = config.polling ?? {};
    const forecast = config.forecast ?? {};

    const baseDelayMs = retry.base_delay_ms ?? DEFAULTS.baseDelayMs;
    const maxDelayMs = Math.max(retry.max_delay_ms ?? DEFAULTS.maxDelayMs, baseDelayMs);

    return {
      regions: normaliseRegions(config.nem_region, config.extra_regions),
      nemweb: {
        base_url: (nemweb.base_url ?? DEFAULT_NEMWEB_BASE_URL).replace(/\/+$/, ""),
        listing_timeout_ms: nemweb.listing_timeout_ms ?? DEFAULTS.listingTimeoutMs,
        download_timeout_ms: nemweb.download_timeout_ms ?? DEFAULTS.downloadTimeoutMs,
        user_agent: nemweb.user_agent ?? DEFAULTS.userAgent,
      },
      retry: {
        max_attempts: retry.max_attempts ?? DEFAULTS.maxAttempts,
        base_delay_ms: baseDelayMs,
        max_delay_ms: maxDelayMs,
      },
      polling: {
        cadence_seconds: {
          realtime: polling.realtime_seconds ?? DEFAULTS.realtimeSeconds,
          five_minute: polling.five_minute_seconds ?? DEFAULTS.fiveMinuteSeconds,
          predispatch: polling.predispatch_seconds ?? DEFAULTS.predispatchSeconds,
        },
        jitter_ratio: polling.jitter_ratio ?? DEFAULTS.jitterRatio,
      },
      staleness: {
        failure_threshold: config.staleness?.failure_threshold ?? DEFAULTS.failureThreshold,
      },
      forecast: {
        max_periods: {
          realtime: null,
          five_minute: forecast.five_minute_periods ?? DEFAULTS.fiveMinutePeriods,
          predispatch: forecast.predispatch_periods ?? DEFAULTS.predispatchPeriods,
        },
      },
      store: {
        history_depth: config.store?.history_depth ?? DEFAULTS.historyDepth,
      },
      shutdown: {
        grace_period_ms: config.shutdown?.grace_period_ms ?? DEFAULTS.gracePeriodMs,
      },
    };
  }
}
