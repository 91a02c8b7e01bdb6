import type { ProductKind } from "./forecast";

export interface EngineSettings {
  /** Raw region codes in configuration order, selected region first. */
  regions: string[];
  nemweb: {
    base_url: string;
    listing_timeout_ms: number;
    download_timeout_ms: number;
    user_agent: string;
  };
  retry: {
    max_attempts: number;
    base_delay_ms: number;
    max_delay_ms: number;
  };
  polling: {
    cadence_seconds: Record<ProductKind, number>;
    jitter_ratio: number;
  };
  staleness: {
    failure_threshold: number;
  };
  forecast: {
    max_periods: Record<ProductKind, number | null>;
  };
  store: {
    history_depth: number;
  };
  shutdown: {
    grace_period_ms: number;
  };
}
