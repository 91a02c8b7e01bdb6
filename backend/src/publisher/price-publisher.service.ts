import { Inject, Injectable } from "@nestjs/common";

import {
  RegionNotConfiguredError,
  describeRegion,
  formatMarketIso,
  futurePoints,
  parseRegionCode,
  peakPoint,
} from "@nemcast/domain";
import type {
  CurrentPricePayload,
  ForecastKind,
  ForecastPayload,
  PeakPayload,
  PricePoint,
  ProductKind,
  ProductSnapshot,
  RegionCode,
  RegionStatus,
  SpikeInfo,
} from "@nemcast/domain";
import { ForecastStoreService } from "../engine/forecast-store.service";
import { RegionManagerService } from "../engine/region-manager.service";
import type { PipelineJobStats } from "../engine/region-pipeline";
import { assessSpike } from "../engine/spike-detector";

interface ForecastView {
  points: readonly PricePoint[];
  generatedAt: number | null;
  lastSuccessAt: number | null;
  stale: boolean;
}

function isoOrNull(epochMs: number | null): string | null {
  return epochMs === null ? null : formatMarketIso(epochMs);
}

/** Renders a point list into the parallel-array forecast shape, prices in $/kWh. */
export function projectForecast(region: RegionCode, kind: ForecastKind, view: ForecastView): ForecastPayload {
  const forecast: number[] = [];
  const timestamps: string[] = [];
  const forecastDict: Record<string, number> = {};
  const forecastCents: number[] = [];
  const forecastMwh: number[] = [];
  for (const point of view.points) {
    const iso = formatMarketIso(point.timestampMs);
    forecast.push(point.price.dollarsPerKwh);
    timestamps.push(iso);
    forecastDict[iso] = point.price.dollarsPerKwh;
    forecastCents.push(point.price.centsPerKwh);
    forecastMwh.push(point.price.dollarsPerMwh);
  }
  return {
    region,
    kind,
    unit: "$/kWh",
    forecast,
    timestamps,
    forecast_dict: forecastDict,
    forecast_cents: forecastCents,
    forecast_mwh: forecastMwh,
    forecast_length: forecast.length,
    generated_at: isoOrNull(view.generatedAt),
    last_update: isoOrNull(view.lastSuccessAt),
    stale: view.stale,
  };
}

/**
 * Read-only view over the forecast store for downstream consumers. Every method
 * reads the latest committed snapshots and never waits on a fetch.
 */
@Injectable()
export class PricePublisherService {
  constructor(
    @Inject(ForecastStoreService) private readonly store: ForecastStoreService,
    @Inject(RegionManagerService) private readonly regionManager: RegionManagerService,
  ) {
  }

  current(region: string): CurrentPricePayload {
    const code = this.requireRegion(region);
    const dispatch = this.snapshot(code, "realtime");
    const latest = dispatch.series?.points.at(-1);
    if (latest) {
      return this.currentPayload(code, latest, dispatch, "DISPATCH");
    }
    const fiveMinute = this.snapshot(code, "five_minute");
    const next = fiveMinute.series?.points[0];
    if (next) {
      return this.currentPayload(code, next, fiveMinute, "P5MIN");
    }
    return {
      region: code,
      price: null,
      price_mwh: null,
      price_cents: null,
      timestamp: null,
      last_update: null,
      stale: dispatch.stale || fiveMinute.stale,
      source: null,
    };
  }

  forecast(region: string, kind: ForecastKind, nowMs: number = Date.now()): ForecastPayload {
    const code = this.requireRegion(region);
    return projectForecast(code, kind, this.view(code, kind, nowMs));
  }

  merged(region: string, nowMs: number = Date.now()): ForecastPayload {
    return this.forecast(region, "merged", nowMs);
  }

  peak(region: string, kind: ForecastKind, nowMs: number = Date.now()): PeakPayload {
    const code = this.requireRegion(region);
    const view = this.view(code, kind, nowMs);
    const peak = kind === "merged" ? peakPoint(futurePoints(view.points, nowMs)) : this.store.peak(code, kind, nowMs);
    return {
      region: code,
      kind,
      price: peak ? peak.price.dollarsPerKwh : null,
      price_mwh: peak ? peak.price.dollarsPerMwh : null,
      timestamp: peak ? formatMarketIso(peak.timestampMs) : null,
      stale: view.stale,
    };
  }

  spike(region: string): SpikeInfo {
    const code = this.requireRegion(region);
    return assessSpike(code, this.store.recentRealtimePrices(code));
  }

  status(): RegionStatus[] {
    const result: RegionStatus[] = [];
    for (const region of this.store.regions()) {
      const snapshot = this.store.readRegion(region);
      if (!snapshot) {
        continue;
      }
      const stats: Record<string, PipelineJobStats> = this.regionManager.pipelineStats(region) ?? {};
      const info = describeRegion(region);
      const product = (kind: ProductKind) => {
        const item = snapshot.products[kind];
        const job: PipelineJobStats | undefined = stats[kind];
        return {
          version: item.version,
          points: item.series?.points.length ?? 0,
          source_file: item.series?.sourceFile ?? null,
          generated_at: isoOrNull(item.series?.generatedAt ?? null),
          last_update: isoOrNull(item.lastSuccessAt),
          last_attempt: isoOrNull(latest([job?.lastAttemptAt ?? null, item.lastAttemptAt])),
          last_outcome: job?.lastOutcome ?? null,
          stale: item.stale,
          consecutive_failures: item.consecutiveFailures,
          last_error: item.lastError,
          dropped_ticks: job?.droppedTicks ?? 0,
          recent_files: this.store.history(region, kind).map((series) => series.sourceFile),
        };
      };
      result.push({
        region,
        name: info.name,
        time_zone: info.timeZone,
        stale: snapshot.stale,
        last_update: isoOrNull(snapshot.lastSuccessAt),
        products: {
          realtime: product("realtime"),
          five_minute: product("five_minute"),
          predispatch: product("predispatch"),
        },
      });
    }
    return result;
  }

  private view(region: RegionCode, kind: ForecastKind, nowMs: number): ForecastView {
    if (kind !== "merged") {
      const snapshot = this.snapshot(region, kind);
      return {
        points: snapshot.series?.points ?? [],
        generatedAt: snapshot.series?.generatedAt ?? null,
        lastSuccessAt: snapshot.lastSuccessAt,
        stale: snapshot.stale,
      };
    }

    const fiveMinute = this.snapshot(region, "five_minute");
    const predispatch = this.snapshot(region, "predispatch");
    const near = futurePoints(fiveMinute.series?.points ?? [], nowMs);
    const horizonStart = near.at(-1)?.timestampMs ?? nowMs;
    const far = futurePoints(predispatch.series?.points ?? [], horizonStart);
    const sources = [fiveMinute, predispatch].filter((item) => item.series !== null);
    return {
      points: [...near, ...far],
      generatedAt: latest(sources.map((item) => item.series?.generatedAt ?? null)),
      lastSuccessAt: latest(sources.map((item) => item.lastSuccessAt)),
      stale: fiveMinute.stale || predispatch.stale,
    };
  }

  private currentPayload(
    region: RegionCode,
    point: PricePoint,
    snapshot: ProductSnapshot,
    source: "DISPATCH" | "P5MIN",
  ): CurrentPricePayload {
    return {
      region,
      price: point.price.dollarsPerKwh,
      price_mwh: point.price.dollarsPerMwh,
      price_cents: point.price.centsPerKwh,
      timestamp: formatMarketIso(point.timestampMs),
      last_update: isoOrNull(snapshot.lastSuccessAt),
      stale: snapshot.stale,
      source,
    };
  }

  private snapshot(region: RegionCode, product: ProductKind): ProductSnapshot {
    const snapshot = this.store.read(region, product);
    if (!snapshot) {
      throw new RegionNotConfiguredError(region);
    }
    return snapshot;
  }

  private requireRegion(region: string): RegionCode {
    const code = parseRegionCode(region);
    if (!this.store.hasRegion(code)) {
      throw new RegionNotConfiguredError(code);
    }
    return code;
  }
}

function latest(values: (number | null)[]): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (value !== null && (result === null || value > result)) {
      result = value;
    }
  }
  return result;
}
