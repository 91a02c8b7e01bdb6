import { Inject, Injectable, Logger } from "@nestjs/common";

import { PRODUCT_KINDS, describeError, peakPoint, futurePoints } from "@nemcast/domain";
import type {
  EngineSettings,
  EnergyPrice,
  ForecastSeries,
  PricePoint,
  ProductKind,
  ProductSnapshot,
  RegionCode,
  RegionSnapshot,
} from "@nemcast/domain";
import { ENGINE_SETTINGS } from "./tokens";

export const REALTIME_WINDOW_SIZE = 12;

interface RegionSlice {
  owner: object | null;
  products: Record<ProductKind, ProductSnapshot>;
  history: Record<ProductKind, ForecastSeries[]>;
  realtimeWindow: PricePoint[];
}

function emptySnapshot(region: RegionCode, product: ProductKind): ProductSnapshot {
  return Object.freeze({
    region,
    product,
    series: null,
    stale: false,
    consecutiveFailures: 0,
    lastSuccessAt: null,
    lastAttemptAt: null,
    lastError: null,
    version: 0,
  });
}

/**
 * Holds the latest series per (region, product). Every write swaps in a new
 * frozen snapshot, so a reader holding an older one never observes a partial
 * update.
 */
@Injectable()
export class ForecastStoreService {
  private readonly logger = new Logger(ForecastStoreService.name);
  private readonly slices = new Map<RegionCode, RegionSlice>();

  constructor(@Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings) {
  }

  /**
   * Creates an empty slice for `region`. A different `owner` replaces the
   * existing slice, so a region re-added while its old pipeline is still
   * shutting down starts clean.
   */
  registerRegion(region: RegionCode, owner: object | null = null): void {
    const existing = this.slices.get(region);
    if (existing?.owner === owner) {
      return;
    }
    if (existing) {
      this.logger.verbose(`Replacing ${region} slice for a new owner`);
    }
    this.slices.set(region, {
      owner,
      products: {
        realtime: emptySnapshot(region, "realtime"),
        five_minute: emptySnapshot(region, "five_minute"),
        predispatch: emptySnapshot(region, "predispatch"),
      },
      history: {realtime: [], five_minute: [], predispatch: []},
      realtimeWindow: [],
    });
  }

  /** Drops the slice; with `owner`, only while that owner still holds it. */
  dropRegion(region: RegionCode, owner?: object): boolean {
    const slice = this.slices.get(region);
    if (!slice || (owner !== undefined && slice.owner !== owner)) {
      return false;
    }
    return this.slices.delete(region);
  }

  hasRegion(region: RegionCode): boolean {
    return this.slices.has(region);
  }

  regions(): RegionCode[] {
    return [...this.slices.keys()];
  }

  update(region: RegionCode, product: ProductKind, series: ForecastSeries, nowMs: number): ProductSnapshot {
    const slice = this.requireSlice(region);
    const previous = slice.products[product];
    const next: ProductSnapshot = Object.freeze({
      region,
      product,
      series,
      stale: false,
      consecutiveFailures: 0,
      lastSuccessAt: nowMs,
      lastAttemptAt: nowMs,
      lastError: null,
      version: previous.version + 1,
    });
    slice.products[product] = next;

    const history = [...slice.history[product], series];
    slice.history[product] = history.slice(-Math.max(1, this.settings.store.history_depth));

    if (product === "realtime") {
      this.appendRealtime(slice, series);
    }
    if (previous.stale) {
      this.logger.log(`${region}/${product} recovered after ${previous.consecutiveFailures} failed cycles`);
    }
    return next;
  }

  recordFailure(
    region: RegionCode,
    product: ProductKind,
    error: unknown,
    threshold: number,
    nowMs: number,
  ): ProductSnapshot {
    const slice = this.requireSlice(region);
    const previous = slice.products[product];
    const consecutiveFailures = previous.consecutiveFailures + 1;
    const next: ProductSnapshot = Object.freeze({
      ...previous,
      consecutiveFailures,
      stale: previous.stale || consecutiveFailures >= threshold,
      lastAttemptAt: nowMs,
      lastError: describeError(error),
    });
    slice.products[product] = next;
    return next;
  }

  read(region: RegionCode, product: ProductKind): ProductSnapshot | null {
    return this.slices.get(region)?.products[product] ?? null;
  }

  readRegion(region: RegionCode): RegionSnapshot | null {
    const slice = this.slices.get(region);
    if (!slice) {
      return null;
    }
    const products = Object.freeze({...slice.products});
    let lastSuccessAt: number | null = null;
    for (const product of PRODUCT_KINDS) {
      const success = products[product].lastSuccessAt;
      if (success !== null && (lastSuccessAt === null || success > lastSuccessAt)) {
        lastSuccessAt = success;
      }
    }
    return Object.freeze({
      region,
      products,
      stale: PRODUCT_KINDS.some((product) => products[product].stale),
      lastSuccessAt,
    });
  }

  peak(region: RegionCode, product: ProductKind, nowMs: number): PricePoint | null {
    const series = this.read(region, product)?.series;
    if (!series) {
      return null;
    }
    return peakPoint(futurePoints(series.points, nowMs));
  }

  history(region: RegionCode, product: ProductKind): readonly ForecastSeries[] {
    return [...(this.slices.get(region)?.history[product] ?? [])];
  }

  /** Realtime prices in interval order, newest last. */
  recentRealtimePrices(region: RegionCode): EnergyPrice[] {
    return (this.slices.get(region)?.realtimeWindow ?? []).map((point) => point.price);
  }

  clear(): void {
    this.slices.clear();
  }

  private appendRealtime(slice: RegionSlice, series: ForecastSeries): void {
    const window = slice.realtimeWindow;
    for (const point of series.points) {
      const last = window.at(-1);
      if (!last || point.timestampMs > last.timestampMs) {
        window.push(point);
      }
    }
    if (window.length > REALTIME_WINDOW_SIZE) {
      window.splice(0, window.length - REALTIME_WINDOW_SIZE);
    }
  }

  private requireSlice(region: RegionCode): RegionSlice {
    const slice = this.slices.get(region);
    if (!slice) {
      throw new Error(`Region ${region} is not registered with the forecast store`);
    }
    return slice;
  }
}
