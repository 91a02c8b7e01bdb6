import type { EnergyPrice } from "./price";
import type { RegionCode } from "./region";

export const PRODUCT_KINDS = ["realtime", "five_minute", "predispatch"] as const;

export type ProductKind = (typeof PRODUCT_KINDS)[number];

export interface PricePoint {
  readonly timestampMs: number;
  readonly price: EnergyPrice;
}

export interface ForecastSeries {
  readonly region: RegionCode;
  readonly product: ProductKind;
  readonly points: readonly PricePoint[];
  /** Publish time of the source bundle, taken from its file name. */
  readonly generatedAt: number;
  readonly sourceFile: string;
}

export interface ProductSnapshot {
  readonly region: RegionCode;
  readonly product: ProductKind;
  readonly series: ForecastSeries | null;
  readonly stale: boolean;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt: number | null;
  readonly lastAttemptAt: number | null;
  readonly lastError: string | null;
  /** Increments on every committed series; failures leave it untouched. */
  readonly version: number;
}

export interface RegionSnapshot {
  readonly region: RegionCode;
  readonly products: Readonly<Record<ProductKind, ProductSnapshot>>;
  readonly stale: boolean;
  readonly lastSuccessAt: number | null;
}

/**
 * Sorts points ascending and collapses duplicate timestamps, keeping the value
 * seen last in the input.
 */
export function normaliseSeriesPoints(points: readonly PricePoint[]): PricePoint[] {
  const byTimestamp = new Map<number, PricePoint>();
  for (const point of points) {
    byTimestamp.set(point.timestampMs, point);
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestampMs - b.timestampMs);
}

export function createForecastSeries(input: {
  region: RegionCode;
  product: ProductKind;
  points: readonly PricePoint[];
  generatedAt: number;
  sourceFile: string;
  maxPoints?: number | null;
}): ForecastSeries {
  let points = normaliseSeriesPoints(input.points);
  if (typeof input.maxPoints === "number" && input.maxPoints >= 0) {
    points = points.slice(0, input.maxPoints);
  }
  return Object.freeze({
    region: input.region,
    product: input.product,
    points: Object.freeze(points.map((point) => Object.freeze({...point}))),
    generatedAt: input.generatedAt,
    sourceFile: input.sourceFile,
  });
}

export function futurePoints(points: readonly PricePoint[], nowMs: number): PricePoint[] {
  return points.filter((point) => point.timestampMs > nowMs);
}

export function peakPoint(points: readonly PricePoint[]): PricePoint | null {
  let peak: PricePoint | null = null;
  for (const point of points) {
    if (!peak || point.price.dollarsPerMwh > peak.price.dollarsPerMwh) {
      peak = point;
    }
  }
  return peak;
}
