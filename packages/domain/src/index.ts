export { EnergyPrice, MARKET_PRICE_CAP_DOLLARS_PER_MWH, MARKET_PRICE_FLOOR_DOLLARS_PER_MWH } from "./price";
export { Duration } from "./duration";
export {
  MARKET_UTC_OFFSET_MINUTES,
  formatMarketIso,
  parseFileTimestamp,
  parseMarketTimestamp,
} from "./market-time";
export {
  NEM_REGIONS,
  REGION_CODES,
  describeRegion,
  isRegionCode,
  parseRegionCode,
} from "./region";
export type { RegionCode, RegionInfo } from "./region";
export {
  PRODUCT_KINDS,
  createForecastSeries,
  futurePoints,
  normaliseSeriesPoints,
  peakPoint,
} from "./forecast";
export type { ForecastSeries, PricePoint, ProductKind, ProductSnapshot, RegionSnapshot } from "./forecast";
export type { EngineSettings } from "./settings";
export * from "./payloads";
export * from "./errors";
