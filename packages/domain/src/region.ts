import { RegionConfigError } from "./errors";

export const REGION_CODES = ["NSW1", "QLD1", "VIC1", "SA1", "TAS1"] as const;

export type RegionCode = (typeof REGION_CODES)[number];

export interface RegionInfo {
  code: RegionCode;
  name: string;
  /** Local zone for display only; market data is always in fixed UTC+10. */
  timeZone: string;
}

export const NEM_REGIONS: Readonly<Record<RegionCode, RegionInfo>> = {
  NSW1: {code: "NSW1", name: "New South Wales", timeZone: "Australia/Sydney"},
  QLD1: {code: "QLD1", name: "Queensland", timeZone: "Australia/Brisbane"},
  VIC1: {code: "VIC1", name: "Victoria", timeZone: "Australia/Melbourne"},
  SA1: {code: "SA1", name: "South Australia", timeZone: "Australia/Adelaide"},
  TAS1: {code: "TAS1", name: "Tasmania", timeZone: "Australia/Hobart"},
};

export function isRegionCode(value: unknown): value is RegionCode {
  return typeof value === "string" && REGION_CODES.some((code) => code === value);
}

export function parseRegionCode(value: unknown): RegionCode {
  const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
  if (isRegionCode(normalized)) {
    return normalized;
  }
  throw new RegionConfigError(typeof value === "string" ? value : String(value));
}

export function describeRegion(code: RegionCode): RegionInfo {
  return NEM_REGIONS[code];
}
