import type { ProductKind } from "@nemcast/domain";

export interface ReportSource {
  product: ProductKind;
  label: string;
  /** Directory below the NEMWEB base URL, with trailing slash. */
  directory: string;
  /** Group 1 is the 12-digit publish timestamp, group 2 the sequence/run token. */
  filePattern: RegExp;
}

export interface TableSchema {
  report: string;
  /** `null` accepts any sub-report name under `report`. */
  subReport: string | null;
  timeColumn: string;
  regionColumn: string;
  priceColumn: string;
  interventionColumn: string | null;
}

export const REPORT_SOURCES: Readonly<Record<ProductKind, ReportSource>> = {
  realtime: {
    product: "realtime",
    label: "DISPATCHIS",
    directory: "/Reports/Current/DispatchIS_Reports/",
    filePattern: /PUBLIC_DISPATCHIS_(\d{12})_(\d+)\.zip/gi,
  },
  five_minute: {
    product: "five_minute",
    label: "P5MIN",
    directory: "/Reports/Current/P5_Reports/",
    filePattern: /PUBLIC_P5MIN_(\d{12})_(\d{14})\.zip/gi,
  },
  predispatch: {
    product: "predispatch",
    label: "PREDISPATCH",
    directory: "/Reports/Current/Predispatch_Reports/",
    filePattern: /PUBLIC_PREDISPATCH_(\d{12})_(\d{14})_LEGACY\.zip/gi,
  },
};

// Accepted tables per product, in order of preference.
export const TABLE_SCHEMAS: Readonly<Record<ProductKind, readonly TableSchema[]>> = {
  realtime: [
    {
      report: "DISPATCH",
      subReport: "PRICE",
      timeColumn: "SETTLEMENTDATE",
      regionColumn: "REGIONID",
      priceColumn: "RRP",
      interventionColumn: "INTERVENTION",
    },
  ],
  five_minute: [
    {
      report: "P5MIN",
      subReport: "REGIONSOLUTION",
      timeColumn: "INTERVAL_DATETIME",
      regionColumn: "REGIONID",
      priceColumn: "RRP",
      interventionColumn: "INTERVENTION",
    },
  ],
  predispatch: [
    {
      report: "PREDISPATCH",
      subReport: "REGION_PRICES",
      timeColumn: "DATETIME",
      regionColumn: "REGIONID",
      priceColumn: "RRP",
      interventionColumn: "INTERVENTION",
    },
    {
      report: "PDREGION",
      subReport: null,
      timeColumn: "DATETIME",
      regionColumn: "REGIONID",
      priceColumn: "RRP",
      interventionColumn: "INTERVENTION",
    },
  ],
};
