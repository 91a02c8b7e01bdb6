import { strToU8, zipSync } from "fflate";

import type { EngineSettings } from "@nemcast/domain";
import type { FetchLike } from "../../src/nemweb/nemweb-client";

export const BASE_URL = "https://nemweb.test";

export const DISPATCH_DIR = "/Reports/Current/DispatchIS_Reports/";
export const P5MIN_DIR = "/Reports/Current/P5_Reports/";
export const PREDISPATCH_DIR = "/Reports/Current/Predispatch_Reports/";

export interface CidTableFixture {
  report: string;
  subReport: string;
  version?: number;
  columns: string[];
  rows: (string | number)[][];
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[\s,"]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Builds a CID-format report: comment header, then an `I` row and its `D` rows per table. */
export function cidCsv(tables: CidTableFixture[]): string {
  const lines = ["C,NEMP.WORLD,TEST,AEMO,PUBLIC,2025/01/01,12:00:00,0000000000001,TEST,0000000000001"];
  for (const table of tables) {
    const prefix = [table.report, table.subReport, String(table.version ?? 1)];
    lines.push(["I", ...prefix, ...table.columns].join(","));
    for (const row of table.rows) {
      lines.push(["D", ...prefix, ...row.map(csvField)].join(","));
    }
  }
  lines.push('C,"END OF REPORT",' + String(lines.length + 1));
  return lines.join("\r\n");
}

export function zipBundle(files: Record<string, string>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(files)) {
    entries[name] = strToU8(text);
  }
  return zipSync(entries);
}

export function listingHtml(directory: string, fileNames: string[]): string {
  const links = fileNames
    .map((name) => `${name.length} <A HREF="${directory}${name}">${name}</A><br>`)
    .join("\n");
  return `<html><head><title>nemweb.test - ${directory}</title></head><body><pre>${links}</pre></body></html>`;
}

export interface DispatchRow {
  settlement: string;
  region: string;
  rrp: string | number;
  intervention?: number;
}

export function dispatchCsv(rows: DispatchRow[]): string {
  return cidCsv([
    {
      report: "DISPATCH",
      subReport: "PRICE",
      version: 5,
      columns: ["SETTLEMENTDATE", "RUNNO", "REGIONID", "DISPATCHINTERVAL", "INTERVENTION", "RRP"],
      rows: rows.map((row) => [row.settlement, 1, row.region, "20250101001", row.intervention ?? 0, row.rrp]),
    },
  ]);
}

export interface IntervalRow {
  interval: string;
  region: string;
  rrp: string | number;
  intervention?: number;
}

export function p5minCsv(rows: IntervalRow[], runTime = "2025/01/01 12:00:00"): string {
  return cidCsv([
    {
      report: "P5MIN",
      subReport: "REGIONSOLUTION",
      version: 9,
      columns: ["RUN_DATETIME", "INTERVENTION", "INTERVAL_DATETIME", "REGIONID", "RRP", "ROP"],
      rows: rows.map((row) => [runTime, row.intervention ?? 0, row.interval, row.region, row.rrp, row.rrp]),
    },
  ]);
}

export function predispatchCsv(rows: IntervalRow[]): string {
  return cidCsv([
    {
      report: "PREDISPATCH",
      subReport: "CASE_SOLUTION",
      columns: ["PREDISPATCHSEQNO", "RUNNO"],
      rows: [["2025010101", 1]],
    },
    {
      report: "PREDISPATCH",
      subReport: "REGION_PRICES",
      version: 1,
      columns: ["PREDISPATCHSEQNO", "RUNNO", "REGIONID", "PERIODID", "INTERVENTION", "RRP", "DATETIME"],
      rows: rows.map((row, index) => ["2025010101", 1, row.region, index + 1, row.intervention ?? 0, row.rrp, row.interval]),
    },
  ]);
}

export type RouteHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

/** In-process stand-in for NEMWEB: routes by path, 404 for anything unregistered. */
export class NemwebStub {
  readonly calls: string[] = [];
  private readonly routes = new Map<string, RouteHandler>();

  constructor(private readonly baseUrl: string = BASE_URL) {
  }

  on(path: string, handler: RouteHandler): this {
    this.routes.set(`${this.baseUrl}${path}`, handler);
    return this;
  }

  serveListing(directory: string, fileNames: string[]): this {
    return this.on(directory, () => new Response(listingHtml(directory, fileNames), {status: 200}));
  }

  serveFile(directory: string, fileName: string, bytes: Uint8Array): this {
    return this.on(`${directory}${fileName}`, () => new Response(bytes, {status: 200}));
  }

  callsTo(path: string): number {
    const url = `${this.baseUrl}${path}`;
    return this.calls.filter((call) => call === url).length;
  }

  readonly fetch: FetchLike = async (input, init) => {
    this.calls.push(input);
    if (init?.signal?.aborted) {
      throw new Error("aborted");
    }
    const handler = this.routes.get(input);
    if (!handler) {
      return new Response("Not Found", {status: 404, statusText: "Not Found"});
    }
    return handler(input, init);
  };
}

export function testSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    regions: ["NSW1"],
    nemweb: {
      base_url: BASE_URL,
      listing_timeout_ms: 1_000,
      download_timeout_ms: 1_000,
      user_agent: "nemcast-test",
    },
    retry: {max_attempts: 1, base_delay_ms: 0, max_delay_ms: 0},
    polling: {
      cadence_seconds: {realtime: 5, five_minute: 30, predispatch: 300},
      jitter_ratio: 0,
    },
    staleness: {failure_threshold: 3},
    forecast: {max_periods: {realtime: null, five_minute: 12, predispatch: 96}},
    store: {history_depth: 3},
    shutdown: {grace_period_ms: 100},
    ...overrides,
  };
}

/** Epoch ms of a market-time wall clock reading (UTC+10). */
export function marketTime(year: number, month: number, day: number, hour: number, minute: number): number {
  return Date.UTC(year, month - 1, day, hour - 10, minute, 0);
}
