import { TRPCError } from "@trpc/server";
import { beforeEach, describe, expect, it } from "vitest";

import { EnergyPrice, RegionConfigError, RegionNotConfiguredError, createForecastSeries } from "@nemcast/domain";
import type { ProductKind, RegionCode } from "@nemcast/domain";
import { ForecastStoreService } from "../src/engine/forecast-store.service";
import { RegionManagerService } from "../src/engine/region-manager.service";
import { RegionPipeline } from "../src/engine/region-pipeline";
import { PricePublisherService } from "../src/publisher/price-publisher.service";
import { createAppRouter } from "../src/trpc/trpc.router";
import { DISPATCH_DIR, NemwebStub, dispatchCsv, marketTime, testSettings, zipBundle } from "./support/nemweb-fixtures";

const UPDATED_AT = marketTime(2025, 1, 1, 12, 0);

function commit(store: ForecastStoreService, region: RegionCode, product: ProductKind, points: [number, number][]): void {
  store.update(
    region,
    product,
    createForecastSeries({
      region,
      product,
      points: points.map(([timestampMs, price]) => ({timestampMs, price: EnergyPrice.fromDollarsPerMwh(price)})),
      generatedAt: UPDATED_AT,
      sourceFile: `${product}.zip`,
    }),
    UPDATED_AT,
  );
}

describe("PricePublisherService", () => {
  let store: ForecastStoreService;
  let publisher: PricePublisherService;

  beforeEach(() => {
    const settings = testSettings({regions: ["NSW1", "VIC1"]});
    store = new ForecastStoreService(settings);
    publisher = new PricePublisherService(store, new RegionManagerService(settings, store, new NemwebStub().fetch));
    store.registerRegion("NSW1");
    store.registerRegion("VIC1");

    commit(store, "NSW1", "realtime", [[marketTime(2025, 1, 1, 12, 5), 85.5]]);
    commit(store, "NSW1", "five_minute", [
      [marketTime(2025, 1, 1, 12, 5), 90],
      [marketTime(2025, 1, 1, 12, 10), 95],
      [marketTime(2025, 1, 1, 12, 15), 300],
    ]);
    commit(store, "NSW1", "predispatch", [
      [marketTime(2025, 1, 1, 12, 0), 50],
      [marketTime(2025, 1, 1, 12, 30), 100],
      [marketTime(2025, 1, 1, 13, 0), 120],
      [marketTime(2025, 1, 1, 13, 30), 110],
    ]);
    commit(store, "VIC1", "five_minute", [[marketTime(2025, 1, 1, 12, 5), -20]]);
  });

  it("serves the latest dispatch price with unit projections", () => {
    const current = publisher.current("nsw1");

    expect(current).toMatchObject({
      region: "NSW1",
      price_mwh: 85.5,
      timestamp: "2025-01-01T12:05:00+10:00",
      last_update: "2025-01-01T12:00:00+10:00",
      stale: false,
      source: "DISPATCH",
    });
    expect(current.price).toBeCloseTo(0.0855, 10);
    expect(current.price_cents).toBeCloseTo(8.55, 10);
  });

  it("serves the newest of several dispatch intervals decoded from one bundle", async () => {
    const fileName = "PUBLIC_DISPATCHIS_202501011210_0000000450000003.zip";
    const stub = new NemwebStub()
      .serveListing(DISPATCH_DIR, [fileName])
      .serveFile(
        DISPATCH_DIR,
        fileName,
        zipBundle({
          "DISPATCH.CSV": dispatchCsv([
            {settlement: "2025/01/01 12:00:00", region: "SA1", rrp: 40.1},
            {settlement: "2025/01/01 12:05:00", region: "SA1", rrp: 42.3},
            {settlement: "2025/01/01 12:10:00", region: "SA1", rrp: 44.8},
          ]),
        }),
      );
    store.registerRegion("SA1");
    const pipeline = new RegionPipeline({
      region: "SA1",
      settings: testSettings(),
      store,
      fetchImpl: stub.fetch,
      now: () => UPDATED_AT,
    });

    await expect(pipeline.runCycle("realtime")).resolves.toBe("updated");

    expect(publisher.current("SA1")).toMatchObject({
      region: "SA1",
      price_mwh: 44.8,
      timestamp: "2025-01-01T12:10:00+10:00",
      source: "DISPATCH",
    });
  });

  it("falls back to the first five-minute point without dispatch data", () => {
    expect(publisher.current("VIC1")).toMatchObject({
      region: "VIC1",
      price: -0.02,
      price_mwh: -20,
      price_cents: -2,
      timestamp: "2025-01-01T12:05:00+10:00",
      source: "P5MIN",
    });
  });

  it("returns an empty current price for a region with no data yet", () => {
    store.registerRegion("SA1");
    expect(publisher.current("SA1")).toEqual({
      region: "SA1",
      price: null,
      price_mwh: null,
      price_cents: null,
      timestamp: null,
      last_update: null,
      stale: false,
      source: null,
    });
  });

  it("projects a forecast into parallel arrays of equal length", () => {
    const forecast = publisher.forecast("NSW1", "five_minute");

    expect(forecast.unit).toBe("$/kWh");
    expect(forecast.kind).toBe("five_minute");
    expect(forecast.timestamps).toEqual([
      "2025-01-01T12:05:00+10:00",
      "2025-01-01T12:10:00+10:00",
      "2025-01-01T12:15:00+10:00",
    ]);
    expect(forecast.forecast_mwh).toEqual([90, 95, 300]);
    expect(forecast.forecast_cents).toEqual([9, 9.5, 30]);
    expect(forecast.forecast).toEqual([0.09, 0.095, 0.3]);
    expect(forecast.forecast_dict["2025-01-01T12:15:00+10:00"]).toBe(0.3);
    expect(forecast.forecast_length).toBe(3);
    expect(forecast.generated_at).toBe("2025-01-01T12:00:00+10:00");
    expect(forecast.stale).toBe(false);
  });

  it("merges future five-minute points with the predispatch horizon beyond them", () => {
    const merged = publisher.merged("NSW1", marketTime(2025, 1, 1, 12, 7));

    expect(merged.kind).toBe("merged");
    expect(merged.forecast_mwh).toEqual([95, 300, 100, 120, 110]);
    expect(merged.timestamps).toEqual([
      "2025-01-01T12:10:00+10:00",
      "2025-01-01T12:15:00+10:00",
      "2025-01-01T12:30:00+10:00",
      "2025-01-01T13:00:00+10:00",
      "2025-01-01T13:30:00+10:00",
    ]);
  });

  it("finds the peak of each view among future points", () => {
    const now = marketTime(2025, 1, 1, 12, 7);

    expect(publisher.peak("NSW1", "predispatch", now)).toEqual({
      region: "NSW1",
      kind: "predispatch",
      price: 0.12,
      price_mwh: 120,
      timestamp: "2025-01-01T13:00:00+10:00",
      stale: false,
    });
    expect(publisher.peak("NSW1", "merged", now).price_mwh).toBe(300);
    expect(publisher.peak("NSW1", "realtime", now).price).toBeNull();
  });

  it("reports spike metrics from the realtime window", () => {
    expect(publisher.spike("NSW1")).toMatchObject({region: "NSW1", samples: 1, is_spike: false, current_price: 85.5});
  });

  it("summarises every region with its metadata", () => {
    const [nsw, vic] = publisher.status();

    expect(nsw).toMatchObject({region: "NSW1", name: "New South Wales", time_zone: "Australia/Sydney", stale: false});
    expect(nsw.products.realtime).toEqual({
      version: 1,
      points: 1,
      source_file: "realtime.zip",
      generated_at: "2025-01-01T12:00:00+10:00",
      last_update: "2025-01-01T12:00:00+10:00",
      last_attempt: "2025-01-01T12:00:00+10:00",
      last_outcome: null,
      stale: false,
      consecutive_failures: 0,
      last_error: null,
      dropped_ticks: 0,
      recent_files: ["realtime.zip"],
    });
    expect(vic.region).toBe("VIC1");
    expect(vic.products.predispatch.points).toBe(0);
  });

  it("distinguishes unknown codes from regions that are not configured", () => {
    expect(() => publisher.current("QLD1")).toThrow(RegionNotConfiguredError);
    expect(() => publisher.current("WA1")).toThrow(RegionConfigError);
  });

  describe("tRPC router", () => {
    it("serves publisher reads through a caller", async () => {
      const caller = createAppRouter(publisher).createCaller({});

      await expect(caller.prices.current({region: "NSW1"})).resolves.toMatchObject({source: "DISPATCH", price_mwh: 85.5});
      const forecast = await caller.prices.forecast({region: "NSW1", kind: "predispatch"});
      expect(forecast.forecast_mwh).toEqual([50, 100, 120, 110]);
      const status = await caller.engine.status();
      expect(status.map((entry) => entry.region)).toEqual(["NSW1", "VIC1"]);
    });

    it("maps region errors onto tRPC codes", async () => {
      const caller = createAppRouter(publisher).createCaller({});

      await expect(caller.prices.current({region: "QLD1"})).rejects.toMatchObject({code: "NOT_FOUND"});
      await expect(caller.prices.spike({region: "WA1"})).rejects.toMatchObject({code: "BAD_REQUEST"});
      await expect(caller.prices.merged({region: ""})).rejects.toBeInstanceOf(TRPCError);
      await expect(caller.prices.peak({region: "NSW1", kind: "merged"})).resolves.toMatchObject({kind: "merged"});
    });
  });
});
