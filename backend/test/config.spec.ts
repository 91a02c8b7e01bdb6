import { describe, expect, it } from "vitest";

import { ConfigFileService } from "../src/config/config-file.service";
import { DEFAULT_NEMWEB_BASE_URL, EngineSettingsFactory } from "../src/config/engine-settings.factory";
import { resolveLogLevels } from "../src/config/log-levels";

describe("ConfigFileService", () => {
  const service = new ConfigFileService();

  it("parses a YAML document", () => {
    const document = service.parseDocument([
      "nem_region: nsw1",
      "extra_regions:",
      "  - VIC1",
      "polling:",
      "  realtime_seconds: 10",
      "logging:",
      "  level: debug",
    ].join("\n"));

    expect(document).toEqual({
      nem_region: "nsw1",
      extra_regions: ["VIC1"],
      polling: {realtime_seconds: 10},
      logging: {level: "debug"},
    });
  });

  it("rejects an empty file", () => {
    expect(() => service.parseDocument("")).toThrow("Config file is empty or invalid");
  });

  it("lists every invalid field", () => {
    expect(() => service.parseDocument("nem_region: NSW1\npolling:\n  jitter_ratio: 2\n")).toThrow(
      /^Invalid configuration: polling\.jitter_ratio: /,
    );
    expect(() => service.parseDocument("extra_regions: []\n")).toThrow(/^Invalid configuration: nem_region: /);
  });
});

describe("EngineSettingsFactory", () => {
  const factory = new EngineSettingsFactory();

  it("fills defaults around the selected region", () => {
    const settings = factory.create({nem_region: "QLD1"});

    expect(settings.regions).toEqual(["QLD1"]);
    expect(settings.nemweb.base_url).toBe(DEFAULT_NEMWEB_BASE_URL);
    expect(settings.retry).toEqual({max_attempts: 4, base_delay_ms: 1000, max_delay_ms: 8000});
    expect(settings.polling).toEqual({
      cadence_seconds: {realtime: 5, five_minute: 30, predispatch: 300},
      jitter_ratio: 0.2,
    });
    expect(settings.staleness.failure_threshold).toBe(3);
    expect(settings.forecast.max_periods).toEqual({realtime: null, five_minute: 12, predispatch: 96});
    expect(settings.store.history_depth).toBe(3);
    expect(settings.shutdown.grace_period_ms).toBe(5000);
  });

  it("normalises regions and overrides", () => {
    const settings = factory.create({
      nem_region: " nsw1 ",
      extra_regions: ["vic1", "NSW1", "SA1"],
      nemweb: {base_url: "https://mirror.test/nem//"},
      retry: {base_delay_ms: 2000, max_delay_ms: 500},
    });

    expect(settings.regions).toEqual(["NSW1", "VIC1", "SA1"]);
    expect(settings.nemweb.base_url).toBe("https://mirror.test/nem");
    expect(settings.retry).toEqual({max_attempts: 4, base_delay_ms: 2000, max_delay_ms: 2000});
  });
});

describe("resolveLogLevels", () => {
  it("maps names and aliases onto Nest levels", () => {
    expect(resolveLogLevels("warning")).toEqual({levels: ["fatal", "error", "warn"], threshold: "warn", recognised: true});
    expect(resolveLogLevels(" DEBUG ").levels).toEqual(["fatal", "error", "warn", "log", "debug"]);
    expect(resolveLogLevels("info").threshold).toBe("log");
    expect(resolveLogLevels("verbose").levels).toHaveLength(6);
    expect(resolveLogLevels(undefined)).toEqual({levels: ["fatal", "error", "warn", "log"], threshold: "log", recognised: true});
  });

  it("falls back to info for unknown levels", () => {
    expect(resolveLogLevels("chatty")).toEqual({levels: ["fatal", "error", "warn", "log"], threshold: "log", recognised: false});
  });
});
