import { Logger } from "@nestjs/common";

import { Duration, FetchError, PRODUCT_KINDS, describeError } from "@nemcast/domain";
import type { EngineSettings, ProductKind, RegionCode } from "@nemcast/domain";
import { NemwebClient } from "../nemweb/nemweb-client";
import type { FetchLike } from "../nemweb/nemweb-client";
import { ReportFetcher } from "../nemweb/report-fetcher";
import { decodeBundle } from "../nemweb/report-parser";
import type { ForecastStoreService } from "./forecast-store.service";
import { PollScheduler } from "./poll-scheduler";
import type { PollJobStats } from "./poll-scheduler";

export type CycleOutcome = "updated" | "unchanged" | "not_found" | "failed" | "cancelled";

export interface CycleAttempt {
  at: number;
  outcome: CycleOutcome;
}

export interface PipelineJobStats extends PollJobStats {
  lastAttemptAt: number | null;
  lastOutcome: CycleOutcome | null;
}

export interface RegionPipelineDeps {
  region: RegionCode;
  settings: EngineSettings;
  store: ForecastStoreService;
  fetchImpl: FetchLike;
  now?: () => number;
  random?: () => number;
}

/**
 * Everything one region needs to keep its three series fresh: its own fetcher
 * (and change-detection state), scheduler and abort controller. Pipelines share
 * only the store.
 */
export class RegionPipeline {
  readonly region: RegionCode;
  private readonly logger: Logger;
  private readonly settings: EngineSettings;
  private readonly store: ForecastStoreService;
  private readonly fetcher: ReportFetcher;
  private readonly scheduler: PollScheduler;
  private readonly controller = new AbortController();
  private readonly attempts = new Map<ProductKind, CycleAttempt>();
  private readonly now: () => number;
  private started = false;

  constructor(deps: RegionPipelineDeps) {
    this.region = deps.region;
    this.settings = deps.settings;
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
    this.logger = new Logger(`${RegionPipeline.name}:${deps.region}`);
    const {nemweb, retry, polling} = deps.settings;
    this.fetcher = new ReportFetcher(
      deps.region,
      new NemwebClient({
        baseUrl: nemweb.base_url,
        listingTimeoutMs: nemweb.listing_timeout_ms,
        downloadTimeoutMs: nemweb.download_timeout_ms,
        userAgent: nemweb.user_agent,
        retry,
        fetchImpl: deps.fetchImpl,
        label: deps.region,
      }),
    );
    this.scheduler = new PollScheduler({jitterRatio: polling.jitter_ratio, random: deps.random, label: deps.region});
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.store.registerRegion(this.region, this);
    for (const product of PRODUCT_KINDS) {
      const cadence = Duration.fromSeconds(this.settings.polling.cadence_seconds[product]);
      this.scheduler.schedule(product, cadence.milliseconds, async () => {
        await this.runCycle(product);
      });
    }
    this.logger.log(`Started polling ${PRODUCT_KINDS.join(", ")} for ${this.region}`);
  }

  /** Stops timers, cancels in-flight requests and waits up to `graceMs` for cycles to settle. */
  async stop(graceMs: number): Promise<void> {
    this.scheduler.stop();
    this.controller.abort();
    const drained = await this.scheduler.drain(graceMs);
    if (!drained) {
      this.logger.warn(`In-flight cycles for ${this.region} did not settle within ${graceMs} ms`);
    }
    this.started = false;
  }

  stats(): Record<string, PipelineJobStats> {
    const result: Record<string, PipelineJobStats> = {};
    for (const [key, job] of Object.entries(this.scheduler.stats())) {
      const attempt = PRODUCT_KINDS.find((product) => product === key);
      const last = attempt ? this.attempts.get(attempt) : undefined;
      result[key] = {...job, lastAttemptAt: last?.at ?? null, lastOutcome: last?.outcome ?? null};
    }
    return result;
  }

  /** Outcome of the latest cycle; unchanged and not_found cycles are recorded only here. */
  lastAttempt(product: ProductKind): CycleAttempt | null {
    return this.attempts.get(product) ?? null;
  }

  async runCycle(product: ProductKind): Promise<CycleOutcome> {
    const outcome = await this.cycle(product);
    this.attempts.set(product, {at: this.now(), outcome});
    return outcome;
  }

  private async cycle(product: ProductKind): Promise<CycleOutcome> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      return "cancelled";
    }
    const key = `${this.region}/${product}`;
    try {
      const outcome = await this.fetcher.fetch(product, signal);
      if (outcome.status === "unchanged") {
        return "unchanged";
      }
      const {series, warnings, table} = decodeBundle(outcome.bundle, this.region, {
        maxPeriods: this.settings.forecast.max_periods[product],
      });
      if (signal.aborted) {
        return "cancelled";
      }
      for (const warning of warnings) {
        this.logger.warn(`${key}: skipped ${warning.file} line ${warning.line}: ${warning.reason}`);
      }
      for (const point of series.points) {
        if (!point.price.withinMarketBounds()) {
          this.logger.warn(`${key}: price ${point.price.dollarsPerMwh} $/MWh outside market bounds`);
        }
      }
      const snapshot = this.store.update(this.region, product, series, this.now());
      this.fetcher.acknowledge(product, outcome.bundle.fileName);
      this.logger.log(
        `${key}: committed ${series.points.length} points from ${table} in ${outcome.bundle.fileName} (v${snapshot.version})`,
      );
      return "updated";
    } catch (error) {
      if (signal.aborted) {
        this.logger.verbose(`${key}: cycle cancelled`);
        return "cancelled";
      }
      if (error instanceof FetchError && error.kind === "not_found") {
        this.logger.warn(`${key}: ${error.message}`);
        return "not_found";
      }
      const threshold = this.settings.staleness.failure_threshold;
      const before = this.store.read(this.region, product);
      const after = this.store.recordFailure(this.region, product, error, threshold, this.now());
      this.logger.warn(`${key}: cycle failed (${after.consecutiveFailures} in a row): ${describeError(error)}`);
      if (after.stale && !before?.stale) {
        this.logger.error(`${key}: marked stale after ${after.consecutiveFailures} consecutive failures`);
      }
      return "failed";
    }
  }
}
