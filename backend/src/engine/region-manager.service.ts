import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from "@nestjs/common";

import { RegionConfigError, describeError, parseRegionCode } from "@nemcast/domain";
import type { EngineSettings, RegionCode } from "@nemcast/domain";
import type { FetchLike } from "../nemweb/nemweb-client";
import { ForecastStoreService } from "./forecast-store.service";
import { RegionPipeline } from "./region-pipeline";
import type { PipelineJobStats } from "./region-pipeline";
import { ENGINE_SETTINGS, NEMWEB_FETCH } from "./tokens";

@Injectable()
export class RegionManagerService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(RegionManagerService.name);
  private readonly pipelines = new Map<RegionCode, RegionPipeline>();

  constructor(
    @Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings,
    @Inject(ForecastStoreService) private readonly store: ForecastStoreService,
    @Inject(NEMWEB_FETCH) private readonly fetchImpl: FetchLike,
  ) {
  }

  onModuleInit(): void {
    for (const code of this.settings.regions) {
      try {
        this.addRegion(code);
      } catch (error) {
        if (error instanceof RegionConfigError) {
          this.logger.error(`Skipping region '${error.code}': ${error.message}`);
          continue;
        }
        throw error;
      }
    }
    if (!this.pipelines.size) {
      this.logger.warn("No valid NEM regions configured; nothing will be polled");
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Stopping ${this.pipelines.size} region pipeline(s)${signal ? ` on ${signal}` : ""}`);
    const graceMs = this.settings.shutdown.grace_period_ms;
    const pipelines = [...this.pipelines.values()];
    this.pipelines.clear();
    const results = await Promise.allSettled(pipelines.map((pipeline) => pipeline.stop(graceMs)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error(`Failed to stop ${pipelines[index].region}: ${describeError(result.reason)}`);
      }
    });
    this.store.clear();
  }

  /** Starts polling `code`; throws `RegionConfigError` for codes outside the NEM. */
  addRegion(code: string): RegionCode {
    const region = parseRegionCode(code);
    if (this.pipelines.has(region)) {
      this.logger.verbose(`Region ${region} already active`);
      return region;
    }
    const pipeline = new RegionPipeline({
      region,
      settings: this.settings,
      store: this.store,
      fetchImpl: this.fetchImpl,
    });
    this.pipelines.set(region, pipeline);
    pipeline.start();
    return region;
  }

  async removeRegion(code: string): Promise<boolean> {
    const region = parseRegionCode(code);
    const pipeline = this.pipelines.get(region);
    if (!pipeline) {
      return false;
    }
    this.pipelines.delete(region);
    await pipeline.stop(this.settings.shutdown.grace_period_ms);
    if (this.store.dropRegion(region, pipeline)) {
      this.logger.log(`Removed region ${region}`);
    } else {
      this.logger.log(`Stopped previous ${region} pipeline; region was re-added meanwhile`);
    }
    return true;
  }

  regions(): RegionCode[] {
    return [...this.pipelines.keys()];
  }

  pipelineStats(region: RegionCode): Record<string, PipelineJobStats> | null {
    return this.pipelines.get(region)?.stats() ?? null;
  }
}
