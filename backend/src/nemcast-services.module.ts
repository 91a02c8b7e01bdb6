import { DynamicModule, Module } from "@nestjs/common";

import type { EngineSettings } from "@nemcast/domain";
import { EngineSettingsFactory } from "./config/engine-settings.factory";
import type { ConfigDocument } from "./config/schemas";
import { ForecastStoreService } from "./engine/forecast-store.service";
import { RegionManagerService } from "./engine/region-manager.service";
import { CONFIG_DOCUMENT, ENGINE_SETTINGS, NEMWEB_FETCH } from "./engine/tokens";
import type { FetchLike } from "./nemweb/nemweb-client";
import { PricePublisherService } from "./publisher/price-publisher.service";

const globalFetch: FetchLike = (input, init) => fetch(input, init);

@Module({})
export class NemcastServicesModule {
  static register(document: ConfigDocument): DynamicModule {
    return {
      module: NemcastServicesModule,
      global: true,
      providers: [
        EngineSettingsFactory,
        {provide: CONFIG_DOCUMENT, useValue: document},
        {
          provide: ENGINE_SETTINGS,
          inject: [EngineSettingsFactory, CONFIG_DOCUMENT],
          useFactory: (factory: EngineSettingsFactory, config: ConfigDocument): EngineSettings => factory.create(config),
        },
        {provide: NEMWEB_FETCH, useValue: globalFetch},
        ForecastStoreService,
        RegionManagerService,
        PricePublisherService,
      ],
      exports: [
        CONFIG_DOCUMENT,
        ENGINE_SETTINGS,
        NEMWEB_FETCH,
        ForecastStoreService,
        RegionManagerService,
        PricePublisherService,
      ],
    };
  }
}
