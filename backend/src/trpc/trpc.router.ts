import { Inject, Injectable } from "@nestjs/common";
import { TRPCError, initTRPC } from "@trpc/server";
import { z } from "zod";

import {
  RegionConfigError,
  RegionNotConfiguredError,
  currentPricePayloadSchema,
  forecastKindSchema,
  forecastPayloadSchema,
  peakPayloadSchema,
  regionStatusSchema,
  spikeInfoSchema,
} from "@nemcast/domain";
import { PricePublisherService } from "../publisher/price-publisher.service";

const t = initTRPC.create();

const regionInput = z.object({region: z.string().trim().min(1)});
const forecastInput = regionInput.extend({kind: forecastKindSchema});

function exposeDomainErrors<T>(resolve: () => T): T {
  try {
    return resolve();
  } catch (error) {
    if (error instanceof RegionNotConfiguredError) {
      throw new TRPCError({code: "NOT_FOUND", message: error.message, cause: error});
    }
    if (error instanceof RegionConfigError) {
      throw new TRPCError({code: "BAD_REQUEST", message: error.message, cause: error});
    }
    throw error;
  }
}

export function createAppRouter(publisher: PricePublisherService) {
  return t.router({
    prices: t.router({
      current: t.procedure
        .input(regionInput)
        .output(currentPricePayloadSchema)
        .query(({input}) => exposeDomainErrors(() => publisher.current(input.region))),
      forecast: t.procedure
        .input(forecastInput)
        .output(forecastPayloadSchema)
        .query(({input}) => exposeDomainErrors(() => publisher.forecast(input.region, input.kind))),
      merged: t.procedure
        .input(regionInput)
        .output(forecastPayloadSchema)
        .query(({input}) => exposeDomainErrors(() => publisher.merged(input.region))),
      peak: t.procedure
        .input(forecastInput)
        .output(peakPayloadSchema)
        .query(({input}) => exposeDomainErrors(() => publisher.peak(input.region, input.kind))),
      spike: t.procedure
        .input(regionInput)
        .output(spikeInfoSchema)
        .query(({input}) => exposeDomainErrors(() => publisher.spike(input.region))),
    }),
    engine: t.router({
      status: t.procedure.output(z.array(regionStatusSchema)).query(() => publisher.status()),
    }),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter;

  constructor(@Inject(PricePublisherService) publisher: PricePublisherService) {
    this.router = createAppRouter(publisher);
  }

  listProcedures(): { path: string; type: "query" }[] {
    return Object.keys(this.router._def.procedures)
      .sort()
      .map((path) => ({path, type: "query" as const}));
  }
}
