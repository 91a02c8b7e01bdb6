import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError, parseRegionCode } from "@nemcast/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { resolveLogLevels } from "./config/log-levels";
import type { ConfigDocument } from "./config/schemas";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const document = await loadConfiguration();
  validateConfigDocument(document);
  const adapter = new FastifyAdapter({logger: false});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule.forRoot(document), adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify = app.getHttpAdapter().getInstance();
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({}),
    },
  });

  const config = app.get(ConfigService);
  const port = Number(config.get<string>("PORT") ?? 4000);
  const host = config.get<string>("HOST") ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    const logger = new Logger("nemcast");
    const address = fastify.server.address();
    let baseUrl = `http://localhost:${port}`;
    if (isAddressInfo(address)) {
      const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
      baseUrl = `http://${resolvedHost}:${address.port}`;
    }

    logger.log(`API ready at ${baseUrl}`);

    const trpcProcedures = trpcRouter.listProcedures();
    if (trpcProcedures.length) {
      const formatted = trpcProcedures
        .map(({path, type}, index) => {
          const prefix = index === trpcProcedures.length - 1 ? "└──" : "├──";
          return `${prefix} ${type.toUpperCase()} /trpc/${path}`;
        })
        .join("\n");
      logger.log(`tRPC procedures:\n${formatted}`);
    }
  }

  return app;
}

/** Loads the YAML document and applies its log threshold before Nest starts logging. */
async function loadConfiguration(): Promise<ConfigDocument> {
  const configFile = new ConfigFileService();
  const document = await configFile.loadDocument(configFile.resolvePath());

  const requested = document.logging?.level;
  const {levels, threshold, recognised} = resolveLogLevels(requested);
  Logger.overrideLogger(levels);
  const logger = new Logger("bootstrap");
  if (!recognised) {
    logger.warn(`Unknown logging.level '${String(requested)}'; using '${threshold}'`);
  }
  logger.log(`Logging at '${threshold}' and above`);
  return document;
}

function validateConfigDocument(document: ConfigDocument): void {
  const bootstrapLogger = new Logger("bootstrap");

  try {
    parseRegionCode(document.nem_region);
  } catch (error) {
    throw new Error(`nem_region invalid: ${describeError(error)}`);
  }

  for (const extra of document.extra_regions ?? []) {
    try {
      parseRegionCode(extra);
    } catch (error) {
      bootstrapLogger.warn(`extra_regions entry ignored: ${describeError(error)}`);
    }
  }

  bootstrapLogger.verbose("Configuration validation successful.");
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error: unknown) => {
    new Logger("bootstrap").fatal(`Startup failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}

export { bootstrap };
