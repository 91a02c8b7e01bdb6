import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import type { ConfigDocument } from "./config/schemas";
import { NemcastServicesModule } from "./nemcast-services.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({})
export class AppModule {
  static forRoot(document: ConfigDocument): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: [".env", "../.env"],
          cache: true,
        }),
        NemcastServicesModule.register(document),
        TrpcModule,
      ],
    };
  }
}
