import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { LoggerModule, validateBatchEnv } from "@idmap/backend-shared";

import { DatasetModule } from "./dataset/dataset.module";
import { MappingModule } from "./mapping/mapping.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateBatchEnv,
    }),
    LoggerModule,
    MappingModule,
    DatasetModule,
  ],
})
export class AppModule {}
