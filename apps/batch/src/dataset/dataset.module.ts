import { Module } from "@nestjs/common";

import { MappingModule } from "../mapping/mapping.module";
import { DatasetIoService } from "./dataset-io.service";
import { DatasetMappingService } from "./dataset-mapping.service";

@Module({
  imports: [MappingModule],
  providers: [DatasetIoService, DatasetMappingService],
  exports: [DatasetMappingService],
})
export class DatasetModule {}
