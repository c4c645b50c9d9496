import { Module } from "@nestjs/common";

import { MappingStoreService } from "./mapping-store.service";
import { SchemaAnonymizationService } from "./schema-anonymization.service";

@Module({
  providers: [MappingStoreService, SchemaAnonymizationService],
  exports: [MappingStoreService, SchemaAnonymizationService],
})
export class MappingModule {}
