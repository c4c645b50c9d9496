import { ConfigModule, ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { validateBatchEnv } from "@idmap/backend-shared";
import { describe, expect, it } from "vitest";

import { SchemaAnonymizationService } from "../../mapping/schema-anonymization.service";
import { DatasetMappingService } from "../dataset-mapping.service";
import { DatasetModule } from "../dataset.module";
import { MappingModule } from "../../mapping/mapping.module";

describe("DatasetModule", () => {
  it("resolves the batch services against validated config", async () => {
    const module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: validateBatchEnv,
        }),
        MappingModule,
        DatasetModule,
      ],
    }).compile();

    expect(module.get(DatasetMappingService)).toBeInstanceOf(
      DatasetMappingService,
    );
    expect(module.get(SchemaAnonymizationService)).toBeInstanceOf(
      SchemaAnonymizationService,
    );
    expect(module.get(ConfigService).get("QUERY_FIELDS")).toEqual(["q1", "q2"]);

    await module.close();
  });
});
