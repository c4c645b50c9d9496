#!/usr/bin/env node
import "reflect-metadata";

import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { CommanderError } from "commander";
import { Logger } from "nestjs-pino";

import { AppModule } from "./app.module";
import { reportFatalError } from "./bootstrap/report-fatal-error";
import { createProgram } from "./cli";
import { DatasetMappingService } from "./dataset/dataset-mapping.service";
import { SchemaAnonymizationService } from "./mapping/schema-anonymization.service";

async function withApplication(
  run: (app: INestApplicationContext) => Promise<unknown>,
): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(Logger));

  try {
    await run(app);
  } finally {
    await app.close();
  }
}

const program = createProgram({
  anonymize: ({ schemas, output }) =>
    withApplication((app) =>
      app.get(SchemaAnonymizationService).anonymizeFile(schemas, output),
    ),
  map: ({ dataset, mappings, output }) =>
    withApplication((app) =>
      app.get(DatasetMappingService).mapFile(dataset, mappings, output),
    ),
});

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    // Commander has already printed usage errors and help text.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    reportFatalError(error);
  }
}

void main();
