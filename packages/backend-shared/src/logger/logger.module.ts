import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { LoggerModule as PinoLoggerModule } from "nestjs-pino";
import type { Options } from "pino-http";

/**
 * Sensitive field names that must be redacted from logs.
 * Exported for testing to prevent regression.
 */
export const REDACTED_FIELD_PATHS = [
  "password",
  "token",
  "secret",
  "*.password",
  "*.token",
  "*.secret",
] as const;

/**
 * File descriptor log lines are written to. Batch commands are run from a
 * shell, so logs stay off stdout.
 */
export const LOG_DESTINATION = 2;

/**
 * Creates pino configuration based on environment settings.
 * Text output goes through pino-pretty; json output is written as-is.
 * Exported for testing.
 */
export function createPinoOptions(
  nodeEnv: string | undefined,
  logFormat: string | undefined,
  logLevel: string | undefined,
): { pinoHttp: Options } {
  const isProduction = nodeEnv === "production";
  const useJson = logFormat === "json" || isProduction;

  const transport = useJson
    ? {
        target: "pino/file",
        options: { destination: LOG_DESTINATION },
      }
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          destination: LOG_DESTINATION,
        },
      };

  return {
    pinoHttp: {
      level: logLevel ?? (isProduction ? "info" : "debug"),
      transport,
      redact: {
        paths: [...REDACTED_FIELD_PATHS],
        censor: "[REDACTED]",
      },
    },
  };
}

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createPinoOptions(
          config.get<string>("NODE_ENV"),
          config.get<string>("LOG_FORMAT"),
          config.get<string>("LOG_LEVEL"),
        ),
    }),
  ],
  exports: [PinoLoggerModule],
})
export class LoggerModule {}
