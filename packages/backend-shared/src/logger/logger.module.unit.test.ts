import { describe, expect, it } from "vitest";

import {
  createPinoOptions,
  LOG_DESTINATION,
  REDACTED_FIELD_PATHS,
} from "./logger.module";

describe("Logger", () => {
  describe("Field Redaction", () => {
    it("redacts password field", () => {
      expect(REDACTED_FIELD_PATHS).toContain("password");
    });

    it("redacts token field", () => {
      expect(REDACTED_FIELD_PATHS).toContain("token");
    });

    it("redacts nested secret fields", () => {
      expect(REDACTED_FIELD_PATHS).toContain("*.secret");
    });

    it("includes all field paths in pino config", () => {
      const options = createPinoOptions("development", "text", undefined)
        .pinoHttp;

      expect(options.redact).toEqual({
        paths: [...REDACTED_FIELD_PATHS],
        censor: "[REDACTED]",
      });
    });
  });

  describe("Log Level Configuration", () => {
    it("uses explicit log level when provided", () => {
      const options = createPinoOptions("development", "text", "warn").pinoHttp;
      expect(options.level).toBe("warn");
    });

    it("defaults to debug in development when not specified", () => {
      const options = createPinoOptions("development", "text", undefined)
        .pinoHttp;
      expect(options.level).toBe("debug");
    });

    it("defaults to info in production when not specified", () => {
      const options = createPinoOptions("production", "text", undefined)
        .pinoHttp;
      expect(options.level).toBe("info");
    });
  });

  describe("Transport Configuration", () => {
    it("uses pino-pretty on stderr in development with text format", () => {
      const options = createPinoOptions("development", "text", undefined)
        .pinoHttp;
      expect(options.transport).toEqual({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          destination: LOG_DESTINATION,
        },
      });
    });

    it("writes json lines to stderr in production", () => {
      const options = createPinoOptions("production", "text", undefined)
        .pinoHttp;
      expect(options.transport).toEqual({
        target: "pino/file",
        options: { destination: 2 },
      });
    });

    it("writes json lines when format is json", () => {
      const options = createPinoOptions("development", "json", undefined)
        .pinoHttp;
      expect(options.transport).toEqual({
        target: "pino/file",
        options: { destination: 2 },
      });
    });
  });
});
