import { describe, expect, it } from "vitest";

import { batchEnvSchema, validateBatchEnv } from "../env.schema";

describe("env.schema", () => {
  describe("batchEnvSchema", () => {
    it("applies defaults to an empty env", () => {
      const result = batchEnvSchema.safeParse({});

      expect(result.success).toBe(true);
      if (!result.success) {
        throw new Error("Expected parse to succeed");
      }

      expect(result.data).toEqual({
        NODE_ENV: "development",
        LOG_FORMAT: "text",
        MAPPING_STRATEGY: "structural",
        PRETTY_SQL: false,
        PROGRESS_INTERVAL: 1000,
        DATABASE_ID_FIELD: "dbid",
        QUERY_FIELDS: ["q1", "q2"],
      });
    });

    it("splits and trims QUERY_FIELDS", () => {
      const env = validateBatchEnv({ QUERY_FIELDS: " query , ,other " });

      expect(env.QUERY_FIELDS).toEqual(["query", "other"]);
    });

    it("rejects QUERY_FIELDS without any column", () => {
      const result = batchEnvSchema.safeParse({ QUERY_FIELDS: " , " });

      expect(result.success).toBe(false);
    });

    it("coerces PROGRESS_INTERVAL and PRETTY_SQL from strings", () => {
      const env = validateBatchEnv({
        PROGRESS_INTERVAL: "250",
        PRETTY_SQL: "true",
      });

      expect(env.PROGRESS_INTERVAL).toBe(250);
      expect(env.PRETTY_SQL).toBe(true);
    });

    it("rejects an unknown mapping strategy", () => {
      expect(() => validateBatchEnv({ MAPPING_STRATEGY: "regex" })).toThrow();
    });

    it("rejects a negative PROGRESS_INTERVAL", () => {
      const result = batchEnvSchema.safeParse({ PROGRESS_INTERVAL: "-1" });

      expect(result.success).toBe(false);
    });

    it("keeps an explicit log level", () => {
      const env = validateBatchEnv({ LOG_LEVEL: "warn", LOG_FORMAT: "json" });

      expect(env.LOG_LEVEL).toBe("warn");
      expect(env.LOG_FORMAT).toBe("json");
    });
  });
});
