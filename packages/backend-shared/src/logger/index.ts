export * from "./logger.module";
