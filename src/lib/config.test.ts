import { describe, expect, test } from "vitest";
import { config, instrumentationImagesFromEnv } from "./config";
import { logger } from "./logger";

describe("instrumentationImagesFromEnv", () => {
  test("reads both variables", () => {
    expect(
      instrumentationImagesFromEnv({
        AUTO_INSTRUMENTATION_JAVA: "java:1",
        AUTO_INSTRUMENTATION_PYTHON: "python:1",
      }),
    ).toEqual({ java: "java:1", python: "python:1" });
  });

  test("leaves unset variables undefined", () => {
    expect(instrumentationImagesFromEnv({ AUTO_INSTRUMENTATION_PYTHON: "" })).toEqual({
      java: undefined,
      python: "",
    });
  });
});

describe("config", () => {
  test("silences logging under the test runner", () => {
    expect(config.env).toBe("test");
    expect(config.isDev).toBe(false);
    expect(config.logLevel).toBe(process.env.LOG_LEVEL || "silent");
  });

  test("drives the logger level", () => {
    expect(logger.level).toBe(config.logLevel);
  });
});
