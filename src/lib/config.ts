// Environment variables naming the auto-instrumentation images
export const JAVA_IMAGE_ENV = "AUTO_INSTRUMENTATION_JAVA";
export const PYTHON_IMAGE_ENV = "AUTO_INSTRUMENTATION_PYTHON";

const env = process.env.NODE_ENV || "development";

// Load environment variables
export const config = {
  env,
  isDev: env !== "production" && env !== "test",

  // Logging
  logLevel:
    process.env.LOG_LEVEL ||
    (env === "production" ? "info" : env === "test" ? "silent" : "debug"),
};

/**
 * Image references for the auto-instrumentation runtimes.
 * A field is undefined when its variable is not set; an empty value is kept.
 */
export interface InstrumentationImages {
  java?: string;
  python?: string;
}

export function instrumentationImagesFromEnv(
  source: NodeJS.ProcessEnv = process.env,
): InstrumentationImages {
  return {
    java: source[JAVA_IMAGE_ENV],
    python: source[PYTHON_IMAGE_ENV],
  };
}

export default config;
