export {
  buildDefaultInstrumentation,
  buildDefaultInstrumentationFromEnv,
  DEFAULT_INSTRUMENTATION_NAME,
  DEFAULT_PROPAGATORS,
} from "./default-instrumentation";
