/**
 * Agent Manifests
 *
 * Builds the Services and the default Instrumentation resource for managed
 * CloudWatch agent workloads. Every builder is a pure function of its input.
 */

export * from "./controller/instrumentation";
export * from "./controller/manifests";
export { config, instrumentationImagesFromEnv } from "./lib/config";
export type { InstrumentationImages } from "./lib/config";
export * from "./lib/errors";
export { COMPONENT_AGENT, labels, selectorLabels } from "./lib/labels";
export { logger } from "./lib/logger";
export type { Logger } from "./lib/logger";
export * from "./lib/naming";
export * from "./types/crd";
