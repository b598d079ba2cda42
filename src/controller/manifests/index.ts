export { configFromString, configToMetricsPort, DEFAULT_METRICS_PORT } from "./adapters/config";
export type { AgentConfig } from "./adapters/config";
export {
  DEFAULT_AGENT_PORTS,
  fallbackPortName,
  resolvePorts,
} from "./ports";
export type { DropReason, DroppedPort, PortResolution } from "./ports";
export {
  buildHeadlessService,
  buildMonitoringService,
  buildService,
  HEADLESS_EXISTS,
  HEADLESS_LABEL,
  MONITORING_PORT_NAME,
  SERVING_CERT_ANNOTATION,
} from "./service-builder";
export type { ManifestParams } from "./types";
