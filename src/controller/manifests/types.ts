/**
 * Manifest Builder Types
 */

import type { V1ServicePort } from "@kubernetes/client-node";
import type { Logger } from "../../lib/logger";
import type { Agent } from "../../types/crd";

/**
 * Inputs shared by the service builders
 */
export interface ManifestParams {
  agent: Agent;
  /** Logger for diagnostics (default: module logger) */
  logger?: Logger;
  /** Ports the agent needs regardless of its resource (default: DEFAULT_AGENT_PORTS) */
  defaultPorts?: readonly V1ServicePort[];
}
