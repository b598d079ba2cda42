/**
 * Service Builder
 * Builds the Kubernetes Services exposing an agent instance
 */

import type { V1Service, V1ServicePort } from "@kubernetes/client-node";
import { COMPONENT_AGENT, labels, selectorLabels } from "../../lib/labels";
import { logger as defaultLogger } from "../../lib/logger";
import { headlessServiceName, monitoringServiceName, serviceName } from "../../lib/naming";
import { configFromString, configToMetricsPort } from "./adapters/config";
import { DEFAULT_AGENT_PORTS, resolvePorts } from "./ports";
import type { ManifestParams } from "./types";

// Tells the headless service apart from the ClusterIP one
export const HEADLESS_LABEL = "operator.opentelemetry.io/collector-headless-service";
export const HEADLESS_EXISTS = "Exists";
export const SERVING_CERT_ANNOTATION = "service.beta.openshift.io/serving-cert-secret-name";

export const MONITORING_PORT_NAME = "monitoring";

function candidatePorts(params: ManifestParams): V1ServicePort[] {
  const log = params.logger ?? defaultLogger;
  const defaults = params.defaultPorts ?? DEFAULT_AGENT_PORTS;

  return resolvePorts(defaults, params.agent.spec.ports, log).ports;
}

/**
 * Build the ClusterIP service for an agent.
 * Returns null when the agent has no ports to expose.
 */
export function buildService(params: ManifestParams): V1Service | null {
  const { agent } = params;
  const log = params.logger ?? defaultLogger;
  const name = serviceName(agent.metadata.name);

  const ports = candidatePorts(params);

  // No ports, no service
  if (ports.length === 0) {
    log.debug(
      { instance: agent.metadata.name, namespace: agent.metadata.namespace },
      "The instance's configuration didn't yield any ports to open, skipping service",
    );
    return null;
  }

  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: {
      name,
      namespace: agent.metadata.namespace,
      labels: labels(agent.metadata, name, agent.spec.image, COMPONENT_AGENT),
      annotations: { ...agent.metadata.annotations },
    },
    spec: {
      internalTrafficPolicy: agent.spec.mode === "daemonset" ? "Local" : "Cluster",
      selector: selectorLabels(agent.metadata, COMPONENT_AGENT),
      clusterIP: "",
      ports,
    },
  };
}

/**
 * Build the headless variant of the agent service
 */
export function buildHeadlessService(params: ManifestParams): V1Service | null {
  const base = buildService(params);
  if (!base) {
    return base;
  }

  const name = headlessServiceName(params.agent.metadata.name);

  // Fresh maps; the base service's maps are never touched
  const annotations: Record<string, string> = {
    [SERVING_CERT_ANNOTATION]: `${name}-tls`,
    ...base.metadata?.annotations,
  };

  return {
    ...base,
    metadata: {
      ...base.metadata,
      name,
      labels: {
        ...base.metadata?.labels,
        [HEADLESS_LABEL]: HEADLESS_EXISTS,
      },
      annotations,
    },
    spec: {
      ...base.spec,
      clusterIP: "None",
    },
  };
}

/**
 * Build the service exposing the agent's own metrics endpoint.
 * Throws when the configuration cannot be parsed or names no usable port.
 */
export function buildMonitoringService(params: ManifestParams): V1Service {
  const { agent } = params;
  const log = params.logger ?? defaultLogger;
  const name = monitoringServiceName(agent.metadata.name);

  let metricsPort: number;
  try {
    metricsPort = configToMetricsPort(configFromString(agent.spec.config));
  } catch (error) {
    log.error(
      { err: error, instance: agent.metadata.name, namespace: agent.metadata.namespace },
      "Couldn't extract the metrics port from the configuration",
    );
    throw error;
  }

  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: {
      name,
      namespace: agent.metadata.namespace,
      labels: labels(agent.metadata, name, agent.spec.image, COMPONENT_AGENT),
      annotations: { ...agent.metadata.annotations },
    },
    spec: {
      selector: selectorLabels(agent.metadata, COMPONENT_AGENT),
      clusterIP: "",
      ports: [
        {
          name: MONITORING_PORT_NAME,
          port: metricsPort,
        },
      ],
    },
  };
}
