/**
 * Agent configuration adapter
 *
 * Reads the raw configuration text of an agent and extracts what the
 * manifest builders need from it.
 */

import * as yaml from "js-yaml";
import { ConfigParseError, MetricsPortError } from "../../../lib/errors";

export type AgentConfig = Record<string, unknown>;

// Port the agent exposes its own metrics on when the address names none
export const DEFAULT_METRICS_PORT = 8888;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse configuration text (YAML or JSON)
 */
export function configFromString(text: string): AgentConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    throw new ConfigParseError("couldn't parse the agent configuration", error);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigParseError("agent configuration must be a mapping");
  }
  return parsed;
}

function lookup(config: AgentConfig, path: string[]): unknown {
  let current: unknown = config;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Split "host:port", "[ipv6]:port" or ":port".
 * Returns null for the port when the address carries none.
 */
function splitHostPort(address: string): { host: string; port: string | null } {
  if (address.startsWith("[")) {
    const end = address.indexOf("]");
    if (end === -1) {
      throw new MetricsPortError(`missing ']' in address "${address}"`, address);
    }
    const rest = address.slice(end + 1);
    if (rest === "") return { host: address.slice(1, end), port: null };
    if (!rest.startsWith(":") || rest.indexOf(":", 1) !== -1) {
      throw new MetricsPortError(`unexpected characters after ']' in address "${address}"`, address);
    }
    return { host: address.slice(1, end), port: rest.slice(1) };
  }

  const colons = address.split(":").length - 1;
  if (colons === 0) return { host: address, port: null };
  if (colons > 1) {
    throw new MetricsPortError(`too many colons in address "${address}"`, address);
  }
  const idx = address.indexOf(":");
  return { host: address.slice(0, idx), port: address.slice(idx + 1) };
}

/**
 * Port the agent serves its own metrics on, from service.telemetry.metrics.address
 */
export function configToMetricsPort(config: AgentConfig): number {
  const address = lookup(config, ["service", "telemetry", "metrics", "address"]);

  if (address === undefined || address === null) {
    return DEFAULT_METRICS_PORT;
  }
  if (typeof address !== "string") {
    throw new MetricsPortError("metrics address must be a string", String(address));
  }

  const { port } = splitHostPort(address);
  if (port === null) {
    return DEFAULT_METRICS_PORT;
  }

  const value = /^\d+$/.test(port) ? Number.parseInt(port, 10) : Number.NaN;
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new MetricsPortError(`invalid metrics port "${port}" in address "${address}"`, address);
  }
  return value;
}
