/**
 * Port Set Resolver
 *
 * Merges the ports an agent is known to need (inferred) with the ports the
 * user declared on the resource. Declared ports always win:
 *
 * 1. an inferred port whose number is already declared is dropped
 * 2. an inferred port whose name is already declared is renamed to
 *    `port-<number>`, or dropped when that name is declared too
 */

import type { V1ServicePort } from "@kubernetes/client-node";
import { type Logger, logger as defaultLogger } from "../../lib/logger";

// Application Signals endpoints served by the agent
export const DEFAULT_AGENT_PORTS: readonly V1ServicePort[] = [
  { name: "appsig-grpc", port: 4315, targetPort: 4315, protocol: "TCP" },
  { name: "appsig-http", port: 4316, targetPort: 4316, protocol: "TCP" },
  { name: "appsig-xray", port: 2000, targetPort: 2000, protocol: "TCP" },
];

export type DropReason =
  | "port-number-declared"
  | "port-number-inferred"
  | "fallback-name-declared"
  | "fallback-name-inferred";

export interface DroppedPort {
  port: V1ServicePort;
  reason: DropReason;
}

export interface PortResolution {
  ports: V1ServicePort[];
  dropped: DroppedPort[];
}

export function fallbackPortName(port: number): string {
  return `port-${port}`;
}

/**
 * Merge inferred ports into the declared ones.
 * The result starts with the declared ports, in order and unchanged; an
 * inferred port also never reuses the number or name of an earlier kept one.
 */
export function resolvePorts(
  inferred: readonly V1ServicePort[],
  declared: readonly V1ServicePort[],
  log: Logger = defaultLogger,
): PortResolution {
  const declaredNumbers = new Set(declared.map((p) => p.port));
  const declaredNames = new Set(declared.map((p) => p.name ?? ""));
  const numbers = new Set(declaredNumbers);
  const names = new Set(declaredNames);

  const ports: V1ServicePort[] = declared.map((p) => ({ ...p }));
  const dropped: DroppedPort[] = [];

  const keep = (port: V1ServicePort) => {
    ports.push(port);
    numbers.add(port.port);
    names.add(port.name ?? "");
  };

  for (const candidate of inferred) {
    if (numbers.has(candidate.port)) {
      dropped.push({
        port: { ...candidate },
        reason: declaredNumbers.has(candidate.port) ? "port-number-declared" : "port-number-inferred",
      });
      continue;
    }

    if (!names.has(candidate.name ?? "")) {
      keep({ ...candidate });
      continue;
    }

    const fallbackName = fallbackPortName(candidate.port);
    if (declaredNames.has(fallbackName)) {
      log.debug(
        {
          inferredPortName: candidate.name,
          fallbackPortName: fallbackName,
        },
        "Declared port name clashes with inferred port and its fallback name, skipping port",
      );
      dropped.push({ port: { ...candidate }, reason: "fallback-name-declared" });
      continue;
    }
    if (names.has(fallbackName)) {
      log.debug(
        {
          inferredPortName: candidate.name,
          fallbackPortName: fallbackName,
        },
        "Fallback port name already used by another inferred port, skipping port",
      );
      dropped.push({ port: { ...candidate }, reason: "fallback-name-inferred" });
      continue;
    }

    keep({ ...candidate, name: fallbackName });
  }

  return { ports, dropped };
}
