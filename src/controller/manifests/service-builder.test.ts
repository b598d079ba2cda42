import { describe, expect, test } from "vitest";
import { ConfigParseError, MetricsPortError } from "../../lib/errors";
import { createAgent } from "../../test-utils/fixtures/agents";
import {
  buildHeadlessService,
  buildMonitoringService,
  buildService,
  HEADLESS_EXISTS,
  HEADLESS_LABEL,
  SERVING_CERT_ANNOTATION,
} from "./service-builder";

const expectedSelector = {
  "app.kubernetes.io/managed-by": "amazon-cloudwatch-agent-operator",
  "app.kubernetes.io/instance": "amazon-cloudwatch.cloudwatch-agent",
  "app.kubernetes.io/part-of": "amazon-cloudwatch-agent",
  "app.kubernetes.io/component": "amazon-cloudwatch-agent",
};

describe("buildService", () => {
  test("uses the default ports when none are declared", () => {
    const service = buildService({ agent: createAgent() });

    expect(service).toEqual({
      apiVersion: "v1",
      kind: "Service",
      metadata: {
        name: "cloudwatch-agent",
        namespace: "amazon-cloudwatch",
        labels: {
          ...expectedSelector,
          "app.kubernetes.io/version": "1.300032.2b361",
          "app.kubernetes.io/name": "cloudwatch-agent",
        },
        annotations: {},
      },
      spec: {
        internalTrafficPolicy: "Cluster",
        selector: expectedSelector,
        clusterIP: "",
        ports: [
          { name: "appsig-grpc", port: 4315, targetPort: 4315, protocol: "TCP" },
          { name: "appsig-http", port: 4316, targetPort: 4316, protocol: "TCP" },
          { name: "appsig-xray", port: 2000, targetPort: 2000, protocol: "TCP" },
        ],
      },
    });
  });

  test("uses a local traffic policy for daemonsets", () => {
    const service = buildService({ agent: createAgent({ mode: "daemonset" }) });

    expect(service?.spec?.internalTrafficPolicy).toBe("Local");
  });

  test("uses a cluster traffic policy for statefulsets", () => {
    const service = buildService({ agent: createAgent({ mode: "statefulset" }) });

    expect(service?.spec?.internalTrafficPolicy).toBe("Cluster");
  });

  test("puts declared ports first and resolves collisions", () => {
    const agent = createAgent({
      ports: [
        { name: "appsig-grpc", port: 25888, protocol: "TCP" },
        { name: "xray", port: 2000, protocol: "UDP" },
      ],
    });

    const service = buildService({ agent });

    expect(service?.spec?.ports).toEqual([
      { name: "appsig-grpc", port: 25888, protocol: "TCP" },
      { name: "xray", port: 2000, protocol: "UDP" },
      { name: "port-4315", port: 4315, targetPort: 4315, protocol: "TCP" },
      { name: "appsig-http", port: 4316, targetPort: 4316, protocol: "TCP" },
    ]);
  });

  test("returns null when no ports are left", () => {
    const service = buildService({ agent: createAgent(), defaultPorts: [] });

    expect(service).toBeNull();
  });

  test("uses only declared ports when there are no defaults", () => {
    const agent = createAgent({ ports: [{ name: "statsd", port: 8125, protocol: "UDP" }] });

    const service = buildService({ agent, defaultPorts: [] });

    expect(service?.spec?.ports).toEqual([{ name: "statsd", port: 8125, protocol: "UDP" }]);
  });

  test("never repeats a port name across overridden defaults", () => {
    const agent = createAgent({ ports: [{ name: "a", port: 9 }] });

    const service = buildService({
      agent,
      defaultPorts: [
        { name: "a", port: 1 },
        { name: "port-1", port: 2 },
      ],
    });

    expect(service?.spec?.ports?.map((p) => p.name)).toEqual(["a", "port-1", "port-2"]);
  });

  test("removes repeated numbers from the defaults when nothing is declared", () => {
    const service = buildService({
      agent: createAgent(),
      defaultPorts: [
        { name: "x", port: 5 },
        { name: "y", port: 5 },
      ],
    });

    expect(service?.spec?.ports).toEqual([{ name: "x", port: 5 }]);
  });

  test("copies annotations instead of sharing the agent's map", () => {
    const annotations = { "team.example.com/owner": "observability" };
    const agent = createAgent({ annotations });

    const service = buildService({ agent });
    if (service?.metadata?.annotations) {
      service.metadata.annotations.extra = "value";
    }

    expect(service?.metadata?.annotations).toEqual({
      "team.example.com/owner": "observability",
      extra: "value",
    });
    expect(annotations).toEqual({ "team.example.com/owner": "observability" });
  });

  test("does not share port objects with the agent", () => {
    const agent = createAgent({ ports: [{ name: "emf", port: 25888 }] });

    const service = buildService({ agent });
    const first = service?.spec?.ports?.[0];
    if (first) first.name = "renamed";

    expect(agent.spec.ports[0]).toEqual({ name: "emf", port: 25888 });
  });

  test("is deterministic", () => {
    const agent = createAgent({ ports: [{ name: "appsig-http", port: 8080 }] });

    expect(JSON.stringify(buildService({ agent }))).toBe(JSON.stringify(buildService({ agent })));
  });
});

describe("buildHeadlessService", () => {
  test("derives a headless service from the base service", () => {
    const agent = createAgent({ annotations: { "team.example.com/owner": "observability" } });

    const headless = buildHeadlessService({ agent });

    expect(headless?.metadata?.name).toBe("cloudwatch-agent-headless");
    expect(headless?.metadata?.labels?.[HEADLESS_LABEL]).toBe(HEADLESS_EXISTS);
    expect(headless?.metadata?.labels?.["app.kubernetes.io/name"]).toBe("cloudwatch-agent");
    expect(headless?.metadata?.annotations).toEqual({
      [SERVING_CERT_ANNOTATION]: "cloudwatch-agent-headless-tls",
      "team.example.com/owner": "observability",
    });
    expect(headless?.spec?.clusterIP).toBe("None");
    expect(headless?.spec?.ports).toHaveLength(3);
  });

  test("keeps the label key and value expected by consumers", () => {
    const headless = buildHeadlessService({ agent: createAgent() });

    expect(headless?.metadata?.labels?.["operator.opentelemetry.io/collector-headless-service"]).toBe(
      "Exists",
    );
  });

  test("an existing serving-cert annotation wins over the generated one", () => {
    const agent = createAgent({ annotations: { [SERVING_CERT_ANNOTATION]: "custom-secret" } });

    const headless = buildHeadlessService({ agent });

    expect(headless?.metadata?.annotations).toEqual({
      [SERVING_CERT_ANNOTATION]: "custom-secret",
    });
  });

  test("does not alias the agent's annotations", () => {
    const annotations = { "team.example.com/owner": "observability" };
    const agent = createAgent({ annotations });

    const headless = buildHeadlessService({ agent });
    if (headless?.metadata?.annotations) {
      headless.metadata.annotations["team.example.com/owner"] = "someone-else";
    }

    expect(annotations).toEqual({ "team.example.com/owner": "observability" });
    expect(buildService({ agent })?.metadata?.annotations).toEqual({
      "team.example.com/owner": "observability",
    });
  });

  test("does not add the headless label to the base service", () => {
    const agent = createAgent();

    buildHeadlessService({ agent });

    expect(buildService({ agent })?.metadata?.labels?.[HEADLESS_LABEL]).toBeUndefined();
  });

  test("is deterministic", () => {
    const agent = createAgent({ annotations: { "team.example.com/owner": "observability" } });

    expect(JSON.stringify(buildHeadlessService({ agent }))).toBe(
      JSON.stringify(buildHeadlessService({ agent })),
    );
  });

  test("returns null when the base service is not needed", () => {
    expect(buildHeadlessService({ agent: createAgent(), defaultPorts: [] })).toBeNull();
  });
});

describe("buildMonitoringService", () => {
  test("uses the default metrics port when the configuration names none", () => {
    const service = buildMonitoringService({ agent: createAgent() });

    expect(service).toEqual({
      apiVersion: "v1",
      kind: "Service",
      metadata: {
        name: "cloudwatch-agent-monitoring",
        namespace: "amazon-cloudwatch",
        labels: {
          ...expectedSelector,
          "app.kubernetes.io/version": "1.300032.2b361",
          "app.kubernetes.io/name": "cloudwatch-agent-monitoring",
        },
        annotations: {},
      },
      spec: {
        selector: expectedSelector,
        clusterIP: "",
        ports: [{ name: "monitoring", port: 8888 }],
      },
    });
  });

  test("reads the metrics port from the configuration", () => {
    const config = [
      "service:",
      "  telemetry:",
      "    metrics:",
      '      address: "0.0.0.0:9100"',
    ].join("\n");

    const service = buildMonitoringService({ agent: createAgent({ config }) });

    expect(service.spec?.ports).toEqual([{ name: "monitoring", port: 9100 }]);
  });

  test("accepts JSON configuration", () => {
    const config = JSON.stringify({ service: { telemetry: { metrics: { address: ":9200" } } } });

    const service = buildMonitoringService({ agent: createAgent({ config }) });

    expect(service.spec?.ports).toEqual([{ name: "monitoring", port: 9200 }]);
  });

  test("throws when the configuration cannot be parsed", () => {
    const agent = createAgent({ config: "service: [unclosed" });

    expect(() => buildMonitoringService({ agent })).toThrow(ConfigParseError);
  });

  test("throws when the metrics port is invalid", () => {
    const config = "service:\n  telemetry:\n    metrics:\n      address: 0.0.0.0:metrics\n";
    const agent = createAgent({ config });

    expect(() => buildMonitoringService({ agent })).toThrow(MetricsPortError);
  });

  test("is deterministic", () => {
    const agent = createAgent({ config: "service:\n  telemetry:\n    metrics:\n      address: :9100\n" });

    expect(JSON.stringify(buildMonitoringService({ agent }))).toBe(
      JSON.stringify(buildMonitoringService({ agent })),
    );
  });

  test("failure does not affect the other services", () => {
    const agent = createAgent({ config: "service: [unclosed" });

    expect(() => buildMonitoringService({ agent })).toThrow();
    expect(buildService({ agent })).not.toBeNull();
    expect(buildHeadlessService({ agent })).not.toBeNull();
  });
});
