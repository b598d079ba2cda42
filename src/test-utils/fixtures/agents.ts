/**
 * Test fixture builders for agent resources
 */

import type { Agent, AgentMode, ServicePort } from "../../types/crd";

export function createAgent(overrides?: {
  name?: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  mode?: AgentMode;
  ports?: ServicePort[];
  config?: string;
  image?: string;
}): Agent {
  return {
    apiVersion: "cloudwatch.aws.amazon.com/v1alpha1",
    kind: "AmazonCloudWatchAgent",
    metadata: {
      name: overrides?.name ?? "cloudwatch-agent",
      namespace: overrides?.namespace ?? "amazon-cloudwatch",
      ...(overrides?.labels && { labels: overrides.labels }),
      ...(overrides?.annotations && { annotations: overrides.annotations }),
    },
    spec: {
      mode: overrides?.mode ?? "deployment",
      ports: overrides?.ports ?? [],
      config: overrides?.config ?? "",
      image: overrides?.image ?? "public.ecr.aws/cloudwatch-agent/cloudwatch-agent:1.300032.2b361",
    },
  };
}
