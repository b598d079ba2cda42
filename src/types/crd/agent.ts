import { z } from "zod";
import { AgentValidationError } from "../../lib/errors";
import { KubeObjectMetaSchema } from "./common";

export const AGENT_API_VERSION = "cloudwatch.aws.amazon.com/v1alpha1";
export const AGENT_KIND = "AmazonCloudWatchAgent";

// How the agent is deployed
export const AgentModeSchema = z.enum(["deployment", "daemonset", "statefulset", "sidecar"]);

export type AgentMode = z.infer<typeof AgentModeSchema>;

// Service port as declared on the resource
export const ServicePortSchema = z.object({
  name: z.string().optional(),
  port: z.number().int().min(1).max(65535),
  protocol: z.enum(["TCP", "UDP", "SCTP"]).optional(),
  appProtocol: z.string().optional(),
  targetPort: z.union([z.number().int(), z.string()]).optional(),
  nodePort: z.number().int().optional(),
});

export type ServicePort = z.infer<typeof ServicePortSchema>;

export const AgentSpecSchema = z
  .object({
    mode: AgentModeSchema.optional().default("deployment"),
    ports: z.array(ServicePortSchema).optional().default([]),
    config: z.string().optional().default(""),
    image: z.string().optional().default(""),
  })
  .superRefine((spec, ctx) => {
    const numbers = new Set<number>();
    const names = new Set<string>();

    spec.ports.forEach((port, i) => {
      if (numbers.has(port.port)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ports", i, "port"],
          message: `duplicate port number ${port.port}`,
        });
      }
      numbers.add(port.port);

      const name = port.name ?? "";
      if (names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ports", i, "name"],
          message: `duplicate port name "${name}"`,
        });
      }
      names.add(name);
    });
  });

export type AgentSpec = z.infer<typeof AgentSpecSchema>;

export const AgentSchema = z.object({
  apiVersion: z.literal(AGENT_API_VERSION),
  kind: z.literal(AGENT_KIND),
  metadata: KubeObjectMetaSchema,
  spec: AgentSpecSchema,
});

export type Agent = z.infer<typeof AgentSchema>;

/**
 * Validate a raw agent resource and apply spec defaults
 */
export function parseAgent(raw: unknown): Agent {
  const result = AgentSchema.safeParse(raw);
  if (!result.success) {
    throw new AgentValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return result.data;
}
