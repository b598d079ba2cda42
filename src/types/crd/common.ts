import { z } from "zod";

// Common Kubernetes metadata
export const KubeObjectMetaSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  uid: z.string().optional(),
  resourceVersion: z.string().optional(),
  generation: z.number().optional(),
  creationTimestamp: z.string().optional(),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
});

export type KubeObjectMeta = z.infer<typeof KubeObjectMetaSchema>;

// Name/value environment entry
export const EnvVarSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

export type EnvVar = z.infer<typeof EnvVarSchema>;
