import { z } from "zod";
import { EnvVarSchema } from "./common";

export const PropagatorSchema = z.enum([
  "tracecontext",
  "baggage",
  "b3",
  "b3multi",
  "jaeger",
  "xray",
  "ottrace",
  "none",
]);

export type Propagator = z.infer<typeof PropagatorSchema>;

// Auto-instrumentation settings for one language runtime
export const RuntimeInstrumentationSchema = z.object({
  image: z.string(),
  env: z.array(EnvVarSchema),
});

export type RuntimeInstrumentation = z.infer<typeof RuntimeInstrumentationSchema>;

export const InstrumentationSchema = z.object({
  apiVersion: z.string(),
  kind: z.literal("Instrumentation"),
  metadata: z.object({
    name: z.string(),
    namespace: z.string(),
  }),
  spec: z.object({
    propagators: z.array(PropagatorSchema),
    java: RuntimeInstrumentationSchema,
    python: RuntimeInstrumentationSchema,
  }),
  status: z.object({}).optional(),
});

export type Instrumentation = z.infer<typeof InstrumentationSchema>;
