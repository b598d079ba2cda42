/**
 * Default Instrumentation
 *
 * Builds the Instrumentation resource applied when the user has not
 * provided one. Everything but the two runtime images is fixed.
 */

import { instrumentationImagesFromEnv, JAVA_IMAGE_ENV, PYTHON_IMAGE_ENV } from "../../lib/config";
import type { InstrumentationImages } from "../../lib/config";
import { MissingConfigError } from "../../lib/errors";
import type { EnvVar, Instrumentation, Propagator } from "../../types/crd";

export const DEFAULT_API_VERSION = "cloudwatch.aws.amazon.com/v1alpha1";
export const DEFAULT_KIND = "Instrumentation";
export const DEFAULT_INSTRUMENTATION_NAME = "java-instrumentation";
export const DEFAULT_NAMESPACE = "default";

export const DEFAULT_PROPAGATORS: readonly Propagator[] = ["tracecontext", "baggage", "b3", "xray"];

const SMP_ENABLED: EnvVar = { name: "OTEL_SMP_ENABLED", value: "true" };
const TRACES_SAMPLER_ARG: EnvVar = {
  name: "OTEL_TRACES_SAMPLER_ARG",
  value: "endpoint=http://cloudwatch-agent.amazon-cloudwatch:2000",
};
const TRACES_SAMPLER: EnvVar = { name: "OTEL_TRACES_SAMPLER", value: "xray" };
const EXPORTER_OTLP_PROTOCOL: EnvVar = {
  name: "OTEL_EXPORTER_OTLP_PROTOCOL",
  value: "http/protobuf",
};
const EXPORTER_TRACES_ENDPOINT: EnvVar = {
  name: "OTEL_EXPORTER_OTLP_TRACES_ENDPOINT",
  value: "http://cloudwatch-agent.amazon-cloudwatch:4316/v1/traces",
};
const EXPORTER_SMP_ENDPOINT: EnvVar = {
  name: "OTEL_AWS_SMP_EXPORTER_ENDPOINT",
  value: "http://cloudwatch-agent.amazon-cloudwatch:4315",
};
const METRICS_EXPORTER: EnvVar = { name: "OTEL_METRICS_EXPORTER", value: "none" };
const PYTHON_DISTRO: EnvVar = { name: "OTEL_PYTHON_DISTRO", value: "aws_distro" };
const PYTHON_CONFIGURATOR: EnvVar = {
  name: "OTEL_PYTHON_CONFIGURATOR",
  value: "aws_configurator",
};

function javaEnv(): EnvVar[] {
  return [
    SMP_ENABLED,
    TRACES_SAMPLER_ARG,
    TRACES_SAMPLER,
    EXPORTER_OTLP_PROTOCOL,
    EXPORTER_TRACES_ENDPOINT,
    EXPORTER_SMP_ENDPOINT,
    METRICS_EXPORTER,
  ].map((e) => ({ ...e }));
}

function pythonEnv(): EnvVar[] {
  return [
    SMP_ENABLED,
    TRACES_SAMPLER_ARG,
    EXPORTER_OTLP_PROTOCOL,
    EXPORTER_TRACES_ENDPOINT,
    EXPORTER_SMP_ENDPOINT,
    METRICS_EXPORTER,
    PYTHON_DISTRO,
    PYTHON_CONFIGURATOR,
  ].map((e) => ({ ...e }));
}

/**
 * Build the default Instrumentation.
 * Throws MissingConfigError when either image is not supplied.
 */
export function buildDefaultInstrumentation(images: InstrumentationImages): Instrumentation {
  if (images.java === undefined) {
    throw new MissingConfigError("unable to determine java instrumentation image", JAVA_IMAGE_ENV);
  }
  if (images.python === undefined) {
    throw new MissingConfigError(
      "unable to determine python instrumentation image",
      PYTHON_IMAGE_ENV,
    );
  }

  return {
    apiVersion: DEFAULT_API_VERSION,
    kind: DEFAULT_KIND,
    metadata: {
      name: DEFAULT_INSTRUMENTATION_NAME,
      namespace: DEFAULT_NAMESPACE,
    },
    spec: {
      propagators: [...DEFAULT_PROPAGATORS],
      java: {
        image: images.java,
        env: javaEnv(),
      },
      python: {
        image: images.python,
        env: pythonEnv(),
      },
    },
    status: {},
  };
}

export function buildDefaultInstrumentationFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Instrumentation {
  return buildDefaultInstrumentation(instrumentationImagesFromEnv(env));
}
