import { MAX_NAME_LENGTH, truncateName } from "./naming";

export const COMPONENT_AGENT = "amazon-cloudwatch-agent";

const MANAGED_BY = "amazon-cloudwatch-agent-operator";
const PART_OF = "amazon-cloudwatch-agent";

export const LABEL_MANAGED_BY = "app.kubernetes.io/managed-by";
export const LABEL_INSTANCE = "app.kubernetes.io/instance";
export const LABEL_PART_OF = "app.kubernetes.io/part-of";
export const LABEL_COMPONENT = "app.kubernetes.io/component";
export const LABEL_VERSION = "app.kubernetes.io/version";
export const LABEL_NAME = "app.kubernetes.io/name";

export interface InstanceMeta {
  name: string;
  namespace: string;
  labels?: Record<string, string>;
}

/**
 * Labels used to select the pods of an agent instance
 */
export function selectorLabels(instance: InstanceMeta, component: string): Record<string, string> {
  return {
    [LABEL_MANAGED_BY]: MANAGED_BY,
    [LABEL_INSTANCE]: truncateName(instance.namespace, `.${instance.name}`, MAX_NAME_LENGTH),
    [LABEL_PART_OF]: PART_OF,
    [LABEL_COMPONENT]: component,
  };
}

/**
 * Full label set for an object owned by an agent instance.
 * The instance's own labels are carried over first.
 */
export function labels(
  instance: InstanceMeta,
  name: string,
  image: string,
  component: string,
): Record<string, string> {
  const base: Record<string, string> = {
    ...instance.labels,
    ...selectorLabels(instance, component),
  };

  const segments = image.split(":");
  const tag = segments[segments.length - 1] ?? "";
  base[LABEL_VERSION] = segments.length > 1 ? tag.slice(0, MAX_NAME_LENGTH) : "latest";

  // Don't override the app name if the instance already sets one
  if (!(LABEL_NAME in base)) {
    base[LABEL_NAME] = name;
  }

  return base;
}
