/**
 * Resource naming
 *
 * Kubernetes object names must be DNS-1123 labels: at most 63 characters,
 * lower-case alphanumerics and '-', starting and ending with an alphanumeric.
 */

export const MAX_NAME_LENGTH = 63;

const ALPHANUMERIC = /[a-z0-9]/;
const NON_ALPHANUMERIC_TAIL = /[^a-zA-Z0-9]+$/;

/**
 * Replace every invalid character with '-', or 'a' at either end
 */
export function dnsName(name: string): string {
  const chars = Array.from(name.toLowerCase());
  return chars
    .map((c, i) => {
      if (ALPHANUMERIC.test(c)) return c;
      return i === 0 || i === chars.length - 1 ? "a" : "-";
    })
    .join("");
}

/**
 * Join base and suffix, shortening base first so the result fits in max.
 * Trailing non-alphanumerics left by the cut are removed.
 */
export function truncateName(base: string, suffix: string, max: number = MAX_NAME_LENGTH): string {
  let result = `${base}${suffix}`;
  const excess = result.length - max;

  if (excess > 0) {
    const shortened = base.length > excess ? base.slice(0, base.length - excess) : "";
    result = `${shortened}${suffix}`;
  }

  if (result.length > max) {
    return result.slice(0, max);
  }

  return result.replace(NON_ALPHANUMERIC_TAIL, "");
}

export function serviceName(agentName: string): string {
  return dnsName(truncateName(agentName, ""));
}

export function headlessServiceName(agentName: string): string {
  return dnsName(truncateName(serviceName(agentName), "-headless"));
}

export function monitoringServiceName(agentName: string): string {
  return dnsName(truncateName(serviceName(agentName), "-monitoring"));
}
