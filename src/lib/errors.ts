/**
 * Errors raised by the manifest builders.
 *
 * Builders return `null` when a resource is simply not needed; anything
 * thrown is one of the classes below.
 */

export type ManifestErrorCode =
  | "MISSING_CONFIG"
  | "CONFIG_PARSE"
  | "METRICS_PORT"
  | "AGENT_VALIDATION";

export class ManifestError extends Error {
  readonly code: ManifestErrorCode;

  constructor(message: string, code: ManifestErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ManifestError";
    this.code = code;
  }
}

/**
 * A required external value (an image reference) was not supplied
 */
export class MissingConfigError extends ManifestError {
  readonly key: string;

  constructor(message: string, key: string) {
    super(message, "MISSING_CONFIG");
    this.name = "MissingConfigError";
    this.key = key;
  }
}

export class ConfigParseError extends ManifestError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_PARSE", { cause });
    this.name = "ConfigParseError";
  }
}

export class MetricsPortError extends ManifestError {
  readonly address: string;

  constructor(message: string, address: string) {
    super(message, "METRICS_PORT");
    this.name = "MetricsPortError";
    this.address = address;
  }
}

export class AgentValidationError extends ManifestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid agent resource: ${issues.join("; ")}`, "AGENT_VALIDATION");
    this.name = "AgentValidationError";
    this.issues = issues;
  }
}
