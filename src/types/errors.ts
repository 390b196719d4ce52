/**
 * Base error for everything the provisioner reports to the operator.
 * `code` is stable and printed by the CLI; `remediation` is an optional hint.
 */
export class ProvisioningError extends Error {
  readonly code: string;
  readonly remediation?: string;

  constructor(code: string, message: string, remediation?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.remediation = remediation;
  }
}

/** Missing or invalid input; aborts before any work starts. */
export class ConfigurationError extends ProvisioningError {
  constructor(message: string, remediation?: string) {
    super('CONFIG_INVALID', message, remediation);
  }
}

/** An instance id that cannot be turned into a reference and path. */
export class ResolutionError extends ProvisioningError {
  readonly instanceId: string;

  constructor(instanceId: string, message: string) {
    super('INSTANCE_UNRESOLVABLE', message, 'Check the manifest entry for typos or unsupported characters');
    this.instanceId = instanceId;
  }
}

export class FetchError extends ProvisioningError {
  readonly instanceId: string;
  readonly exitCode: number | null;

  constructor(instanceId: string, message: string, exitCode: number | null = null) {
    super('FETCH_FAILED', message);
    this.instanceId = instanceId;
    this.exitCode = exitCode;
  }
}

/** The store cannot be read, so no summary can be trusted. */
export class AggregationError extends ProvisioningError {
  constructor(message: string) {
    super('STORE_UNREADABLE', message, 'Check that the store directory exists and is readable');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
