/**
 * Provisioning errors
 *
 * Typed errors raised by the GCE managers and the configuration layer, and
 * the classifier that maps provider failures onto the closed set of kinds
 * the orchestrator recovers from.
 */

/**
 * Provider failures that skip a zone instead of ending the run.
 */
export enum ProvisioningErrorKind {
  /** A conflicting GPU-bearing resource already exists in the target scope */
  FORBIDDEN = "FORBIDDEN",
  /** The accelerator/machine combination is not offered in the zone */
  BAD_REQUEST = "BAD_REQUEST",
  /** The zone is out of capacity */
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
  /** An instance with the target name already exists */
  CONFLICT = "CONFLICT",
}

/**
 * A zone operation reached DONE with errors attached.
 */
export class OperationFailedError extends Error {
  constructor(
    message: string,
    public readonly operationName: string,
    public readonly errorCode?: string,
    public readonly httpStatusCode?: number
  ) {
    super(message);
    this.name = "OperationFailedError";
  }
}

/**
 * A zone operation did not reach DONE in time.
 */
export class OperationTimeoutError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation timed out after ${timeoutMs / 1000}s: ${operationName}`);
    this.name = "OperationTimeoutError";
  }
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid provisioner configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

// gRPC status codes used by Google API errors, plus the HTTP statuses that
// Compute Engine reports on failed operations.
const KIND_BY_CODE: ReadonlyMap<number, ProvisioningErrorKind> = new Map([
  [3, ProvisioningErrorKind.BAD_REQUEST], // INVALID_ARGUMENT
  [400, ProvisioningErrorKind.BAD_REQUEST],
  [7, ProvisioningErrorKind.FORBIDDEN], // PERMISSION_DENIED
  [403, ProvisioningErrorKind.FORBIDDEN],
  [14, ProvisioningErrorKind.SERVICE_UNAVAILABLE], // UNAVAILABLE
  [503, ProvisioningErrorKind.SERVICE_UNAVAILABLE],
  [6, ProvisioningErrorKind.CONFLICT], // ALREADY_EXISTS
  [10, ProvisioningErrorKind.CONFLICT], // ABORTED, what HTTP 409 maps to
  [409, ProvisioningErrorKind.CONFLICT],
]);

/**
 * Map a provider failure onto a recoverable kind.
 *
 * Returns undefined for anything outside the four kinds, including
 * timeouts and plain errors; callers let those propagate.
 */
export function classifyProvisioningError(error: unknown): ProvisioningErrorKind | undefined {
  if (error instanceof OperationFailedError) {
    return error.httpStatusCode === undefined
      ? undefined
      : KIND_BY_CODE.get(error.httpStatusCode);
  }
  if (error instanceof OperationTimeoutError) return undefined;

  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "number") return KIND_BY_CODE.get(code);
  }
  return undefined;
}

/**
 * Message text for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
