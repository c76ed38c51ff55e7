/**
 * GCE Operation Manager
 *
 * Polls zone operations until they reach DONE, then reports their errors
 * and warnings. Errors are raised; warnings are logged and otherwise ignored.
 */

import type { ZoneOperationsClient } from "@google-cloud/compute";
import { GCE_OPERATION_TIMEOUT_MS, OPERATION_POLL_INTERVAL_MS } from "../../constants";
import { OperationFailedError, OperationTimeoutError } from "../../errors/provisioning-errors";
import type { LogCallback } from "../types";
import type { IGceOperationManager } from "./interfaces";

export type ZoneOperationsApi = Pick<ZoneOperationsClient, "get">;

/** Project and zone a zone operation belongs to. */
export interface OperationLocation {
  project: string;
  zone: string;
}

export interface WaitOptions {
  /** Timeout in milliseconds */
  timeoutMs?: number;
  /** Polling interval in milliseconds */
  pollIntervalMs?: number;
  /** Human-readable description for logging */
  description?: string;
}

interface OperationResult {
  status?: unknown;
  progress?: number | null;
  httpErrorStatusCode?: number | null;
  httpErrorMessage?: string | null;
  error?: { errors?: Array<{ code?: string | null; message?: string | null }> | null } | null;
  warnings?: Array<{ code?: unknown; message?: string | null }> | null;
}

/**
 * Name of an operation handle, or undefined when it has none.
 */
function operationNameOf(operation: unknown): string | undefined {
  if (typeof operation !== "object" || operation === null || !("name" in operation)) {
    return undefined;
  }
  const { name } = operation;
  return typeof name === "string" && name.length > 0 ? name : undefined;
}

/**
 * Manages GCE zone operation polling.
 */
export class GceOperationManager implements IGceOperationManager {
  constructor(
    private readonly zoneOpsClient: ZoneOperationsApi,
    private readonly log: LogCallback
  ) {}

  async waitForOperation(
    operation: unknown,
    location: OperationLocation,
    options: WaitOptions = {}
  ): Promise<void> {
    const fullName = operationNameOf(operation);
    if (!fullName) return;

    const operationName = fullName.split("/").pop() ?? fullName;
    const {
      timeoutMs = GCE_OPERATION_TIMEOUT_MS,
      pollIntervalMs = OPERATION_POLL_INTERVAL_MS,
      description = operationName,
    } = options;

    let lastStatus = "";
    const start = Date.now();

    while (Date.now() - start < timeoutMs) {
      const result = await this.getOperationStatus(operationName, location);

      const status = String(result.status ?? "UNKNOWN");
      const progress = result.progress ?? 0;

      if (status !== lastStatus) {
        const elapsed = Math.round((Date.now() - start) / 1000);
        this.log(
          `  [${description}] ${status}${progress > 0 ? ` (${progress}%)` : ""} - ${elapsed}s elapsed`,
          "stdout"
        );
        lastStatus = status;
      }

      if (status === "DONE") {
        this.checkResult(result, operationName, description);
        return;
      }

      await this.sleep(pollIntervalMs);
    }

    this.log(`  [${description}] TIMEOUT after ${timeoutMs / 1000}s`, "stderr");
    throw new OperationTimeoutError(operationName, timeoutMs);
  }

  private checkResult(result: OperationResult, operationName: string, description: string): void {
    const firstError = result.error?.errors?.[0];
    const httpStatus = result.httpErrorStatusCode ?? undefined;

    if (firstError || (httpStatus !== undefined && httpStatus >= 400)) {
      const code = firstError?.code ?? undefined;
      const message = firstError?.message ?? result.httpErrorMessage ?? "Operation failed";
      this.log(`Error during ${description}: [Code: ${code ?? httpStatus}]: ${message}`, "stderr");
      this.log(`Operation ID: ${operationName}`, "stderr");
      throw new OperationFailedError(message, operationName, code, httpStatus);
    }

    const warnings = result.warnings ?? [];
    if (warnings.length > 0) {
      this.log(`Warnings during ${description}:`, "stderr");
      for (const warning of warnings) {
        this.log(` - ${String(warning.code ?? "UNKNOWN")}: ${warning.message ?? ""}`, "stderr");
      }
    }
  }

  private async getOperationStatus(
    operationName: string,
    location: OperationLocation
  ): Promise<OperationResult> {
    const [result] = await this.zoneOpsClient.get({
      project: location.project,
      zone: location.zone,
      operation: operationName,
    });
    return result;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
