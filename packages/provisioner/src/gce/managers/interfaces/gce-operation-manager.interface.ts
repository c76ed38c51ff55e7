/**
 * GCE Operation Manager Interface
 *
 * Provides abstraction for waiting on GCE zone operations.
 * Enables dependency injection for testing.
 */

import type { OperationLocation, WaitOptions } from "../gce-operation-manager";

/**
 * Interface for managing GCE operation polling.
 */
export interface IGceOperationManager {
  /**
   * Wait for a zone operation to reach DONE.
   *
   * @param operation - The operation object returned from a GCE API call
   * @param location - Project and zone the operation runs in
   * @param options - Wait options (timeout, polling interval, description)
   */
  waitForOperation(
    operation: unknown,
    location: OperationLocation,
    options?: WaitOptions
  ): Promise<void>;
}
