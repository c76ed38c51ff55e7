/**
 * GCE Instance Manager Interface
 *
 * Create, fetch and delete single VM instances.
 */

import type { AttachedDiskSpec, CreateInstanceOptions, ProvisionedInstance } from "../../types";

export interface DeleteInstanceOptions {
  /** Block until the delete operation is DONE. Default: false */
  waitForCompletion?: boolean;
  /** Only used when waitForCompletion is true */
  timeoutMs?: number;
}

/**
 * Interface for managing GCE VM instances.
 */
export interface IGceInstanceManager {
  /**
   * Insert an instance, wait for the create operation, then fetch the
   * instance again and return it.
   */
  createInstance(
    projectId: string,
    zone: string,
    name: string,
    disks: AttachedDiskSpec[],
    options?: CreateInstanceOptions
  ): Promise<ProvisionedInstance>;

  getInstance(projectId: string, zone: string, name: string): Promise<ProvisionedInstance>;

  /** Submit a delete request. Does not wait unless asked to. */
  deleteInstance(
    projectId: string,
    zone: string,
    name: string,
    options?: DeleteInstanceOptions
  ): Promise<void>;
}
