/**
 * GCE Managers
 *
 * Re-exports manager implementations and their interfaces.
 */

export * from "./interfaces";
export { GceOperationManager } from "./gce-operation-manager";
export type { ZoneOperationsApi, OperationLocation, WaitOptions } from "./gce-operation-manager";
export { GceImageManager } from "./gce-image-manager";
export type { ImagesApi } from "./gce-image-manager";
export { GceInstanceManager, toProvisionedInstance } from "./gce-instance-manager";
export type { InstancesApi } from "./gce-instance-manager";
