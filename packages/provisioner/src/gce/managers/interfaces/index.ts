/**
 * GCE Manager Interfaces
 *
 * Re-exports all manager interfaces for dependency injection and testing.
 */

export type { IGceOperationManager } from "./gce-operation-manager.interface";
export type { IGceImageManager } from "./gce-image-manager.interface";
export type { IGceInstanceManager, DeleteInstanceOptions } from "./gce-instance-manager.interface";
