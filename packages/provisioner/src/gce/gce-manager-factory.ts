/**
 * GCE Manager Factory
 *
 * Creates the Compute Engine SDK clients once and wires up the managers.
 */

import { ImagesClient, InstancesClient, ZoneOperationsClient } from "@google-cloud/compute";
import {
  GceImageManager,
  GceInstanceManager,
  GceOperationManager,
  type IGceImageManager,
  type IGceInstanceManager,
  type IGceOperationManager,
} from "./managers";
import type { LogCallback } from "./types";

/**
 * Configuration for the GCE manager factory.
 */
export interface GceManagerFactoryConfig {
  /** Path to service account key file (optional, uses ADC if not provided) */
  keyFilePath?: string;
  /** Log callback function */
  log: LogCallback;
}

/**
 * Collection of all GCE managers.
 */
export interface GceManagers {
  operationManager: IGceOperationManager;
  imageManager: IGceImageManager;
  instanceManager: IGceInstanceManager;
}

export class GceManagerFactory {
  static createManagers(config: GceManagerFactoryConfig): GceManagers {
    const { keyFilePath, log } = config;

    const clientOptions = keyFilePath ? { keyFilename: keyFilePath } : {};

    // SDK clients
    const imagesClient = new ImagesClient(clientOptions);
    const instancesClient = new InstancesClient(clientOptions);
    const zoneOperationsClient = new ZoneOperationsClient(clientOptions);

    const operationManager = new GceOperationManager(zoneOperationsClient, log);
    const imageManager = new GceImageManager(imagesClient, log);
    const instanceManager = new GceInstanceManager(instancesClient, operationManager, log);

    return { operationManager, imageManager, instanceManager };
  }
}
