/**
 * GCE Instance Manager
 *
 * Creates, fetches and deletes single GPU VM instances.
 */

import type { InstancesClient } from "@google-cloud/compute";
import { GCE_OPERATION_TIMEOUT_MS } from "../../constants";
import { buildInstanceSpec } from "../gce-spec-builder";
import type {
  AttachedDiskSpec,
  CreateInstanceOptions,
  InstanceResource,
  LogCallback,
  ProvisionedInstance,
} from "../types";
import type { DeleteInstanceOptions, IGceInstanceManager, IGceOperationManager } from "./interfaces";

export type InstancesApi = Pick<InstancesClient, "insert" | "get" | "delete">;

/**
 * Reduce an instance resource to the fields the orchestrator uses.
 */
export function toProvisionedInstance(resource: InstanceResource, zone: string): ProvisionedInstance {
  const natIp = resource.networkInterfaces?.[0]?.accessConfigs?.[0]?.natIP;
  return {
    name: resource.name ?? "",
    zone,
    status: String(resource.status ?? "UNKNOWN"),
    selfLink: resource.selfLink ?? "",
    ...(natIp ? { externalIp: natIp } : {}),
  };
}

export class GceInstanceManager implements IGceInstanceManager {
  constructor(
    private readonly instancesClient: InstancesApi,
    private readonly operationManager: IGceOperationManager,
    private readonly log: LogCallback
  ) {}

  async createInstance(
    projectId: string,
    zone: string,
    name: string,
    disks: AttachedDiskSpec[],
    options: CreateInstanceOptions = {}
  ): Promise<ProvisionedInstance> {
    const instanceResource = buildInstanceSpec(projectId, zone, name, disks, options, this.log);

    this.log(`Creating the ${name} instance in ${zone}...`, "stdout");

    const [operation] = await this.instancesClient.insert({
      project: projectId,
      zone,
      instanceResource,
    });

    await this.operationManager.waitForOperation(
      operation,
      { project: projectId, zone },
      {
        description: "instance creation",
        timeoutMs: options.timeoutMs ?? GCE_OPERATION_TIMEOUT_MS,
      }
    );

    this.log(`Instance ${name} created.`, "stdout");

    // The create response carries no network details; fetch the materialized instance.
    return this.getInstance(projectId, zone, name);
  }

  async getInstance(projectId: string, zone: string, name: string): Promise<ProvisionedInstance> {
    const [instance] = await this.instancesClient.get({
      project: projectId,
      zone,
      instance: name,
    });
    return toProvisionedInstance(instance, zone);
  }

  async deleteInstance(
    projectId: string,
    zone: string,
    name: string,
    options: DeleteInstanceOptions = {}
  ): Promise<void> {
    const [operation] = await this.instancesClient.delete({
      project: projectId,
      zone,
      instance: name,
    });

    this.log(`Deleting instance ${name}...`, "stdout");

    if (options.waitForCompletion) {
      await this.operationManager.waitForOperation(
        operation,
        { project: projectId, zone },
        {
          description: "instance deletion",
          timeoutMs: options.timeoutMs ?? GCE_OPERATION_TIMEOUT_MS,
        }
      );
      this.log(`Instance ${name} deleted successfully.`, "stdout");
      return;
    }

    this.log(`Instance ${name} deletion requested.`, "stdout");
  }
}
