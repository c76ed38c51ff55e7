/**
 * GCE Spec Builder
 *
 * Pure construction of the disk and instance resources submitted to
 * Compute Engine. No I/O happens here; arguments are not validated.
 */

import {
  GCE_DEFAULT_ACCELERATOR_COUNT,
  GCE_DEFAULT_ACCELERATOR_TYPE,
  GCE_DEFAULT_MACHINE_TYPE,
  GCE_DEFAULT_NETWORK_LINK,
  INSTANCE_NAME_PREFIX,
} from "../constants";
import type {
  AccessConfigSpec,
  AcceleratorConfig,
  AttachedDiskSpec,
  CreateInstanceOptions,
  InstanceSpec,
  LogCallback,
  NetworkInterfaceSpec,
  SchedulingSpec,
} from "./types";

const QUALIFIED_MACHINE_TYPE = /^zones\/[a-z\d-]+\/machineTypes\/[a-z\d-]+$/;

/**
 * Deterministic instance name for a zone.
 */
export function instanceNameForRegion(region: string): string {
  return `${INSTANCE_NAME_PREFIX}${region}`;
}

/**
 * Zone-qualified disk type, e.g. "zones/us-west1-a/diskTypes/pd-standard".
 */
export function zonalDiskType(zone: string, diskType: string): string {
  return `zones/${zone}/diskTypes/${diskType}`;
}

/**
 * Qualify a bare machine type with its zone. Already-qualified values pass through.
 */
export function normalizeMachineType(zone: string, machineType: string): string {
  if (QUALIFIED_MACHINE_TYPE.test(machineType)) return machineType;
  return `zones/${zone}/machineTypes/${machineType}`;
}

/**
 * Build an attached disk initialized from an image.
 *
 * @param diskType - "zones/<zone>/diskTypes/(pd-standard|pd-ssd|pd-balanced|pd-extreme)"
 * @param sourceImage - "projects/<project>/global/images/<image>" or an image self link
 * @param autoDelete - delete the disk together with the VM
 */
export function buildDiskSpec(
  diskType: string,
  sizeGb: number,
  boot: boolean,
  sourceImage: string,
  autoDelete: boolean = true
): AttachedDiskSpec {
  return {
    boot,
    autoDelete,
    initializeParams: {
      sourceImage,
      diskSizeGb: sizeGb,
      diskType,
    },
  };
}

function buildNetworkInterface(options: CreateInstanceOptions): NetworkInterfaceSpec {
  const networkInterface: NetworkInterfaceSpec = {
    network: options.networkLink ?? GCE_DEFAULT_NETWORK_LINK,
  };
  if (options.subnetworkLink) {
    networkInterface.subnetwork = options.subnetworkLink;
  }
  if (options.internalIp) {
    networkInterface.networkIP = options.internalIp;
  }

  if (options.externalAccess) {
    const access: AccessConfigSpec = {
      type: "ONE_TO_ONE_NAT",
      name: "External NAT",
      networkTier: "PREMIUM",
    };
    if (options.externalIpv4) {
      access.natIP = options.externalIpv4;
    }
    networkInterface.accessConfigs = [access];
  }

  return networkInterface;
}

function defaultAccelerators(
  projectId: string,
  zone: string,
  options: CreateInstanceOptions
): AcceleratorConfig[] {
  const accelerator =
    options.defaultAccelerator === undefined
      ? { type: GCE_DEFAULT_ACCELERATOR_TYPE, count: GCE_DEFAULT_ACCELERATOR_COUNT }
      : options.defaultAccelerator;
  if (accelerator === null) return [];

  return [
    {
      acceleratorType: `projects/${projectId}/zones/${zone}/acceleratorTypes/${accelerator.type}`,
      acceleratorCount: accelerator.count,
    },
  ];
}

/**
 * Build the instance resource for a GPU VM.
 *
 * Scheduling is applied in three layers: the GPU baseline (restart on
 * failure, terminate on host maintenance), then `preemptible`, which throws
 * the baseline away, then `spot`, which adds its fields to whatever is left.
 */
export function buildInstanceSpec(
  projectId: string,
  zone: string,
  name: string,
  disks: AttachedDiskSpec[],
  options: CreateInstanceOptions = {},
  log?: LogCallback
): InstanceSpec {
  const instance: InstanceSpec = {
    name,
    disks,
    networkInterfaces: [buildNetworkInterface(options)],
    machineType: normalizeMachineType(zone, options.machineType ?? GCE_DEFAULT_MACHINE_TYPE),
    guestAccelerators: defaultAccelerators(projectId, zone, options),
  };

  let scheduling: SchedulingSpec = {
    automaticRestart: true,
    onHostMaintenance: "TERMINATE",
  };

  if (options.accelerators && options.accelerators.length > 0) {
    instance.guestAccelerators = options.accelerators;
    scheduling.onHostMaintenance = "TERMINATE";
  }

  if (options.preemptible) {
    log?.("Preemptible VMs are being replaced by Spot VMs.", "stderr");
    scheduling = { preemptible: true };
  }

  if (options.spot) {
    scheduling.provisioningModel = "SPOT";
    scheduling.instanceTerminationAction = options.instanceTerminationAction ?? "STOP";
  }

  instance.scheduling = scheduling;

  if (options.customHostname !== undefined) {
    instance.hostname = options.customHostname;
  }
  if (options.deleteProtection) {
    instance.deletionProtection = true;
  }

  return instance;
}
