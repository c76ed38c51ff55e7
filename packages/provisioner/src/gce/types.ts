/**
 * GCE Type Definitions
 *
 * Shared types for the spec builders and the GCE managers.
 */

import type { protos } from "@google-cloud/compute";

/** Instance resource submitted to `instances.insert`. */
export type InstanceSpec = protos.google.cloud.compute.v1.IInstance;

/** Disk attached to an instance at creation time. */
export type AttachedDiskSpec = protos.google.cloud.compute.v1.IAttachedDisk;

export type AcceleratorConfig = protos.google.cloud.compute.v1.IAcceleratorConfig;

export type SchedulingSpec = protos.google.cloud.compute.v1.IScheduling;

export type NetworkInterfaceSpec = protos.google.cloud.compute.v1.INetworkInterface;

export type AccessConfigSpec = protos.google.cloud.compute.v1.IAccessConfig;

/** Raw instance as returned by `instances.get`. */
export type InstanceResource = protos.google.cloud.compute.v1.IInstance;

export type InstanceTerminationAction = "STOP" | "DELETE";

/**
 * Options for building and creating a GPU instance.
 */
export interface CreateInstanceOptions {
  /** Bare type ("g2-standard-4") or "zones/<zone>/machineTypes/<type>". Default: "g2-standard-4" */
  machineType?: string;
  /** Default: "global/networks/default" */
  networkLink?: string;
  /** "regions/<region>/subnetworks/<name>" */
  subnetworkLink?: string;
  /** Internal IP to assign; a free address from the subnet otherwise */
  internalIp?: string;
  /** Attach a one-to-one NAT access config */
  externalAccess?: boolean;
  /** Static external address; only used when externalAccess is true */
  externalIpv4?: string;
  /** Replaces the default accelerator when non-empty */
  accelerators?: AcceleratorConfig[];
  /**
   * Accelerator attached when `accelerators` is empty.
   * Default: one nvidia-l4. null attaches nothing.
   */
  defaultAccelerator?: { type: string; count: number } | null;
  /** Deprecated in favour of spot. Discards other scheduling fields. */
  preemptible?: boolean;
  spot?: boolean;
  /** Default: "STOP" */
  instanceTerminationAction?: InstanceTerminationAction;
  /** RFC 1035 hostname */
  customHostname?: string;
  deleteProtection?: boolean;
  /** Create-operation timeout in milliseconds. Default: 300s */
  timeoutMs?: number;
}

/**
 * Newest image of a family.
 */
export interface ImageReference {
  name: string;
  /** "https://www.googleapis.com/compute/v1/projects/<p>/global/images/<name>" */
  selfLink: string;
}

/**
 * Instance fields the orchestrator needs after creation.
 */
export interface ProvisionedInstance {
  name: string;
  zone: string;
  status: string;
  selfLink: string;
  /** First NAT IP of the first network interface */
  externalIp?: string;
}

/**
 * Type alias for log callback function.
 */
export type LogCallback = (message: string, stream: "stdout" | "stderr") => void;
