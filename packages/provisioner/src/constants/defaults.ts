/**
 * Default values for GPU VM provisioning.
 */

// Boot image
export const DEFAULT_IMAGE_PROJECT = "ubuntu-os-cloud";
export const DEFAULT_IMAGE_FAMILY = "ubuntu-2204-lts";

// GCE defaults
export const GCE_DEFAULT_MACHINE_TYPE = "g2-standard-4";
export const GCE_DEFAULT_DISK_SIZE_GB = 20;
export const GCE_DEFAULT_DISK_TYPE = "pd-standard";
export const GCE_DEFAULT_NETWORK_LINK = "global/networks/default";
export const GCE_DEFAULT_ACCELERATOR_TYPE = "nvidia-l4";
export const GCE_DEFAULT_ACCELERATOR_COUNT = 1;

export const INSTANCE_NAME_PREFIX = "vm-";

// SSH defaults
export const DEFAULT_SSH_USER = "Dell";
export const DEFAULT_SSH_KEY_PATH = "id_rsa";
/** VMs are throwaway and NAT IPs get reused, so host keys are never recorded. */
export const DEFAULT_SSH_OPTIONS: readonly string[] = [
  "StrictHostKeyChecking=no",
  "UserKnownHostsFile=/dev/null",
  "LogLevel=ERROR",
];

/** Zones tried in order, one VM at a time. */
export const DEFAULT_REGIONS: readonly string[] = [
  "northamerica-northeast1-a",
  "southamerica-east1-a",
  "us-central1-a",
  "us-east1-c",
  "us-south1-a",
  "us-west1-a",
  "northamerica-northeast2-a",
  "us-east4-a",
  "us-east5-b",
  "us-west2-a",
];
