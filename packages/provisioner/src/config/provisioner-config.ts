import { z } from "zod";
import {
  CUDA_SETUP_COMMANDS,
  DEFAULT_IMAGE_FAMILY,
  DEFAULT_IMAGE_PROJECT,
  DEFAULT_REGIONS,
  DEFAULT_SSH_KEY_PATH,
  DEFAULT_SSH_OPTIONS,
  DEFAULT_SSH_USER,
  GCE_DEFAULT_ACCELERATOR_COUNT,
  GCE_DEFAULT_ACCELERATOR_TYPE,
  GCE_DEFAULT_DISK_SIZE_GB,
  GCE_DEFAULT_DISK_TYPE,
  GCE_DEFAULT_MACHINE_TYPE,
  GCE_OPERATION_TIMEOUT_MS,
  REGION_COOLDOWN_MS,
  REMOTE_COMMAND_TIMEOUT_MS,
} from "../constants";
import { ConfigValidationError } from "../errors/provisioning-errors";

export const AcceleratorSchema = z.object({
  /** Accelerator type name, e.g. "nvidia-l4" */
  type: z.string().min(1).default(GCE_DEFAULT_ACCELERATOR_TYPE),
  count: z.number().int().min(1).default(GCE_DEFAULT_ACCELERATOR_COUNT),
});

export const ProvisionerConfigSchema = z.object({
  // -- Boot image --
  sourceProject: z.string().min(1).default(DEFAULT_IMAGE_PROJECT),
  sourceFamily: z.string().min(1).default(DEFAULT_IMAGE_FAMILY),

  // -- Target --
  targetProject: z.string().min(1),
  regions: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_REGIONS]),
  /** Service account key file; Application Default Credentials when unset */
  keyFilePath: z.string().min(1).optional(),

  // -- VM shape --
  diskType: z.string().min(1).default(GCE_DEFAULT_DISK_TYPE),
  diskSizeGb: z.number().int().min(10).default(GCE_DEFAULT_DISK_SIZE_GB),
  machineType: z.string().min(1).default(GCE_DEFAULT_MACHINE_TYPE),
  /** GPU attached to every VM; null attaches none */
  accelerator: AcceleratorSchema.nullable().default(() => ({
    type: GCE_DEFAULT_ACCELERATOR_TYPE,
    count: GCE_DEFAULT_ACCELERATOR_COUNT,
  })),
  preemptible: z.boolean().default(false),
  spot: z.boolean().default(false),
  instanceTerminationAction: z.enum(["STOP", "DELETE"]).default("STOP"),
  deleteProtection: z.boolean().default(false),

  // -- Remote setup --
  sshUser: z.string().min(1).default(DEFAULT_SSH_USER),
  sshKeyPath: z.string().min(1).default(DEFAULT_SSH_KEY_PATH),
  sshOptions: z.array(z.string().min(1)).default(() => [...DEFAULT_SSH_OPTIONS]),
  setupCommands: z.array(z.string().min(1)).default(() => [...CUDA_SETUP_COMMANDS]),

  // -- Timing --
  cooldownSeconds: z.number().min(0).default(REGION_COOLDOWN_MS / 1000),
  operationTimeoutSeconds: z.number().positive().default(GCE_OPERATION_TIMEOUT_MS / 1000),
  commandTimeoutSeconds: z.number().positive().default(REMOTE_COMMAND_TIMEOUT_MS / 1000),
  waitForDeleteCompletion: z.boolean().default(false),
});

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;
export type ProvisionerConfigInput = z.input<typeof ProvisionerConfigSchema>;
export type AcceleratorSetting = z.infer<typeof AcceleratorSchema>;

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws ConfigValidationError listing every issue as `path: message`
 */
export function parseProvisionerConfig(input: unknown): ProvisionerConfig {
  const result = ProvisionerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}
