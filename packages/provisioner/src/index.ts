// Configuration
export * from "./config/provisioner-config";

// Errors
export * from "./errors/provisioning-errors";

// Constants
export * from "./constants";

// GCE
export * from "./gce/types";
export * from "./gce/gce-spec-builder";
export * from "./gce/managers";
export { GceManagerFactory } from "./gce/gce-manager-factory";
export type { GceManagerFactoryConfig, GceManagers } from "./gce/gce-manager-factory";

// Remote setup
export { SshCommandRunner, buildSshArgs } from "./remote/ssh-command-runner";
export type {
  IRemoteCommandRunner,
  RemoteCommandRequest,
  RemoteCommandResult,
  SshCommandRunnerOptions,
} from "./remote/ssh-command-runner";

// Orchestration
export {
  ProvisioningOrchestrator,
  createOptionsFromConfig,
  rejectionMessage,
} from "./orchestrator/provisioning-orchestrator";
export type {
  ProgressCallback,
  ProvisionOutcome,
  ProvisioningOrchestratorOptions,
  ProvisioningStage,
  RegionReport,
  RunSummary,
} from "./orchestrator/provisioning-orchestrator";
