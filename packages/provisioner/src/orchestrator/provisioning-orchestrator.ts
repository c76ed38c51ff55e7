/**
 * Provisioning Orchestrator
 *
 * Drives one create → configure → destroy cycle per zone, strictly in
 * sequence. A provider rejection in one of the four recoverable kinds skips
 * the zone; every other failure ends the run with no cleanup.
 */

import type { ProvisionerConfig } from "../config/provisioner-config";
import {
  ProvisioningErrorKind,
  classifyProvisioningError,
  errorMessage,
} from "../errors/provisioning-errors";
import { buildDiskSpec, instanceNameForRegion, zonalDiskType } from "../gce/gce-spec-builder";
import type { IGceImageManager, IGceInstanceManager } from "../gce/managers";
import type { AttachedDiskSpec, CreateInstanceOptions, LogCallback, ProvisionedInstance } from "../gce/types";
import type { IRemoteCommandRunner } from "../remote/ssh-command-runner";

export type ProvisioningStage =
  | "resolving-image"
  | "creating"
  | "configuring"
  | "deleting"
  | "cooling-down"
  | "done"
  | "skipped";

export type ProgressCallback = (region: string, stage: ProvisioningStage, message?: string) => void;

/**
 * Result of a create attempt. Unclassified errors are thrown, not returned.
 */
export type ProvisionOutcome =
  | { status: "created"; instance: ProvisionedInstance }
  | { status: "rejected"; kind: ProvisioningErrorKind; message: string };

export interface RegionReport {
  region: string;
  instanceName: string;
  outcome: "configured" | ProvisioningErrorKind;
  externalIp?: string;
  commandsRun: number;
  commandsFailed: number;
}

export interface RunSummary {
  regions: RegionReport[];
}

export interface ProvisioningOrchestratorOptions {
  config: ProvisionerConfig;
  imageManager: IGceImageManager;
  instanceManager: IGceInstanceManager;
  commandRunner: IRemoteCommandRunner;
  log: LogCallback;
  onProgress?: ProgressCallback;
  /** Replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Diagnostic printed when a zone is skipped.
 */
export function rejectionMessage(kind: ProvisioningErrorKind, region: string): string {
  switch (kind) {
    case ProvisioningErrorKind.FORBIDDEN:
      return "#### GPU Exists in this region. Delete VM with that GPU first. ####";
    case ProvisioningErrorKind.BAD_REQUEST:
      return `#### GPU doesn't exist in region ${region}. Try another region ####`;
    case ProvisioningErrorKind.SERVICE_UNAVAILABLE:
      return `#### Region ${region} doesn't have the resources to fulfill request ####`;
    case ProvisioningErrorKind.CONFLICT:
      return `#### VM instance with this GPU already exists in ${region} ####`;
  }
}

/**
 * Options passed to every create call. External access is always on: the
 * setup commands reach the VM through its NAT address.
 */
export function createOptionsFromConfig(config: ProvisionerConfig): CreateInstanceOptions {
  return {
    machineType: config.machineType,
    externalAccess: true,
    defaultAccelerator: config.accelerator,
    preemptible: config.preemptible,
    spot: config.spot,
    instanceTerminationAction: config.instanceTerminationAction,
    deleteProtection: config.deleteProtection,
    timeoutMs: config.operationTimeoutSeconds * 1000,
  };
}

export class ProvisioningOrchestrator {
  private readonly config: ProvisionerConfig;
  private readonly imageManager: IGceImageManager;
  private readonly instanceManager: IGceInstanceManager;
  private readonly commandRunner: IRemoteCommandRunner;
  private readonly log: LogCallback;
  private readonly onProgress?: ProgressCallback;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ProvisioningOrchestratorOptions) {
    this.config = options.config;
    this.imageManager = options.imageManager;
    this.instanceManager = options.instanceManager;
    this.commandRunner = options.commandRunner;
    this.log = options.log;
    this.onProgress = options.onProgress;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Process every configured zone in order.
   */
  async run(): Promise<RunSummary> {
    const regions: RegionReport[] = [];
    for (const region of this.config.regions) {
      regions.push(await this.processRegion(region));
    }
    return { regions };
  }

  async processRegion(region: string): Promise<RegionReport> {
    const { config } = this;
    const instanceName = instanceNameForRegion(region);

    this.onProgress?.(region, "resolving-image");
    const image = await this.imageManager.resolveBootImage(config.sourceProject, config.sourceFamily);
    const disk = buildDiskSpec(
      zonalDiskType(region, config.diskType),
      config.diskSizeGb,
      true,
      image.selfLink
    );

    this.onProgress?.(region, "creating");
    const outcome = await this.provisionInstance(region, [disk]);

    switch (outcome.status) {
      case "rejected": {
        const message = rejectionMessage(outcome.kind, region);
        this.log(message, "stderr");
        this.onProgress?.(region, "skipped", message);
        return { region, instanceName, outcome: outcome.kind, commandsRun: 0, commandsFailed: 0 };
      }
      case "created":
        return this.configureAndDestroy(region, outcome.instance);
    }
  }

  /**
   * Submit the create request and classify provider rejections.
   */
  async provisionInstance(region: string, disks: AttachedDiskSpec[]): Promise<ProvisionOutcome> {
    try {
      const instance = await this.instanceManager.createInstance(
        this.config.targetProject,
        region,
        instanceNameForRegion(region),
        disks,
        createOptionsFromConfig(this.config)
      );
      return { status: "created", instance };
    } catch (error: unknown) {
      const kind = classifyProvisioningError(error);
      if (kind === undefined) throw error;
      return { status: "rejected", kind, message: errorMessage(error) };
    }
  }

  private async configureAndDestroy(
    region: string,
    instance: ProvisionedInstance
  ): Promise<RegionReport> {
    const { config } = this;
    const instanceName = instanceNameForRegion(region);

    this.log(`#### GPU Successfully added in VM in region ${region} ####`, "stdout");

    const host = instance.externalIp;
    if (!host) {
      throw new Error(`Instance ${instanceName} in ${region} has no external IP`);
    }

    this.onProgress?.(region, "configuring", host);
    let commandsFailed = 0;
    for (const command of config.setupCommands) {
      this.log(`[${instanceName}] $ ${command}`, "stdout");
      const result = await this.commandRunner.runRemoteCommand({
        host,
        user: config.sshUser,
        keyFile: config.sshKeyPath,
        command,
        timeoutMs: config.commandTimeoutSeconds * 1000,
      });

      this.logOutput(instanceName, result.stdout, "stdout");
      this.logOutput(instanceName, result.stderr, "stderr");

      if (result.timedOut) {
        commandsFailed++;
        this.log(
          `[${instanceName}] timed out after ${config.commandTimeoutSeconds}s: ${command}`,
          "stderr"
        );
      } else if (result.exitCode === null) {
        commandsFailed++;
        this.log(
          `[${instanceName}] ended by ${result.signal ?? "an ssh error"}: ${command}`,
          "stderr"
        );
      } else if (result.exitCode !== 0) {
        commandsFailed++;
        this.log(`[${instanceName}] exited with ${result.exitCode}: ${command}`, "stderr");
      }
    }

    this.onProgress?.(region, "deleting");
    await this.instanceManager.deleteInstance(config.targetProject, region, instanceName, {
      waitForCompletion: config.waitForDeleteCompletion,
      timeoutMs: config.operationTimeoutSeconds * 1000,
    });

    this.onProgress?.(region, "cooling-down");
    await this.sleep(config.cooldownSeconds * 1000);
    this.onProgress?.(region, "done");

    return {
      region,
      instanceName,
      outcome: "configured",
      externalIp: host,
      commandsRun: config.setupCommands.length,
      commandsFailed,
    };
  }

  /**
   * Forward remote output to the log, one prefixed line at a time.
   */
  private logOutput(instanceName: string, output: string, stream: "stdout" | "stderr"): void {
    for (const line of output.split(/\r?\n/)) {
      const text = line.trimEnd();
      if (text.length > 0) {
        this.log(`[${instanceName}] ${text}`, stream);
      }
    }
  }
}
