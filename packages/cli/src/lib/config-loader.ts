import fs from "fs-extra";
import path from "path";
import {
  ConfigValidationError,
  ProvisionerConfigSchema,
  parseProvisionerConfig,
} from "@gpu-lab/provisioner";
import type { ProvisionerConfig } from "@gpu-lab/provisioner";

/** Flags shared by `run`, `plan` and `regions` */
export interface ConfigOptions {
  config?: string;
  project?: string;
  region?: string[];
  spot?: boolean;
  /** Set to false by commander for `--no-gpu` */
  gpu?: boolean;
}

export type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  const configPath = path.resolve(file);

  if (!(await fs.pathExists(configPath))) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const raw: unknown = await fs.readJson(configPath);
  if (!isRecord(raw)) {
    throw new ConfigValidationError([`(root): Expected a JSON object in ${configPath}`]);
  }
  return raw;
}

/**
 * Merge the config file, environment fallbacks and CLI flags, in increasing
 * precedence. The result is not validated.
 */
export async function resolveConfigInput(
  options: ConfigOptions,
  env: Environment = process.env
): Promise<Record<string, unknown>> {
  const input: Record<string, unknown> = options.config ? await readConfigFile(options.config) : {};

  const envProject = env.GCP_PROJECT_ID || env.GOOGLE_CLOUD_PROJECT;
  if (input.targetProject === undefined && envProject) {
    input.targetProject = envProject;
  }
  if (input.keyFilePath === undefined && env.GOOGLE_APPLICATION_CREDENTIALS) {
    input.keyFilePath = env.GOOGLE_APPLICATION_CREDENTIALS;
  }

  if (options.project) input.targetProject = options.project;
  if (options.region && options.region.length > 0) input.regions = [...options.region];
  if (options.spot) input.spot = true;
  if (options.gpu === false) input.accelerator = null;

  return input;
}

export async function loadConfig(
  options: ConfigOptions,
  env: Environment = process.env
): Promise<ProvisionerConfig> {
  return parseProvisionerConfig(await resolveConfigInput(options, env));
}

/**
 * Zones only. Unlike {@link loadConfig} this needs no target project.
 */
export async function loadRegions(
  options: ConfigOptions,
  env: Environment = process.env
): Promise<string[]> {
  const input = await resolveConfigInput(options, env);
  const result = ProvisionerConfigSchema.shape.regions.safeParse(input.regions);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${["regions", ...issue.path].join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
