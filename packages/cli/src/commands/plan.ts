import chalk from "chalk";
import {
  buildDiskSpec,
  buildInstanceSpec,
  createOptionsFromConfig,
  instanceNameForRegion,
  zonalDiskType,
} from "@gpu-lab/provisioner";
import type { InstanceSpec, ProvisionerConfig } from "@gpu-lab/provisioner";
import { ConfigOptions, loadConfig } from "../lib/config-loader";

/**
 * Instance specs for every zone, as `run` would submit them. The boot disk
 * points at the image family instead of a resolved image.
 */
export function planInstances(config: ProvisionerConfig): InstanceSpec[] {
  const sourceImage = `projects/${config.sourceProject}/global/images/family/${config.sourceFamily}`;
  const options = createOptionsFromConfig(config);

  return config.regions.map((region) =>
    buildInstanceSpec(
      config.targetProject,
      region,
      instanceNameForRegion(region),
      [buildDiskSpec(zonalDiskType(region, config.diskType), config.diskSizeGb, true, sourceImage)],
      options
    )
  );
}

export async function plan(options: ConfigOptions): Promise<void> {
  const config = await loadConfig(options);

  console.log(chalk.blue.bold(`Plan for ${config.targetProject}\n`));
  for (const spec of planInstances(config)) {
    console.log(chalk.cyan(spec.name ?? ""));
    console.log(JSON.stringify(spec, null, 2));
    console.log();
  }
}
