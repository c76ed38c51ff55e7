import chalk from "chalk";
import { instanceNameForRegion } from "@gpu-lab/provisioner";
import { ConfigOptions, loadRegions } from "../lib/config-loader";

export async function regions(options: ConfigOptions): Promise<void> {
  const zones = await loadRegions(options);

  console.log(chalk.blue.bold("\nConfigured zones\n"));
  for (const zone of zones) {
    console.log(`  ${chalk.cyan(zone.padEnd(28))} ${chalk.gray(instanceNameForRegion(zone))}`);
  }
  console.log();
}
