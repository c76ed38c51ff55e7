import chalk from "chalk";
import ora, { Ora } from "ora";
import {
  GceManagerFactory,
  ProvisioningOrchestrator,
  SshCommandRunner,
  instanceNameForRegion,
} from "@gpu-lab/provisioner";
import type { ProvisioningStage, RunSummary } from "@gpu-lab/provisioner";
import { ConfigOptions, loadConfig } from "../lib/config-loader";
import { createConsoleLog } from "../lib/console-log";

export function reportProgress(
  spinner: Ora,
  region: string,
  stage: ProvisioningStage,
  detail?: string
): void {
  const prefix = chalk.cyan(`[${region}]`);
  switch (stage) {
    case "resolving-image":
      spinner.start(`${prefix} Resolving boot image...`);
      break;
    case "creating":
      spinner.text = `${prefix} Creating ${instanceNameForRegion(region)}...`;
      break;
    case "configuring":
      spinner.text = `${prefix} Running setup commands on ${detail ?? "instance"}...`;
      break;
    case "deleting":
      spinner.text = `${prefix} Deleting ${instanceNameForRegion(region)}...`;
      break;
    case "cooling-down":
      spinner.text = `${prefix} Cooling down...`;
      break;
    case "done":
      spinner.succeed(`${prefix} Done`);
      break;
    case "skipped":
      spinner.warn(`${prefix} Skipped`);
      break;
  }
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [chalk.white.bold("Summary:")];
  for (const report of summary.regions) {
    const outcome =
      report.outcome === "configured"
        ? report.commandsFailed === 0
          ? chalk.green("configured")
          : chalk.yellow(`configured (${report.commandsFailed}/${report.commandsRun} commands failed)`)
        : chalk.gray(`skipped: ${report.outcome}`);
    lines.push(`  ${chalk.cyan(report.region.padEnd(28))} ${report.instanceName.padEnd(32)} ${outcome}`);
  }
  return lines;
}

export async function run(options: ConfigOptions): Promise<void> {
  const config = await loadConfig(options);

  console.log(chalk.blue.bold("GPU Lab\n"));
  console.log(chalk.white(`Project: ${chalk.cyan(config.targetProject)}`));
  console.log(chalk.white(`Zones: ${chalk.cyan(config.regions.join(", "))}`));
  console.log();

  const spinner = ora();
  const log = createConsoleLog(spinner);
  const { imageManager, instanceManager } = GceManagerFactory.createManagers({
    keyFilePath: config.keyFilePath,
    log,
  });

  const orchestrator = new ProvisioningOrchestrator({
    config,
    imageManager,
    instanceManager,
    commandRunner: new SshCommandRunner({ sshOptions: config.sshOptions }),
    log,
    onProgress: (region, stage, detail) => reportProgress(spinner, region, stage, detail),
  });

  let summary: RunSummary;
  try {
    summary = await orchestrator.run();
  } catch (error) {
    spinner.fail(chalk.red("Run aborted"));
    throw error;
  }

  console.log();
  for (const line of formatSummary(summary)) {
    console.log(line);
  }
}
