import { Command } from "commander";
import { run } from "./commands/run";
import { plan } from "./commands/plan";
import { regions } from "./commands/regions";

function withConfigOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "JSON configuration file")
    .option("-p, --project <id>", "Target GCP project (falls back to GCP_PROJECT_ID)")
    .option("-r, --region <zone...>", "Zones to process, in order")
    .option("--spot", "Request Spot VMs")
    .option("--no-gpu", "Create VMs without an accelerator");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("gpu-lab")
    .description("Create, configure and tear down GPU VMs across GCE zones")
    .version("0.1.0");

  // Subcommands copy this setting when they are created, so it goes first
  program.exitOverride();

  withConfigOptions(
    program
      .command("run")
      .description("Provision, configure and delete one GPU VM per zone")
  ).action(run);

  withConfigOptions(
    program
      .command("plan")
      .description("Print the instance spec for each zone without calling the API")
  ).action(plan);

  withConfigOptions(
    program
      .command("regions")
      .description("List the configured zones and their instance names")
  ).action(regions);

  return program;
}
