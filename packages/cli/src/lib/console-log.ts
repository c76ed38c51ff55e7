import chalk from "chalk";
import type { Ora } from "ora";
import type { LogCallback } from "@gpu-lab/provisioner";

/**
 * Console sink for provisioner logs. A running spinner is cleared before the
 * line is written and redrawn after it.
 */
export function createConsoleLog(spinner?: Ora): LogCallback {
  const write: LogCallback = (message, stream) => {
    if (stream === "stderr") {
      console.error(chalk.yellow(message));
    } else {
      console.log(chalk.gray(message));
    }
  };

  return (message, stream) => {
    if (spinner?.isSpinning) {
      spinner.clear();
      write(message, stream);
      spinner.render();
      return;
    }
    write(message, stream);
  };
}
