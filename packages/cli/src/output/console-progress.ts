import chalk from "chalk";
import type { ProgressReporter } from "@hoist/provisioning";

/**
 * Prints a wait banner, one dot per unsuccessful attempt, then "done". The
 * banner goes out with the first dot so log lines from the wait's setup
 * stay on their own line.
 */
export class ConsoleProgress implements ProgressReporter {
  private started = false;

  constructor(
    private readonly label: string,
    private readonly out: NodeJS.WritableStream = process.stdout
  ) {}

  tick(): void {
    this.begin();
    this.out.write(chalk.magenta("."));
  }

  done(): void {
    this.begin();
    this.out.write(chalk.magenta("done\n"));
  }

  private begin(): void {
    if (this.started) return;
    this.started = true;
    this.out.write(chalk.magenta(this.label));
  }
}
