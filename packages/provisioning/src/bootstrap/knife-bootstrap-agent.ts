import { spawn } from "child_process";
import readline from "readline";
import { BootstrapError, formatGatewaySpec } from "@hoist/core";
import type { BootstrapAgent, BootstrapRequest } from "../interface/bootstrap-agent";
import { noopLog, type ProvisionLogCallback } from "../interface/logging";

export interface KnifeBootstrapAgentOptions {
  /** knife executable; defaults to `knife` on the PATH */
  knifePath?: string;
  log?: ProvisionLogCallback;
}

/**
 * Build the `knife bootstrap` argument list. Short flags are used because
 * they are stable across knife releases that renamed the long ones.
 */
export function buildKnifeBootstrapArgs(request: BootstrapRequest): string[] {
  const args = ["bootstrap", request.address, "-N", request.nodeName, "-x", request.sshUser];

  if (request.sshPassword) args.push("-P", request.sshPassword);
  args.push("-i", request.identityFile);
  if (request.useSudo) args.push("--sudo");
  if (request.runList.length > 0) args.push("-r", request.runList.join(","));
  if (request.gateway) args.push("-G", formatGatewaySpec(request.gateway));
  if (request.yes) args.push("--yes");

  return args;
}

/**
 * Bootstraps a node by running `knife bootstrap`, streaming its output
 * line by line to the log callback.
 */
export class KnifeBootstrapAgent implements BootstrapAgent {
  private readonly knifePath: string;
  private readonly log: ProvisionLogCallback;

  constructor(options: KnifeBootstrapAgentOptions = {}) {
    this.knifePath = options.knifePath ?? "knife";
    this.log = options.log ?? noopLog;
  }

  bootstrap(request: BootstrapRequest): Promise<void> {
    const args = buildKnifeBootstrapArgs(request);
    this.log(`Running knife bootstrap for ${request.address}`);

    return new Promise((resolve, reject) => {
      // stdin stays attached so knife can prompt for a sudo password
      const child = spawn(this.knifePath, args, { stdio: ["inherit", "pipe", "pipe"] });

      if (child.stdout) {
        const rl = readline.createInterface({ input: child.stdout });
        rl.on("line", (line) => this.log(line, "stdout"));
      }

      if (child.stderr) {
        const rl = readline.createInterface({ input: child.stderr });
        rl.on("line", (line) => this.log(line, "stderr"));
      }

      child.on("error", (err) => {
        reject(new BootstrapError(`Failed to run ${this.knifePath}: ${err.message}`, null, err));
      });

      child.on("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new BootstrapError(`knife bootstrap exited with code ${code}`, code));
      });
    });
  }
}
