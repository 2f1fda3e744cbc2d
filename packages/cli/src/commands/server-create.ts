import chalk from "chalk";
import ora from "ora";
import fs from "fs-extra";
import {
  ConfigurationError,
  mergeMetadata,
  validateServerCreateOptions,
  type ServerCreateConfig,
  type ServerCreateOptions,
} from "@hoist/core";
import {
  createEc2Backend,
  expandHome,
  KnifeBootstrapAgent,
  ServerCreateOrchestrator,
  type BootstrapAgent,
  type LaunchInstanceRequest,
  type PollerClock,
  type ProberFactory,
  type ProvisionLogCallback,
  type ProvisioningBackend,
  type ServerCreateResult,
  type ServerCreateStage,
} from "@hoist/provisioning";
import { ConsoleProgress } from "../output/console-progress";
import { formatServerInfo } from "../output/server-info";

export interface ServerCreateDeps {
  createBackend(config: ServerCreateConfig, log: ProvisionLogCallback): ProvisioningBackend;
  createBootstrapAgent(log: ProvisionLogCallback): BootstrapAgent;
  clock?: PollerClock;
  proberFactory?: ProberFactory;
  out?: NodeJS.WritableStream;
}

const defaultDeps: ServerCreateDeps = {
  createBackend: (config, log) => createEc2Backend({ region: config.region, log }),
  createBootstrapAgent: (log) => new KnifeBootstrapAgent({ log }),
};

async function readOptionFile(flag: string, fileName: string): Promise<string> {
  const resolved = expandHome(fileName);
  if (!(await fs.pathExists(resolved))) {
    throw new ConfigurationError(`File for --${flag} not found: ${fileName}`);
  }
  return fs.readFile(resolved, "utf8");
}

/**
 * Read the key and user-data files and assemble the launch request.
 */
export async function buildLaunchRequest(config: ServerCreateConfig): Promise<LaunchInstanceRequest> {
  const sshAuthorizedKeys = await readOptionFile("ssh-authorized-keys-file", config.sshAuthorizedKeysFile);
  const userData = config.userDataFile
    ? await readOptionFile("user-data-file", config.userDataFile)
    : undefined;

  return {
    availabilityDomain: config.availabilityDomain,
    compartmentId: config.compartmentId,
    displayName: config.displayName,
    imageId: config.imageId,
    shape: config.shape,
    subnetId: config.subnetId,
    hostnameLabel: config.hostnameLabel,
    metadata: mergeMetadata({ metadataJson: config.metadataJson, sshAuthorizedKeys, userData }),
  };
}

/**
 * Console side of a run: plain log lines, stderr lines in yellow, and a
 * spinner over the single-request phases.
 */
class ConsoleOutput {
  private spinner: ReturnType<typeof ora> | undefined;

  constructor(private readonly out: NodeJS.WritableStream) {}

  readonly log: ProvisionLogCallback = (line, stream) => {
    this.stopSpinner();
    this.out.write(`${stream === "stderr" ? chalk.yellow(line) : line}\n`);
  };

  readonly onStage = (stage: ServerCreateStage): void => {
    if (stage === "running") this.startSpinner("Resolving network interface...");
  };

  startSpinner(text: string): void {
    this.spinner = ora({ text, stream: this.out }).start();
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }
}

/**
 * `hoist server create`: validate everything, launch, wait, bootstrap and
 * print the server summary.
 */
export async function serverCreate(
  options: ServerCreateOptions,
  deps: ServerCreateDeps = defaultDeps
): Promise<ServerCreateResult> {
  const config = validateServerCreateOptions(options);
  const launch = await buildLaunchRequest(config);

  const out = deps.out ?? process.stdout;
  const output = new ConsoleOutput(out);

  const orchestrator = new ServerCreateOrchestrator({
    backend: deps.createBackend(config, output.log),
    bootstrapAgent: deps.createBootstrapAgent(output.log),
    clock: deps.clock,
    proberFactory: deps.proberFactory,
    log: output.log,
    onStage: output.onStage,
    createProgress: (label) => new ConsoleProgress(label, out),
  });

  output.startSpinner("Launching instance...");
  let result: ServerCreateResult;
  try {
    result = await orchestrator.run({
      launch,
      usePrivateIp: config.usePrivateIp,
      ssh: config.ssh,
      nodeName: config.nodeName,
      runList: config.runList,
      waitToStabilizeSeconds: config.waitToStabilizeSeconds,
      waitForSshMaxSeconds: config.waitForSshMaxSeconds,
      yes: config.yes,
    });
  } finally {
    output.stopSpinner();
  }

  out.write("\n");
  out.write(`${chalk.green.bold("Server created")}\n`);
  out.write(`${formatServerInfo(result)}\n`);
  return result;
}
