#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { HOIST_VERSION, type ServerCreateOptions } from "@hoist/core";
import { serverCreate } from "./commands/server-create";
import { describeFailure } from "./output/failure";

const program = new Command();

program
  .name("hoist")
  .description("Hoist CLI - launch cloud instances and bootstrap them with Chef")
  .version(HOIST_VERSION);

const server = program
  .command("server")
  .description("Server management commands");

server
  .command("create")
  .description("Launch an instance, wait for SSH and run knife bootstrap on it")
  .option("--availability-domain <ad>", "Availability zone to launch the instance in")
  .option("--compartment-id <id>", "Account that owns the instance")
  .option("--display-name <name>", "Name for the instance")
  .option("--hostname-label <label>", "Hostname label for the primary network interface")
  .option("--image-id <id>", "Image to launch")
  .option("--metadata <json>", "Instance metadata as a JSON object of string values")
  .option("--shape <shape>", "Instance type")
  .option("--ssh-authorized-keys-file <file>", "Public keys allowed to log in to the instance")
  .option("--subnet-id <id>", "Subnet for the primary network interface")
  .option("--use-private-ip", "Connect to the private address instead of the public one")
  .option("--user-data-file <file>", "Cloud-init user data for the instance")
  .option("--region <region>", "Cloud region")
  .option("-x, --ssh-user <user>", "SSH user for bootstrap (default: opc)")
  .option("-P, --ssh-password <password>", "SSH password for bootstrap")
  .option("-G, --ssh-gateway <gateway>", "SSH gateway as [user@]host[:port]")
  .option("-i, --identity-file <file>", "SSH private key for bootstrap")
  .option("-N, --node-name <name>", "Chef node name (default: the instance display name)")
  .option("-r, --run-list <list>", "Comma separated run list for the first Chef run")
  .option("--wait-to-stabilize <seconds>", "Pause after SSH answers, before bootstrap (default: 40)")
  .option("--wait-for-ssh-max <seconds>", "Maximum wait for SSH access (default: 300)")
  .option("-y, --yes", "Answer yes to bootstrap prompts")
  .action(async (options: ServerCreateOptions) => {
    await serverCreate(options);
  });

// Add error handling
program.exitOverride();

program.parseAsync(process.argv).catch((error: unknown) => {
  // Commander has already printed its own usage message
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error(chalk.red("Error:"), describeFailure(error));
  process.exit(1);
});
