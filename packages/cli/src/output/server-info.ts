import chalk from "chalk";
import type { ServerCreateResult } from "@hoist/provisioning";

/** Label/value rows describing a created server, in display order */
export function serverInfoRows(result: ServerCreateResult): Array<[string, string]> {
  const { instance, networkInterface } = result;
  const rows: Array<[string, string | undefined]> = [
    ["Display Name", instance.displayName],
    ["Instance ID", instance.id],
    ["Availability Domain", instance.availabilityDomain],
    ["Compartment ID", instance.compartmentId],
    ["Shape", instance.shape],
    ["Image ID", instance.imageId],
    ["Lifecycle State", instance.lifecycleState],
    ["Public IP Address", networkInterface.publicAddress],
    ["Private IP Address", networkInterface.privateAddress],
    ["Network ID", networkInterface.networkId],
    ["Hostname", networkInterface.hostname],
    ["Node Name", result.nodeName],
  ];
  return rows.map(([label, value]) => [label, value ?? "-"]);
}

export function formatServerInfo(result: ServerCreateResult): string {
  const rows = serverInfoRows(result);
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  return rows.map(([label, value]) => `${chalk.cyan(`${label}:`.padEnd(width))} ${value}`).join("\n");
}
