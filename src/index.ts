#!/usr/bin/env node

import { backupCommand } from "./cli/commands/backup";
import { listCommand } from "./cli/commands/list";
import { color, LINKS, ui, VERSION } from "./cli/ui";

export function printHelp(): void {
  ui.banner("EBS volume snapshots");

  ui.note(
    `${color.cyan("backup")}      Snapshot a volume, a device, or every data volume of an instance
${color.cyan("list")}        List snapshots created by volsnap`,
    "Commands",
  );

  ui.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  ui.note(
    `volsnap backup --instance self --keep     ${color.dim("# All data volumes of this host")}
volsnap backup --volume vol-0abc --wait   ${color.dim("# One volume, wait for completion")}
volsnap list --instance self              ${color.dim("# Snapshots of this host")}`,
    "Examples",
  );

  ui.note(LINKS, "Links");

  ui.outro(`Run ${color.cyan("volsnap <command> --help")} for command details`);
}

export function printVersion(): void {
  console.log(`volsnap v${VERSION}`);
}

export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("volsnap --help")} for usage information.`);
      return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`${color.red("Fatal error:")}`, error);
      process.exit(1);
    });
}
