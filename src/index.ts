import { Command } from "commander";

import { updateCommand, type UpdateCommandOptions } from "./cli/update.js";

export const PROGRAM_NAME = "userjs-updater";
export const PROGRAM_VERSION = "0.3.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description("Update a Firefox profile user.js from upstream while keeping user-overrides.js")
    .version(PROGRAM_VERSION)
    .option("-u, --unattended", "Run without the interactive menu", false)
    .option("-m, --minify", "Merge overrides into upstream prefs instead of appending them", false)
    .option("--singlebackup", "Keep only the most recent user-backup-*.js file", false)
    .option("-d, --dir <path>", "Profile directory containing user.js")
    .option("--url <url>", "Upstream user.js URL")
    .option("--log-file <path>", "Append JSONL update events to this file")
    .option("--debug", "Show error codes, causes, and stack traces", false)
    .action(async (opts: UpdateCommandOptions) => {
      process.exitCode = await updateCommand(opts);
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}
