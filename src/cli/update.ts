import { buildUpdateContext } from "../app/updater/update-context.js";
import { runUpdate, type UpdateAttempt } from "../app/updater/update-engine.js";
import { loadUpdaterConfig } from "../core/config.js";
import { renderErrorLines, resolveColorEnabled } from "../core/error-format.js";
import type { TextWriter } from "../core/logger.js";
import type { FetchLike } from "../core/upstream.js";

import { HELP_TEXT, INTRO_TEXT } from "./help.js";
import { createClackMenuPrompt, type MenuPrompt } from "./menu.js";

// =============================================================================
// TYPES
// =============================================================================

export type UpdateCommandOptions = {
  unattended?: boolean;
  minify?: boolean;
  singlebackup?: boolean;
  dir?: string;
  url?: string;
  logFile?: string;
  debug?: boolean;
};

export type UpdateCommandDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  prompt?: MenuPrompt;
  fetch?: FetchLike;
  stdout?: TextWriter;
  stderr?: TextWriter;
  now?: () => Date;
  color?: boolean;
};

// =============================================================================
// UPDATE COMMAND
// =============================================================================

/**
 * Runs one update and reports the result. Returns the process exit code.
 */
export async function updateCommand(
  opts: UpdateCommandOptions,
  deps: UpdateCommandDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    const config = loadUpdaterConfig({
      cwd: deps.cwd,
      env: deps.env,
      flags: {
        dir: opts.dir,
        url: opts.url,
        logFile: opts.logFile,
        unattended: opts.unattended,
        minify: opts.minify,
        singleBackup: opts.singlebackup,
      },
    });

    const ctx = buildUpdateContext({
      config,
      adapters: { fetch: deps.fetch, write: stdout, now: deps.now },
    });

    const attempt = await runUpdate(ctx, {
      confirmStart: config.options.unattended
        ? undefined
        : async () => {
            const prompt = deps.prompt ?? createClackMenuPrompt();
            stdout(`\n${INTRO_TEXT}\n\n`);
            const choice = await prompt.selectStartAction();
            if (choice === "help") {
              stdout(`${HELP_TEXT}\n`);
            }
            return choice === "start";
          },
    });

    printAttemptSummary(attempt, stdout);
    return 0;
  } catch (err) {
    const color = deps.color ?? resolveColorEnabled({ stream: process.stderr });
    stderr(`${renderErrorLines(err, { mode: opts.debug ? "debug" : "short", color })}\n`);
    return 1;
  }
}

function printAttemptSummary(attempt: UpdateAttempt, write: TextWriter): void {
  if (attempt.outcome === "committed" && attempt.backupPath) {
    write(`Previous script saved as ${attempt.backupPath}\n`);
  }
}
