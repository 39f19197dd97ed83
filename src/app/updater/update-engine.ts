/**
 * Update engine.
 * Purpose: replace the live profile script with a validated candidate, or leave it untouched.
 * Assumptions: one run at a time per profile directory; all IO goes through fs-extra or ports.
 * Usage: const attempt = await runUpdate(buildUpdateContext({ config }), { confirmStart }).
 */

import path from "node:path";

import fse from "fs-extra";

import { backupFileName, pruneBackups } from "../../core/backup.js";
import { formatErrorMessage } from "../../core/error-format.js";
import {
  HeaderParseError,
  IoError,
  MissingOverridesError,
  MissingScriptError,
  UpdaterError,
} from "../../core/errors.js";
import { logUpdaterEvent } from "../../core/logger.js";
import { buildCandidate, type BuildMode } from "../../core/merge.js";
import {
  formatVersion,
  readVersionHeader,
  versionsEqual,
  type VersionRecord,
} from "../../core/version-header.js";

import type { UpdateContext } from "./update-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type UpdateOutcome = "committed" | "discarded" | "cancelled";

export type UpdateAttempt = {
  oldVersion: VersionRecord;
  newVersion?: VersionRecord;
  stagingPath: string;
  outcome: UpdateOutcome;
  backupPath?: string;
  prunedBackups: string[];
};

export type UpdateHooks = {
  /** Called once the live version is known; returning false ends the run untouched. */
  confirmStart?: (oldVersion: VersionRecord) => Promise<boolean>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runUpdate(ctx: UpdateContext, hooks: UpdateHooks = {}): Promise<UpdateAttempt> {
  const { logger } = ctx.ports;
  logUpdaterEvent(logger, "update.start", {
    profile_dir: ctx.paths.profileDir,
    mode: resolveBuildMode(ctx),
  });

  try {
    return await executeUpdate(ctx, hooks);
  } catch (err) {
    logUpdaterEvent(logger, "update.failed", {
      kind: err instanceof UpdaterError ? err.kind : "unknown",
      message: formatErrorMessage(err),
    });
    throw err;
  }
}

// =============================================================================
// STEPS
// =============================================================================

async function executeUpdate(ctx: UpdateContext, hooks: UpdateHooks): Promise<UpdateAttempt> {
  const { paths, ports } = ctx;
  const { logger } = ports;

  const oldVersion = await readLocalVersion(paths.script);
  logUpdaterEvent(logger, "version.local", { version: formatVersion(oldVersion) });

  if (hooks.confirmStart && !(await hooks.confirmStart(oldVersion))) {
    logUpdaterEvent(logger, "update.cancelled");
    return { oldVersion, stagingPath: paths.staging, outcome: "cancelled", prunedBackups: [] };
  }

  logUpdaterEvent(logger, "upstream.fetch.start", { url: ports.scriptSource.url });
  const upstreamText = await ports.scriptSource.fetchScript();
  logUpdaterEvent(logger, "upstream.fetch.complete", { bytes: Buffer.byteLength(upstreamText) });

  const overridesText = await readOverrides(paths.overrides);
  logUpdaterEvent(logger, "overrides.read", { path: paths.overrides });

  const mode = resolveBuildMode(ctx);
  const candidate = buildCandidate(mode, upstreamText, overridesText);
  await io(`write ${paths.staging}`, () => fse.writeFile(paths.staging, candidate, "utf8"));
  logUpdaterEvent(logger, "candidate.built", { mode, path: paths.staging });

  const newVersion = await readCandidateVersion(paths.staging);
  const matches = versionsEqual(oldVersion, newVersion);
  logUpdaterEvent(logger, "version.candidate", {
    old_version: formatVersion(oldVersion),
    new_version: formatVersion(newVersion),
    matches,
  });

  // Promotion happens when the candidate header matches the live one.
  if (!matches) {
    await io(`remove ${paths.staging}`, () => fse.remove(paths.staging));
    logUpdaterEvent(logger, "update.discarded");
    return {
      oldVersion,
      newVersion,
      stagingPath: paths.staging,
      outcome: "discarded",
      prunedBackups: [],
    };
  }

  const { backupPath, prunedBackups } = await commitCandidate(ctx);
  return {
    oldVersion,
    newVersion,
    stagingPath: paths.staging,
    outcome: "committed",
    backupPath,
    prunedBackups,
  };
}

async function readLocalVersion(scriptPath: string): Promise<VersionRecord> {
  if (!(await io(`check ${scriptPath}`, () => fse.pathExists(scriptPath)))) {
    throw new MissingScriptError(scriptPath);
  }

  return readVersionHeader(scriptPath);
}

async function readOverrides(overridesPath: string): Promise<string> {
  if (!(await io(`check ${overridesPath}`, () => fse.pathExists(overridesPath)))) {
    throw new MissingOverridesError(overridesPath);
  }

  return io(`read ${overridesPath}`, () => fse.readFile(overridesPath, "utf8"));
}

async function readCandidateVersion(stagingPath: string): Promise<VersionRecord> {
  try {
    return await readVersionHeader(stagingPath);
  } catch (err) {
    if (err instanceof HeaderParseError) {
      await io(`remove ${stagingPath}`, () => fse.remove(stagingPath));
    }
    throw err;
  }
}

async function commitCandidate(
  ctx: UpdateContext,
): Promise<{ backupPath: string; prunedBackups: string[] }> {
  const { paths, ports } = ctx;
  const { logger } = ports;

  const backupName = backupFileName(ports.clock.now());
  const backupPath = path.join(paths.profileDir, backupName);

  // rename would silently replace a backup taken earlier in the same second.
  if (await io(`check ${backupPath}`, () => fse.pathExists(backupPath))) {
    throw new IoError(`Backup ${backupPath} already exists; refusing to overwrite it`);
  }

  // Both events go out before the first rename; nothing may fail between the two renames.
  logUpdaterEvent(logger, "commit.backup", { backup_name: backupName, path: backupPath });
  logUpdaterEvent(logger, "commit.promote", { from: paths.staging, to: paths.script });

  await io(`rename ${paths.script} to ${backupPath}`, () => fse.rename(paths.script, backupPath));
  try {
    await fse.rename(paths.staging, paths.script);
  } catch (err) {
    // The live file now only exists as the backup; surface where it went.
    throw new IoError(
      `Failed to promote ${paths.staging} to ${paths.script}; previous script is at ${backupPath}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  let prunedBackups: string[] = [];
  if (ctx.options.single_backup) {
    prunedBackups = await pruneBackups(paths.profileDir, backupName);
    for (const name of prunedBackups) {
      logUpdaterEvent(logger, "backup.pruned", { backup_name: name });
    }
  }

  logUpdaterEvent(logger, "update.committed", { backup: backupPath });
  return { backupPath, prunedBackups };
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveBuildMode(ctx: UpdateContext): BuildMode {
  return ctx.options.minify ? "merge" : "append";
}

async function io<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new IoError(`Failed to ${action}: ${formatErrorMessage(err)}`, err);
  }
}
