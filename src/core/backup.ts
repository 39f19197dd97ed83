import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { IoError } from "./errors.js";

const BACKUP_PREFIX = "user-backup-";
const BACKUP_SUFFIX = ".js";
const BACKUP_NAME_PATTERN = /^user-backup-\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.js$/;

// =============================================================================
// NAMING
// =============================================================================

/** `YYYY-MM-DD_HH-MM-SS` in local wall-clock time. */
export function formatBackupTimestamp(date: Date): string {
  const day = [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join("-");
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join("-");
  return `${day}_${time}`;
}

export function backupFileName(date: Date): string {
  return `${BACKUP_PREFIX}${formatBackupTimestamp(date)}${BACKUP_SUFFIX}`;
}

export function isBackupFileName(name: string): boolean {
  return BACKUP_NAME_PATTERN.test(name);
}

// =============================================================================
// RETENTION
// =============================================================================

export async function listBackups(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fse.readdir(dir);
  } catch (err) {
    throw new IoError(`Failed to list ${dir}: ${formatErrorMessage(err)}`, err);
  }
  return names.filter(isBackupFileName).sort();
}

/**
 * Removes every backup in `dir` except `keepName`. Returns the removed names.
 */
export async function pruneBackups(dir: string, keepName: string): Promise<string[]> {
  const stale = (await listBackups(dir)).filter((name) => name !== keepName);

  for (const name of stale) {
    const filePath = path.join(dir, name);
    try {
      await fse.remove(filePath);
    } catch (err) {
      throw new IoError(`Failed to remove old backup ${filePath}: ${formatErrorMessage(err)}`, err);
    }
  }

  return stale;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
