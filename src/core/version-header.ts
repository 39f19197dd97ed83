import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { HeaderParseError, IoError } from "./errors.js";

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export type VersionRecord = Readonly<{
  name: string;
  version: string;
  date: string;
}>;

export const FAMILY_TOKEN = "ghacks";

const NAME_MARKER = "name: ";
const DATE_MARKER = "date: ";
const VERSION_MARKER = "version ";
const HEADER_LINE_COUNT = 4;

export type VersionHeaderOptions = {
  familyToken?: string;
};

// =============================================================================
// PARSING
// =============================================================================

/**
 * Reads the identity header from the first four lines of a profile script:
 *
 * ```
 * /******
 *  * name: ghacks user.js
 *  * date: 14 February 2020
 *  * version 72-beta
 * ```
 *
 * The first line is ignored. Each following line must carry its marker; the
 * text after the marker becomes the field value.
 */
export function parseVersionHeader(text: string, options: VersionHeaderOptions = {}): VersionRecord {
  const lines = splitLeadingLines(text, HEADER_LINE_COUNT);
  if (lines.length < HEADER_LINE_COUNT) {
    throw new HeaderParseError(
      `Header ended after ${lines.length} line(s); expected ${HEADER_LINE_COUNT}`,
    );
  }

  const name = extractField(lines[1], NAME_MARKER, 2);
  const date = extractField(lines[2], DATE_MARKER, 3);
  const version = extractField(lines[3], VERSION_MARKER, 4);

  const familyToken = options.familyToken ?? FAMILY_TOKEN;
  if (!name.includes(familyToken)) {
    throw new HeaderParseError("Version not recognized");
  }

  return Object.freeze({ name, version, date });
}

export async function readVersionHeader(
  filePath: string,
  options: VersionHeaderOptions = {},
): Promise<VersionRecord> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new IoError(`Failed to read ${filePath}: ${formatErrorMessage(err)}`, err);
  }

  return parseVersionHeader(text, options);
}

export function versionsEqual(left: VersionRecord, right: VersionRecord): boolean {
  return left.name === right.name && left.version === right.version && left.date === right.date;
}

export function formatVersion(record: VersionRecord): string {
  return `${record.name}: ${record.version} from ${record.date}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitLeadingLines(text: string, count: number): string[] {
  const lines: string[] = [];
  let start = 0;

  while (lines.length < count && start < text.length) {
    const newline = text.indexOf("\n", start);
    const end = newline === -1 ? text.length : newline;
    lines.push(text.slice(start, end).replace(/\r$/, ""));
    start = end + 1;
  }

  return lines;
}

function extractField(line: string, marker: string, lineNumber: number): string {
  const index = line.indexOf(marker);
  if (index === -1) {
    throw new HeaderParseError(`Header line ${lineNumber} is missing the "${marker}" marker`);
  }
  return line.slice(index + marker.length);
}
