import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type UpdaterEvent = {
  type: string;
  payload?: JsonObject;
};

export interface UpdaterLogger {
  log(event: UpdaterEvent): void;
}

export type TextWriter = (text: string) => void;

// =============================================================================
// JSONL FILE LOGGER
// =============================================================================

export class JsonlLogger implements UpdaterLogger {
  private readonly runId?: string;

  constructor(
    public readonly filePath: string,
    defaults: { runId?: string } = {},
  ) {
    this.runId = defaults.runId;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: UpdaterEvent): void {
    const record: JsonObject = { ts: new Date().toISOString(), type: event.type };
    if (this.runId) {
      record.run_id = this.runId;
    }
    if (event.payload) {
      record.payload = event.payload;
    }
    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf8");
  }
}

// =============================================================================
// CONSOLE LOGGER
// =============================================================================

type ConsoleRenderer = (payload: JsonObject) => string | null;

const CONSOLE_RENDERERS: Record<string, ConsoleRenderer> = {
  "version.local": (p) => `Found version: ${text(p.version)}`,
  "upstream.fetch.start": (p) => `Retrieving latest user.js file from ${text(p.url)}...`,
  "version.candidate": (p) =>
    p.matches === true
      ? `Versions match\n  Old version: ${text(p.old_version)}\n  New version: ${text(p.new_version)}`
      : null,
  "commit.backup": (p) => `Backing up to ${text(p.backup_name)}`,
  "commit.promote": () => "Renaming new file...",
  "backup.pruned": (p) => `Removed old backup ${text(p.backup_name)}`,
  "update.committed": () => "Update complete!",
  "update.discarded": () => "Update completed without any changes",
};

/**
 * Renders the progress events a person running the updater cares about.
 * Events without a renderer are ignored.
 */
export function createConsoleLogger(
  opts: { write?: TextWriter } = {},
): UpdaterLogger {
  const write = opts.write ?? ((value: string) => process.stdout.write(value));

  return {
    log(event: UpdaterEvent): void {
      const render = CONSOLE_RENDERERS[event.type];
      if (!render) return;

      const line = render(event.payload ?? {});
      if (line !== null) {
        write(`${line}\n`);
      }
    },
  };
}

// =============================================================================
// COMPOSITION
// =============================================================================

export function createFanoutLogger(...loggers: UpdaterLogger[]): UpdaterLogger {
  return {
    log(event: UpdaterEvent): void {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

export function logUpdaterEvent(logger: UpdaterLogger, type: string, payload?: JsonObject): void {
  logger.log(payload ? { type, payload } : { type });
}

function text(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}
