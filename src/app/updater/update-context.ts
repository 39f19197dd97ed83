/**
 * UpdateContext + composition root for one updater run.
 * Purpose: resolve paths and options once and bundle them with injected ports.
 * Usage: runUpdate(buildUpdateContext({ config, ports: { logger } })).
 */

import { randomUUID } from "node:crypto";

import {
  resolveUpdaterPaths,
  type UpdateOptions,
  type UpdaterConfig,
  type UpdaterPaths,
} from "../../core/config.js";
import {
  createConsoleLogger,
  createFanoutLogger,
  JsonlLogger,
  type TextWriter,
} from "../../core/logger.js";
import { createUpstreamSource, type FetchLike } from "../../core/upstream.js";

import type { UpdatePorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type UpdateContext = {
  runId: string;
  paths: UpdaterPaths;
  options: UpdateOptions;
  ports: UpdatePorts;
};

/** Low-level hooks the default ports are built on. */
export type DefaultPortAdapters = {
  fetch?: FetchLike;
  write?: TextWriter;
  now?: () => Date;
};

export type BuildUpdateContextInput = {
  config: UpdaterConfig;
  runId?: string;
  adapters?: DefaultPortAdapters;
  ports?: Partial<UpdatePorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(
  config: UpdaterConfig,
  runId: string,
  adapters: DefaultPortAdapters = {},
): UpdatePorts {
  const consoleLogger = createConsoleLogger({ write: adapters.write });
  return {
    scriptSource: createUpstreamSource({
      url: config.upstream_url,
      timeoutMs: config.fetch_timeout_ms,
      fetch: adapters.fetch,
    }),
    clock: { now: adapters.now ?? (() => new Date()) },
    logger: config.log_file
      ? createFanoutLogger(consoleLogger, new JsonlLogger(config.log_file, { runId }))
      : consoleLogger,
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildUpdateContext(input: BuildUpdateContextInput): UpdateContext {
  const runId = input.runId ?? randomUUID();
  const ports: UpdatePorts = {
    ...createDefaultPorts(input.config, runId, input.adapters),
    ...input.ports,
  };

  return {
    runId,
    paths: resolveUpdaterPaths(input.config),
    options: input.config.options,
    ports,
  };
}
