/**
 * Update workflow ports.
 * Purpose: define the collaborators the engine talks to so tests can swap them.
 * Assumptions: ports are thin adapters; the engine owns all decisions.
 */

import type { UpdaterLogger } from "../../core/logger.js";
import type { UpstreamSource } from "../../core/upstream.js";

export type ScriptSource = UpstreamSource;

export type Clock = {
  now: () => Date;
};

export type UpdatePorts = {
  scriptSource: ScriptSource;
  clock: Clock;
  logger: UpdaterLogger;
};
