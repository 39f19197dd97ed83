import path from "node:path";

import { z, type ZodIssue } from "zod";

import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export const DEFAULT_UPSTREAM_URL =
  "https://raw.githubusercontent.com/ghacksuserjs/ghacks-user.js/master/user.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const UpdateOptionsSchema = z
  .object({
    unattended: z.boolean().default(false),
    minify: z.boolean().default(false),
    single_backup: z.boolean().default(false),
  })
  .strict();

export const UpdaterConfigSchema = z
  .object({
    profile_dir: z.string().min(1),
    script_file: z.string().min(1).default("user.js"),
    overrides_file: z.string().min(1).default("user-overrides.js"),
    staging_file: z.string().min(1).default("user.js.new"),
    upstream_url: z.string().url().default(DEFAULT_UPSTREAM_URL),
    fetch_timeout_ms: z.number().int().positive().default(30_000),
    log_file: z.string().min(1).optional(),
    options: UpdateOptionsSchema.default({}),
  })
  .strict()
  .refine((config) => config.staging_file !== config.script_file, {
    message: "staging_file must differ from script_file",
    path: ["staging_file"],
  });

export type UpdateOptions = z.infer<typeof UpdateOptionsSchema>;
export type UpdaterConfig = z.infer<typeof UpdaterConfigSchema>;

export type UpdaterPaths = {
  profileDir: string;
  script: string;
  overrides: string;
  staging: string;
};

// =============================================================================
// LOADING
// =============================================================================

export type UpdaterFlags = {
  dir?: string;
  url?: string;
  logFile?: string;
  unattended?: boolean;
  minify?: boolean;
  singleBackup?: boolean;
};

export const CONFIG_ENV = {
  profileDir: "USERJS_UPDATER_PROFILE_DIR",
  url: "USERJS_UPDATER_URL",
  timeoutMs: "USERJS_UPDATER_TIMEOUT_MS",
  logFile: "USERJS_UPDATER_LOG_FILE",
} as const;

export function loadUpdaterConfig(args: {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  flags?: UpdaterFlags;
}): UpdaterConfig {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;
  const flags = args.flags ?? {};

  const raw: Record<string, unknown> = {
    profile_dir: path.resolve(cwd, flags.dir ?? envValue(env, CONFIG_ENV.profileDir) ?? "."),
    options: {
      unattended: flags.unattended ?? false,
      minify: flags.minify ?? false,
      single_backup: flags.singleBackup ?? false,
    },
  };

  const url = flags.url ?? envValue(env, CONFIG_ENV.url);
  if (url !== undefined) raw.upstream_url = url;

  const timeout = envValue(env, CONFIG_ENV.timeoutMs);
  if (timeout !== undefined) raw.fetch_timeout_ms = Number(timeout);

  const logFile = flags.logFile ?? envValue(env, CONFIG_ENV.logFile);
  if (logFile !== undefined) raw.log_file = path.resolve(cwd, logFile);

  const parsed = UpdaterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid updater configuration.",
      message: issues.join("\n"),
      hint: `Check the command-line flags and the ${Object.values(CONFIG_ENV).join(", ")} environment variables.`,
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function resolveUpdaterPaths(config: UpdaterConfig): UpdaterPaths {
  const profileDir = path.resolve(config.profile_dir);
  return {
    profileDir,
    script: path.join(profileDir, config.script_file),
    overrides: path.join(profileDir, config.overrides_file),
    staging: path.join(profileDir, config.staging_file),
  };
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }

    return `${location}: ${issue.message}`;
  });
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}
