export const INTRO_TEXT = [
  "This updater should be run from your Firefox profile directory.",
  "It will download the latest version of ghacks user.js and then",
  "add your own changes from user-overrides.js to it.",
  "Visit the wiki for more detailed information.",
].join("\n");

export const HELP_TEXT = [
  "Available options:",
  "",
  "  -m, --minify",
  "",
  "    Merge overrides instead of appending them. Only user_pref lines are kept",
  "    after the upstream banner; when a pref is declared in both files, the",
  "    value from user-overrides.js is used. Comments and blank lines outside",
  "    the banner are dropped.",
  "",
  "  -u, --unattended",
  "",
  "    Run without user input.",
  "",
  "  --singlebackup",
  "",
  "    Keep only the backup created by this run; older user-backup-*.js files",
  "    are removed after a successful update.",
  "",
  "  -d, --dir <path>",
  "",
  "    Profile directory containing user.js and user-overrides.js.",
].join("\n");
