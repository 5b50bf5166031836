// Codes the launcher itself exits with. A successful run exits with the
// launched entry's own status instead.
export const EXIT_CODES = {
  RUNTIME_NOT_FOUND: 10,
  WRONG_DIRECTORY: 11,
  MANIFEST_MISSING: 12,
  WORKSPACE_ERROR: 13,
  CONFIG_INVALID: 14,
  LAUNCH_FAILED: 15,
} as const;

export type LauncherExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type StageFatal = {
  kind: "fatal";
  reason: string;
  exitCode: LauncherExitCode;
};
