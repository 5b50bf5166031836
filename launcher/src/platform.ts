import path from "node:path";

export const LAUNCH_MODES = ["interactive", "cli"] as const;

export type LaunchMode = (typeof LAUNCH_MODES)[number];

export const LAUNCH_MODE_ENV = "CRYPTOCLIP_LAUNCH_MODE";

/**
 * Everything that differs between the POSIX and Windows launch sequences.
 * The pipeline itself is the same on both.
 */
export type PlatformConfig = {
  platform: string;
  runtimeCandidates: string[];
  defaultMode: LaunchMode;
  path: path.PlatformPath;
  executableExtensions: string[];
  quote: (value: string) => string;
};

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

// spawn refuses .bat/.cmd shims without a shell (EINVAL), so only real
// binaries count as a runtime.
const SPAWNABLE_EXTENSIONS = new Set([".COM", ".EXE"]);

const SAFE_ARG = /^[\w@%+=:,./\\-]+$/;

const quotePosix = (value: string): string =>
  SAFE_ARG.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;

const quoteWindows = (value: string): string =>
  SAFE_ARG.test(value) ? value : `"${value.replace(/"/g, '""')}"`;

// Windows environments are case-insensitive; PATH may arrive as "Path".
export const readEnvVar = (
  env: Record<string, string | undefined>,
  name: string,
  platform: string,
): string | undefined => {
  if (platform !== "win32") {
    return env[name];
  }
  const key = Object.keys(env).find((candidate) => candidate.toUpperCase() === name);
  return key === undefined ? undefined : env[key];
};

export const resolvePlatformConfig = (
  platform: string,
  env: Record<string, string | undefined>,
): PlatformConfig => {
  if (platform === "win32") {
    const pathext = (readEnvVar(env, "PATHEXT", platform) ?? "").trim() || DEFAULT_PATHEXT;
    const extensions = pathext
      .split(";")
      .map((ext) => ext.trim())
      .filter((ext) => SPAWNABLE_EXTENSIONS.has(ext.toUpperCase()));
    return {
      platform,
      runtimeCandidates: ["python", "py"],
      defaultMode: "interactive",
      path: path.win32,
      executableExtensions: ["", ...extensions],
      quote: quoteWindows,
    };
  }
  return {
    platform,
    runtimeCandidates: ["python3", "python"],
    defaultMode: "cli",
    path: path.posix,
    executableExtensions: [""],
    quote: quotePosix,
  };
};

const isLaunchMode = (value: string): value is LaunchMode =>
  LAUNCH_MODES.some((mode) => mode === value);

export type LaunchModeResult = { ok: true; mode: LaunchMode } | { ok: false; error: string };

export const resolveLaunchMode = (options: {
  env: Record<string, string | undefined>;
  configured: LaunchMode | null;
  platformConfig: PlatformConfig;
}): LaunchModeResult => {
  const raw = (options.env[LAUNCH_MODE_ENV] ?? "").trim();
  if (raw) {
    if (!isLaunchMode(raw)) {
      return {
        ok: false,
        error: `${LAUNCH_MODE_ENV} must be one of ${LAUNCH_MODES.join(", ")} (got "${raw}")`,
      };
    }
    return { ok: true, mode: raw };
  }
  return { ok: true, mode: options.configured ?? options.platformConfig.defaultMode };
};
