import { join } from "node:path";
import type { ExecFile, SpawnProcess } from "./child-process.js";
import { loadLauncherConfig } from "./config.js";
import { EXIT_CODES } from "./exit-codes.js";
import { safePathKind, type FileSystemAdapter } from "./file-system.js";
import { launch, type SignalTarget } from "./launch.js";
import { resolveLaunchMode, resolvePlatformConfig } from "./platform.js";
import { runPreflight } from "./preflight.js";
import { provision } from "./provision.js";
import type { Reporter } from "./reporter.js";
import { ensureWorkspace } from "./workspace.js";

export type BootstrapDeps = {
  argv: string[];
  env: Record<string, string | undefined>;
  cwd: string;
  platform: string;
  fileSystem: FileSystemAdapter;
  execFile: ExecFile;
  spawnProcess: SpawnProcess;
  signals: SignalTarget;
  reporter: Reporter;
};

/**
 * Runs preflight, dependency provisioning and workspace preparation in
 * order, then hands off to the selected entry. Resolves with the exit code
 * for the launcher process: one of `EXIT_CODES` when a stage stops the
 * sequence, otherwise the entry's own status.
 */
export async function runBootstrap(deps: BootstrapDeps): Promise<number> {
  const { reporter, fileSystem } = deps;

  const loaded = loadLauncherConfig({ cwd: deps.cwd, fileSystem });
  if (!loaded.ok) {
    for (const error of loaded.errors) {
      reporter.fail("config", error);
    }
    return EXIT_CODES.CONFIG_INVALID;
  }
  const { config } = loaded;

  const platformConfig = resolvePlatformConfig(deps.platform, deps.env);

  const preflight = await runPreflight({
    env: deps.env,
    cwd: deps.cwd,
    runtimeCandidates: config.runtime.candidates ?? platformConfig.runtimeCandidates,
    runtimeMajorVersion: config.runtime.major_version,
    markerFile: config.marker_file,
    isolationEnv: config.runtime.isolation_env,
    platformConfig,
    fileSystem,
    execFile: deps.execFile,
    reporter,
  });
  if (preflight.kind === "fatal") {
    return preflight.exitCode;
  }

  const provisioned = await provision({
    manifestPath: join(deps.cwd, config.manifest),
    cwd: deps.cwd,
    installer: config.installer,
    runtimePath: preflight.runtimePath,
    quote: platformConfig.quote,
    fileSystem,
    spawnProcess: deps.spawnProcess,
    reporter,
  });
  if (provisioned.kind === "fatal") {
    return provisioned.exitCode;
  }

  const workspace = ensureWorkspace(join(deps.cwd, config.workspace_dir), { fileSystem, reporter });
  if (workspace.kind === "fatal") {
    return workspace.exitCode;
  }

  // The mode matters only from here on.
  const mode = resolveLaunchMode({ env: deps.env, configured: config.mode, platformConfig });
  if (!mode.ok) {
    reporter.fail("config", mode.error);
    return EXIT_CODES.CONFIG_INVALID;
  }

  const entry = config.entries[mode.mode];
  const entryDir = join(deps.cwd, entry.cwd);
  if (safePathKind(fileSystem, join(entryDir, entry.script)) !== "file") {
    reporter.fail("launch", `entry ${join(entry.cwd, entry.script)} not found in ${deps.cwd}`);
    return EXIT_CODES.LAUNCH_FAILED;
  }

  return launch(
    {
      mode: mode.mode,
      command: preflight.runtimePath,
      args: [entry.script, ...deps.argv],
      cwd: entryDir,
    },
    { spawnProcess: deps.spawnProcess, signals: deps.signals, reporter },
  );
}
