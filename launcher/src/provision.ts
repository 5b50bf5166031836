import type { ChildExit, SpawnProcess } from "./child-process.js";
import { RUNTIME_PLACEHOLDER, type InstallerConfig } from "./config.js";
import { EXIT_CODES, type StageFatal } from "./exit-codes.js";
import { safePathKind, type FileSystemAdapter } from "./file-system.js";
import type { Reporter } from "./reporter.js";

export type ProvisionResult = { kind: "completed"; withWarnings: boolean } | StageFatal;

export type ProvisionOptions = {
  manifestPath: string;
  cwd: string;
  installer: InstallerConfig;
  runtimePath: string;
  quote: (value: string) => string;
  fileSystem: FileSystemAdapter;
  spawnProcess: SpawnProcess;
  reporter: Reporter;
};

export const resolveInstallerCommand = (
  installer: InstallerConfig,
  runtimePath: string,
  manifestPath: string,
): { command: string; args: string[] } => ({
  command: installer.command === RUNTIME_PLACEHOLDER ? runtimePath : installer.command,
  args: [...installer.args, manifestPath],
});

const installerSucceeded = (exit: ChildExit): boolean => exit.kind === "exited" && exit.code === 0;

/**
 * Installs what the manifest lists. Only a missing manifest is fatal: an
 * installer that fails or cannot be started downgrades to a warning, since
 * an earlier run may already have satisfied the dependencies.
 */
export async function provision(options: ProvisionOptions): Promise<ProvisionResult> {
  const { reporter } = options;

  reporter.step("deps", "checking dependencies");
  if (safePathKind(options.fileSystem, options.manifestPath) !== "file") {
    reporter.fail("deps", `${options.manifestPath} not found`);
    return { kind: "fatal", reason: "manifest missing", exitCode: EXIT_CODES.MANIFEST_MISSING };
  }

  const { command, args } = resolveInstallerCommand(
    options.installer,
    options.runtimePath,
    options.manifestPath,
  );
  reporter.step("deps", `running ${[command, ...args].map(options.quote).join(" ")}`);

  // Installer stderr is discarded; failures are summarized, never itemized.
  const exit = await options.spawnProcess(command, args, {
    cwd: options.cwd,
    stdio: ["inherit", "inherit", "ignore"],
  }).wait;

  if (installerSucceeded(exit)) {
    reporter.ok("deps", "dependencies installed");
    return { kind: "completed", withWarnings: false };
  }
  reporter.warn("deps", "some dependencies may not have installed");
  return { kind: "completed", withWarnings: true };
}
