import { join } from "node:path";
import type { ExecFile } from "./child-process.js";
import { EXIT_CODES, type StageFatal } from "./exit-codes.js";
import { safePathKind, type FileSystemAdapter } from "./file-system.js";
import type { PlatformConfig } from "./platform.js";
import type { Reporter } from "./reporter.js";
import { probeRuntime, type RuntimeProbe } from "./runtime-probe.js";

export type WorkingDirectoryCheck = {
  isProjectRoot: boolean;
  markerPath: string;
};

export type EnvironmentIsolationHint = {
  isIsolated: boolean;
  variable: string;
};

export type PreflightResult =
  | {
      kind: "proceed";
      runtime: RuntimeProbe;
      runtimePath: string;
      isolation: EnvironmentIsolationHint;
    }
  | StageFatal;

export type PreflightOptions = {
  env: Record<string, string | undefined>;
  cwd: string;
  runtimeCandidates: string[];
  runtimeMajorVersion: number;
  markerFile: string;
  isolationEnv: string;
  platformConfig: PlatformConfig;
  fileSystem: FileSystemAdapter;
  execFile: ExecFile;
  reporter: Reporter;
};

export const checkWorkingDirectory = (
  cwd: string,
  markerFile: string,
  fileSystem: FileSystemAdapter,
): WorkingDirectoryCheck => {
  const markerPath = join(cwd, markerFile);
  return { isProjectRoot: safePathKind(fileSystem, markerPath) === "file", markerPath };
};

export const checkIsolation = (
  env: Record<string, string | undefined>,
  variable: string,
): EnvironmentIsolationHint => ({
  isIsolated: (env[variable] ?? "").trim().length > 0,
  variable,
});

const reportIsolationAdvisory = (reporter: Reporter, variable: string, runtimeCommand: string) => {
  reporter.warn("preflight", `no isolated environment detected (${variable} is not set)`);
  reporter.note("preflight", "a virtual environment is recommended:");
  reporter.note("preflight", `  ${runtimeCommand} -m venv venv`);
  reporter.note("preflight", "  source venv/bin/activate   # macOS/Linux");
  reporter.note("preflight", "  venv\\Scripts\\activate      # Windows");
};

export async function runPreflight(options: PreflightOptions): Promise<PreflightResult> {
  const { reporter } = options;

  reporter.step("preflight", "checking runtime");
  const runtime = await probeRuntime(options.runtimeCandidates, {
    ...options,
    requiredMajor: options.runtimeMajorVersion,
    onIncompatible: (path, versionString) => {
      reporter.warn(
        "preflight",
        `skipping ${path} (${versionString}): major version ${options.runtimeMajorVersion} required`,
      );
    },
  });
  if (!runtime.found || runtime.path === null) {
    reporter.fail(
      "preflight",
      `runtime not found (looked for ${options.runtimeCandidates.join(", ")} on PATH; ` +
        `major version ${options.runtimeMajorVersion} required)`,
    );
    return { kind: "fatal", reason: "runtime not found", exitCode: EXIT_CODES.RUNTIME_NOT_FOUND };
  }
  reporter.ok("preflight", `runtime ${runtime.path} (${runtime.versionString ?? "version unknown"})`);

  const workingDirectory = checkWorkingDirectory(options.cwd, options.markerFile, options.fileSystem);
  if (!workingDirectory.isProjectRoot) {
    reporter.fail(
      "preflight",
      `wrong working directory: ${options.markerFile} not found in ${options.cwd}`,
    );
    reporter.note("preflight", "run the launcher from the project root");
    return {
      kind: "fatal",
      reason: "wrong working directory",
      exitCode: EXIT_CODES.WRONG_DIRECTORY,
    };
  }
  reporter.ok("preflight", `project root ${options.cwd}`);

  const isolation = checkIsolation(options.env, options.isolationEnv);
  if (isolation.isIsolated) {
    reporter.ok("preflight", `isolated environment ${(options.env[isolation.variable] ?? "").trim()}`);
  } else {
    reportIsolationAdvisory(reporter, isolation.variable, runtime.command ?? "python3");
  }

  return { kind: "proceed", runtime, runtimePath: runtime.path, isolation };
}
