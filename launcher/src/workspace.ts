import { createLauncherError, errorCode, errorMessage } from "./errors.js";
import { EXIT_CODES, type StageFatal } from "./exit-codes.js";
import type { FileSystemAdapter, PathKind } from "./file-system.js";
import type { Reporter } from "./reporter.js";

export type WorkspaceResult =
  | { kind: "ready"; created: boolean }
  | (StageFatal & { error: Error });

const fatal = (dirPath: string, detail: string, cause?: unknown): WorkspaceResult => {
  const error = createLauncherError(
    "WorkspaceError",
    `cannot prepare workspace ${dirPath}: ${detail}`,
    cause,
  );
  return {
    kind: "fatal",
    reason: "workspace error",
    exitCode: EXIT_CODES.WORKSPACE_ERROR,
    error,
  };
};

const isDirectory = (fileSystem: FileSystemAdapter, dirPath: string): boolean => {
  try {
    return fileSystem.pathKindSync(dirPath) === "directory";
  } catch {
    return false;
  }
};

// Idempotent: an existing directory is left untouched.
export const ensureWorkspace = (
  dirPath: string,
  deps: { fileSystem: FileSystemAdapter; reporter: Reporter },
): WorkspaceResult => {
  const { fileSystem, reporter } = deps;

  const report = (result: WorkspaceResult): WorkspaceResult => {
    if (result.kind === "fatal") {
      reporter.fail("workspace", result.error.message);
    }
    return result;
  };

  let kind: PathKind;
  try {
    kind = fileSystem.pathKindSync(dirPath);
  } catch (err: unknown) {
    return report(fatal(dirPath, errorCode(err) ?? errorMessage(err), err));
  }

  if (kind === "directory") {
    reporter.ok("workspace", `workspace ${dirPath} present`);
    return { kind: "ready", created: false };
  }
  if (kind !== "missing") {
    return report(fatal(dirPath, "path exists and is not a directory"));
  }

  reporter.step("workspace", `creating workspace ${dirPath}`);
  try {
    fileSystem.makeDirectorySync(dirPath);
  } catch (err: unknown) {
    if (errorCode(err) === "EEXIST" && isDirectory(fileSystem, dirPath)) {
      return { kind: "ready", created: false };
    }
    return report(fatal(dirPath, errorCode(err) ?? errorMessage(err), err));
  }
  return { kind: "ready", created: true };
};
