export type LauncherErrorName = "WorkspaceError" | "SpawnError";

export const createLauncherError = (
  name: LauncherErrorName,
  message: string,
  cause?: unknown,
): Error => {
  const err = cause === undefined ? new Error(message) : new Error(message, { cause });
  err.name = name;
  return err;
};

export const errorCode = (cause: unknown): string | null => {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return null;
};

export const errorMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
