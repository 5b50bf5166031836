import { execFile as execFileBuiltin, spawn, type StdioOptions } from "node:child_process";
import { createLauncherError, errorCode, errorMessage } from "./errors.js";

export type ExecFile = (
  file: string,
  args: string[],
) => Promise<{ stdout: string; stderr: string }>;

export type ChildExit =
  | { kind: "exited"; code: number }
  | { kind: "signaled"; signal: NodeJS.Signals }
  | { kind: "error"; error: Error };

export type ChildHandle = {
  wait: Promise<ChildExit>;
  kill: (signal: NodeJS.Signals) => void;
};

export type SpawnOptions = {
  cwd: string;
  stdio: StdioOptions;
};

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export const nodeExecFile: ExecFile = (file, args) =>
  new Promise((resolve, reject) => {
    execFileBuiltin(file, args, { encoding: "utf8", windowsHide: true }, (err, stdout, stderr) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({ stdout: String(stdout), stderr: String(stderr) });
    });
  });

const toSpawnError = (command: string, cause: unknown): Error => {
  const code = errorCode(cause);
  const detail = code ?? errorMessage(cause);
  return createLauncherError("SpawnError", `could not start ${command} (${detail})`, cause);
};

// Resolves once: a failed spawn emits "error" and may still emit "close" afterwards.
export const nodeSpawnProcess: SpawnProcess = (command, args, options) => {
  let child: ReturnType<typeof spawn>;
  try {
    child = spawn(command, args, { cwd: options.cwd, stdio: options.stdio });
  } catch (cause: unknown) {
    return {
      wait: Promise.resolve({ kind: "error", error: toSpawnError(command, cause) }),
      kill: () => {},
    };
  }

  const wait = new Promise<ChildExit>((resolve) => {
    let settled = false;
    const settle = (exit: ChildExit) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(exit);
    };
    child.once("error", (cause: unknown) => {
      settle({ kind: "error", error: toSpawnError(command, cause) });
    });
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (signal) {
        settle({ kind: "signaled", signal });
        return;
      }
      settle({ kind: "exited", code: code ?? 1 });
    });
  });

  return {
    wait,
    kill: (signal) => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    },
  };
};
