import { constants } from "node:os";
import type { ChildExit, SpawnProcess } from "./child-process.js";
import { EXIT_CODES } from "./exit-codes.js";
import type { LaunchMode } from "./platform.js";
import type { Reporter } from "./reporter.js";

export type LaunchSpec = {
  mode: LaunchMode;
  command: string;
  args: string[];
  cwd: string;
};

export type SignalTarget = {
  on: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
  off: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
};

export type LaunchDeps = {
  spawnProcess: SpawnProcess;
  signals: SignalTarget;
  reporter: Reporter;
};

// SIGINT from a terminal already reaches the child through its process group;
// the parent only has to survive it. Signals aimed at the parent alone are relayed.
const RELAYED_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

export const exitCodeForSignal = (signal: NodeJS.Signals): number => {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === "number") {
      return 128 + value;
    }
  }
  return 1;
};

export const exitCodeFor = (exit: ChildExit): number => {
  switch (exit.kind) {
    case "exited":
      return exit.code;
    case "signaled":
      return exitCodeForSignal(exit.signal);
    case "error":
      return EXIT_CODES.LAUNCH_FAILED;
  }
};

/**
 * Runs the entry with inherited stdio and resolves with the status the
 * launcher should exit with once the entry has finished.
 */
export async function launch(spec: LaunchSpec, deps: LaunchDeps): Promise<number> {
  const { reporter, signals } = deps;

  reporter.step("launch", `starting ${spec.mode} entry`);
  if (spec.mode === "cli") {
    reporter.note("launch", "press Ctrl+C to exit, or type 'quit' in interactive mode");
  }

  const child = deps.spawnProcess(spec.command, spec.args, { cwd: spec.cwd, stdio: "inherit" });

  const ignoreInterrupt = () => {};
  const relay = (signal: NodeJS.Signals) => {
    child.kill(signal);
  };
  signals.on("SIGINT", ignoreInterrupt);
  for (const signal of RELAYED_SIGNALS) {
    signals.on(signal, relay);
  }

  let exit: ChildExit;
  try {
    exit = await child.wait;
  } finally {
    signals.off("SIGINT", ignoreInterrupt);
    for (const signal of RELAYED_SIGNALS) {
      signals.off(signal, relay);
    }
  }

  if (exit.kind === "error") {
    reporter.fail("launch", exit.error.message);
  }
  return exitCodeFor(exit);
}
