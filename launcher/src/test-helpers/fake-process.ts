import type { ChildExit, ChildHandle, ExecFile, SpawnOptions, SpawnProcess } from "../child-process.js";
import { createReporter, type Reporter } from "../reporter.js";

export type SpawnCall = {
  command: string;
  args: string[];
  options: SpawnOptions;
};

export type FakeChild = ChildHandle & {
  kills: NodeJS.Signals[];
  finish: (exit: ChildExit) => void;
};

const createFakeChild = (): FakeChild => {
  const kills: NodeJS.Signals[] = [];
  let finish: (exit: ChildExit) => void = () => {};
  const wait = new Promise<ChildExit>((resolve) => {
    finish = resolve;
  });
  return {
    wait,
    kills,
    finish: (exit) => finish(exit),
    kill: (signal) => {
      kills.push(signal);
    },
  };
};

/**
 * Each spawned child resolves with the next queued exit. With `manual`, the
 * test settles children itself through `children[i].finish`.
 */
export const createFakeSpawn = (exits: ChildExit[] = [], opts: { manual?: boolean } = {}) => {
  const calls: SpawnCall[] = [];
  const children: FakeChild[] = [];
  const queue = [...exits];
  const spawnProcess: SpawnProcess = (command, args, options) => {
    calls.push({ command, args, options });
    const child = createFakeChild();
    children.push(child);
    if (!opts.manual) {
      child.finish(queue.shift() ?? { kind: "exited", code: 0 });
    }
    return child;
  };
  return { spawnProcess, calls, children };
};

export const fakeExecFile =
  (versions: Record<string, string>): ExecFile =>
  async (file) => {
    const version = versions[file];
    if (version === undefined) {
      throw new Error(`${file}: command failed`);
    }
    return { stdout: `${version}\n`, stderr: "" };
  };

export type RecordingReporter = Reporter & {
  stdout: string[];
  stderr: string[];
};

export const createRecordingReporter = (): RecordingReporter => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const reporter = createReporter({
    stdout: (text) => {
      stdout.push(text);
    },
    stderr: (text) => {
      stderr.push(text);
    },
  });
  return { ...reporter, stdout, stderr };
};
