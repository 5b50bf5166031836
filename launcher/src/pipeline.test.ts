import { EventEmitter } from "node:events";
import { describe, expect, it } from "vitest";

import type { ChildExit, ExecFile } from "./child-process.js";
import { EXIT_CODES } from "./exit-codes.js";
import { runBootstrap, type BootstrapDeps } from "./pipeline.js";
import { createFakeFileSystem, type FakeFileSystem } from "./test-helpers/fake-file-system.js";
import {
  createFakeSpawn,
  createRecordingReporter,
  fakeExecFile,
} from "./test-helpers/fake-process.js";

const projectFiles = {
  "/work/app/src/main.py": "",
  "/work/app/cli_main.py": "",
  "/work/app/requirements.txt": "cryptography\npyperclip\n",
};

const setup = (
  options: {
    exits?: ChildExit[];
    fileSystem?: FakeFileSystem;
    env?: Record<string, string | undefined>;
    argv?: string[];
    platform?: string;
    execFile?: ExecFile;
  } = {},
) => {
  const fileSystem =
    options.fileSystem ??
    createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: projectFiles,
      directories: ["/work/app", "/work/app/src"],
    });
  const spawn = createFakeSpawn(options.exits ?? []);
  const reporter = createRecordingReporter();
  const deps: BootstrapDeps = {
    argv: options.argv ?? [],
    env: options.env ?? { PATH: "/usr/bin", VIRTUAL_ENV: "/work/app/venv" },
    cwd: "/work/app",
    platform: options.platform ?? "linux",
    fileSystem,
    execFile: options.execFile ?? fakeExecFile({ "/usr/bin/python3": "Python 3.11.4" }),
    spawnProcess: spawn.spawnProcess,
    signals: new EventEmitter(),
    reporter,
  };
  return { deps, fileSystem, spawn, reporter };
};

describe("runBootstrap", () => {
  it("halts before provisioning when the runtime is absent", async () => {
    const fileSystem = createFakeFileSystem({ files: projectFiles, directories: ["/work/app"] });
    const { deps, spawn } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.RUNTIME_NOT_FOUND);
    expect(spawn.calls).toEqual([]);
    expect(fileSystem.mkdirCalls).toEqual([]);
  });

  it("halts with the wrong-directory code outside the project root", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: { "/work/app/requirements.txt": "" },
    });
    const { deps, spawn } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.WRONG_DIRECTORY);
    expect(spawn.calls).toEqual([]);
    expect(fileSystem.mkdirCalls).toEqual([]);
  });

  it("halts when the manifest is missing without touching the workspace", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: { "/work/app/src/main.py": "", "/work/app/cli_main.py": "" },
    });
    const { deps, spawn, reporter } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.MANIFEST_MISSING);
    expect(spawn.calls).toEqual([]);
    expect(fileSystem.mkdirCalls).toEqual([]);
    expect(reporter.stderr).toEqual(["[deps] error: /work/app/requirements.txt not found\n"]);
  });

  it("still prepares the workspace and launches when the installer fails", async () => {
    const { deps, spawn, fileSystem, reporter } = setup({
      exits: [
        { kind: "exited", code: 1 },
        { kind: "exited", code: 0 },
      ],
    });

    const code = await runBootstrap(deps);

    expect(code).toBe(0);
    expect(spawn.calls).toHaveLength(2);
    expect(fileSystem.mkdirCalls).toEqual(["/work/app/assets"]);
    expect(reporter.stdout).toContain("[deps] warning: some dependencies may not have installed\n");
  });

  it("runs the whole sequence and exits with the entry's status", async () => {
    const { deps, spawn, fileSystem, reporter } = setup({
      env: { PATH: "/usr/bin" },
      argv: ["--verbose", "foo"],
      exits: [
        { kind: "exited", code: 0 },
        { kind: "exited", code: 3 },
      ],
    });

    const code = await runBootstrap(deps);

    expect(code).toBe(3);
    expect(reporter.stdout).toContain(
      "[preflight] warning: no isolated environment detected (VIRTUAL_ENV is not set)\n",
    );
    expect(spawn.calls[0]?.args).toEqual([
      "-m",
      "pip",
      "install",
      "-r",
      "/work/app/requirements.txt",
    ]);
    expect(fileSystem.directories.has("/work/app/assets")).toBe(true);
    expect(spawn.calls[1]).toEqual({
      command: "/usr/bin/python3",
      args: ["cli_main.py", "--verbose", "foo"],
      options: { cwd: "/work/app", stdio: "inherit" },
    });
    expect(reporter.stderr).toEqual([]);
  });

  it("starts the interactive entry from its own directory when requested", async () => {
    const { deps, spawn } = setup({
      env: { PATH: "/usr/bin", CRYPTOCLIP_LAUNCH_MODE: "interactive" },
      argv: ["--minimized"],
    });

    await runBootstrap(deps);

    expect(spawn.calls[1]).toEqual({
      command: "/usr/bin/python3",
      args: ["main.py", "--minimized"],
      options: { cwd: "/work/app/src", stdio: "inherit" },
    });
  });

  it("defaults to the interactive entry on Windows", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["C:\\Python311\\python.EXE"],
      files: projectFiles,
      directories: ["/work/app", "/work/app/src"],
    });
    const { deps, spawn } = setup({
      fileSystem,
      platform: "win32",
      env: { Path: "C:\\Python311", PATHEXT: ".EXE" },
    });

    await runBootstrap(deps);

    expect(spawn.calls[0]?.command).toBe("C:\\Python311\\python.EXE");
    expect(spawn.calls[1]).toEqual({
      command: "C:\\Python311\\python.EXE",
      args: ["main.py"],
      options: { cwd: "/work/app/src", stdio: "inherit" },
    });
  });

  it("stops on an invalid config file before any check runs", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: { ...projectFiles, "/work/app/launcher.config.yaml": "mode: gui\n" },
    });
    const { deps, spawn, reporter } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.CONFIG_INVALID);
    expect(spawn.calls).toEqual([]);
    expect(reporter.stdout).toEqual([]);
    expect(reporter.stderr).toEqual([
      "[config] error: launcher.config.yaml: mode: must be one of interactive, cli\n",
    ]);
  });

  it("stops on an unknown launch mode override before the handoff", async () => {
    const { deps, reporter, spawn, fileSystem } = setup({
      env: { PATH: "/usr/bin", CRYPTOCLIP_LAUNCH_MODE: "gui" },
    });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.CONFIG_INVALID);
    expect(spawn.calls).toHaveLength(1);
    expect(fileSystem.mkdirCalls).toEqual(["/work/app/assets"]);
    expect(reporter.stderr).toEqual([
      '[config] error: CRYPTOCLIP_LAUNCH_MODE must be one of interactive, cli (got "gui")\n',
    ]);
  });

  it("keeps the runtime exit code when the mode override is also invalid", async () => {
    const fileSystem = createFakeFileSystem({ files: projectFiles, directories: ["/work/app"] });
    const { deps, spawn } = setup({
      fileSystem,
      env: { PATH: "/usr/bin", CRYPTOCLIP_LAUNCH_MODE: "gui" },
    });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.RUNTIME_NOT_FOUND);
    expect(spawn.calls).toEqual([]);
  });

  it("keeps the wrong-directory exit code when the mode override is also invalid", async () => {
    const fileSystem = createFakeFileSystem({ executables: ["/usr/bin/python3"] });
    const { deps } = setup({
      fileSystem,
      env: { PATH: "/usr/bin", CRYPTOCLIP_LAUNCH_MODE: "gui" },
    });

    expect(await runBootstrap(deps)).toBe(EXIT_CODES.WRONG_DIRECTORY);
  });

  it("halts before provisioning when the only runtime is Python 2", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python"],
      files: projectFiles,
      directories: ["/work/app", "/work/app/src"],
    });
    const { deps, spawn } = setup({
      fileSystem,
      execFile: fakeExecFile({ "/usr/bin/python": "Python 2.7.18" }),
    });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.RUNTIME_NOT_FOUND);
    expect(spawn.calls).toEqual([]);
    expect(fileSystem.mkdirCalls).toEqual([]);
  });

  it("does not launch when the workspace cannot be prepared", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: { ...projectFiles, "/work/app/assets": "" },
    });
    const { deps, spawn } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.WORKSPACE_ERROR);
    expect(spawn.calls).toHaveLength(1);
  });

  it("does not launch when the selected entry is missing", async () => {
    const fileSystem = createFakeFileSystem({
      executables: ["/usr/bin/python3"],
      files: { "/work/app/src/main.py": "", "/work/app/requirements.txt": "" },
    });
    const { deps, spawn, reporter } = setup({ fileSystem });

    const code = await runBootstrap(deps);

    expect(code).toBe(EXIT_CODES.LAUNCH_FAILED);
    expect(spawn.calls).toHaveLength(1);
    expect(reporter.stderr).toEqual(["[launch] error: entry cli_main.py not found in /work/app\n"]);
  });
});

describe("EXIT_CODES", () => {
  it("assigns a distinct non-zero code to every launcher failure", () => {
    const codes = Object.values(EXIT_CODES);

    expect(new Set(codes).size).toBe(codes.length);
    expect(codes).not.toContain(0);
  });
});
