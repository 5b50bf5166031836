#!/usr/bin/env node
import { nodeExecFile, nodeSpawnProcess } from "./child-process.js";
import { nodeFileSystemAdapter } from "./file-system.js";
import { loadLocalEnv } from "./local-env.js";
import { runBootstrap } from "./pipeline.js";
import { processReporter } from "./reporter.js";

const reporter = processReporter();

try {
  reporter.step("bootstrap", "starting Crypto Clipboard");
  loadLocalEnv();
  const exitCode = await runBootstrap({
    argv: process.argv.slice(2),
    env: process.env,
    cwd: process.cwd(),
    platform: process.platform,
    fileSystem: nodeFileSystemAdapter,
    execFile: nodeExecFile,
    spawnProcess: nodeSpawnProcess,
    signals: process,
    reporter,
  });
  process.exit(exitCode);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[bootstrap] unexpected error: ${message}\n`);
  process.exit(1);
}
