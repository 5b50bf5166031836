// Best-effort local env loading: fills CRYPTOCLIP_* variables the shell
// left unset. Other keys in the file are ignored.

import { join } from "node:path";
import { nodeFileSystemAdapter, type FileSystemAdapter } from "./file-system.js";

export const LOCAL_ENV_FILE_NAME = "launcher.env";
export const LOCAL_ENV_PATH_OVERRIDE = "CRYPTOCLIP_LAUNCHER_ENV_PATH";
export const LOCAL_ENV_KEY_PREFIX = "CRYPTOCLIP_";

export const parseEnvFile = (text: string): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    const normalized = line.startsWith("export ") ? line.slice("export ".length).trim() : line;
    const eqIndex = normalized.indexOf("=");
    if (eqIndex <= 0) {
      continue;
    }
    const key = normalized.slice(0, eqIndex).trim();
    if (!/^[A-Z_][A-Z0-9_]*$/.test(key)) {
      continue;
    }
    let value = normalized.slice(eqIndex + 1).trim();

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
};

type LoadEnvDeps = {
  env: Record<string, string | undefined>;
  cwd: string;
  fileSystem: FileSystemAdapter;
};

const defaultDeps = (): LoadEnvDeps => ({
  env: process.env,
  cwd: process.cwd(),
  fileSystem: nodeFileSystemAdapter,
});

export const loadLocalEnv = (deps: Partial<LoadEnvDeps> = {}): string | null => {
  const d = { ...defaultDeps(), ...deps } satisfies LoadEnvDeps;

  const override = (d.env[LOCAL_ENV_PATH_OVERRIDE] ?? "").trim();
  const envPath = override || join(d.cwd, LOCAL_ENV_FILE_NAME);

  try {
    if (d.fileSystem.pathKindSync(envPath) !== "file") {
      return null;
    }
    const parsed = parseEnvFile(d.fileSystem.readTextFileSync(envPath));
    for (const [key, value] of Object.entries(parsed)) {
      if (key.startsWith(LOCAL_ENV_KEY_PREFIX) && d.env[key] === undefined) {
        d.env[key] = value;
      }
    }
    return envPath;
  } catch {
    // Optional file; an unreadable one is treated as absent.
    return null;
  }
};
