import type { ExecFile } from "./child-process.js";
import type { FileSystemAdapter } from "./file-system.js";
import { readEnvVar, type PlatformConfig } from "./platform.js";

export type RuntimeProbe = {
  found: boolean;
  command: string | null;
  path: string | null;
  versionString: string | null;
};

type LookupOptions = {
  env: Record<string, string | undefined>;
  platformConfig: PlatformConfig;
  fileSystem: FileSystemAdapter;
};

export const findExecutable = (command: string, options: LookupOptions): string | null => {
  const { platformConfig, fileSystem } = options;
  const p = platformConfig.path;

  const candidatesFor = (base: string) =>
    platformConfig.executableExtensions.map((ext) => `${base}${ext}`);

  if (p.isAbsolute(command)) {
    return candidatesFor(command).find((file) => fileSystem.isExecutableSync(file)) ?? null;
  }

  const searchPath = readEnvVar(options.env, "PATH", platformConfig.platform) ?? "";
  for (const dir of searchPath.split(p.delimiter)) {
    if (!dir) {
      continue;
    }
    for (const file of candidatesFor(p.join(dir, command))) {
      if (fileSystem.isExecutableSync(file)) {
        return file;
      }
    }
  }
  return null;
};

// Python 2 prints its version on stderr.
const readVersion = async (execFile: ExecFile, runtimePath: string): Promise<string | null> => {
  try {
    const { stdout, stderr } = await execFile(runtimePath, ["--version"]);
    return stdout.trim() || stderr.trim() || null;
  } catch {
    return null;
  }
};

// "Python 3.11.4" -> 3; null when no dotted version number appears.
export const parseMajorVersion = (versionString: string): number | null => {
  const match = /(\d+)\.\d+/.exec(versionString);
  return match?.[1] === undefined ? null : Number(match[1]);
};

export type ProbeOptions = LookupOptions & {
  execFile: ExecFile;
  requiredMajor: number;
  onIncompatible?: (path: string, versionString: string) => void;
};

/**
 * Returns the first candidate on PATH whose reported major version matches.
 * A candidate whose version cannot be read is accepted as found.
 */
export const probeRuntime = async (
  candidates: string[],
  options: ProbeOptions,
): Promise<RuntimeProbe> => {
  for (const command of candidates) {
    const found = findExecutable(command, options);
    if (!found) {
      continue;
    }
    const versionString = await readVersion(options.execFile, found);
    const major = versionString === null ? null : parseMajorVersion(versionString);
    if (versionString !== null && major !== null && major !== options.requiredMajor) {
      options.onIncompatible?.(found, versionString);
      continue;
    }
    return { found: true, command, path: found, versionString };
  }
  return { found: false, command: null, path: null, versionString: null };
};
