import { join, posix, win32 } from "node:path";
import { parse as parseYaml } from "yaml";
import {
  array,
  check,
  getDotPath,
  integer,
  minLength,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  type InferOutput,
} from "valibot";
import type { FileSystemAdapter } from "./file-system.js";
import { errorMessage } from "./errors.js";
import { LAUNCH_MODES, type LaunchMode } from "./platform.js";

export const CONFIG_FILE_NAME = "launcher.config.yaml";

export const RUNTIME_PLACEHOLDER = "{runtime}";

export type EntryConfig = {
  script: string;
  cwd: string;
};

export type InstallerConfig = {
  command: string;
  args: string[];
};

export type LauncherConfig = {
  runtime: {
    // null: use the platform's candidates
    candidates: string[] | null;
    major_version: number;
    isolation_env: string;
  };
  marker_file: string;
  manifest: string;
  installer: InstallerConfig;
  workspace_dir: string;
  // null: use the platform's default mode
  mode: LaunchMode | null;
  entries: Record<LaunchMode, EntryConfig>;
};

export const DEFAULT_LAUNCHER_CONFIG: LauncherConfig = {
  runtime: {
    candidates: null,
    major_version: 3,
    isolation_env: "VIRTUAL_ENV",
  },
  marker_file: "src/main.py",
  manifest: "requirements.txt",
  installer: {
    command: RUNTIME_PLACEHOLDER,
    args: ["-m", "pip", "install", "-r"],
  },
  workspace_dir: "assets",
  mode: null,
  entries: {
    interactive: { script: "main.py", cwd: "src" },
    cli: { script: "cli_main.py", cwd: "." },
  },
};

export const isInsideRoot = (value: string): boolean =>
  !posix.isAbsolute(value) && !win32.isAbsolute(value) && !value.split(/[\\/]/).includes("..");

const relativePath = pipe(
  string(),
  minLength(1, "must not be empty"),
  check(isInsideRoot, "must be a relative path inside the project root"),
);

const entrySchema = object({
  script: optional(relativePath),
  cwd: optional(relativePath),
});

const configFileSchema = object({
  runtime: optional(
    object({
      candidates: optional(
        pipe(
          array(pipe(string(), minLength(1, "must not be empty"))),
          minLength(1, "must list at least one runtime"),
        ),
      ),
      major_version: optional(
        pipe(number(), integer("must be an integer"), minValue(1, "must be at least 1")),
      ),
      isolation_env: optional(
        pipe(string(), regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an environment variable name")),
      ),
    }),
  ),
  marker_file: optional(relativePath),
  manifest: optional(relativePath),
  installer: optional(
    object({
      command: optional(pipe(string(), minLength(1, "must not be empty"))),
      args: optional(array(string())),
    }),
  ),
  workspace_dir: optional(relativePath),
  mode: optional(picklist(LAUNCH_MODES, `must be one of ${LAUNCH_MODES.join(", ")}`)),
  entries: optional(
    object({
      interactive: optional(entrySchema),
      cli: optional(entrySchema),
    }),
  ),
});

type ConfigFile = InferOutput<typeof configFileSchema>;

const mergeEntry = (
  base: EntryConfig,
  file: { script?: string | undefined; cwd?: string | undefined } | undefined,
): EntryConfig => ({
  script: file?.script ?? base.script,
  cwd: file?.cwd ?? base.cwd,
});

const mergeConfig = (base: LauncherConfig, file: ConfigFile): LauncherConfig => ({
  runtime: {
    candidates: file.runtime?.candidates ?? base.runtime.candidates,
    major_version: file.runtime?.major_version ?? base.runtime.major_version,
    isolation_env: file.runtime?.isolation_env ?? base.runtime.isolation_env,
  },
  marker_file: file.marker_file ?? base.marker_file,
  manifest: file.manifest ?? base.manifest,
  installer: {
    command: file.installer?.command ?? base.installer.command,
    args: file.installer?.args ?? base.installer.args,
  },
  workspace_dir: file.workspace_dir ?? base.workspace_dir,
  mode: file.mode ?? base.mode,
  entries: {
    interactive: mergeEntry(base.entries.interactive, file.entries?.interactive),
    cli: mergeEntry(base.entries.cli, file.entries?.cli),
  },
});

export type LoadConfigResult = { ok: true; config: LauncherConfig } | { ok: false; errors: string[] };

export const loadLauncherConfig = (options: {
  cwd: string;
  fileSystem: FileSystemAdapter;
}): LoadConfigResult => {
  const configPath = join(options.cwd, CONFIG_FILE_NAME);

  let text: string;
  try {
    if (options.fileSystem.pathKindSync(configPath) === "missing") {
      return { ok: true, config: DEFAULT_LAUNCHER_CONFIG };
    }
    text = options.fileSystem.readTextFileSync(configPath);
  } catch (err: unknown) {
    return { ok: false, errors: [`${CONFIG_FILE_NAME} could not be read: ${errorMessage(err)}`] };
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    return { ok: false, errors: [`${CONFIG_FILE_NAME} is not valid YAML: ${errorMessage(err)}`] };
  }
  if (raw === null || raw === undefined) {
    return { ok: true, config: DEFAULT_LAUNCHER_CONFIG };
  }

  const parsed = safeParse(configFileSchema, raw);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.issues.map((issue) => {
        const field = getDotPath(issue);
        return field
          ? `${CONFIG_FILE_NAME}: ${field}: ${issue.message}`
          : `${CONFIG_FILE_NAME}: ${issue.message}`;
      }),
    };
  }
  return { ok: true, config: mergeConfig(DEFAULT_LAUNCHER_CONFIG, parsed.output) };
};
