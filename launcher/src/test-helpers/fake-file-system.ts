import { dirname } from "node:path";
import type { FileSystemAdapter } from "../file-system.js";

type FakeFileSystemInit = {
  files?: Record<string, string>;
  directories?: string[];
  executables?: string[];
};

export type FakeFileSystem = FileSystemAdapter & {
  files: Map<string, string>;
  directories: Set<string>;
  mkdirCalls: string[];
};

const codedError = (code: string, message: string): Error =>
  Object.assign(new Error(`${code}: ${message}`), { code });

export const createFakeFileSystem = (init: FakeFileSystemInit = {}): FakeFileSystem => {
  const files = new Map(Object.entries(init.files ?? {}));
  const executables = new Set(init.executables ?? []);
  const directories = new Set(init.directories ?? []);
  const mkdirCalls: string[] = [];

  return {
    files,
    directories,
    mkdirCalls,
    readTextFileSync: (filePath) => {
      const text = files.get(filePath);
      if (text === undefined) {
        throw codedError("ENOENT", `no such file ${filePath}`);
      }
      return text;
    },
    pathKindSync: (filePath) => {
      if (files.has(filePath) || executables.has(filePath)) {
        return "file";
      }
      return directories.has(filePath) ? "directory" : "missing";
    },
    isExecutableSync: (filePath) => executables.has(filePath),
    makeDirectorySync: (dirPath) => {
      mkdirCalls.push(dirPath);
      let current = dirPath;
      while (!directories.has(current) && current !== dirname(current)) {
        directories.add(current);
        current = dirname(current);
      }
    },
  };
};
