import { accessSync, constants, mkdirSync, readFileSync, statSync } from "node:fs";

export type PathKind = "file" | "directory" | "other" | "missing";

export type FileSystemAdapter = {
  readTextFileSync: (filePath: string) => string;
  pathKindSync: (filePath: string) => PathKind;
  isExecutableSync: (filePath: string) => boolean;
  makeDirectorySync: (dirPath: string) => void;
};

export const nodeFileSystemAdapter: FileSystemAdapter = {
  readTextFileSync: (filePath) => readFileSync(filePath, "utf8"),
  pathKindSync: (filePath) => {
    const stat = statSync(filePath, { throwIfNoEntry: false });
    if (!stat) {
      return "missing";
    }
    if (stat.isFile()) {
      return "file";
    }
    return stat.isDirectory() ? "directory" : "other";
  },
  isExecutableSync: (filePath) => {
    try {
      if (!statSync(filePath).isFile()) {
        return false;
      }
      accessSync(filePath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  },
  makeDirectorySync: (dirPath) => {
    mkdirSync(dirPath, { recursive: true });
  },
};

// Unreadable paths (EACCES, ENOTDIR) count as absent.
export const safePathKind = (fileSystem: FileSystemAdapter, filePath: string): PathKind => {
  try {
    return fileSystem.pathKindSync(filePath);
  } catch {
    return "missing";
  }
};
