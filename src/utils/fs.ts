import * as fs from "fs/promises";
import { constants as fsConstants } from "fs";
import * as path from "path";
import { globIterate } from "glob";
import ignore, { Ignore } from "ignore";

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalize path separators for cross-platform compatibility
 * Converts all path separators to forward slashes for consistent storage
 */
export function normalizePath(filePath: string): string {
  return path.posix.normalize(filePath.replace(/\\/g, "/"));
}

/**
 * Split a relative POSIX path into directory and file name
 */
export function splitPath(relativePath: string): {
  dirName: string;
  baseName: string;
} {
  const normalized = normalizePath(relativePath);
  return {
    dirName: path.posix.dirname(normalized),
    baseName: path.posix.basename(normalized),
  };
}

/**
 * Inverse of splitPath
 */
export function joinPath(dirName: string, baseName: string): string {
  return path.posix.join(dirName, baseName);
}

/**
 * Build a gitignore-style matcher. Returns null when there is nothing to
 * exclude.
 */
export function createExcluder(excludePatterns: string[]): Ignore | null {
  if (excludePatterns.length === 0) return null;
  return ignore().add(excludePatterns);
}

export interface WalkOptions {
  excluder?: Ignore | null;
  onUnreadableDirectory?: (dirPath: string, error: unknown) => void;
  onSkipped?: (filePath: string, reason: string) => void;
}

export interface WalkEntry {
  relativePath: string;
  fullPath: string;
}

/**
 * Lazily enumerate regular files under rootDir matching a glob.
 *
 * Symbolic links are never followed and never yielded; nor are sockets,
 * FIFOs or devices. A plain `*` segment in the pattern lets glob descend
 * through a linked directory, so entries below one are dropped here.
 * Directories that turn up in the walk but cannot be listed are reported
 * through onUnreadableDirectory; only patterns that yield directories (such
 * as `**`) see them.
 */
export async function* walkFiles(
  rootDir: string,
  pattern: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
  const entries = globIterate(pattern, {
    cwd: rootDir,
    dot: true,
    nocase: true,
    follow: false,
    withFileTypes: true,
  });

  for await (const entry of entries) {
    const relativePath = entry.relativePosix();
    if (relativePath.length === 0) continue;

    if (options.excluder?.ignores(relativePath)) {
      continue;
    }

    // parents below rootDir, nearest first
    let linked = false;
    let parent = entry.parent;
    for (let depth = relativePath.split("/").length - 1; depth > 0; depth--) {
      if (parent === undefined) break;
      if (parent.isSymbolicLink()) {
        linked = true;
        break;
      }
      parent = parent.parent;
    }
    if (linked) {
      options.onSkipped?.(relativePath, "inside a linked directory");
      continue;
    }

    if (entry.isDirectory()) {
      if (options.onUnreadableDirectory) {
        try {
          await fs.access(entry.fullpath(), fsConstants.R_OK | fsConstants.X_OK);
        } catch (error) {
          options.onUnreadableDirectory(relativePath, error);
        }
      }
      continue;
    }

    if (entry.isSymbolicLink()) {
      options.onSkipped?.(relativePath, "symbolic link");
      continue;
    }
    if (!entry.isFile()) {
      options.onSkipped?.(relativePath, "not a regular file");
      continue;
    }

    yield { relativePath, fullPath: entry.fullpath() };
  }
}

/**
 * Fail unless rootDir is a directory we can list
 */
export async function assertReadableDirectory(rootDir: string): Promise<void> {
  const stats = await fs.stat(rootDir);
  if (!stats.isDirectory()) {
    throw new Error(`Not a directory: ${rootDir}`);
  }
  await fs.access(rootDir, fsConstants.R_OK | fsConstants.X_OK);
}
