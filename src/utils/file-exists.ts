import { access, stat } from "node:fs/promises";
import { constants } from "node:fs";
import type { PathProbe } from "../types";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function directoryExists(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a regular file
 */
export async function regularFileExists(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

export const fsPathProbe: PathProbe = {
  fileExists: regularFileExists,
  directoryExists,
};
