import { stat } from "fs/promises";

export type PathKind = "file" | "directory" | "other";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  return (await pathKind(path)) !== null;
}

/**
 * Resolve what a path points to, or null when it does not exist
 */
export async function pathKind(path: string): Promise<PathKind | null> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "directory";
    return "other";
  } catch {
    return null;
  }
}
