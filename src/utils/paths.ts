/**
 * Path Utilities
 * Output paths are kept POSIX-style so they can be used as hrefs
 */

import path from "node:path";

/**
 * Convert a platform path to forward slashes
 */
export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * Replace the extension of a relative path
 *
 * @example
 * toOutputPath("2024/hello.md", ".html") // "2024/hello.html"
 * toOutputPath("notes.markdown", ".html") // "notes.html"
 */
export function toOutputPath(relativePath: string, extension: string): string {
  const parsed = path.posix.parse(toPosix(relativePath));
  return path.posix.join(parsed.dir, `${parsed.name}${extension}`);
}

/**
 * Build an href from one output page to another output-root-relative path
 *
 * @example
 * relativeHref("2024/hello.html", "style/tailwind.css") // "../style/tailwind.css"
 * relativeHref("hello.html", "2024/next.html") // "2024/next.html"
 */
export function relativeHref(fromPage: string, target: string): string {
  const fromDir = path.posix.dirname(toPosix(fromPage));
  return path.posix.relative(fromDir, toPosix(target));
}

/**
 * Prefix that climbs from a page back to the output root
 *
 * @example
 * rootPrefix("hello.html") // ""
 * rootPrefix("2024/01/hello.html") // "../../"
 */
export function rootPrefix(fromPage: string): string {
  const dir = path.posix.dirname(toPosix(fromPage));
  if (dir === ".") return "";
  return "../".repeat(dir.split("/").length);
}

/**
 * Check whether a path lies inside (or equals) a directory
 */
export function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}
