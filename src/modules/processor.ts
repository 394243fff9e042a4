/**
 * Processor Module
 * Reads every discovered file, validates its front matter and orders the posts
 */

import { readFile } from "fs/promises";
import { parseFrontMatter } from "../utils";
import type { BuildContext, Post, PostDescriptor } from "../types";

function isPost(file: PostDescriptor): file is Post {
  return file.metadata !== undefined && file.content !== undefined;
}

/**
 * Oldest first; posts sharing a date fall back to their path
 */
export function comparePosts(a: Post, b: Post): number {
  if (a.metadata.date < b.metadata.date) return -1;
  if (a.metadata.date > b.metadata.date) return 1;
  return a.relativePath.localeCompare(b.relativePath);
}

/**
 * Parses front matter for all scanned files
 *
 * Reads from context:
 * - files, mode
 *
 * Writes to context:
 * - posts: Files with valid metadata, ordered by date
 */
export async function process(ctx: BuildContext): Promise<void> {
  if (!ctx.files || !ctx.mode) {
    throw new Error("Scanner must run before processor");
  }

  const { files, mode, tracker, logger } = ctx;
  tracker.setTotalFiles(files.length);

  for (const file of files) {
    let raw: string;
    try {
      raw = await readFile(file.inputPath, "utf-8");
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", "read");
      tracker.incrementFailed();
      continue;
    }

    const result = parseFrontMatter(raw);

    if (!result.ok) {
      // A tree may hold drafts and notes without metadata; a single file must be a post
      if (mode === "directory") {
        tracker.trackSkipped(file.relativePath, result.reason, result.details);
        logger.debug(`Skipping ${file.relativePath}: ${result.details}`);
      } else {
        tracker.trackError(
          file.relativePath,
          new Error(result.details),
          "file",
          "parse",
        );
        tracker.incrementFailed();
      }
      continue;
    }

    file.metadata = result.metadata;
    file.content = result.content;
  }

  ctx.posts = files.filter(isPost).sort(comparePosts);
}
