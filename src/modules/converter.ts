/**
 * Converter Module
 * Turns each post body into classed HTML and prepares its output directory
 *
 * Only posts that get through here are linked from the index and from
 * their neighbours' navigation.
 */

import { mkdir } from "fs/promises";
import { dirname } from "node:path";
import { applyClasses, createMarkdownRenderer } from "../utils";
import type { BuildContext, Page, Post } from "../types";

function isPage(post: Post): post is Page {
  return post.html !== undefined;
}

/**
 * Run the converter module
 *
 * Writes to context:
 * - pages: Converted posts, oldest first
 */
export async function convert(ctx: BuildContext): Promise<void> {
  if (!ctx.posts) {
    throw new Error("Processor must run before converter");
  }

  const { config, tracker, posts } = ctx;
  const renderMarkdown = createMarkdownRenderer(config.markdown);
  const pages: Page[] = [];

  for (const post of posts) {
    let html: string;
    try {
      html = applyClasses(
        await renderMarkdown(post.content),
        config.styles.classes,
      );
    } catch (error) {
      tracker.trackError(post.relativePath, error, "file", "render");
      tracker.incrementFailed();
      continue;
    }

    if (!ctx.dryRun) {
      try {
        await mkdir(dirname(post.outputPath), { recursive: true });
      } catch (error) {
        tracker.trackError(post.relativePath, error, "file", "write");
        tracker.incrementFailed();
        continue;
      }
    }

    post.html = html;
    if (isPage(post)) {
      pages.push(post);
    }
  }

  ctx.pages = pages;
}
