/**
 * Indexer Module
 * Writes the post listing page for directory builds
 *
 * Runs after the converter, so only posts that will be written are listed,
 * and before the renderer, so pages can link back to the index.
 */

import { writeFile, mkdir } from "fs/promises";
import { dirname, join } from "node:path";
import { loadIndexTemplate, relativeHref, toPosix } from "../utils";
import type { BuildContext, IndexTemplateContext } from "../types";

/**
 * Run the indexer module
 *
 * Writes to context:
 * - indexHref: Output-root-relative path of the index page, when written
 */
export async function indexer(ctx: BuildContext): Promise<void> {
  if (!ctx.pages || !ctx.mode || !ctx.templates) {
    throw new Error("Converter must run before indexer");
  }

  const { config, tracker, logger, pages, templates } = ctx;

  if (ctx.mode !== "directory" || !config.output.createIndex) {
    return;
  }

  const indexPath = toPosix(config.output.indexFilename);

  const conflict = pages.find((post) => post.outputRelativePath === indexPath);
  if (conflict) {
    tracker.trackResource(
      indexPath,
      "index-conflict",
      `${conflict.relativePath} already renders to ${indexPath}`,
    );
    return;
  }

  let template = await loadIndexTemplate(null);
  if (templates.index) {
    try {
      template = await loadIndexTemplate(templates.index);
    } catch (error) {
      tracker.trackResource(
        templates.index,
        "template-error",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  const context: IndexTemplateContext = {
    title: config.site.title,
    lang: config.site.lang,
    stylesheet: relativeHref(indexPath, config.stylesheet.path),
    cdn: config.stylesheet.cdn,
    posts: [...pages].reverse().map((post) => ({
      title: post.metadata.title,
      date: post.metadata.date,
      description: post.metadata.description,
      tags: post.metadata.tags ?? [],
      href: relativeHref(indexPath, post.outputRelativePath),
    })),
  };

  let html: string;
  try {
    html = template(context);
  } catch (error) {
    tracker.trackResource(
      templates.index ?? indexPath,
      "template-error",
      error instanceof Error ? error.message : String(error),
    );
    return;
  }

  const outputPath = join(ctx.output, indexPath);
  if (!ctx.dryRun) {
    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, html, "utf-8");
    } catch (error) {
      tracker.trackResource(
        indexPath,
        "write-error",
        error instanceof Error ? error.message : String(error),
      );
      return;
    }
  }

  logger.debug(`Wrote index ${indexPath} (${pages.length} posts)`);
  ctx.indexHref = indexPath;
  tracker.incrementCreatedIndexes();
}
