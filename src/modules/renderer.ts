/**
 * Renderer Module
 * Wraps each converted post in the page template and writes it to the
 * mirrored output path
 */

import { writeFile } from "fs/promises";
import { loadPageTemplate, relativeHref, rootPrefix } from "../utils";
import type {
  BuildContext,
  NavigationLink,
  Page,
  PageTemplateContext,
} from "../types";

export async function render(ctx: BuildContext): Promise<void> {
  if (!ctx.pages || !ctx.mode || !ctx.templates) {
    throw new Error("Converter must run before renderer");
  }

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, tracker, logger, pages, mode, templates, indexHref } = ctx;

  let template = await loadPageTemplate(null);
  if (templates.page) {
    try {
      template = await loadPageTemplate(templates.page);
    } catch (error) {
      tracker.trackResource(
        templates.page,
        "template-error",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  // ============================================================================
  // Helper Functions
  // ============================================================================

  function link(from: Page, to: Page): NavigationLink {
    return {
      title: to.metadata.title,
      href: relativeHref(from.outputRelativePath, to.outputRelativePath),
    };
  }

  function buildNavigation(index: number): PageTemplateContext["navigation"] {
    const post = pages[index];
    const navigation: PageTemplateContext["navigation"] = {};

    if (indexHref) {
      navigation.index = relativeHref(post.outputRelativePath, indexHref);
    }

    // A single converted file stands alone
    if (mode === "file") {
      return navigation;
    }

    if (index > 0) {
      navigation.prev = link(post, pages[index - 1]);
    }
    if (index < pages.length - 1) {
      navigation.next = link(post, pages[index + 1]);
    }

    return navigation;
  }

  function renderPage(post: Page, index: number): string {
    const context: PageTemplateContext = {
      title: post.metadata.title,
      date: post.metadata.date,
      description: post.metadata.description,
      tags: post.metadata.tags ?? [],
      metadata: post.metadata,
      lang: config.site.lang,
      site: config.site.title,
      stylesheet: relativeHref(
        post.outputRelativePath,
        config.stylesheet.path,
      ),
      cdn: config.stylesheet.cdn,
      root: rootPrefix(post.outputRelativePath),
      navigation: buildNavigation(index),
      content: post.html,
    };

    return template(context);
  }

  // ============================================================================
  // Main Orchestration
  // ============================================================================

  for (const [index, post] of pages.entries()) {
    let page: string;
    try {
      page = renderPage(post, index);
    } catch (error) {
      tracker.trackError(post.relativePath, error, "file", "render");
      tracker.incrementFailed();
      continue;
    }

    if (!ctx.dryRun) {
      try {
        await writeFile(post.outputPath, page, "utf-8");
      } catch (error) {
        tracker.trackError(post.relativePath, error, "file", "write");
        tracker.incrementFailed();
        continue;
      }
    }

    post.written = true;
    tracker.incrementSuccessful();
    logger.debug(`${post.relativePath} -> ${post.outputRelativePath}`);
  }
}
