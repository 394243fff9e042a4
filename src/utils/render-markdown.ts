import { Marked } from "marked";
import { gfmHeadingId } from "marked-gfm-heading-id";
import type { MarkdownConfig } from "../types";

export type MarkdownRenderer = (markdown: string) => Promise<string>;

/**
 * Create a Markdown to HTML renderer
 * Tables are part of GFM, heading ids follow GitHub's slug rules
 */
export function createMarkdownRenderer(config: MarkdownConfig): MarkdownRenderer {
  const marked = new Marked({ gfm: config.gfm, breaks: config.breaks });

  if (config.headingIds) {
    marked.use(gfmHeadingId());
  }

  return async (markdown) => {
    if (!markdown) return "";
    return await marked.parse(markdown);
  };
}
