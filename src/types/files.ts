/**
 * Post and template type definitions
 */

import { z } from "zod";

/**
 * Normalise a front matter date to YYYY-MM-DD
 * YAML parses unquoted dates into Date objects, quoted ones stay strings
 */
function toCalendarDate(value: Date | string): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    // Plain YAML dates land on UTC midnight; full timestamps carry a time of day
    const iso = value.toISOString();
    return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : null;
  }

  const text = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}$/.test(text)) {
    return null;
  }

  // Reject dates that roll over (2024-02-30 -> 2024-03-01)
  const date = new Date(`${text}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString().slice(0, 10) === text ? text : null;
}

export const CalendarDateSchema = z
  .union([z.date(), z.string()])
  .transform((value, ctx) => {
    const date = toCalendarDate(value);
    if (date === null) {
      ctx.addIssue({
        code: "custom",
        message: `Invalid date "${String(value)}", expected YYYY-MM-DD`,
      });
      return z.NEVER;
    }
    return date;
  });

/**
 * Post front matter
 *
 * Fields:
 * - title: Page title (required)
 * - date: Publication date, YYYY-MM-DD (required)
 * - description: Summary shown on the index page
 * - tags: Free-form tags for templates
 * - Custom fields allowed for user templates
 */
export const PostMetadataSchema = z.looseObject({
  title: z.string().trim().min(1, "Title must not be empty"),
  date: CalendarDateSchema,
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export type PostMetadata = z.infer<typeof PostMetadataSchema>;

export interface PostDescriptor {
  // Scanner fills these fields:
  inputPath: string; // Absolute path to source Markdown
  relativePath: string; // Relative path from input root (e.g., "2024/hello.md")
  outputRelativePath: string; // Mirrored output path (e.g., "2024/hello.html")
  outputPath: string; // Absolute output path
  directory: string; // Relative directory ("." for the root)
  filename: string; // Base filename without extension

  // Processor fills these fields:
  metadata?: PostMetadata;
  content?: string; // Markdown body without front matter

  // Converter fills these fields:
  html?: string; // Rendered, classed HTML body

  // Renderer fills these fields:
  written?: boolean; // True after the page has been written (or would be, in dry runs)
}

/**
 * A post that passed front matter validation
 */
export type Post = PostDescriptor & { metadata: PostMetadata; content: string };

/**
 * A post whose body converted and whose output directory is ready
 */
export type Page = Post & { html: string };

/**
 * Template file paths
 * Null means use built-in default template
 */
export interface TemplateSet {
  page: string | null; // Path to page.html.hbs
  index: string | null; // Path to index.html.hbs
}

// ============================================================================
// Template Context Types
// ============================================================================

export interface NavigationLink {
  title: string;
  href: string; // Relative to the current page
}

/**
 * Context passed to page templates
 * Available variables in page.html.hbs
 */
export interface PageTemplateContext {
  // Post metadata
  title: string;
  date: string;
  description?: string;
  tags: string[];
  metadata: PostMetadata; // Full front matter for custom fields

  // Site info
  lang: string;
  site: string;
  stylesheet: string; // Relative href to the stylesheet
  cdn: boolean;
  root: string; // Relative prefix to the output root ("" or "../")

  navigation: {
    prev?: NavigationLink; // Older post
    next?: NavigationLink; // Newer post
    index?: string; // Relative href to the index page
  };

  // Main content
  content: string; // Rendered, classed HTML
}

/**
 * Context passed to index templates
 * Available variables in index.html.hbs
 */
export interface IndexTemplateContext {
  title: string;
  lang: string;
  stylesheet: string;
  cdn: boolean;

  // Newest first
  posts: Array<{
    title: string;
    date: string;
    description?: string;
    tags: string[];
    href: string;
  }>;
}
