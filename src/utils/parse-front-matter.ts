import matter from "gray-matter";
import { PostMetadataSchema } from "../types";
import type { PostMetadata, SkippedIssueReason } from "../types";

export type FrontMatterResult =
  | { ok: true; metadata: PostMetadata; content: string }
  | { ok: false; reason: SkippedIssueReason; details: string };

/**
 * Split YAML front matter from a Markdown document and validate it
 *
 * @example
 * parseFrontMatter("---\ntitle: Hello\ndate: 2024-01-02\n---\n\n# Body")
 * // { ok: true, metadata: { title: "Hello", date: "2024-01-02" }, content: "# Body" }
 */
export function parseFrontMatter(raw: string): FrontMatterResult {
  // Editors on Windows often save a byte order mark before the opening ---
  const source = raw.replace(/^\uFEFF/, "");

  if (!matter.test(source)) {
    return {
      ok: false,
      reason: "missing-front-matter",
      details: "Document does not start with a --- front matter block",
    };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(source);
  } catch (error) {
    return {
      ok: false,
      reason: "invalid-front-matter",
      details: error instanceof Error ? error.message : String(error),
    };
  }

  const result = PostMetadataSchema.safeParse(parsed.data);
  if (!result.success) {
    return {
      ok: false,
      reason: "invalid-front-matter",
      details: result.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message,
        )
        .join("; "),
    };
  }

  return { ok: true, metadata: result.data, content: parsed.content.trim() };
}
