/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { BuildConfig } from "./config";
import type { PostDescriptor, Post, Page, TemplateSet } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  SkippedIssue,
  ResourceIssue,
  FileIssueReason,
  SkippedIssueReason,
  ResourceIssueReason,
  FileStage,
  StylesheetStatus,
  ProcessingStats,
} from "../utils/tracker";

/**
 * "directory" walks a tree of posts, "file" converts a single post
 */
export type BuildMode = "directory" | "file";

export interface BuildContext {
  // Input - provided at initialization
  config: BuildConfig;
  input: string; // File or directory given on the command line
  output: string; // Output root
  dryRun?: boolean;
  verbose?: boolean;

  // Unified tracking for stats and errors
  tracker: Tracker;
  logger: Logger;

  // Scanner
  mode?: BuildMode;
  inputRoot?: string; // Absolute directory the relative paths start from
  files?: PostDescriptor[]; // All discovered Markdown files
  templates?: TemplateSet; // Custom templates from the input root

  // Processor
  posts?: Post[]; // Valid posts, oldest first

  // Converter
  pages?: Page[]; // Posts ready to be written, oldest first

  // Indexer
  indexHref?: string; // Output-root-relative path of the index page, when one is written
}
