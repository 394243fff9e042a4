/**
 * Central type exports
 */

// Configuration
export type {
  BuildConfig,
  PartialBuildConfig,
  InputConfig,
  OutputConfig,
  SiteConfig,
  MarkdownConfig,
  StylesConfig,
  StylesheetConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { BuildConfigSchema, PartialBuildConfigSchema } from "./config";

// Files
export type {
  PostDescriptor,
  Post,
  Page,
  PostMetadata,
  TemplateSet,
  NavigationLink,
  PageTemplateContext,
  IndexTemplateContext,
} from "./files";
export { PostMetadataSchema, CalendarDateSchema } from "./files";

// Context
export type {
  BuildContext,
  BuildMode,
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
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
