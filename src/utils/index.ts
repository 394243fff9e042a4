/**
 * Utility exports
 */

// Path utilities
export {
  toPosix,
  toOutputPath,
  relativeHref,
  rootPrefix,
  isInside,
} from "./paths";

// Filesystem utilities
export { fileExists, pathKind } from "./file-exists";
export type { PathKind } from "./file-exists";

// Content utilities
export { parseFrontMatter } from "./parse-front-matter";
export type { FrontMatterResult } from "./parse-front-matter";
export { createMarkdownRenderer } from "./render-markdown";
export type { MarkdownRenderer } from "./render-markdown";
export { applyClasses } from "./apply-classes";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Template utilities
export { loadTemplate } from "./load-template";
export type { Template } from "./load-template";
export { loadPageTemplate } from "./load-page-template";
export { loadIndexTemplate } from "./load-index-template";
export { getDefaultPageTemplate } from "./get-default-page-template";
export { getDefaultIndexTemplate } from "./get-default-index-template";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
