/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  pattern: z.string(),
  ignore: z.array(z.string()),
});

export const OutputConfigSchema = z.object({
  extension: z.string().regex(/^\.[\w.-]+$/, "Extension must start with a dot"),
  createIndex: z.boolean(),
  indexFilename: z.string().min(1),
  stats: z.boolean(),
});

export const SiteConfigSchema = z.object({
  title: z.string(),
  lang: z.string().min(1),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean(),
  breaks: z.boolean(),
  headingIds: z.boolean(),
});

export const StylesConfigSchema = z.object({
  // Maps CSS selectors to the Tailwind classes added to every match
  // Example: { "h1": "text-3xl font-bold", "pre code": "text-sm" }
  classes: z.record(z.string(), z.string()),
});

export const StylesheetConfigSchema = z.object({
  // Location of the prebuilt stylesheet, relative to the output root
  path: z
    .string()
    .min(1)
    .refine(
      (value) => !value.startsWith("/"),
      "Stylesheet path must be relative to the output root",
    ),
  // Optional stylesheet copied into the output tree on every run
  source: z.string().nullable(),
  // Also include the Tailwind Play CDN script in every page
  cdn: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const BuildConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  site: SiteConfigSchema,
  markdown: MarkdownConfigSchema,
  styles: StylesConfigSchema,
  stylesheet: StylesheetConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialBuildConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  site: SiteConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  styles: StylesConfigSchema.partial().optional(),
  stylesheet: StylesheetConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type StylesConfig = z.infer<typeof StylesConfigSchema>;
export type StylesheetConfig = z.infer<typeof StylesheetConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
