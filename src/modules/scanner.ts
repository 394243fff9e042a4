/**
 * Scanner Module
 * Resolves the input path, discovers Markdown files and builds post descriptors
 */

import glob from "fast-glob";
import path from "node:path";
import {
  fileExists,
  pathKind,
  isInside,
  toPosix,
  toOutputPath,
} from "../utils";
import type {
  BuildContext,
  BuildConfig,
  PostDescriptor,
  TemplateSet,
} from "../types";

/**
 * Detect template files in a directory
 * Returns paths to template files if they exist
 */
async function detectTemplates(directory: string): Promise<TemplateSet> {
  const pagePath = path.join(directory, "page.html.hbs");
  const indexPath = path.join(directory, "index.html.hbs");

  return {
    page: (await fileExists(pagePath)) ? pagePath : null,
    index: (await fileExists(indexPath)) ? indexPath : null,
  };
}

function describe(
  inputRoot: string,
  inputPath: string,
  output: string,
  config: BuildConfig,
): PostDescriptor {
  const relativePath = toPosix(path.relative(inputRoot, inputPath));
  const outputRelativePath = toOutputPath(
    relativePath,
    config.output.extension,
  );

  return {
    inputPath,
    relativePath,
    outputRelativePath,
    outputPath: path.join(output, outputRelativePath),
    directory: path.posix.dirname(relativePath),
    filename: path.posix.parse(relativePath).name,
  };
}

/**
 * Scans the input path and populates context
 *
 * Writes to context:
 * - mode: "file" for a single post, "directory" for a tree
 * - inputRoot: Directory relative paths start from
 * - files: All discovered Markdown files, sorted by relative path
 * - templates: Custom templates from the input root
 */
export async function scan(ctx: BuildContext): Promise<void> {
  const { config, logger } = ctx;
  const input = path.resolve(ctx.input);
  const output = path.resolve(ctx.output);

  const kind = await pathKind(input);
  if (kind === null) {
    throw new Error(
      `The path specified does not exist or is not accessible: ${ctx.input}`,
    );
  }
  if (kind === "other") {
    throw new Error(
      `The path specified is neither a file nor a directory: ${ctx.input}`,
    );
  }

  // Single file: its directory is the root, no navigation between posts
  if (kind === "file") {
    const inputRoot = path.dirname(input);
    ctx.mode = "file";
    ctx.inputRoot = inputRoot;
    ctx.templates = await detectTemplates(inputRoot);
    ctx.files = [describe(inputRoot, input, output, config)];
    logger.debug(`Converting single file ${ctx.files[0].relativePath}`);
    return;
  }

  const ignore = [...config.input.ignore, "**/*.hbs"];

  // Never read back pages from an output tree nested in the input
  if (output !== input && isInside(output, input)) {
    ignore.push(`${glob.escapePath(toPosix(path.relative(input, output)))}/**`);
  }

  const markdownFiles = await glob(config.input.pattern, {
    cwd: input,
    absolute: true,
    onlyFiles: true,
    ignore,
  });

  const files = markdownFiles
    .map((inputPath) => describe(input, inputPath, output, config))
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  logger.debug(`Found ${files.length} Markdown files in ${input}`);

  ctx.mode = "directory";
  ctx.inputRoot = input;
  ctx.templates = await detectTemplates(input);
  ctx.files = files;
}
