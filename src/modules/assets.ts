/**
 * Assets Module
 * Places the prebuilt Tailwind stylesheet in the output tree, or checks it is there
 */

import { copyFile, mkdir } from "fs/promises";
import path from "node:path";
import { fileExists } from "../utils";
import type { BuildContext } from "../types";

export async function assets(ctx: BuildContext): Promise<void> {
  const { config, tracker, logger } = ctx;
  const target = path.resolve(ctx.output, config.stylesheet.path);
  const source = config.stylesheet.source
    ? path.resolve(config.stylesheet.source)
    : null;

  // Nothing to copy: the stylesheet is expected to be built already
  if (source === null || source === target) {
    if (await fileExists(target)) {
      tracker.setStylesheetStatus("present");
      return;
    }
    tracker.trackResource(
      config.stylesheet.path,
      "stylesheet-missing",
      `Expected a prebuilt stylesheet at ${target}`,
    );
    tracker.setStylesheetStatus("missing");
    return;
  }

  if (!(await fileExists(source))) {
    tracker.trackResource(
      source,
      "copy-failed",
      `Stylesheet source not found: ${source}`,
    );
    tracker.setStylesheetStatus("failed");
    return;
  }

  if (ctx.dryRun) {
    tracker.setStylesheetStatus("copied");
    return;
  }

  try {
    await mkdir(path.dirname(target), { recursive: true });
    await copyFile(source, target);
    tracker.setStylesheetStatus("copied");
    logger.debug(`Copied ${source} -> ${target}`);
  } catch (error) {
    tracker.trackResource(
      source,
      "copy-failed",
      error instanceof Error ? error.message : String(error),
    );
    tracker.setStylesheetStatus("failed");
  }
}
