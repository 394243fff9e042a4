/**
 * Pipeline modules export
 */

import type { BuildContext } from "../types";
import { scan } from "./scanner";
import { process } from "./processor";
import { convert } from "./converter";
import { indexer } from "./indexer";
import { render } from "./renderer";
import { assets } from "./assets";

export { scan, process, convert, indexer, render, assets };
export { stats } from "./stats";

export interface PipelineStage {
  label: string;
  run: (ctx: BuildContext) => Promise<void>;
}

/**
 * Build stages in execution order
 * Bodies are converted first so the index and navigation only link pages
 * that will exist; the index is written before pages so they can link to it
 */
export const pipeline: PipelineStage[] = [
  { label: "Scanning files...", run: scan },
  { label: "Reading front matter...", run: process },
  { label: "Converting Markdown...", run: convert },
  { label: "Generating index...", run: indexer },
  { label: "Rendering pages...", run: render },
  { label: "Placing stylesheet...", run: assets },
];

/**
 * Run every build stage against the context
 */
export async function build(
  ctx: BuildContext,
  onStage?: (stage: PipelineStage) => void,
): Promise<void> {
  for (const stage of pipeline) {
    onStage?.(stage);
    await stage.run(ctx);
  }
}
