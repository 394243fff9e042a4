import type { IndexTemplateContext } from "../types";
import { loadTemplate, type Template } from "./load-template";
import { getDefaultIndexTemplate } from "./get-default-index-template";

/**
 * Load index template (custom index.html.hbs or default)
 */
export async function loadIndexTemplate(
  templatePath: string | null,
): Promise<Template<IndexTemplateContext>> {
  return loadTemplate<IndexTemplateContext>(templatePath, getDefaultIndexTemplate());
}
