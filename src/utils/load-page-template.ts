import type { PageTemplateContext } from "../types";
import { loadTemplate, type Template } from "./load-template";
import { getDefaultPageTemplate } from "./get-default-page-template";

/**
 * Load page template (custom page.html.hbs or default)
 */
export async function loadPageTemplate(
  templatePath: string | null,
): Promise<Template<PageTemplateContext>> {
  return loadTemplate<PageTemplateContext>(templatePath, getDefaultPageTemplate());
}
