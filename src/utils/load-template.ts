import Handlebars from "handlebars";
import { readFile } from "fs/promises";

// Register comparison helpers
Handlebars.registerHelper("eq", (a: unknown, b: unknown) => a === b);
Handlebars.registerHelper("ne", (a: unknown, b: unknown) => a !== b);
Handlebars.registerHelper("and", (a: unknown, b: unknown) => Boolean(a && b));
Handlebars.registerHelper("or", (a: unknown, b: unknown) => Boolean(a || b));
Handlebars.registerHelper("not", (a: unknown) => !a);

// Register join helper
// Usage: {{join tags ", "}}
Handlebars.registerHelper("join", (items: unknown, separator: unknown) => {
  if (!Array.isArray(items)) return "";
  return items.map(String).join(typeof separator === "string" ? separator : ", ");
});

export type Template<T> = Handlebars.TemplateDelegate<T>;

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<Template<T>> {
  if (templatePath === null) {
    return Handlebars.compile<T>(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<T>(templateContent);
}
