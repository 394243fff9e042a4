import { load } from "cheerio";

/**
 * Add Tailwind utility classes to an HTML fragment
 * Each selector in the map receives its classes; existing classes are kept
 *
 * @example
 * applyClasses("<h1>Hi</h1>", { h1: "text-3xl font-bold" })
 * // '<h1 class="text-3xl font-bold">Hi</h1>'
 */
export function applyClasses(
  html: string,
  classes: Record<string, string>,
): string {
  if (!html) return "";

  const $ = load(html, null, false);

  for (const [selector, classNames] of Object.entries(classes)) {
    const value = classNames.trim();
    if (!value) continue;
    $(selector).addClass(value);
  }

  return $.html();
}
