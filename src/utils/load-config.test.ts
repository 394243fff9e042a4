import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadConfig", () => {
  let dir: string;
  let missingUserConfig: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ebolg-config-"));
    missingUserConfig = join(dir, "missing", "config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the defaults", async () => {
    const { config, errors } = await loadConfig(undefined, missingUserConfig);
    expect(errors).toEqual([]);
    expect(config.output.extension).toBe(".html");
    expect(config.stylesheet.path).toBe("style/tailwind.css");
    expect(config.styles.classes.h1).toBe("text-3xl font-bold");
  });

  it("merges a custom config over the defaults", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(
      custom,
      JSON.stringify({
        site: { title: "Notes" },
        styles: { classes: { h1: "text-4xl" } },
      }),
    );

    const { config, errors } = await loadConfig(custom, missingUserConfig);
    expect(errors).toEqual([]);
    expect(config.site.title).toBe("Notes");
    expect(config.site.lang).toBe("en");
    expect(config.styles.classes.h1).toBe("text-4xl");
    expect(config.styles.classes.p).toBe("text-gray-400 mb-4");
  });

  it("applies the user config before the custom config", async () => {
    const user = join(dir, "user.json");
    const custom = join(dir, "custom.json");
    await writeFile(user, JSON.stringify({ site: { title: "User", lang: "pt" } }));
    await writeFile(custom, JSON.stringify({ site: { title: "Custom" } }));

    const { config } = await loadConfig(custom, user);
    expect(config.site).toEqual({ title: "Custom", lang: "pt" });
  });

  it("ignores a config that fails validation", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ output: { extension: "html" } }));

    const { config, errors } = await loadConfig(custom, missingUserConfig);
    expect(config.output.extension).toBe(".html");
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(custom);
    expect(errors[0].error).toBeInstanceOf(ZodError);
  });

  it("ignores a config that is not JSON", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, "{ not json");

    const { errors } = await loadConfig(custom, missingUserConfig);
    expect(errors).toHaveLength(1);
    expect(errors[0].error).toBeInstanceOf(SyntaxError);
  });
});

describe("mergeConfig", () => {
  it("replaces arrays and keeps untouched sections", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { input: { ignore: ["drafts/**"] } });
    expect(merged.input).toEqual({ pattern: "**/*.md", ignore: ["drafts/**"] });
    expect(merged.output).toEqual(base.output);
  });
});
