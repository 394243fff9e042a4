import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { applyCliOptions, buildCommand, defaultOutput } from "./build";
import { loadDefaultConfig, fileExists } from "../../utils";

describe("build command", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ebolg-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Flags
  // ==========================================================================
  describe("applyCliOptions", () => {
    it("maps flags onto the configuration", async () => {
      const config = await loadDefaultConfig();
      applyCliOptions(config, {
        stylesheet: "dist/tailwind.css",
        index: false,
        verbose: true,
      });

      expect(config.stylesheet.source).toBe("dist/tailwind.css");
      expect(config.output.createIndex).toBe(false);
      expect(config.logging.level).toBe("debug");
    });

    it("leaves the configuration alone without flags", async () => {
      const config = await loadDefaultConfig();
      applyCliOptions(config, { index: true });

      expect(config.stylesheet.source).toBeNull();
      expect(config.output.createIndex).toBe(true);
      expect(config.logging.level).toBe("info");
    });
  });

  describe("defaultOutput", () => {
    it("uses a directory input as the output", async () => {
      expect(await defaultOutput(dir)).toBe(dir);
    });

    it("uses the directory holding a file input", async () => {
      const file = join(dir, "post.md");
      await writeFile(file, "# Post\n");
      expect(await defaultOutput(file)).toBe(dir);
    });
  });

  // ==========================================================================
  // Runs
  // ==========================================================================
  describe("buildCommand", () => {
    it("writes pages beside their sources when no output is given", async () => {
      await writeFile(
        join(dir, "hello.md"),
        "---\ntitle: Hello\ndate: 2024-05-06\n---\nHi.\n",
      );

      await buildCommand(dir, undefined, { verbose: true });

      expect(await fileExists(join(dir, "hello.html"))).toBe(true);
      expect(process.exitCode).toBeUndefined();
    });

    it("sets a failing exit code when a file fails", async () => {
      const file = join(dir, "draft.md");
      await writeFile(file, "no front matter\n");

      await buildCommand(file, join(dir, "site"), { verbose: true });

      expect(process.exitCode).toBe(1);
    });
  });
});
