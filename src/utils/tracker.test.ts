import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { Tracker } from "./tracker";

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe("Tracker", () => {
  // ==========================================================================
  // Error mapping
  // ==========================================================================
  describe("trackError", () => {
    it("maps filesystem errors on write to write-error", () => {
      const tracker = new Tracker();
      tracker.trackError("a.md", fsError("EACCES"), "file", "write");
      expect(tracker.getIssues("file")[0].reason).toBe("write-error");
    });

    it("maps missing files to read-error", () => {
      const tracker = new Tracker();
      tracker.trackError("a.md", fsError("ENOENT"), "file", "read");
      expect(tracker.getIssues("file")[0]).toEqual({
        type: "file",
        path: "a.md",
        reason: "read-error",
        details: "ENOENT: failed",
      });
    });

    it("uses the stage for other errors", () => {
      const tracker = new Tracker();
      tracker.trackError("a.md", new Error("bad template"), "file", "render");
      expect(tracker.getIssues("file")[0].reason).toBe("render-error");
    });

    it("maps schema failures on resources", () => {
      const tracker = new Tracker();
      const result = z.object({ a: z.string() }).safeParse({});
      tracker.trackError("config.json", result.error, "resource");
      expect(tracker.getIssues("resource")[0].reason).toBe("schema-validation");
    });

    it("maps JSON syntax errors on resources", () => {
      const tracker = new Tracker();
      tracker.trackError("config.json", new SyntaxError("Unexpected"), "resource");
      expect(tracker.getIssues("resource")[0].reason).toBe("invalid-json");
    });
  });

  // ==========================================================================
  // Counters
  // ==========================================================================
  describe("counters", () => {
    it("counts skipped files through their issues", () => {
      const tracker = new Tracker();
      tracker.trackSkipped("notes.md", "missing-front-matter");
      expect(tracker.getStats().skippedFiles).toBe(1);
      expect(tracker.getIssues("skipped")).toHaveLength(1);
    });

    it("reports failures", () => {
      const tracker = new Tracker();
      expect(tracker.hasFailures()).toBe(false);
      tracker.incrementFailed();
      expect(tracker.hasFailures()).toBe(true);
    });
  });

  // ==========================================================================
  // Export
  // ==========================================================================
  describe("exportStats", () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
    });

    it("writes a summary with issues grouped by reason", async () => {
      dir = await mkdtemp(join(tmpdir(), "ebolg-stats-"));
      const tracker = new Tracker();
      tracker.setTotalFiles(2);
      tracker.incrementSuccessful();
      tracker.trackSkipped("notes.md", "missing-front-matter", "no block");
      tracker.setStylesheetStatus("missing");

      const output = join(dir, "site");
      await tracker.exportStats(output);

      const exported = JSON.parse(
        await readFile(join(output, "stats.json"), "utf-8"),
      );
      expect(exported.summary.totalFiles).toBe(2);
      expect(exported.summary.successfulFiles).toBe(1);
      expect(exported.summary.skippedFiles).toBe(1);
      expect(exported.summary.stylesheet).toBe("missing");
      expect(exported.issues.skipped["missing-front-matter"]).toEqual([
        {
          type: "skipped",
          path: "notes.md",
          reason: "missing-front-matter",
          details: "no block",
        },
      ]);
    });
  });
});
