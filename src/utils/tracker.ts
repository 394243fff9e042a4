/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "read-error"
  | "parse-error"
  | "render-error"
  | "write-error";
export type SkippedIssueReason = "missing-front-matter" | "invalid-front-matter";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error"
  | "template-error"
  | "stylesheet-missing"
  | "copy-failed"
  | "index-conflict"
  | "write-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface SkippedIssue {
  type: "skipped";
  path: string;
  reason: SkippedIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | SkippedIssue | ResourceIssue;
export type IssueType = Issue["type"];

export type FileStage = "read" | "parse" | "render" | "write";

export type StylesheetStatus =
  | "unchecked"
  | "copied"
  | "present"
  | "missing"
  | "failed";

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedFiles: number;

  // Other counts
  createdIndexes: number;
  stylesheet: StylesheetStatus;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return { reason: "schema-validation", details: describeError(error) };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: describeError(error) };
}

const STAGE_REASONS: Record<FileStage, FileIssueReason> = {
  read: "read-error",
  parse: "parse-error",
  render: "render-error",
  write: "write-error",
};

function mapFileError(
  error: unknown,
  stage: FileStage = "parse",
): IssueInfo<FileIssueReason> {
  const details = describeError(error);

  // Filesystem errors belong to the side of the stage that touched the disk
  if (error instanceof Error && "code" in error) {
    const code = error.code;
    if (code === "ENOENT" || code === "EACCES" || code === "EPERM") {
      return {
        reason: stage === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  return { reason: STAGE_REASONS[stage], details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private createdIndexes = 0;
  private stylesheet: StylesheetStatus = "unchecked";
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementCreatedIndexes(): void {
    this.createdIndexes++;
  }

  setStylesheetStatus(status: StylesheetStatus): void {
    this.stylesheet = status;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    stage?: FileStage,
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, stage);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  /**
   * Record a skipped file and count it
   */
  trackSkipped(path: string, reason: SkippedIssueReason, details?: string): void {
    this.skippedFiles++;
    this.issues.push({ type: "skipped", path, reason, details });
  }

  /**
   * Record a resource issue with a known reason
   */
  trackResource(path: string, reason: ResourceIssueReason, details?: string): void {
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  hasFailures(): boolean {
    return this.failedFiles > 0;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      createdIndexes: this.createdIndexes,
      stylesheet: this.stylesheet,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalFiles: stats.totalFiles,
        successfulFiles: stats.successfulFiles,
        failedFiles: stats.failedFiles,
        skippedFiles: stats.skippedFiles,
        createdIndexes: stats.createdIndexes,
        stylesheet: stats.stylesheet,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      file: {},
      skipped: {},
      resource: {},
    };

    for (const issue of this.issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
