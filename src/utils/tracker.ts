/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  FileIssueReason,
  ResourceIssueReason,
  BuildStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

// Write failures are fatal and never become issues
type FileContext = "read" | "convert";

const FILE_REASONS: Record<FileContext, FileIssueReason> = {
  read: "read-error",
  convert: "convert-error",
};

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  context: FileContext = "convert",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (["ENOENT", "EACCES", "EPERM"].includes(String(error.code))) {
      return { reason: "read-error", details };
    }
  }

  return { reason: FILE_REASONS[context], details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private repositories = 0;
  private sources = 0;
  private pages = 0;
  private links = 0;
  private sections = 0;
  private writtenPages = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setRepositories(count: number): void {
    this.repositories = count;
  }

  incrementSources(): void {
    this.sources++;
  }

  setPages(count: number): void {
    this.pages = count;
  }

  setLinks(count: number): void {
    this.links = count;
  }

  setSections(count: number): void {
    this.sections = count;
  }

  incrementWritten(): void {
    this.writtenPages++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context?: FileContext,
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
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

  trackUnmatchedTarget(
    path: string,
    repository: string,
    targets: string[],
  ): void {
    this.issues.push({ type: "target", path, repository, targets });
  }

  trackMissingRepository(path: string, repository: string): void {
    this.issues.push({ type: "repository", path, repository });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): BuildStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      repositories: this.repositories,
      sources: this.sources,
      pages: this.pages,
      unmatchedPages: this.getIssues("target").length,
      links: this.links,
      sections: this.sections,
      writtenPages: this.writtenPages,
      issues: this.issues,
      duration,
    };
  }
}
