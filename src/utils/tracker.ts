/**
 * Harvest Tracker
 * Unified tracking for download stats and per-URL issues
 */

import type { TaskOutcome } from "../types";

// ============================================================================
// Types
// ============================================================================

export type DownloadIssueReason =
  | "timeout"
  | "invalid-response"
  | "decode-error"
  | "write-error"
  | "download-failed";

export interface DownloadIssue {
  url: string;
  reason: DownloadIssueReason;
  details: string;
  attempt: number;
}

export interface HarvestStats {
  totalUrls: number;
  downloadedImages: number;
  skippedImages: number;
  failedImages: number;
  timedOutImages: number;
  failedAttempts: number;
  issues: DownloadIssue[]; // Last issue per URL
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo {
  reason: DownloadIssueReason;
  details: string;
}

function mapDownloadError(error: Error, stage: "fetch" | "store"): IssueInfo {
  const details = error.message;

  if (stage === "store") {
    return { reason: "write-error", details };
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return { reason: "timeout", details };
  }
  if (details.startsWith("HTTP ")) {
    return { reason: "invalid-response", details };
  }
  if (error.name === "DecodeError") {
    return { reason: "decode-error", details };
  }
  return { reason: "download-failed", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalUrls = 0;
  private downloadedImages = 0;
  private skippedImages = 0;
  private failedImages = 0;
  private timedOutImages = 0;
  private failedAttempts = 0;
  private issues: Map<string, DownloadIssue> = new Map();
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalUrls(count: number): void {
    this.totalUrls = count;
  }

  /**
   * Count a final task outcome
   */
  trackOutcome(outcome: TaskOutcome): void {
    switch (outcome) {
      case "succeeded":
        this.downloadedImages++;
        break;
      case "skipped":
        this.skippedImages++;
        break;
      case "permanently-failed":
        this.failedImages++;
        break;
      case "timed-out":
        this.timedOutImages++;
        break;
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track a failed attempt, keeping only the latest error per URL
   */
  trackAttemptError(
    url: string,
    error: Error,
    attempt: number,
    stage: "fetch" | "store" = "fetch",
  ): void {
    this.failedAttempts++;
    const { reason, details } = mapDownloadError(error, stage);
    this.issues.set(url, { url, reason, details, attempt });
  }

  getIssue(url: string): DownloadIssue | undefined {
    return this.issues.get(url);
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): HarvestStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalUrls: this.totalUrls,
      downloadedImages: this.downloadedImages,
      skippedImages: this.skippedImages,
      failedImages: this.failedImages,
      timedOutImages: this.timedOutImages,
      failedAttempts: this.failedAttempts,
      issues: [...this.issues.values()],
      duration,
    };
  }
}
