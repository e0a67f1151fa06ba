// Audio Violence Analyzer - Report Persistence
// Opt-in export of a finalized report to disk.
//
// Reports live in server memory until their TTL expires. Nothing is written
// unless a caller explicitly asks for it through the save endpoint.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AlertEvent, AnalysisReport, ChunkResult } from "./types.js";

/**
 * Formats a number of seconds into `[MM:SS]` timestamp format.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}

/** One line per chunk: `[MM:SS] ALERT score explanation` */
export function formatChunkLine(chunk: ChunkResult): string {
  return `${formatTimestamp(chunk.start)} ${chunk.alert.toUpperCase()} ${chunk.fusedScore.toFixed(2)} ${chunk.explanation}`;
}

export function formatEventLine(event: AlertEvent): string {
  const line =
    `${formatTimestamp(event.start)}-${formatTimestamp(event.end)} ${event.type} ` +
    `(${event.alert}, confidence ${event.confidence.toFixed(2)}): ${event.explanation}`;
  return event.transcript ? `${line}\n  "${event.transcript}"` : line;
}

/**
 * Renders the timeline.txt content: a summary header, one line per chunk,
 * then the event log.
 */
export function formatTimeline(report: AnalysisReport): string {
  const { statistics } = report;
  const lines: string[] = [
    "=== Violence Analysis Report ===",
    "",
    `Session ID: ${report.sessionId}`,
    `Mode: ${report.mode}`,
    `Duration: ${report.duration.toFixed(2)}s`,
    `Overall Alert: ${report.overallAlert}`,
    `Violence Detected: ${report.violenceDetected ? "yes" : "no"}`,
    `Escalation: ${report.escalationTrend} (score ${report.escalationScore.toFixed(2)}), ${report.temporalPrediction}`,
    `Chunks: ${report.totalChunks} (Safe ${statistics.safeChunks}, Warning ${statistics.warningChunks}, ` +
      `Critical ${statistics.criticalChunks}), degraded ${report.degradedChunks}`,
    "",
    "--- Timeline ---",
    ...report.chunks.map(formatChunkLine),
    "",
    "--- Events ---",
  ];

  if (report.events.length === 0) {
    lines.push("No events.");
  } else {
    lines.push(...report.events.map(formatEventLine));
  }

  return lines.join("\n");
}

/**
 * Generates the output directory name.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}` (UTC)
 */
export function buildDirectoryName(sessionId: string, date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const timestamp =
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
  return `${timestamp}_${sessionId}`;
}

/**
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
 *     report.json
 *     timeline.txt
 */
export class ReportPersistence {
  private readonly baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /** @returns the file paths that were written */
  async save(report: AnalysisReport, savedAt: Date = new Date()): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(report.sessionId, savedAt));
    await mkdir(dirPath, { recursive: true });

    const reportPath = join(dirPath, "report.json");
    await writeFile(reportPath, JSON.stringify(report, null, 2), "utf-8");

    const timelinePath = join(dirPath, "timeline.txt");
    await writeFile(timelinePath, formatTimeline(report), "utf-8");

    return [reportPath, timelinePath];
  }
}
