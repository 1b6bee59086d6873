/**
 * Run report: the orchestrator's output, rendered as Markdown for people
 * and JSON for tooling.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { truncateTail } from "../utils/text.js";
import { formatDiagnostic, type FailureCause, type ValidationResult } from "./types.js";
import type { UpgradeTask } from "./upgrade/task.js";

export interface FileReportEntry {
  filePath: string;
  status: "passed" | "failed";
  attempts: number;
  failureCause: FailureCause | null;
  failureMessage: string | null;
  lastResult: ValidationResult | null;
  /** Last diagnostic text, verbatim up to the log limit */
  lastDiagnostic: string | null;
  /** Deprecated APIs present in the original and gone from the final content */
  apiChanges: string[];
}

export interface AbortInfo {
  reason: string;
  /** Files never started, in processing order */
  remaining: string[];
}

export interface RunReport {
  runId: string;
  root: string;
  startedAt: string;
  finishedAt: string;
  runtimeEnabled: boolean;
  /** Printable runtime command, when runtime validation ran */
  runtimeCommand: string | null;
  maxRetries: number;
  entries: FileReportEntry[];
  aborted: AbortInfo | null;
}

export interface ReportSummary {
  total: number;
  passed: number;
  failed: number;
  totalAttempts: number;
}

interface ApiChangePattern {
  pattern: RegExp;
  description: string;
}

const API_CHANGE_PATTERNS: readonly ApiChangePattern[] = [
  { pattern: /tf\.Session\(\)/, description: "Removed tf.Session (TF 1.x → 2.x)" },
  { pattern: /tf\.placeholder/, description: "Replaced tf.placeholder with tf.Variable or function parameters" },
  { pattern: /np\.asscalar/, description: "Replaced np.asscalar with .item()" },
  { pattern: /torch\.cuda\.FloatTensor/, description: "Updated torch.cuda.FloatTensor to modern tensor creation" },
  { pattern: /tf\.get_variable/, description: "Replaced tf.get_variable with tf.Variable" },
  { pattern: /tf\.layers\./, description: "Migrated tf.layers to tf.keras.layers" },
  { pattern: /tf\.contrib\./, description: "Removed tf.contrib (deprecated in TF 2.x)" },
  { pattern: /np\.int\b/, description: "Replaced np.int with int" },
  { pattern: /np\.float\b/, description: "Replaced np.float with float" },
  { pattern: /torch\.autograd\.Variable/, description: "Removed torch.autograd.Variable (no longer needed)" },
];

export function extractApiChanges(oldCode: string, newCode: string): string[] {
  return API_CHANGE_PATTERNS.filter(({ pattern }) => pattern.test(oldCode) && !pattern.test(newCode)).map(
    ({ description }) => description
  );
}

/** Fold a finished task into a report entry. */
export function toReportEntry(task: UpgradeTask, maxLogChars: number): FileReportEntry {
  if (!task.done) {
    throw new Error(`Task for ${task.filePath} is still ${task.status}`);
  }

  const lastEntry = task.history[task.history.length - 1];
  let lastDiagnostic: string | null = null;
  if (task.status === "failed") {
    const text =
      task.failureCause === "validation_exhausted" && lastEntry ? formatDiagnostic(lastEntry) : task.failureMessage ?? "";
    lastDiagnostic = truncateTail(text, maxLogChars).text;
  } else if (lastEntry) {
    lastDiagnostic = truncateTail(formatDiagnostic(lastEntry), maxLogChars).text;
  }

  return {
    filePath: task.filePath,
    status: task.status === "passed" ? "passed" : "failed",
    attempts: task.attempts,
    failureCause: task.failureCause,
    failureMessage: task.failureMessage,
    lastResult: task.lastResult,
    lastDiagnostic,
    apiChanges: extractApiChanges(task.originalContent, task.finalContent),
  };
}

export function summarize(report: RunReport): ReportSummary {
  const passed = report.entries.filter((e) => e.status === "passed").length;
  return {
    total: report.entries.length,
    passed,
    failed: report.entries.length - passed,
    totalAttempts: report.entries.reduce((sum, e) => sum + e.attempts, 0),
  };
}

/** 0 all passed, 1 some failed, 2 aborted. */
export function exitCodeFor(report: RunReport): 0 | 1 | 2 {
  if (report.aborted) return 2;
  return report.entries.some((e) => e.status === "failed") ? 1 : 0;
}

export function renderMarkdownReport(report: RunReport): string {
  const summary = summarize(report);
  const passed = report.entries.filter((e) => e.status === "passed");
  const failed = report.entries.filter((e) => e.status === "failed");
  const out: string[] = [];

  out.push("# ML Repository Upgrade Report", "");
  out.push(`**Run:** ${report.runId}  `);
  out.push(`**Repository:** ${report.root}  `);
  out.push(`**Started:** ${report.startedAt}  `);
  out.push(`**Finished:** ${report.finishedAt}  `);
  out.push(
    `**Runtime validation:** ${
      report.runtimeEnabled ? `enabled (\`${report.runtimeCommand ?? ""}\`)` : "disabled (syntax only)"
    }  `
  );
  out.push(`**Max retries:** ${report.maxRetries}`, "");

  out.push("## Summary", "");
  out.push("| Total | Passed | Failed |", "|---|---|---|", `| ${summary.total} | ${summary.passed} | ${summary.failed} |`, "");

  if (report.aborted) {
    out.push("## Run Aborted", "", report.aborted.reason, "");
    if (report.aborted.remaining.length > 0) {
      out.push("Files not processed:", "");
      for (const file of report.aborted.remaining) out.push(`- \`${file}\``);
      out.push("");
    }
  }

  if (passed.length > 0) {
    out.push("## Upgraded Files", "");
    for (const entry of passed) {
      out.push(`### \`${entry.filePath}\``, "");
      out.push(`- **Attempts:** ${entry.attempts}`);
      if (entry.apiChanges.length > 0) {
        out.push("- **API changes:**");
        for (const change of entry.apiChanges) out.push(`  - ${change}`);
      }
      out.push("");
    }
  }

  if (failed.length > 0) {
    out.push("## Failed Files", "");
    for (const entry of failed) {
      out.push(`### \`${entry.filePath}\``, "");
      out.push(`- **Attempts:** ${entry.attempts}`);
      out.push(`- **Failure cause:** ${entry.failureCause ?? "unknown"}`);
      if (entry.lastDiagnostic) {
        out.push("- **Last diagnostic:**", "", fenced(entry.lastDiagnostic));
      }
      out.push("");
    }
  }

  out.push("## Statistics", "");
  const average = summary.total > 0 ? summary.totalAttempts / summary.total : 0;
  out.push(`- **Average attempts per file:** ${average.toFixed(1)}`);
  out.push(`- **Total collaborator calls:** ${summary.totalAttempts}`);
  const common = mostCommonChanges(passed);
  if (common.length > 0) {
    out.push("", "**Most common API changes:**");
    for (const [change, count] of common) out.push(`- ${change} (${count} files)`);
  }
  out.push("");

  if (failed.length > 0) {
    out.push("## Manual Review Needed", "");
    out.push("The following files failed automatic upgrade and need manual attention:", "");
    failed.forEach((entry, i) => {
      out.push(`${i + 1}. \`${entry.filePath}\` - ${entry.failureMessage ?? "failed"}`);
    });
    out.push("");
  }

  return out.join("\n");
}

export async function writeMarkdownReport(report: RunReport, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderMarkdownReport(report), "utf-8");
}

export async function writeJsonReport(report: RunReport, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify({ ...report, summary: summarize(report) }, null, 2) + "\n", "utf-8");
}

function mostCommonChanges(entries: FileReportEntry[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    for (const change of entry.apiChanges) counts.set(change, (counts.get(change) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 5);
}

/** Fence with more backticks than any run inside the text. */
function fenced(text: string): string {
  const longest = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  const fence = "`".repeat(Math.max(3, longest + 1));
  return `${fence}text\n${text}\n${fence}`;
}
