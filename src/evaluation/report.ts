/**
 * Metric report output: JSON on disk and a text summary for the terminal
 */

import fs from "fs/promises";
import path from "path";
import { METRICS, RANKING_METRICS, type MetricReport } from "./types.js";

/**
 * Write `<outputDir>/<runId>.json` and return its path
 */
export async function writeMetricReport(report: MetricReport, outputDir: string): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const reportPath = path.join(outputDir, `${report.runId}.json`);
  await fs.writeFile(reportPath, JSON.stringify(report, null, 2));
  return reportPath;
}

const score = (value: number | null | undefined): string =>
  value === null || value === undefined ? "n/a" : value.toFixed(3);

export function formatMetricReport(report: MetricReport): string {
  const lines: string[] = [];

  lines.push("═".repeat(60));
  lines.push(`Evaluation Run: ${report.runId}`);
  lines.push(`Suite: ${report.suite.name} (${report.suite.id} v${report.suite.version})`);
  lines.push("═".repeat(60));
  lines.push("");

  lines.push("## Summary Statistics");
  lines.push("");
  lines.push(`- Total Cases: ${report.stats.totalCases}`);
  lines.push(`- Completed: ${report.stats.completed}`);
  lines.push(`- Failed: ${report.stats.failed}`);
  lines.push(`- Total Duration: ${(report.totalDurationMs / 1000).toFixed(1)}s`);
  lines.push("");

  lines.push("## Aggregate Metrics");
  lines.push("");
  for (const metric of METRICS) {
    lines.push(`- ${metric.padEnd(10)} ${score(report.aggregate[metric])}`);
  }

  const excluded = RANKING_METRICS.filter((m) => report.exclusions[m].length > 0);
  if (excluded.length > 0) {
    lines.push("");
    lines.push("Excluded from ranking metrics (no relevant passage):");
    for (const metric of excluded) {
      lines.push(`- ${metric}: ${report.exclusions[metric].join(", ")}`);
    }
  }

  lines.push("");
  lines.push("## Individual Results");
  lines.push("");

  for (const result of report.cases) {
    const status = result.status === "completed" ? "✓" : "✗";
    const answered = result.scores.unanswered === 1 ? "unanswered" : "answered";
    lines.push(
      `${status} ${result.case.id}: ${answered}, ndcg@5 ${score(result.scores["ndcg@5"])}, rougeL ${score(result.scores.rougeL)}, ${result.durationMs}ms`
    );
    if (result.error) {
      lines.push(`  Error: [${result.error.code}] ${result.error.message}`);
    }
    for (const warning of result.warnings) {
      lines.push(`  Warning: ${warning}`);
    }
  }

  lines.push("");
  lines.push("═".repeat(60));

  return lines.join("\n");
}
