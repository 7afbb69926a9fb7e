import type { ConcurrencySummary } from "../core/concurrency.js";
import { safeDivide } from "../core/math.js";
import type { StatisticsBundle } from "../core/types.js";
import { formatPercent, formatSecondsToHms } from "./format.js";

export function renderConsoleSummary(
  bundle: StatisticsBundle,
  concurrency: ConcurrencySummary,
): string {
  const { metrics } = bundle;
  const share = (count: number) => formatPercent(safeDivide(count, metrics.scans));
  const dates = (values: string[]) => (values.length > 0 ? values.join(", ") : "-");

  const lines = [
    "Scan statistics",
    "",
    `  Period:              ${metrics.firstScanDate ?? "-"} .. ${metrics.lastScanDate ?? "-"} (${metrics.totalDays} days, ${metrics.totalWeeks} weeks)`,
    `  Scans counted:       ${metrics.scans}`,
    `  Missing LOC:         ${metrics.missingScans}`,
    `  Malformed:           ${metrics.malformedScans}`,
    `  Full scans:          ${metrics.fullScans} (${share(metrics.fullScans)})`,
    `  Incremental scans:   ${metrics.incrementalScans} (${share(metrics.incrementalScans)})`,
    `  No-change scans:     ${metrics.noScans} (${share(metrics.noScans)})`,
    `  Zero-result scans:   ${metrics.scansWithZeroResults} (${share(metrics.scansWithZeroResults)})`,
    `  Unique projects:     ${metrics.uniqueProjects}`,
    `  Avg total duration:  ${formatSecondsToHms(metrics.averages.durations.total)}`,
    `  Avg engine duration: ${formatSecondsToHms(metrics.averages.durations.engine)}`,
    `  Max daily scans:     ${metrics.maxScansPerDay} (${metrics.maxScansDate ?? "-"})`,
    `  Peak engines:        ${concurrency.maxActual} on ${dates(concurrency.maxActualDates)}`,
    `  Peak optimal:        ${concurrency.maxOptimal} on ${dates(concurrency.maxOptimalDates)}`,
  ];

  return `${lines.join("\n")}\n`;
}
