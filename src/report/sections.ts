import type { ConcurrencySummary } from "../core/concurrency.js";
import { safeDivide } from "../core/math.js";
import { WEEKDAYS, mondayOf } from "../core/time.js";
import type { StatisticsBundle } from "../core/types.js";
import { formatSecondsToHms } from "./format.js";

export type ReportCell = string | number | null;

export type ReportRow = readonly ReportCell[];

export interface CellAnchor {
  /** Spreadsheet column letters, e.g. "AC". */
  column: string;
  row: number;
}

export interface ReportSection {
  id: string;
  slug: string;
  title: string;
  header: readonly string[];
  rows: readonly ReportRow[];
  anchor: CellAnchor;
}

const DATA_START_ROW = 4;

function anchor(column: string): CellAnchor {
  return { column, row: DATA_START_ROW };
}

export function sectionFileName(section: Pick<ReportSection, "id" | "slug">): string {
  return `${section.id}-${section.slug}.csv`;
}

function summaryOfScans(bundle: StatisticsBundle): ReportSection {
  const { metrics } = bundle;
  const share = (count: number) => safeDivide(count, metrics.scans);
  const counted = (label: string, count: number): ReportRow => [label, count, share(count)];

  return {
    id: "01",
    slug: "summary_of_scans",
    title: "Summary of Scans",
    header: ["Description", "Value", "%"],
    rows: [
      ["Start Date", metrics.firstScanDate ?? ""],
      ["End Date", metrics.lastScanDate ?? ""],
      ["Days", metrics.totalDays],
      ["Weeks", metrics.totalWeeks],
      ["Scans Submitted", metrics.scans],
      counted("Full Scans Submitted", metrics.fullScans),
      counted("Incremental Scans Submitted", metrics.incrementalScans),
      counted("No-Change Scans", metrics.noScans),
      counted("Scans with High Results", metrics.scansWithHighResults),
      counted("Scans with Medium Results", metrics.scansWithMediumResults),
      counted("Scans with Low Results", metrics.scansWithLowResults),
      counted("Scans with Informational Results", metrics.scansWithInfoResults),
      counted("Scans with Zero Results", metrics.scansWithZeroResults),
      ["Unique Projects Scanned", metrics.uniqueProjects],
    ],
    anchor: anchor("B"),
  };
}

function scanMetrics(bundle: StatisticsBundle): ReportSection {
  const { metrics } = bundle;
  return {
    id: "02",
    slug: "scan_metrics",
    title: "Scan Metrics",
    header: ["Description", "Average", "Max"],
    rows: [
      ["LOC per Scan", metrics.averages.locPerScan, metrics.locMax],
      ["Failed LOC per Scan", metrics.averages.failedLocPerScan, metrics.failedLocMax],
      ["Daily LOC", metrics.averages.locPerDay, metrics.maxLocPerDay],
    ],
    anchor: anchor("F"),
  };
}

function scanDuration(bundle: StatisticsBundle): ReportSection {
  const { averages, durationMaxima } = bundle.metrics;
  const row = (label: string, average: number, max: number): ReportRow => [
    label,
    formatSecondsToHms(average),
    formatSecondsToHms(max),
  ];

  return {
    id: "03",
    slug: "scan_duration",
    title: "Scan Duration",
    header: ["Description", "Average", "Max"],
    rows: [
      row("Total Scan Duration", averages.durations.total, durationMaxima.total),
      row("Engine Scan Duration", averages.durations.engine, durationMaxima.engine),
      row("Queued Duration", averages.durations.queue, durationMaxima.queue),
      row(
        "Source Pulling Duration",
        averages.durations.sourcePulling,
        durationMaxima.sourcePulling,
      ),
    ],
    anchor: anchor("J"),
  };
}

function resultsBySeverity(bundle: StatisticsBundle): ReportSection {
  const { averages, resultMaxima } = bundle.metrics;
  return {
    id: "04",
    slug: "results_by_severity",
    title: "Results by Severity",
    header: ["Description", "Average", "Max"],
    rows: [
      ["Total", averages.results.total, resultMaxima.total],
      ["High", averages.results.high, resultMaxima.high],
      ["Medium", averages.results.medium, resultMaxima.medium],
      ["Low", averages.results.low, resultMaxima.low],
      ["Informational", averages.results.info, resultMaxima.info],
    ],
    anchor: anchor("N"),
  };
}

function languages(bundle: StatisticsBundle): ReportSection {
  return {
    id: "05",
    slug: "languages",
    title: "Languages",
    header: ["Language", "%", "Scans"],
    rows: bundle.languages.map((entry) => [entry.name, entry.share, entry.scans]),
    anchor: anchor("R"),
  };
}

function submissionSummary(bundle: StatisticsBundle): ReportSection {
  const { metrics } = bundle;
  return {
    id: "06",
    slug: "scan_submission_summary",
    title: "Scan Submission Summary",
    header: ["Description", "Value"],
    rows: [
      ["Average Scans Submitted per Week", safeDivide(metrics.scans, metrics.totalWeeks)],
      ["Average Scans Submitted per Day", safeDivide(metrics.scans, metrics.totalDays)],
      [
        "Average Scans Submitted per Weekday",
        safeDivide(metrics.weekdayScans, 5 * metrics.totalWeeks),
      ],
      [
        "Average Scans Submitted per Weekend Day",
        safeDivide(metrics.weekendScans, 2 * metrics.totalWeeks),
      ],
      ["Max Daily Scans Submitted", metrics.maxScansPerDay],
      ["Date of Max Daily Scans", metrics.maxScansDate ?? ""],
    ],
    anchor: anchor("V"),
  };
}

function dayOfWeek(bundle: StatisticsBundle): ReportSection {
  const { metrics } = bundle;
  return {
    id: "07",
    slug: "day_of_week_scan_average",
    title: "Day of Week",
    header: ["Day of Week", "Scans", "%"],
    rows: WEEKDAYS.map((day) => [
      day,
      metrics.weekdayCounts[day],
      safeDivide(metrics.weekdayCounts[day], metrics.scans),
    ]),
    anchor: anchor("Y"),
  };
}

function origins(bundle: StatisticsBundle): ReportSection {
  return {
    id: "08",
    slug: "origins",
    title: "Origins",
    header: ["Origin", "Scans", "%"],
    rows: bundle.origins
      .filter((origin) => origin.scans > 0)
      .map((origin) => [origin.displayName, origin.scans, origin.share]),
    anchor: anchor("AC"),
  };
}

function presets(bundle: StatisticsBundle): ReportSection {
  return {
    id: "09",
    slug: "presets",
    title: "Presets",
    header: ["Preset", "Scans", "%"],
    rows: bundle.presets.map((entry) => [entry.name, entry.scans, entry.share]),
    anchor: anchor("AG"),
  };
}

function scanTimeAnalysis(bundle: StatisticsBundle): ReportSection {
  return {
    id: "10",
    slug: "scan_time_analysis",
    title: "Scan Time Analysis by LOC",
    header: [
      "LOC Range",
      "Scans",
      "% Scans",
      "Avg Total Time",
      "Avg Source Pulling Time",
      "Avg Queue Time",
      "Avg Engine Scan Time",
    ],
    rows: bundle.sizeBins.map((bin) => [
      bin.label,
      bin.scans,
      safeDivide(bin.scans, bundle.metrics.scans),
      formatSecondsToHms(bin.durationAverages.total),
      formatSecondsToHms(bin.durationAverages.sourcePulling),
      formatSecondsToHms(bin.durationAverages.queue),
      formatSecondsToHms(bin.durationAverages.engine),
    ]),
    anchor: anchor("AK"),
  };
}

function concurrencyAnalysis(concurrency: ConcurrencySummary): ReportSection {
  return {
    id: "11",
    slug: "concurrency_analysis",
    title: "Concurrency Analysis",
    header: ["Date", "Max Actual", "Max Optimal"],
    rows: concurrency.daily.map((day) => [day.date, day.maxActual, day.maxOptimal]),
    anchor: anchor("AS"),
  };
}

function scansByDate(bundle: StatisticsBundle): ReportSection {
  return {
    id: "12",
    slug: "scans_by_date",
    title: "Scans by Date",
    header: ["Date", "Scans"],
    rows: bundle.dates.map((day) => [day.date, day.scans]),
    anchor: anchor("AW"),
  };
}

export function weeklyScanCounts(bundle: StatisticsBundle): Array<[string, number]> {
  const weeks = new Map<string, number>();
  for (const day of bundle.dates) {
    const monday = mondayOf(day.date);
    weeks.set(monday, (weeks.get(monday) ?? 0) + day.scans);
  }
  return [...weeks.entries()].sort(([left], [right]) => left.localeCompare(right));
}

function scansByWeek(bundle: StatisticsBundle): ReportSection {
  return {
    id: "13",
    slug: "scans_by_week",
    title: "Scans by Week",
    header: ["Week", "Scans"],
    rows: weeklyScanCounts(bundle),
    anchor: anchor("AZ"),
  };
}

export function buildReportSections(
  bundle: StatisticsBundle,
  concurrency: ConcurrencySummary,
): ReportSection[] {
  return [
    summaryOfScans(bundle),
    scanMetrics(bundle),
    scanDuration(bundle),
    resultsBySeverity(bundle),
    languages(bundle),
    submissionSummary(bundle),
    dayOfWeek(bundle),
    origins(bundle),
    presets(bundle),
    scanTimeAnalysis(bundle),
    concurrencyAnalysis(concurrency),
    scansByDate(bundle),
    scansByWeek(bundle),
  ];
}
