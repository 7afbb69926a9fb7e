import type { SizeBinLabel } from "./sizeBins.js";
import type { Weekday } from "./time.js";

export type DurationCategory = "sourcePulling" | "queue" | "engine" | "total";

export type DurationStats = Record<DurationCategory, number>;

export const RESULT_SEVERITIES = ["total", "high", "medium", "low", "info"] as const;

export type ResultSeverity = (typeof RESULT_SEVERITIES)[number];

export type SeverityStats = Record<ResultSeverity, number>;

export type IngestOutcome = "counted" | "missing_loc" | "malformed";

/** Running counters; everything here is updated record by record. */
export interface AggregateCounters {
  scans: number;
  yesScans: number;
  noScans: number;
  missingScans: number;
  malformedScans: number;
  fullScans: number;
  incrementalScans: number;

  locSum: number;
  locMax: number;
  failedLocSum: number;
  failedLocMax: number;

  resultSums: SeverityStats;
  resultMaxima: SeverityStats;
  scansWithHighResults: number;
  scansWithMediumResults: number;
  scansWithLowResults: number;
  scansWithInfoResults: number;
  scansWithZeroResults: number;

  durationSums: DurationStats;
  durationMaxima: DurationStats;

  weekdayCounts: Record<Weekday, number>;
  weekdayScans: number;
  weekendScans: number;

  firstScanDate: string | null;
  lastScanDate: string | null;
  uniqueProjects: number;
}

export interface AggregateAverages {
  locPerScan: number;
  failedLocPerScan: number;
  locPerDay: number;
  results: SeverityStats;
  durations: DurationStats;
}

export interface AggregateMetrics extends AggregateCounters {
  averages: AggregateAverages;
  maxLocPerDay: number;
  maxScansPerDay: number;
  maxScansDate: string | null;
  totalDays: number;
  totalWeeks: number;
  totalScanDays: number;
}

export interface SizeBinCounters {
  yesScans: number;
  noScans: number;
  durationSums: DurationStats;
  durationMaxima: DurationStats;
}

export interface SizeBinStats extends SizeBinCounters {
  label: SizeBinLabel;
  scans: number;
  durationAverages: DurationStats;
}

export interface DateStats {
  date: string;
  scans: number;
  yesScans: number;
  noScans: number;
  fullScans: number;
  incrementalScans: number;
  locSum: number;
  locMax: number;
  failedLocSum: number;
  failedLocMax: number;
}

export interface TallyEntry {
  name: string;
  scans: number;
  share: number;
}

export interface OriginTally {
  key: string;
  displayName: string;
  scans: number;
  share: number;
}

export type ConcurrencyEventKind = "queue" | "engine";

export interface ConcurrencyEvent {
  instant: number;
  delta: 1 | -1;
  kind: ConcurrencyEventKind;
}

export interface StatisticsBundle {
  metrics: AggregateMetrics;
  languages: TallyEntry[];
  presets: TallyEntry[];
  origins: OriginTally[];
  sizeBins: SizeBinStats[];
  /** Chronological. */
  dates: DateStats[];
  events: readonly ConcurrencyEvent[];
}

export function emptyDurationStats(): DurationStats {
  return { sourcePulling: 0, queue: 0, engine: 0, total: 0 };
}

export function emptySeverityStats(): SeverityStats {
  return { total: 0, high: 0, medium: 0, low: 0, info: 0 };
}

export function emptyWeekdayCounts(): Record<Weekday, number> {
  return {
    Monday: 0,
    Tuesday: 0,
    Wednesday: 0,
    Thursday: 0,
    Friday: 0,
    Saturday: 0,
    Sunday: 0,
  };
}
