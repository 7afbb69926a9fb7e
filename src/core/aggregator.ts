import { type ScanRecord, parseScanRecord } from "../ingest/scanRecordSchema.js";
import { type Logger, createChildLogger } from "../logging/logger.js";
import { MalformedTimestampError, type ScanStatsError } from "./errors.js";
import { ceilDivide, roundDivide, safeDivide } from "./math.js";
import { ORIGIN_DEFINITIONS, ORIGIN_KEYS, classifyOrigin } from "./origins.js";
import { SIZE_BIN_LABELS, type SizeBinLabel, sizeBinFor } from "./sizeBins.js";
import {
  calendarDate,
  daysBetween,
  isWeekend,
  parseInstant,
  secondsBetween,
  weekdayOf,
} from "./time.js";
import {
  type AggregateCounters,
  type AggregateMetrics,
  type ConcurrencyEvent,
  type DateStats,
  type DurationStats,
  type IngestOutcome,
  RESULT_SEVERITIES,
  type OriginTally,
  type SeverityStats,
  type SizeBinCounters,
  type SizeBinStats,
  type StatisticsBundle,
  type TallyEntry,
  emptyDurationStats,
  emptySeverityStats,
  emptyWeekdayCounts,
} from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export const EXCLUDED_LANGUAGE = "Common";
export const UNNAMED_PRESET = "(none)";

type TimestampField =
  | "ScanRequestedOn"
  | "QueuedOn"
  | "EngineStartedOn"
  | "EngineFinishedOn"
  | "ScanCompletedOn";

interface ScanTiming {
  date: string;
  queuedAt: number | null;
  engineStartedAt: number | null;
  engineFinishedAt: number | null;
  sourcePulling: number;
  queue: number;
  /** null for no-scans */
  engine: number | null;
  total: number;
}

export interface ScanAggregatorOptions {
  originKeys?: readonly string[];
  logger?: Logger;
}

const PROGRESS_LOG_INTERVAL = 100_000;

function readInstant(record: ScanRecord, field: TimestampField): number | null {
  const value = record[field];
  if (value === null || value === undefined) {
    return null;
  }

  const instant = parseInstant(value);
  if (instant === null) {
    throw new MalformedTimestampError(value, field);
  }
  return instant;
}

// Every timestamp is parsed here, before any counter moves, so a bad record
// leaves no partial trace in the aggregates.
function measureScan(record: ScanRecord): ScanTiming {
  const requestedAt = readInstant(record, "ScanRequestedOn");
  if (requestedAt === null) {
    throw new MalformedTimestampError(record.ScanRequestedOn, "ScanRequestedOn");
  }

  const queuedAt = readInstant(record, "QueuedOn");
  const engineStartedAt = readInstant(record, "EngineStartedOn");
  const engineFinishedAt = readInstant(record, "EngineFinishedOn");
  const completedAt = readInstant(record, "ScanCompletedOn");

  let engine: number | null = null;
  if (engineFinishedAt !== null) {
    engine = engineStartedAt === null ? 0 : secondsBetween(engineStartedAt, engineFinishedAt);
  }

  return {
    date: calendarDate(record.ScanRequestedOn),
    queuedAt,
    engineStartedAt,
    engineFinishedAt,
    sourcePulling: queuedAt === null ? 0 : secondsBetween(requestedAt, queuedAt),
    queue:
      queuedAt === null || engineStartedAt === null
        ? 0
        : secondsBetween(queuedAt, engineStartedAt),
    engine,
    total: completedAt === null ? 0 : secondsBetween(requestedAt, completedAt),
  };
}

function emptyCounters(): AggregateCounters {
  return {
    scans: 0,
    yesScans: 0,
    noScans: 0,
    missingScans: 0,
    malformedScans: 0,
    fullScans: 0,
    incrementalScans: 0,
    locSum: 0,
    locMax: 0,
    failedLocSum: 0,
    failedLocMax: 0,
    resultSums: emptySeverityStats(),
    resultMaxima: emptySeverityStats(),
    scansWithHighResults: 0,
    scansWithMediumResults: 0,
    scansWithLowResults: 0,
    scansWithInfoResults: 0,
    scansWithZeroResults: 0,
    durationSums: emptyDurationStats(),
    durationMaxima: emptyDurationStats(),
    weekdayCounts: emptyWeekdayCounts(),
    weekdayScans: 0,
    weekendScans: 0,
    firstScanDate: null,
    lastScanDate: null,
    uniqueProjects: 0,
  };
}

function emptySizeBin(): SizeBinCounters {
  return {
    yesScans: 0,
    noScans: 0,
    durationSums: emptyDurationStats(),
    durationMaxima: emptyDurationStats(),
  };
}

function emptyDateStats(date: string): DateStats {
  return {
    date,
    scans: 0,
    yesScans: 0,
    noScans: 0,
    fullScans: 0,
    incrementalScans: 0,
    locSum: 0,
    locMax: 0,
    failedLocSum: 0,
    failedLocMax: 0,
  };
}

function addDuration(
  sums: DurationStats,
  maxima: DurationStats,
  category: keyof DurationStats,
  seconds: number,
): void {
  sums[category] += seconds;
  maxima[category] = Math.max(maxima[category], seconds);
}

function toTally(counts: Map<string, number>, scans: number): TallyEntry[] {
  return [...counts.entries()].map(([name, count]) => ({
    name,
    scans: count,
    share: safeDivide(count, scans),
  }));
}

function cloneSeverity(stats: SeverityStats): SeverityStats {
  return { ...stats };
}

function cloneDurations(stats: DurationStats): DurationStats {
  return { ...stats };
}

/**
 * Single-pass accumulator over scan records. Call `ingest` once per record in
 * stream order, then `finalize` for the derived statistics.
 */
export class ScanAggregator {
  private readonly counters = emptyCounters();
  private readonly originKeys: readonly string[];
  private readonly originCounts = new Map<string, number>();
  private readonly languageCounts = new Map<string, number>();
  private readonly presetCounts = new Map<string, number>();
  private readonly sizeBins = new Map<SizeBinLabel, SizeBinCounters>();
  private readonly dates = new Map<string, DateStats>();
  private readonly projectKeys = new Set<string>();
  private readonly concurrencyEvents: ConcurrencyEvent[] = [];
  private readonly logger: Logger;
  private position = 0;

  constructor(options: ScanAggregatorOptions = {}) {
    this.originKeys = options.originKeys ?? ORIGIN_KEYS;
    this.logger = options.logger ?? createChildLogger({ component: "aggregator" });

    for (const key of this.originKeys) {
      this.originCounts.set(key, 0);
    }
    for (const label of SIZE_BIN_LABELS) {
      this.sizeBins.set(label, emptySizeBin());
    }
  }

  get recordsSeen(): number {
    return this.position;
  }

  events(): readonly ConcurrencyEvent[] {
    return this.concurrencyEvents;
  }

  /**
   * Validates a raw export item and ingests it. An item without LOC is
   * counted as missing before validation, whatever else it carries; other
   * schema failures count as malformed.
   */
  ingestRaw(raw: unknown): IngestOutcome {
    if (isPlainObject(raw) && (raw.LOC === null || raw.LOC === undefined)) {
      this.advance();
      return this.countMissing();
    }

    const parsed = parseScanRecord(raw);
    if (!parsed.ok) {
      this.advance();
      this.rejectMalformed(parsed.error);
      return "malformed";
    }
    return this.ingest(parsed.record);
  }

  ingest(record: ScanRecord): IngestOutcome {
    this.advance();

    const loc = record.LOC;
    if (loc === null || loc === undefined) {
      return this.countMissing();
    }

    let timing: ScanTiming;
    try {
      timing = measureScan(record);
    } catch (error) {
      if (error instanceof MalformedTimestampError) {
        this.rejectMalformed(error);
        return "malformed";
      }
      throw error;
    }

    this.apply(record, loc, timing);
    this.emitConcurrencyEvents(timing);
    return "counted";
  }

  private advance(): void {
    this.position += 1;
    if (this.position % PROGRESS_LOG_INTERVAL === 0) {
      this.logger.debug({ records: this.position }, "processing scans");
    }
  }

  private countMissing(): IngestOutcome {
    this.counters.missingScans += 1;
    return "missing_loc";
  }

  rejectMalformed(error: ScanStatsError): void {
    this.counters.malformedScans += 1;
    this.logger.warn({ record: this.position, kind: error.kind }, error.message);
  }

  private apply(record: ScanRecord, loc: number, timing: ScanTiming): void {
    const counters = this.counters;
    const isYesScan = timing.engine !== null;
    const isIncremental = record.IsIncremental === true;
    const failedLoc = record.FailedLOC ?? 0;

    counters.scans += 1;
    if (isYesScan) {
      counters.yesScans += 1;
    } else {
      counters.noScans += 1;
    }
    if (isIncremental) {
      counters.incrementalScans += 1;
    } else {
      counters.fullScans += 1;
    }

    counters.locSum += loc;
    counters.locMax = Math.max(counters.locMax, loc);
    counters.failedLocSum += failedLoc;
    counters.failedLocMax = Math.max(counters.failedLocMax, failedLoc);

    const results: SeverityStats = {
      total: record.TotalVulnerabilities ?? 0,
      high: record.High ?? 0,
      medium: record.Medium ?? 0,
      low: record.Low ?? 0,
      info: record.Info ?? 0,
    };
    for (const severity of RESULT_SEVERITIES) {
      counters.resultSums[severity] += results[severity];
      counters.resultMaxima[severity] = Math.max(
        counters.resultMaxima[severity],
        results[severity],
      );
    }
    if (results.high > 0) {
      counters.scansWithHighResults += 1;
    }
    if (results.medium > 0) {
      counters.scansWithMediumResults += 1;
    }
    if (results.low > 0) {
      counters.scansWithLowResults += 1;
    }
    if (results.info > 0) {
      counters.scansWithInfoResults += 1;
    }
    if (results.total === 0) {
      counters.scansWithZeroResults += 1;
    }

    const { durationSums, durationMaxima } = counters;
    addDuration(durationSums, durationMaxima, "sourcePulling", timing.sourcePulling);
    addDuration(durationSums, durationMaxima, "queue", timing.queue);
    addDuration(durationSums, durationMaxima, "total", timing.total);
    if (timing.engine !== null) {
      addDuration(durationSums, durationMaxima, "engine", timing.engine);
    }

    const weekday = weekdayOf(timing.date);
    counters.weekdayCounts[weekday] += 1;
    if (isWeekend(weekday)) {
      counters.weekendScans += 1;
    } else {
      counters.weekdayScans += 1;
    }

    if (counters.firstScanDate === null || timing.date < counters.firstScanDate) {
      counters.firstScanDate = timing.date;
    }
    if (counters.lastScanDate === null || timing.date > counters.lastScanDate) {
      counters.lastScanDate = timing.date;
    }

    // Id alone is not unique: some exports leave it blank.
    const projectKey = `${record.ProjectId ?? 0}_${record.ProjectName ?? ""}`;
    if (!this.projectKeys.has(projectKey)) {
      this.projectKeys.add(projectKey);
      counters.uniqueProjects += 1;
    }

    const languages = new Set(
      (record.ScannedLanguages ?? [])
        .map((language) => language.LanguageName)
        .filter((name): name is string => !!name && name !== EXCLUDED_LANGUAGE),
    );
    for (const language of languages) {
      this.languageCounts.set(language, (this.languageCounts.get(language) ?? 0) + 1);
    }

    const origin = classifyOrigin(record.Origin, this.originKeys);
    this.originCounts.set(origin, (this.originCounts.get(origin) ?? 0) + 1);

    const preset = record.PresetName ?? UNNAMED_PRESET;
    this.presetCounts.set(preset, (this.presetCounts.get(preset) ?? 0) + 1);

    const bin = this.sizeBins.get(sizeBinFor(loc)) ?? emptySizeBin();
    addDuration(bin.durationSums, bin.durationMaxima, "sourcePulling", timing.sourcePulling);
    addDuration(bin.durationSums, bin.durationMaxima, "queue", timing.queue);
    addDuration(bin.durationSums, bin.durationMaxima, "total", timing.total);
    if (timing.engine !== null) {
      bin.yesScans += 1;
      addDuration(bin.durationSums, bin.durationMaxima, "engine", timing.engine);
    } else {
      bin.noScans += 1;
    }

    const day = this.dates.get(timing.date) ?? emptyDateStats(timing.date);
    this.dates.set(timing.date, day);
    day.scans += 1;
    if (isYesScan) {
      day.yesScans += 1;
    } else {
      day.noScans += 1;
    }
    if (isIncremental) {
      day.incrementalScans += 1;
    } else {
      day.fullScans += 1;
    }
    day.locSum += loc;
    day.locMax = Math.max(day.locMax, loc);
    day.failedLocSum += failedLoc;
    day.failedLocMax = Math.max(day.failedLocMax, failedLoc);
  }

  // Queue occupancy runs from QueuedOn to EngineStartedOn. Engine occupancy is
  // replayed from QueuedOn for the observed engine duration, which models the
  // load the engines would have carried with no queueing at all.
  private emitConcurrencyEvents(timing: ScanTiming): void {
    const { queuedAt, engineStartedAt, engineFinishedAt } = timing;
    if (queuedAt === null || engineStartedAt === null) {
      return;
    }

    this.concurrencyEvents.push(
      { instant: queuedAt, delta: 1, kind: "queue" },
      { instant: engineStartedAt, delta: -1, kind: "queue" },
    );

    if (engineFinishedAt === null) {
      return;
    }

    const engineRunMs = Math.max(0, engineFinishedAt - engineStartedAt);
    this.concurrencyEvents.push(
      { instant: queuedAt, delta: 1, kind: "engine" },
      { instant: queuedAt + engineRunMs, delta: -1, kind: "engine" },
    );
  }

  finalize(): StatisticsBundle {
    const counters = this.counters;
    const dates = [...this.dates.values()]
      .sort((left, right) => left.date.localeCompare(right.date))
      .map((day) => ({ ...day }));

    const totalDays =
      counters.firstScanDate !== null && counters.lastScanDate !== null
        ? daysBetween(counters.firstScanDate, counters.lastScanDate) + 1
        : 0;

    let maxLocPerDay = 0;
    let maxScansPerDay = 0;
    let maxScansDate: string | null = null;
    for (const day of dates) {
      maxLocPerDay = Math.max(maxLocPerDay, day.locSum);
      if (day.scans > maxScansPerDay) {
        maxScansPerDay = day.scans;
        maxScansDate = day.date;
      }
    }

    const { durationSums, resultSums } = counters;
    const metrics: AggregateMetrics = {
      ...counters,
      resultSums: cloneSeverity(counters.resultSums),
      resultMaxima: cloneSeverity(counters.resultMaxima),
      durationSums: cloneDurations(counters.durationSums),
      durationMaxima: cloneDurations(counters.durationMaxima),
      weekdayCounts: { ...counters.weekdayCounts },
      averages: {
        locPerScan: ceilDivide(counters.locSum, counters.scans),
        failedLocPerScan: ceilDivide(counters.failedLocSum, counters.scans),
        locPerDay: ceilDivide(counters.locSum, totalDays),
        results: {
          total: ceilDivide(resultSums.total, counters.scans),
          high: roundDivide(resultSums.high, counters.scans),
          medium: roundDivide(resultSums.medium, counters.scans),
          low: roundDivide(resultSums.low, counters.scans),
          info: roundDivide(resultSums.info, counters.scans),
        },
        durations: {
          sourcePulling: ceilDivide(durationSums.sourcePulling, counters.scans),
          queue: ceilDivide(durationSums.queue, counters.scans),
          engine: ceilDivide(durationSums.engine, counters.yesScans),
          total: ceilDivide(durationSums.total, counters.scans),
        },
      },
      maxLocPerDay,
      maxScansPerDay,
      maxScansDate,
      totalDays,
      totalWeeks: Math.ceil(totalDays / 7),
      totalScanDays: dates.length,
    };

    const sizeBins: SizeBinStats[] = SIZE_BIN_LABELS.map((label) => {
      const bin = this.sizeBins.get(label) ?? emptySizeBin();
      const scans = bin.yesScans + bin.noScans;
      return {
        label,
        scans,
        yesScans: bin.yesScans,
        noScans: bin.noScans,
        durationSums: cloneDurations(bin.durationSums),
        durationMaxima: cloneDurations(bin.durationMaxima),
        durationAverages: {
          sourcePulling: ceilDivide(bin.durationSums.sourcePulling, scans),
          queue: ceilDivide(bin.durationSums.queue, scans),
          engine: ceilDivide(bin.durationSums.engine, bin.yesScans),
          total: ceilDivide(bin.durationSums.total, scans),
        },
      };
    });

    const displayNames = new Map(
      ORIGIN_DEFINITIONS.map((definition) => [definition.key, definition.displayName]),
    );
    const origins: OriginTally[] = [...this.originCounts.entries()].map(([key, scans]) => ({
      key,
      displayName: displayNames.get(key) ?? key,
      scans,
      share: safeDivide(scans, counters.scans),
    }));

    return {
      metrics,
      languages: toTally(this.languageCounts, counters.scans),
      presets: toTally(this.presetCounts, counters.scans),
      origins,
      sizeBins,
      dates,
      events: [...this.concurrencyEvents],
    };
  }
}

export function processScans(
  records: Iterable<ScanRecord>,
  options: ScanAggregatorOptions = {},
): StatisticsBundle {
  const aggregator = new ScanAggregator(options);
  for (const record of records) {
    aggregator.ingest(record);
  }
  return aggregator.finalize();
}
