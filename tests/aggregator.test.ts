import { describe, expect, it } from "vitest";
import { ScanAggregator, UNNAMED_PRESET, processScans } from "../src/core/aggregator.js";
import type { ScanRecord } from "../src/ingest/scanRecordSchema.js";

function scan(overrides: Partial<ScanRecord> = {}): ScanRecord {
  return {
    Id: 1,
    ProjectId: 10,
    ProjectName: "alpha",
    ScanRequestedOn: "2024-01-01T10:00:00",
    QueuedOn: "2024-01-01T10:00:30",
    EngineStartedOn: "2024-01-01T10:01:00",
    EngineFinishedOn: "2024-01-01T10:11:00",
    ScanCompletedOn: "2024-01-01T10:12:00",
    IsIncremental: false,
    LOC: 15_000,
    FailedLOC: 100,
    TotalVulnerabilities: 5,
    High: 1,
    Medium: 2,
    Low: 1,
    Info: 1,
    Origin: "Jenkins 2.4",
    PresetName: "Default",
    ScannedLanguages: [{ LanguageName: "Java" }, { LanguageName: "Common" }],
    ...overrides,
  };
}

// A yes-scan, a no-scan of the same project later that day, and a yes-scan of
// another project two days later.
function threeScans(): ScanRecord[] {
  return [
    scan(),
    scan({
      Id: 2,
      ScanRequestedOn: "2024-01-01T12:00:00",
      QueuedOn: "2024-01-01T12:00:10",
      EngineStartedOn: "2024-01-01T12:00:20",
      EngineFinishedOn: null,
      ScanCompletedOn: "2024-01-01T12:00:40",
      IsIncremental: true,
      LOC: 30_000,
      FailedLOC: 0,
      TotalVulnerabilities: 0,
      High: 0,
      Medium: 0,
      Low: 0,
      Info: 0,
      Origin: "Web Portal",
      PresetName: null,
      ScannedLanguages: [{ LanguageName: "Java" }],
    }),
    scan({
      Id: 3,
      ProjectId: 11,
      ProjectName: "beta",
      ScanRequestedOn: "2024-01-03T09:00:00",
      QueuedOn: "2024-01-03T09:00:05",
      EngineStartedOn: "2024-01-03T09:00:05",
      EngineFinishedOn: "2024-01-03T09:05:00",
      ScanCompletedOn: "2024-01-03T09:06:00",
      LOC: 25_000,
      FailedLOC: 50,
      TotalVulnerabilities: 3,
      High: 0,
      Medium: 1,
      Low: 1,
      Info: 1,
      Origin: "GitHub",
      ScannedLanguages: [{ LanguageName: "JavaScript" }, { LanguageName: "Java" }],
    }),
  ];
}

describe("scan aggregator", () => {
  it("accumulates counters over a small export", () => {
    const { metrics } = processScans(threeScans());

    expect(metrics.scans).toBe(3);
    expect(metrics.yesScans).toBe(2);
    expect(metrics.noScans).toBe(1);
    expect(metrics.fullScans).toBe(2);
    expect(metrics.incrementalScans).toBe(1);
    expect(metrics.locSum).toBe(70_000);
    expect(metrics.locMax).toBe(30_000);
    expect(metrics.failedLocSum).toBe(150);
    expect(metrics.failedLocMax).toBe(100);
    expect(metrics.resultSums).toEqual({ total: 8, high: 1, medium: 3, low: 2, info: 2 });
    expect(metrics.resultMaxima).toEqual({ total: 5, high: 1, medium: 2, low: 1, info: 1 });
    expect(metrics.scansWithHighResults).toBe(1);
    expect(metrics.scansWithMediumResults).toBe(2);
    expect(metrics.scansWithZeroResults).toBe(1);
    expect(metrics.uniqueProjects).toBe(2);
  });

  it("measures durations per category", () => {
    const { metrics } = processScans(threeScans());

    expect(metrics.durationSums).toEqual({
      sourcePulling: 45,
      queue: 40,
      engine: 895,
      total: 1120,
    });
    expect(metrics.durationMaxima).toEqual({
      sourcePulling: 30,
      queue: 30,
      engine: 600,
      total: 720,
    });
    expect(metrics.averages.durations).toEqual({
      sourcePulling: 15,
      queue: 14,
      engine: 448,
      total: 374,
    });
  });

  it("derives averages and calendar figures", () => {
    const { metrics } = processScans(threeScans());

    expect(metrics.averages.locPerScan).toBe(23_334);
    expect(metrics.averages.failedLocPerScan).toBe(50);
    expect(metrics.averages.locPerDay).toBe(23_334);
    expect(metrics.averages.results).toEqual({ total: 3, high: 0, medium: 1, low: 1, info: 1 });
    expect(metrics.firstScanDate).toBe("2024-01-01");
    expect(metrics.lastScanDate).toBe("2024-01-03");
    expect(metrics.totalDays).toBe(3);
    expect(metrics.totalWeeks).toBe(1);
    expect(metrics.totalScanDays).toBe(2);
    expect(metrics.maxLocPerDay).toBe(45_000);
    expect(metrics.maxScansPerDay).toBe(2);
    expect(metrics.maxScansDate).toBe("2024-01-01");
    expect(metrics.weekdayCounts.Monday).toBe(2);
    expect(metrics.weekdayCounts.Wednesday).toBe(1);
    expect(metrics.weekdayScans).toBe(3);
    expect(metrics.weekendScans).toBe(0);
  });

  it("tallies languages, presets and origins", () => {
    const bundle = processScans(threeScans());

    expect(bundle.languages).toEqual([
      { name: "Java", scans: 3, share: 1 },
      { name: "JavaScript", scans: 1, share: 1 / 3 },
    ]);
    expect(bundle.presets).toEqual([
      { name: "Default", scans: 2, share: 2 / 3 },
      { name: UNNAMED_PRESET, scans: 1, share: 1 / 3 },
    ]);

    const used = bundle.origins.filter((origin) => origin.scans > 0);
    expect(used.map((origin) => [origin.key, origin.scans])).toEqual([
      ["Jenkins", 1],
      ["Other", 1],
      ["Web Portal", 1],
    ]);
    expect(bundle.origins).toHaveLength(18);
  });

  it("bins scans by LOC", () => {
    const bundle = processScans(threeScans());
    const small = bundle.sizeBins.find((bin) => bin.label === "0-20k");
    const medium = bundle.sizeBins.find((bin) => bin.label === "20k-50k");

    expect(small?.scans).toBe(1);
    expect(medium?.yesScans).toBe(1);
    expect(medium?.noScans).toBe(1);
    expect(medium?.durationAverages).toEqual({
      sourcePulling: 8,
      queue: 5,
      engine: 295,
      total: 200,
    });

    const binned = bundle.sizeBins.reduce((sum, bin) => sum + bin.scans, 0);
    expect(binned).toBe(bundle.metrics.scans);
  });

  it("keeps per-date statistics in chronological order", () => {
    const bundle = processScans([...threeScans()].reverse());

    expect(bundle.dates.map((day) => [day.date, day.scans, day.locSum])).toEqual([
      ["2024-01-01", 2, 45_000],
      ["2024-01-03", 1, 25_000],
    ]);
  });

  it("emits concurrency events from the queued instant", () => {
    const aggregator = new ScanAggregator();
    for (const record of threeScans()) {
      aggregator.ingest(record);
    }

    const queued = Date.UTC(2024, 0, 1, 10, 0, 30);
    expect(aggregator.events().slice(0, 4)).toEqual([
      { instant: queued, delta: 1, kind: "queue" },
      { instant: Date.UTC(2024, 0, 1, 10, 1, 0), delta: -1, kind: "queue" },
      { instant: queued, delta: 1, kind: "engine" },
      { instant: queued + 600_000, delta: -1, kind: "engine" },
    ]);
    // The no-scan only occupies the queue.
    expect(aggregator.events()).toHaveLength(10);
  });

  it("counts records without LOC as missing", () => {
    const aggregator = new ScanAggregator();

    expect(aggregator.ingest(scan({ LOC: null }))).toBe("missing_loc");
    expect(aggregator.ingest(scan())).toBe("counted");

    const { metrics } = aggregator.finalize();
    expect(metrics.missingScans).toBe(1);
    expect(metrics.scans).toBe(1);
    expect(aggregator.recordsSeen).toBe(2);
  });

  it("counts a raw item without LOC as missing even when other fields fail validation", () => {
    const aggregator = new ScanAggregator();

    expect(aggregator.ingestRaw({ ScanRequestedOn: "2024-01-01T10:00:00", High: "3" })).toBe(
      "missing_loc",
    );
    expect(aggregator.ingestRaw({ LOC: null, IsIncremental: "yes" })).toBe("missing_loc");
    expect(aggregator.ingestRaw({ LOC: 10, IsIncremental: "yes" })).toBe("malformed");

    const { metrics } = aggregator.finalize();
    expect(metrics.missingScans).toBe(2);
    expect(metrics.malformedScans).toBe(1);
    expect(aggregator.recordsSeen).toBe(3);
  });

  it("aggregates a finished scan, an unfinished scan and a scan without LOC", () => {
    const aggregator = new ScanAggregator();
    const outcomes = [
      {
        Id: 1,
        ProjectId: 20,
        ProjectName: "gamma",
        ScanRequestedOn: "2024-02-05T09:00:00",
        QueuedOn: "2024-02-05T09:00:10",
        EngineStartedOn: "2024-02-05T09:00:15",
        EngineFinishedOn: "2024-02-05T09:00:35",
        ScanCompletedOn: "2024-02-05T09:00:40",
        IsIncremental: false,
        LOC: 15_000,
      },
      {
        Id: 2,
        ProjectId: 21,
        ProjectName: "delta",
        ScanRequestedOn: "2024-02-05T11:00:00",
        QueuedOn: "2024-02-05T11:00:10",
        EngineStartedOn: "2024-02-05T11:00:15",
        ScanCompletedOn: "2024-02-05T11:00:20",
        IsIncremental: false,
        LOC: 25_000,
      },
      { Id: 3, ProjectId: 22, ScanRequestedOn: "2024-02-05T12:00:00" },
    ].map((raw) => aggregator.ingestRaw(raw));

    expect(outcomes).toEqual(["counted", "counted", "missing_loc"]);

    const { metrics, sizeBins } = aggregator.finalize();
    expect(metrics.scans).toBe(2);
    expect(metrics.missingScans).toBe(1);
    expect(metrics.yesScans).toBe(1);
    expect(metrics.noScans).toBe(1);
    expect(metrics.durationSums).toEqual({
      sourcePulling: 20,
      queue: 10,
      engine: 20,
      total: 60,
    });
    expect(metrics.durationMaxima).toEqual({
      sourcePulling: 10,
      queue: 5,
      engine: 20,
      total: 40,
    });
    expect(metrics.averages.durations).toEqual({
      sourcePulling: 10,
      queue: 5,
      engine: 20,
      total: 30,
    });

    const small = sizeBins.find((bin) => bin.label === "0-20k");
    const medium = sizeBins.find((bin) => bin.label === "20k-50k");
    expect([small?.scans, small?.yesScans, small?.noScans]).toEqual([1, 1, 0]);
    expect([medium?.scans, medium?.yesScans, medium?.noScans]).toEqual([1, 0, 1]);
    expect(sizeBins.reduce((sum, bin) => sum + bin.scans, 0)).toBe(2);
  });

  it("skips records with malformed timestamps without partial updates", () => {
    const aggregator = new ScanAggregator();

    expect(aggregator.ingest(scan({ ScanCompletedOn: "garbage" }))).toBe("malformed");
    expect(aggregator.ingest(scan({ ScanRequestedOn: null }))).toBe("malformed");
    expect(aggregator.ingestRaw({ LOC: "lots", ScanRequestedOn: "2024-01-01" })).toBe(
      "malformed",
    );

    const bundle = aggregator.finalize();
    expect(bundle.metrics.malformedScans).toBe(3);
    expect(bundle.metrics.scans).toBe(0);
    expect(bundle.metrics.uniqueProjects).toBe(0);
    expect(bundle.languages).toEqual([]);
    expect(bundle.events).toEqual([]);
  });

  it("treats absent optional timestamps as zero durations", () => {
    const bundle = processScans([
      scan({ QueuedOn: null, EngineStartedOn: null, ScanCompletedOn: null }),
    ]);

    expect(bundle.metrics.yesScans).toBe(1);
    expect(bundle.metrics.durationSums).toEqual({
      sourcePulling: 0,
      queue: 0,
      engine: 0,
      total: 0,
    });
    expect(bundle.events).toEqual([]);
  });

  it("counts a project once per id and name", () => {
    const bundle = processScans([
      scan(),
      scan({ Id: 2 }),
      scan({ Id: 3, ProjectName: "alpha-fork" }),
      scan({ Id: 4, ProjectId: null, ProjectName: null }),
    ]);

    expect(bundle.metrics.uniqueProjects).toBe(3);
  });

  it("finalizes an empty stream to zeros", () => {
    const { metrics, dates, languages } = processScans([]);

    expect(metrics.scans).toBe(0);
    expect(metrics.firstScanDate).toBeNull();
    expect(metrics.lastScanDate).toBeNull();
    expect(metrics.totalDays).toBe(0);
    expect(metrics.totalWeeks).toBe(0);
    expect(metrics.maxScansDate).toBeNull();
    expect(metrics.averages.locPerScan).toBe(0);
    expect(metrics.averages.durations.engine).toBe(0);
    expect(dates).toEqual([]);
    expect(languages).toEqual([]);
  });
});
