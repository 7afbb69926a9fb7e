import { access, mkdir } from "node:fs/promises";
import type { ScanStatsOptions } from "./cli/args.js";
import { ScanAggregator } from "./core/aggregator.js";
import { type ConcurrencySummary, analyzeConcurrency } from "./core/concurrency.js";
import { errorMessage } from "./core/errors.js";
import type { StatisticsBundle } from "./core/types.js";
import { type ScanExportSummary, readScanExport } from "./ingest/scanExport.js";
import { type Logger, createChildLogger } from "./logging/logger.js";
import { CsvReportSink } from "./output/csvReportSink.js";
import { FullDataDump } from "./output/fullDataDump.js";
import { type PublishResult, publishReport } from "./output/publish.js";
import type { ReportSink } from "./output/reportSink.js";
import { WorkbookReportSink } from "./output/workbookReportSink.js";
import { buildReportSections } from "./report/sections.js";

export type RunOptions = Omit<ScanStatsOptions, "json" | "customer">;

export interface RunResult {
  generatedAtUtc: string;
  inputFile: string;
  outputDir: string | null;
  excelPath: string | null;
  recordCount: number;
  fullDataPath: string | null;
  bundle: StatisticsBundle;
  concurrency: ConcurrencySummary;
  publish: PublishResult;
}

/** Aborts the run before any report section is published; the CLI exits with status 1. */
export class RunSetupError extends Error {}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function runScanStats(
  options: RunOptions,
  logger: Logger = createChildLogger({ component: "pipeline" }),
): Promise<RunResult> {
  const generatedAtUtc = new Date().toISOString();

  if (!(await fileExists(options.inputFile))) {
    throw new RunSetupError(`Input file does not exist: ${options.inputFile}`);
  }

  const writesFiles = options.csv || options.fullData;
  if (writesFiles) {
    try {
      await mkdir(options.outputDir, { recursive: true });
    } catch (error) {
      throw new RunSetupError(
        `Cannot create output directory ${options.outputDir}: ${errorMessage(error)}`,
      );
    }
  }

  const sinks: ReportSink[] = [];
  if (options.excelPath) {
    sinks.push(await WorkbookReportSink.open(options.excelPath, options.sheetName));
  }
  if (options.csv) {
    sinks.push(new CsvReportSink(options.outputDir));
  }

  const aggregator = new ScanAggregator({
    logger: createChildLogger({ component: "aggregator" }),
  });
  const fullData = options.fullData
    ? new FullDataDump(options.outputDir, createChildLogger({ component: "full-data" }))
    : null;

  logger.info({ inputFile: options.inputFile }, "reading scan export");
  let exported: ScanExportSummary;
  try {
    exported = await readScanExport(options.inputFile, async (raw, fieldNames) => {
      await fullData?.writeRecord(raw, fieldNames);
      aggregator.ingestRaw(raw);
    });
  } catch (error) {
    await fullData?.release();
    throw new RunSetupError(errorMessage(error));
  }
  await fullData?.close(exported.fieldNames);
  logger.info(
    { records: exported.recordCount, fields: exported.fieldNames.length },
    "scan export read",
  );

  const bundle = aggregator.finalize();
  logger.info(
    {
      scans: bundle.metrics.scans,
      missing: bundle.metrics.missingScans,
      malformed: bundle.metrics.malformedScans,
    },
    "scan processing completed",
  );

  const concurrency = analyzeConcurrency(
    bundle.events,
    bundle.metrics.firstScanDate,
    bundle.metrics.lastScanDate,
    options.snapshotSeconds,
  );
  logger.info(
    { maxActual: concurrency.maxActual, maxOptimal: concurrency.maxOptimal },
    "concurrency calculated",
  );

  const sections = buildReportSections(bundle, concurrency);
  const published = await publishReport(sections, sinks, logger);
  const publish: PublishResult = {
    sectionsWritten: published.sectionsWritten,
    failures: [...(fullData?.failures ?? []), ...published.failures],
  };

  return {
    generatedAtUtc,
    inputFile: options.inputFile,
    outputDir: writesFiles ? options.outputDir : null,
    excelPath: options.excelPath ?? null,
    recordCount: exported.recordCount,
    fullDataPath: fullData?.path ?? null,
    bundle,
    concurrency,
    publish,
  };
}
