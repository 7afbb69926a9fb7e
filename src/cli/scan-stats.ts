#!/usr/bin/env node

import { loadSettings } from "../config/settings.js";
import { WorkbookError } from "../core/errors.js";
import { logger } from "../logging/logger.js";
import { type RunResult, RunSetupError, runScanStats } from "../pipeline.js";
import { renderConsoleSummary } from "../report/consoleSummary.js";
import { HelpRequested, UsageError, helpText, parseScanStatsArgs } from "./args.js";

function jsonResult(result: RunResult): string {
  const { bundle, concurrency, publish } = result;
  const summary = {
    generatedAtUtc: result.generatedAtUtc,
    inputFile: result.inputFile,
    outputDir: result.outputDir,
    excelPath: result.excelPath,
    fullDataPath: result.fullDataPath,
    recordCount: result.recordCount,
    scans: bundle.metrics.scans,
    yesScans: bundle.metrics.yesScans,
    noScans: bundle.metrics.noScans,
    missingScans: bundle.metrics.missingScans,
    malformedScans: bundle.metrics.malformedScans,
    firstScanDate: bundle.metrics.firstScanDate,
    lastScanDate: bundle.metrics.lastScanDate,
    maxActualConcurrency: concurrency.maxActual,
    maxActualConcurrencyDates: concurrency.maxActualDates,
    maxOptimalConcurrency: concurrency.maxOptimal,
    maxOptimalConcurrencyDates: concurrency.maxOptimalDates,
    sectionsWritten: publish.sectionsWritten,
    failures: publish.failures,
  };
  return `${JSON.stringify(summary, null, 2)}\n`;
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const options = parseScanStatsArgs(process.argv.slice(2), settings);

  const result = await runScanStats(options);

  process.stdout.write(
    options.json ? jsonResult(result) : renderConsoleSummary(result.bundle, result.concurrency),
  );

  if (result.publish.failures.length > 0) {
    process.exitCode = 2;
  }
}

main().catch((error) => {
  if (error instanceof HelpRequested) {
    process.stdout.write(helpText());
    return;
  }

  if (error instanceof UsageError) {
    process.stderr.write(`${error.message}\n\n${helpText()}`);
    process.exitCode = 2;
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof RunSetupError || error instanceof WorkbookError) {
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = 1;
    return;
  }

  logger.fatal({ err: error }, message);
  process.exitCode = 2;
});
