export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/time.js";
export * from "./core/math.js";
export * from "./core/sizeBins.js";
export * from "./core/origins.js";
export * from "./core/aggregator.js";
export * from "./core/concurrency.js";

export * from "./config/settings.js";

export * from "./ingest/scanExport.js";
export * from "./ingest/scanRecordSchema.js";

export * from "./report/format.js";
export * from "./report/sections.js";
export * from "./report/consoleSummary.js";

export * from "./output/csv.js";
export * from "./output/reportSink.js";
export * from "./output/csvReportSink.js";
export * from "./output/fullDataCsvWriter.js";
export * from "./output/fullDataDump.js";
export * from "./output/workbookReportSink.js";
export * from "./output/publish.js";

export * from "./pipeline.js";
