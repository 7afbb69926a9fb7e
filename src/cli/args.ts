import { basename, extname, isAbsolute, join, resolve } from "node:path";
import type { ScanStatsSettings } from "../config/settings.js";

export interface ScanStatsOptions {
  inputFile: string;
  csv: boolean;
  fullData: boolean;
  outputDir: string;
  customer?: string;
  excelPath?: string;
  sheetName: string;
  snapshotSeconds: number;
  json: boolean;
}

export class UsageError extends Error {}

export class HelpRequested extends Error {
  constructor() {
    super("help");
  }
}

function absolutizePath(rawPath: string, cwd: string): string {
  return isAbsolute(rawPath) ? rawPath : resolve(cwd, rawPath);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function runStamp(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${date}-${time}`;
}

export function defaultOutputDirName(
  inputFile: string,
  customer: string | undefined,
  now: Date,
): string {
  const name = customer?.trim()
    ? customer.trim().replace(/ /g, "_")
    : basename(inputFile, extname(inputFile));
  return `scan_stats_${name}_${runStamp(now)}`;
}

export function helpText(): string {
  const lines = [
    "scan-stats - aggregate statistics from a static code scan export",
    "",
    "Usage:",
    "  scan-stats <input.json> [options]",
    "",
    "Environment variables:",
    "  SCAN_STATS_SNAPSHOT_SECONDS  Concurrency snapshot width in seconds (default: 5)",
    "  SCAN_STATS_SHEET             Workbook sheet receiving the data (default: Data)",
    "  SCAN_STATS_LOG_LEVEL         fatal|error|warn|info|debug|trace|silent (default: info)",
    "  SCAN_STATS_LOG_PRETTY        1 to pretty-print logs",
    "",
    "Options:",
    "  --csv                      Write one CSV file per report section",
    "  --full-data                Write a CSV dump of every scan record",
    "  --output-dir <dir>         Directory for CSV output",
    "  --customer <name>          Name used for the default output directory",
    "  --excel <workbook.xlsx>    Write report sections into an existing workbook",
    "  --sheet <name>             Sheet to write into (default: Data)",
    "  --snapshot-seconds <n>",
    "  --json                     Print the run result as JSON",
    "  --help",
  ];

  return `${lines.join("\n")}\n`;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`Missing value for ${flag}.`);
  }
  return value;
}

export function parseScanStatsArgs(
  argv: string[],
  settings: Pick<ScanStatsSettings, "sheetName" | "snapshotSeconds">,
  now: Date = new Date(),
  cwd: string = process.cwd(),
): ScanStatsOptions {
  let inputFile: string | undefined;
  let outputDir: string | undefined;
  const options: Omit<ScanStatsOptions, "inputFile" | "outputDir"> = {
    csv: false,
    fullData: false,
    sheetName: settings.sheetName,
    snapshotSeconds: settings.snapshotSeconds,
    json: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      throw new HelpRequested();
    }

    if (arg === "--csv") {
      options.csv = true;
      continue;
    }

    if (arg === "--full-data" || arg === "--full_data") {
      options.fullData = true;
      continue;
    }

    if (arg === "--json") {
      options.json = true;
      continue;
    }

    if (arg === "--output-dir") {
      outputDir = requireValue(argv, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--customer") {
      options.customer = requireValue(argv, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--excel") {
      options.excelPath = absolutizePath(requireValue(argv, i, arg), cwd);
      i += 1;
      continue;
    }

    if (arg === "--sheet") {
      options.sheetName = requireValue(argv, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--snapshot-seconds") {
      const parsed = Number(requireValue(argv, i, arg));
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new UsageError("--snapshot-seconds must be a positive whole number.");
      }
      options.snapshotSeconds = parsed;
      i += 1;
      continue;
    }

    if (arg?.startsWith("--")) {
      throw new UsageError(`Unknown arg: ${arg}`);
    }

    if (inputFile !== undefined) {
      throw new UsageError(`Unexpected extra argument: ${arg}`);
    }
    inputFile = arg;
  }

  if (!inputFile) {
    throw new UsageError("Missing input file.");
  }

  return {
    ...options,
    inputFile: absolutizePath(inputFile, cwd),
    outputDir: absolutizePath(
      outputDir ?? join(cwd, defaultOutputDirName(inputFile, options.customer, now)),
      cwd,
    ),
  };
}
