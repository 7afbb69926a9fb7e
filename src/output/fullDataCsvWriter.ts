import { type FileHandle, mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import { type CsvCell, csvLine } from "./csv.js";

export const FULL_DATA_FILE_NAME = "00-full_scan_data.csv";

const LANGUAGES_FIELD = "ScannedLanguages";
const FLUSH_EVERY_ROWS = 1_000;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function languageList(value: unknown): string {
  if (!Array.isArray(value)) {
    return "";
  }

  return value
    .map((language: unknown) =>
      isPlainObject(language) && typeof language.LanguageName === "string"
        ? language.LanguageName
        : "",
    )
    .filter(Boolean)
    .join(", ");
}

function cellFor(field: string, value: unknown): CsvCell {
  if (field === LANGUAGES_FIELD) {
    return languageList(value);
  }
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

export function fullDataRow(fieldNames: readonly string[], raw: unknown): CsvCell[] {
  const record = isPlainObject(raw) ? raw : {};
  return fieldNames.map((field) => cellFor(field, record[field]));
}

/**
 * Raw dump of every exported record, written alongside aggregation so records
 * dropped from the statistics still appear here.
 */
export class FullDataCsvWriter {
  readonly path: string;
  private readonly handle: FileHandle;
  private readonly fieldNames: readonly string[];
  private pending: string[] = [];
  private closed = false;

  private constructor(path: string, handle: FileHandle, fieldNames: readonly string[]) {
    this.path = path;
    this.handle = handle;
    this.fieldNames = fieldNames;
  }

  static async open(
    outputDir: string,
    fieldNames: readonly string[],
  ): Promise<FullDataCsvWriter> {
    await mkdir(outputDir, { recursive: true });
    const path = join(outputDir, FULL_DATA_FILE_NAME);
    const handle = await open(path, "w");
    const writer = new FullDataCsvWriter(path, handle, fieldNames);
    writer.pending.push(csvLine(fieldNames));
    return writer;
  }

  async writeRecord(raw: unknown): Promise<void> {
    this.pending.push(csvLine(fullDataRow(this.fieldNames, raw)));
    if (this.pending.length >= FLUSH_EVERY_ROWS) {
      await this.flush();
    }
  }

  private async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const chunk = this.pending.join("");
    this.pending = [];
    await this.handle.write(chunk, null, "utf-8");
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.flush();
    } finally {
      await this.handle.close();
    }
  }
}
