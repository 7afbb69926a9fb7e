import { createReadStream } from "node:fs";
import { Readable } from "node:stream";
import Pick from "stream-json/filters/Pick.js";
import Parser from "stream-json/Parser.js";
import StreamArray from "stream-json/streamers/StreamArray.js";

export interface ScanExport {
  /** Field names declared by the export, in declared order. */
  fieldNames: string[];
  records: unknown[];
}

export interface ScanExportSummary {
  fieldNames: string[];
  recordCount: number;
}

export type ScanRecordHandler = (
  record: unknown,
  fieldNames: readonly string[],
) => Promise<void> | void;

interface JsonToken {
  name: string;
  value?: unknown;
}

const CONTEXT_KEY = "@odata.context";
const RECORDS_KEY = "value";
const CONTEXT_FIELDS_PATTERN = /#Scans\((.*)\)/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reads the field list out of an OData context such as
 * `...$metadata#Scans(Id,LOC,ScannedLanguages(LanguageName))`.
 */
export function extractFieldNames(context: string): string[] {
  const match = CONTEXT_FIELDS_PATTERN.exec(context);
  if (!match?.[1]) {
    return [];
  }

  const fields: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of match[1]) {
    if (char === "(") {
      depth += 1;
      continue;
    }
    if (char === ")") {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth > 0) {
      continue;
    }
    if (char === ",") {
      fields.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  fields.push(current.trim());

  return fields.filter(Boolean);
}

function isValueToken(token: JsonToken): boolean {
  return (
    token.name === "startObject" ||
    token.name === "startArray" ||
    token.name === "stringValue" ||
    token.name === "numberValue" ||
    token.name === "nullValue" ||
    token.name === "trueValue" ||
    token.name === "falseValue"
  );
}

/**
 * Walks the top-level `value` array one record at a time, so the export is
 * never held in memory as a whole. Field names come from `@odata.context`
 * when it precedes the records, otherwise from the first record's keys.
 */
export async function streamScanExport(
  input: Readable,
  source: string,
  onRecord: ScanRecordHandler,
): Promise<ScanExportSummary> {
  const invalid = (reason: string) => new Error(`Invalid scan export at ${source}: ${reason}`);

  const tokens = Parser.parser();
  const picker = Pick.pick({ filter: RECORDS_KEY });
  const records = StreamArray.streamArray();

  const fail = (error: Error) => {
    input.unpipe(tokens);
    records.destroy(error);
  };

  let depth = 0;
  let tokenCount = 0;
  let pendingKey: string | null = null;
  let contextFields: string[] = [];
  let sawRecords = false;
  let complete = false;

  // Registered before the pipes so top-level shape errors win over the
  // streamers' own complaints about the same token.
  tokens.on("data", (token: JsonToken) => {
    tokenCount += 1;
    if (tokenCount === 1 && token.name !== "startObject") {
      fail(invalid("expected object."));
      return;
    }

    if (depth === 1) {
      if (token.name === "keyValue") {
        pendingKey = String(token.value);
      } else if (pendingKey === RECORDS_KEY) {
        pendingKey = null;
        if (token.name !== "startArray") {
          fail(invalid("missing 'value' array."));
          return;
        }
        sawRecords = true;
      } else if (pendingKey !== null && isValueToken(token)) {
        if (pendingKey === CONTEXT_KEY && typeof token.value === "string") {
          contextFields = extractFieldNames(token.value);
        }
        pendingKey = null;
      }
    }

    if (token.name === "startObject" || token.name === "startArray") {
      depth += 1;
    } else if (token.name === "endObject" || token.name === "endArray") {
      depth -= 1;
      complete = depth === 0;
    }
  });

  input.on("error", fail);
  tokens.on("error", () => fail(invalid("not valid JSON.")));
  picker.on("error", fail);

  input.pipe(tokens).pipe(picker).pipe(records);

  let fieldNames: string[] | null = null;
  let recordCount = 0;
  try {
    for await (const item of records) {
      const entry: unknown = item;
      const record = isPlainObject(entry) ? entry.value : undefined;
      if (fieldNames === null) {
        fieldNames =
          contextFields.length > 0 ? contextFields : isPlainObject(record) ? Object.keys(record) : [];
      }
      recordCount += 1;
      await onRecord(record, fieldNames);
    }
  } finally {
    input.destroy();
    tokens.destroy();
    picker.destroy();
  }

  if (!complete) {
    throw invalid("not valid JSON.");
  }
  if (!sawRecords) {
    throw invalid("missing 'value' array.");
  }

  return { fieldNames: fieldNames ?? contextFields, recordCount };
}

export async function readScanExport(
  path: string,
  onRecord: ScanRecordHandler,
): Promise<ScanExportSummary> {
  return streamScanExport(createReadStream(path), path, onRecord);
}

/** Collects a whole export held in a string; meant for small documents. */
export async function parseScanExport(raw: string, source = "scan export"): Promise<ScanExport> {
  const records: unknown[] = [];
  const { fieldNames } = await streamScanExport(Readable.from([raw]), source, (record) => {
    records.push(record);
  });
  return { fieldNames, records };
}
