export type ScanStatsErrorKind =
  | "malformed_timestamp"
  | "malformed_record"
  | "report_write"
  | "workbook";

export class ScanStatsError extends Error {
  readonly kind: ScanStatsErrorKind;

  constructor(kind: ScanStatsErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class MalformedTimestampError extends ScanStatsError {
  readonly value: unknown;

  constructor(value: unknown, field?: string) {
    const where = field ? ` in '${field}'` : "";
    super("malformed_timestamp", `Malformed timestamp${where}: ${JSON.stringify(value)}.`);
    this.value = value;
  }
}

export class MalformedRecordError extends ScanStatsError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("malformed_record", `Malformed scan record: ${issues.join("; ")}.`);
    this.issues = issues;
  }
}

export class ReportWriteError extends ScanStatsError {
  readonly sectionId: string;

  constructor(sectionId: string, message: string, options?: ErrorOptions) {
    super("report_write", `Failed to write section ${sectionId}: ${message}`, options);
    this.sectionId = sectionId;
  }
}

export class WorkbookError extends ScanStatsError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super("workbook", `${message} (${path})`, options);
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
