import { z } from "zod";
import { MalformedRecordError } from "../core/errors.js";

const timestamp = z.string().nullish();
const count = z.number().nonnegative().nullish();

export const scannedLanguageSchema = z
  .object({
    LanguageName: z.string().nullish(),
  })
  .passthrough();

export const scanRecordSchema = z
  .object({
    Id: z.union([z.number(), z.string()]).nullish(),
    ProjectId: z.union([z.number(), z.string()]).nullish(),
    ProjectName: z.string().nullish(),
    ScanRequestedOn: timestamp,
    QueuedOn: timestamp,
    EngineStartedOn: timestamp,
    EngineFinishedOn: timestamp,
    ScanCompletedOn: timestamp,
    IsIncremental: z.boolean().nullish(),
    LOC: count,
    FailedLOC: count,
    TotalVulnerabilities: count,
    High: count,
    Medium: count,
    Low: count,
    Info: count,
    Origin: z.string().nullish(),
    PresetName: z.string().nullish(),
    ScannedLanguages: z.array(scannedLanguageSchema).nullish(),
  })
  .passthrough();

export type ScanRecord = z.infer<typeof scanRecordSchema>;

export type ParsedScanRecord =
  | { ok: true; record: ScanRecord }
  | { ok: false; error: MalformedRecordError };

export function parseScanRecord(raw: unknown): ParsedScanRecord {
  const result = scanRecordSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, record: result.data };
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return { ok: false, error: new MalformedRecordError(issues) };
}
