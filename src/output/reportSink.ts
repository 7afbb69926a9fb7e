import type { ReportSection } from "../report/sections.js";

export interface ReportSink {
  readonly name: string;
  writeSection(section: ReportSection): Promise<void>;
  close(): Promise<void>;
}
