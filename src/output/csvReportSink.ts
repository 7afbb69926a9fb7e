import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type ReportSection, sectionFileName } from "../report/sections.js";
import { toCsv } from "./csv.js";
import type { ReportSink } from "./reportSink.js";

export class CsvReportSink implements ReportSink {
  readonly name = "csv";
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  pathFor(section: Pick<ReportSection, "id" | "slug">): string {
    return join(this.outputDir, sectionFileName(section));
  }

  async writeSection(section: ReportSection): Promise<void> {
    const absolutePath = this.pathFor(section);
    await mkdir(this.outputDir, { recursive: true });

    const tempPath = `${absolutePath}.tmp-${randomUUID()}`;
    try {
      await writeFile(tempPath, toCsv(section.header, section.rows), "utf-8");
      await rename(tempPath, absolutePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async close(): Promise<void> {}
}
