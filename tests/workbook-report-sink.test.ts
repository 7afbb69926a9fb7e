import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";
import { afterEach, describe, expect, it } from "vitest";
import { WorkbookError } from "../src/core/errors.js";
import { WorkbookReportSink, columnIndex } from "../src/output/workbookReportSink.js";
import type { ReportSection } from "../src/report/sections.js";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
});

async function templateWorkbook(sheetName = "Data"): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "scan-stats-workbook-"));
  tempDirs.push(dir);
  const path = join(dir, "template.xlsx");

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.getCell("A1").value = "Scan report";
  await workbook.xlsx.writeFile(path);
  return path;
}

const weekly: ReportSection = {
  id: "13",
  slug: "scans_by_week",
  title: "Scans by Week",
  header: ["Week", "Scans"],
  rows: [
    ["2024-01-01", 5],
    ["2024-01-08", 3],
  ],
  anchor: { column: "AZ", row: 4 },
};

describe("column letters", () => {
  it("converts letters to 1-based indexes", () => {
    expect(columnIndex("A")).toBe(1);
    expect(columnIndex("Z")).toBe(26);
    expect(columnIndex("AC")).toBe(29);
    expect(columnIndex("az")).toBe(52);
    expect(() => columnIndex("A1")).toThrow(RangeError);
  });
});

describe("workbook report sink", () => {
  it("writes rows at the section anchor and keeps existing cells", async () => {
    const path = await templateWorkbook();
    const sink = await WorkbookReportSink.open(path, "Data");

    await sink.writeSection(weekly);
    await sink.close();

    const reloaded = new ExcelJS.Workbook();
    await reloaded.xlsx.readFile(path);
    const sheet = reloaded.getWorksheet("Data");
    expect(sheet?.getCell("A1").value).toBe("Scan report");
    expect(sheet?.getCell("AZ4").value).toBe("2024-01-01");
    expect(sheet?.getCell("BA4").value).toBe(5);
    expect(sheet?.getCell("AZ5").value).toBe("2024-01-08");
    expect(sheet?.getCell("BA5").value).toBe(3);
    expect(sheet?.getCell("AZ3").value).toBeNull();
  });

  it("fails when the workbook is missing", async () => {
    await expect(WorkbookReportSink.open("/nonexistent/scan-stats.xlsx", "Data")).rejects.toThrow(
      WorkbookError,
    );
  });

  it("fails when the file is not a workbook", async () => {
    const dir = await mkdtemp(join(tmpdir(), "scan-stats-workbook-"));
    tempDirs.push(dir);
    const path = join(dir, "broken.xlsx");
    await writeFile(path, "not a zip", "utf-8");

    await expect(WorkbookReportSink.open(path, "Data")).rejects.toThrow(
      "Workbook is not a valid .xlsx file or is corrupted",
    );
  });

  it("fails when the sheet is missing", async () => {
    const path = await templateWorkbook("Summary");

    await expect(WorkbookReportSink.open(path, "Data")).rejects.toThrow(
      `Workbook has no sheet named 'Data' (${path})`,
    );
  });
});
