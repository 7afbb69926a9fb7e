import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";
import pino from "pino";
import { afterEach, describe, expect, it } from "vitest";
import { WorkbookError } from "../src/core/errors.js";
import { type RunOptions, RunSetupError, runScanStats } from "../src/pipeline.js";

const silent = pino({ level: "silent" });
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

const exportDocument = {
  "@odata.context":
    "https://cx.example.test/odata/v1/$metadata#Scans(Id,LOC,ScanRequestedOn,ScannedLanguages(LanguageName))",
  value: [
    {
      Id: 1,
      ProjectId: 10,
      ProjectName: "alpha",
      ScanRequestedOn: "2024-01-01T10:00:00",
      QueuedOn: "2024-01-01T10:00:30",
      EngineStartedOn: "2024-01-01T10:01:00",
      EngineFinishedOn: "2024-01-01T10:11:00",
      ScanCompletedOn: "2024-01-01T10:12:00",
      IsIncremental: false,
      LOC: 15000,
      Origin: "Jenkins",
      PresetName: "Default",
      ScannedLanguages: [{ LanguageName: "Java" }],
    },
    {
      Id: 2,
      ProjectId: 11,
      ProjectName: "beta",
      ScanRequestedOn: "2024-01-02T08:00:00",
      QueuedOn: "2024-01-02T08:00:10",
      EngineStartedOn: "2024-01-02T08:00:10",
      EngineFinishedOn: "2024-01-02T08:01:10",
      ScanCompletedOn: "2024-01-02T08:02:00",
      IsIncremental: true,
      LOC: 5000,
      Origin: "CLI",
      PresetName: "Default",
      ScannedLanguages: [{ LanguageName: "Go" }],
    },
    { Id: 3, ScanRequestedOn: "2024-01-02T09:00:00", LOC: null },
    { Id: 4, ScanRequestedOn: "not-a-date", LOC: 10 },
  ],
};

async function workspace(): Promise<{ dir: string; inputFile: string }> {
  const dir = await mkdtemp(join(tmpdir(), "scan-stats-run-"));
  tempDirs.push(dir);
  const inputFile = join(dir, "scans.json");
  await writeFile(inputFile, JSON.stringify(exportDocument), "utf-8");
  return { dir, inputFile };
}

function options(overrides: Partial<RunOptions> & Pick<RunOptions, "inputFile" | "outputDir">) {
  return {
    csv: false,
    fullData: false,
    sheetName: "Data",
    snapshotSeconds: 5,
    ...overrides,
  };
}

describe("scan statistics run", () => {
  it("aggregates an export and writes every section as CSV", async () => {
    const { dir, inputFile } = await workspace();
    const outputDir = join(dir, "report");

    const result = await runScanStats(
      options({ inputFile, outputDir, csv: true, fullData: true }),
      silent,
    );

    expect(result.recordCount).toBe(4);
    expect(result.bundle.metrics.scans).toBe(2);
    expect(result.bundle.metrics.missingScans).toBe(1);
    expect(result.bundle.metrics.malformedScans).toBe(1);
    expect(result.concurrency.maxActual).toBe(1);
    expect(result.concurrency.maxOptimal).toBe(2);
    expect(result.concurrency.maxActualDates).toEqual(["2024-01-01"]);
    expect(result.publish).toEqual({ sectionsWritten: 13, failures: [] });
    expect(result.outputDir).toBe(outputDir);
    expect(result.excelPath).toBeNull();

    const files = (await readdir(outputDir)).sort();
    expect(files).toHaveLength(14);
    expect(files[0]).toBe("00-full_scan_data.csv");
    expect(files[13]).toBe("13-scans_by_week.csv");

    expect(await readFile(join(outputDir, "12-scans_by_date.csv"), "utf-8")).toBe(
      "Date,Scans\n2024-01-01,1\n2024-01-02,1\n",
    );

    const dump = (await readFile(join(outputDir, "00-full_scan_data.csv"), "utf-8")).split("\n");
    expect(dump.slice(0, 3)).toEqual([
      "Id,LOC,ScanRequestedOn,ScannedLanguages",
      "1,15000,2024-01-01T10:00:00,Java",
      "2,5000,2024-01-02T08:00:00,Go",
    ]);
    expect(dump).toHaveLength(6);
  });

  it("keeps publishing sections when the full data dump cannot be written", async () => {
    const { dir, inputFile } = await workspace();
    const outputDir = join(dir, "report");
    await mkdir(join(outputDir, "00-full_scan_data.csv"), { recursive: true });

    const result = await runScanStats(
      options({ inputFile, outputDir, csv: true, fullData: true }),
      silent,
    );

    expect(result.bundle.metrics.scans).toBe(2);
    expect(result.recordCount).toBe(4);
    expect(result.fullDataPath).toBeNull();
    expect(result.publish.sectionsWritten).toBe(13);
    expect(result.publish.failures).toEqual([
      { sink: "full-data", sectionId: null, message: expect.stringContaining("EISDIR") },
    ]);

    const files = (await readdir(outputDir)).sort();
    expect(files).toHaveLength(14);
    expect(files[1]).toBe("01-summary_of_scans.csv");
    expect(files[13]).toBe("13-scans_by_week.csv");
  });

  it("writes sections into a workbook template", async () => {
    const { dir, inputFile } = await workspace();
    const excelPath = join(dir, "template.xlsx");
    const template = new ExcelJS.Workbook();
    template.addWorksheet("Data");
    await template.xlsx.writeFile(excelPath);

    const result = await runScanStats(
      options({ inputFile, outputDir: join(dir, "unused"), excelPath }),
      silent,
    );

    expect(result.outputDir).toBeNull();
    expect(result.publish.failures).toEqual([]);
    expect(await readdir(dir)).not.toContain("unused");

    const reloaded = new ExcelJS.Workbook();
    await reloaded.xlsx.readFile(excelPath);
    const sheet = reloaded.getWorksheet("Data");
    expect(sheet?.getCell("B4").value).toBe("Start Date");
    expect(sheet?.getCell("C4").value).toBe("2024-01-01");
    expect(sheet?.getCell("AW5").value).toBe("2024-01-02");
    expect(sheet?.getCell("AX5").value).toBe(1);
  });

  it("fails setup for a missing input file", async () => {
    const { dir } = await workspace();

    await expect(
      runScanStats(options({ inputFile: join(dir, "absent.json"), outputDir: dir }), silent),
    ).rejects.toThrow(RunSetupError);
  });

  it("fails setup for an unreadable export", async () => {
    const { dir } = await workspace();
    const inputFile = join(dir, "broken.json");
    await writeFile(inputFile, "{ value: ", "utf-8");

    await expect(runScanStats(options({ inputFile, outputDir: dir }), silent)).rejects.toThrow(
      `Invalid scan export at ${inputFile}: not valid JSON.`,
    );
  });

  it("fails before aggregating when the workbook is missing", async () => {
    const { dir, inputFile } = await workspace();

    await expect(
      runScanStats(
        options({ inputFile, outputDir: dir, excelPath: join(dir, "missing.xlsx") }),
        silent,
      ),
    ).rejects.toThrow(WorkbookError);
  });
});
