import { access } from "node:fs/promises";
import ExcelJS from "exceljs";
import { WorkbookError, errorMessage } from "../core/errors.js";
import type { CellAnchor, ReportRow, ReportSection } from "../report/sections.js";
import type { ReportSink } from "./reportSink.js";

const COLUMN_PATTERN = /^[A-Z]{1,3}$/;

/** "A" -> 1, "Z" -> 26, "AC" -> 29. */
export function columnIndex(letters: string): number {
  const normalized = letters.trim().toUpperCase();
  if (!COLUMN_PATTERN.test(normalized)) {
    throw new RangeError(`Invalid column letters '${letters}'.`);
  }

  let index = 0;
  for (const char of normalized) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index;
}

export function writeRows(
  worksheet: ExcelJS.Worksheet,
  rows: readonly ReportRow[],
  anchor: CellAnchor,
): void {
  const startColumn = columnIndex(anchor.column);
  rows.forEach((row, rowOffset) => {
    row.forEach((value, columnOffset) => {
      worksheet.getCell(anchor.row + rowOffset, startColumn + columnOffset).value = value;
    });
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes section rows into a named sheet of an existing workbook. The
 * workbook is loaded once, mutated in memory and saved on close().
 */
export class WorkbookReportSink implements ReportSink {
  readonly name = "workbook";
  readonly path: string;
  private readonly workbook: ExcelJS.Workbook;
  private readonly worksheet: ExcelJS.Worksheet;

  private constructor(path: string, workbook: ExcelJS.Workbook, worksheet: ExcelJS.Worksheet) {
    this.path = path;
    this.workbook = workbook;
    this.worksheet = worksheet;
  }

  static async open(path: string, sheetName: string): Promise<WorkbookReportSink> {
    if (!(await exists(path))) {
      throw new WorkbookError(path, "Workbook does not exist");
    }

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(path);
    } catch (error) {
      throw new WorkbookError(
        path,
        `Workbook is not a valid .xlsx file or is corrupted: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const worksheet = workbook.getWorksheet(sheetName);
    if (!worksheet) {
      throw new WorkbookError(path, `Workbook has no sheet named '${sheetName}'`);
    }

    return new WorkbookReportSink(path, workbook, worksheet);
  }

  async writeSection(section: ReportSection): Promise<void> {
    writeRows(this.worksheet, section.rows, section.anchor);
  }

  async close(): Promise<void> {
    try {
      await this.workbook.xlsx.writeFile(this.path);
    } catch (error) {
      throw new WorkbookError(this.path, `Failed to save workbook: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
