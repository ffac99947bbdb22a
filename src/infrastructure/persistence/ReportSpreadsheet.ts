import ExcelJS from "exceljs";

import type {
  ColumnKind,
  PurgeReport,
  PurgeReportRow,
  ReportCellValue,
} from "../../interfaces/index.js";

export const SPREADSHEET_EXTENSION = ".xlsx";
export const SHEET_NAME = "results";
export const CELL_FONT = { name: "Courier New", size: 10 } as const;

const NUMBER_FORMATS: Partial<Record<ColumnKind, string>> = {
  float64: "0.0#####",
  timestamp: "yyyy-mm-dd hh:mm:ss",
};

const MAX_FLOAT_DECIMALS = 6;

type SpreadsheetCellValue = string | number | boolean | Date;

function formatFloat(value: number): string {
  const trimmed = value.toFixed(MAX_FLOAT_DECIMALS).replace(/0+$/, "");
  return trimmed.endsWith(".") ? `${trimmed}0` : trimmed;
}

/**
 * Textual form of a report value, matching what the spreadsheet cell displays.
 */
export function formatCellText(value: ReportCellValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") return formatFloat(value);
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  return value.toISOString().slice(0, 19).replace("T", " ");
}

function toSpreadsheetValue(value: ReportCellValue): SpreadsheetCellValue {
  if (typeof value !== "bigint") return value;
  // Larger integers would lose precision as spreadsheet numbers.
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}

function rowValues(report: PurgeReport, row: PurgeReportRow): ReportCellValue[] {
  return [row.user, ...report.columns.map((column) => row[column.name])];
}

export function computeColumnWidths(report: PurgeReport): number[] {
  const headers = [report.indexName, ...report.columns.map((column) => column.name)];
  const widths = headers.map((header) => header.length);

  for (const row of report.rows) {
    rowValues(report, row).forEach((value, index) => {
      widths[index] = Math.max(widths[index], formatCellText(value).length);
    });
  }

  return widths;
}

export async function buildSpreadsheet(report: PurgeReport): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  sheet.addRow([report.indexName, ...report.columns.map((column) => column.name)]);
  for (const row of report.rows) {
    const excelRow = sheet.addRow(rowValues(report, row).map(toSpreadsheetValue));
    report.columns.forEach((column, index) => {
      const numFmt = NUMBER_FORMATS[column.kind];
      if (numFmt) excelRow.getCell(index + 2).numFmt = numFmt;
    });
  }

  computeColumnWidths(report).forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });

  sheet.eachRow((row) => {
    row.eachCell((cell) => {
      cell.font = { ...CELL_FONT };
    });
  });

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
