// app/io/load.ts
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import ExcelJS from "exceljs";
import type { Buffer as ExcelBuffer, CellValue, Workbook, Worksheet } from "exceljs";
import Papa from "papaparse";

import { LoadError } from "../lib/errors";
import { tableFromRecords, type Table } from "../lib/table";

export type LoadedTable = {
  table: Table;
  fileType: "csv" | "excel";
  sheetName?: string;
};

type Row = Record<string, unknown>;

/* =====================
   CSV
===================== */

export function parseCsv(text: string, source = "<text>"): Table {
  const parsed = Papa.parse<Row>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: true,
  });

  if (parsed.errors.length) {
    const first = parsed.errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new LoadError(source, `CSV parsing failed${where}: ${first.message}`);
  }

  const rows = parsed.data.filter((r) => Object.keys(r).length > 0);
  return tableFromRecords(rows, parsed.meta.fields);
}

/* =====================
   EXCEL (xlsx)
===================== */

/** Turn ExcelJS cell values into plain primitives. */
export function normalizeExcelValue(v: CellValue): string | number | boolean | null {
  if (v === null || v === undefined) return null;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  if (typeof v !== "object") return v;

  // formula cell
  if ("formula" in v || "sharedFormula" in v) return normalizeExcelValue(v.result);

  // richText cell
  if ("richText" in v) return v.richText.map((t) => t.text).join("");

  // hyperlink cell
  if ("hyperlink" in v) return v.text;

  // #N/A, #DIV/0! and friends
  if ("error" in v) return null;

  return null;
}

function rowsFromWorksheet(sheet: Worksheet) {
  const headers: string[] = [];
  sheet.getRow(1).eachCell((cell, col) => {
    headers[col - 1] = String(normalizeExcelValue(cell.value) ?? "").trim();
  });

  const names = Array.from({ length: headers.length }, (_, i) => headers[i] || `Column ${i + 1}`);
  const rows: Row[] = [];

  sheet.eachRow((row, idx) => {
    if (idx === 1) return;

    const rowData: Row = {};
    row.eachCell((cell, col) => {
      const key = names[col - 1] ?? `Column ${col}`;
      rowData[key] = normalizeExcelValue(cell.value);
    });

    const hasValue = Object.values(rowData).some(
      (v) => v !== null && v !== undefined && String(v).trim() !== ""
    );
    if (hasValue) rows.push(rowData);
  });

  return { names, rows };
}

function tableFromWorkbook(workbook: Workbook, source: string): LoadedTable {
  const sheet = workbook.worksheets[0];
  if (!sheet) throw new LoadError(source, "No worksheet found in Excel file.");

  const { names, rows } = rowsFromWorksheet(sheet);
  // cells written past the header row still get a column
  const order = [...new Set([...names, ...rows.flatMap((r) => Object.keys(r))])];

  return { table: tableFromRecords(rows, order), fileType: "excel", sheetName: sheet.name };
}

export async function parseWorkbook(data: ExcelBuffer, source = "<buffer>"): Promise<LoadedTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  return tableFromWorkbook(workbook, source);
}

/* =====================
   FILES
===================== */

export async function loadTable(path: string): Promise<LoadedTable> {
  const ext = extname(path).toLowerCase();

  try {
    if (ext === ".csv") {
      const text = await readFile(path, "utf8");
      return { table: parseCsv(text, path), fileType: "csv" };
    }

    if (ext === ".xlsx") {
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(path);
      return tableFromWorkbook(workbook, path);
    }
  } catch (err) {
    if (err instanceof LoadError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new LoadError(path, `could not read '${path}': ${message}`);
  }

  throw new LoadError(path, `unsupported file format '${ext || "(none)"}'; expected .csv or .xlsx`);
}
