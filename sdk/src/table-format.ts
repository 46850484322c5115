import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import Papa from 'papaparse';
import { z } from 'zod';
import { logger, MonitorError } from '@attendance-monitor/utils';
import { describeIssues } from './schemas.js';
import { Cell, Row, TableFormat } from './types.js';

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export const rowSchema = z.record(cellSchema);
const rowsSchema = z.array(rowSchema);

/**
 * CSV cells stay strings; empty cells become null. Columns come from the
 * header row, so short rows are padded with null.
 */
export function parseCsvTable(text: string): Row[] {
  const result = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
  });

  if (result.errors.length > 0) {
    logger.warn(`CSV parsed with ${result.errors.length} issue(s)`, {
      first: result.errors[0].message,
      row: result.errors[0].row,
    });
  }

  const fields = result.meta.fields ?? [];
  return result.data.map((raw) => {
    const row: Row = {};
    for (const field of fields) {
      const value = raw[field];
      row[field] = value === undefined || value === '' ? null : value;
    }
    return row;
  });
}

export function parseJsonTable(text: string): Row[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MonitorError('INVALID_RESPONSE', `Table is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = rowsSchema.safeParse(json);
  if (!result.success) {
    throw new MonitorError('INVALID_RESPONSE', `Table JSON must be an array of flat objects: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseTable(text: string, format: TableFormat): Row[] {
  return format === 'csv' ? parseCsvTable(text) : parseJsonTable(text);
}

export function toCsv(rows: readonly Row[], columns?: string[]): string {
  const fields = columns ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  return Papa.unparse({ fields, data: rows.map((row) => fields.map((field) => row[field] ?? null)) });
}

function excelCell(value: CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('formula' in value || 'sharedFormula' in value) return excelCell(value.result ?? null);
  return null;
}

function sheetRows(sheet: Worksheet): Row[] {
  const header = sheet.getRow(1);
  const columns: string[] = [];
  for (let column = 1; column <= sheet.columnCount; column++) {
    const name = excelCell(header.getCell(column).value);
    columns.push(name === null ? `column_${column}` : String(name));
  }

  const rows: Row[] = [];
  for (let index = 2; index <= sheet.rowCount; index++) {
    const line = sheet.getRow(index);
    if (!line.hasValues) continue;
    const row: Row = {};
    columns.forEach((column, i) => {
      row[column] = excelCell(line.getCell(i + 1).value);
    });
    rows.push(row);
  }
  return rows;
}

/**
 * Reads every sheet of an .xlsx workbook, keyed by sheet name. The first
 * row of each sheet holds the column names; formulas give their cached
 * result and dates become ISO timestamps.
 */
export async function parseWorkbook(bytes: Buffer): Promise<Record<string, Row[]>> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(bytes);
  } catch (error) {
    throw new MonitorError('INVALID_RESPONSE', `Workbook could not be read: ${error instanceof Error ? error.message : String(error)}`);
  }

  const sheets: Record<string, Row[]> = {};
  workbook.eachSheet((sheet) => {
    sheets[sheet.name] = sheetRows(sheet);
  });
  return sheets;
}
