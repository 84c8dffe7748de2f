import * as path from "path";
import * as fsPromises from "fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { Cell, Row, Table } from "./table";

/**
 * Reads a CSV file with headers on the first row
 * @param filePath Path to the file
 * @returns The rows, indexed by position. Blank cells are absent (null).
 */
export async function readCsvTable(filePath: string): Promise<Table> {
  const content = await fsPromises.readFile(filePath, "utf-8");
  return parseCsvTable(content);
}

/**
 * Parses CSV text; see readCsvTable
 */
export function parseCsvTable(content: string): Table {
  let header: string[] = [];
  const records: Record<string, string>[] = parse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names.map((name) => name.trim());
      return header;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const rows: Row[] = records.map((record) => {
    const row: Row = {};
    for (const column of header) {
      const value = record[column];
      row[column] = value === undefined || value.trim() === "" ? null : value;
    }
    return row;
  });
  return Table.fromRecords(rows, header);
}

/**
 * Writes a table as CSV, absent cells as blanks
 * @param table The table; its index is not written
 * @param filePath Path to the file, parent directories are created
 */
export async function writeCsvTable(table: Table, filePath: string): Promise<void> {
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, formatCsvTable(table));
}

export function formatCsvTable(table: Table): string {
  const rows = table
    .toRecords()
    .map((record) => table.columns.map((column) => formatCell(record[column])));
  return stringify([[...table.columns], ...rows]);
}

/**
 * Checks if a file exists
 * @param filePath Path to the file
 * @returns True if the file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  return fsPromises
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

function formatCell(value: Cell): string {
  if (value === null) {
    return "";
  }
  return typeof value === "number" ? formatNumber(value) : value;
}

// Trims float noise such as 84.99999999999999 without rounding real decimals
function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}
