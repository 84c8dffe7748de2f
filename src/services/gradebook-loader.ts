import * as path from "path";
import { FormatOptions } from "../types";
import { Diagnostics } from "../utils/diagnostics";
import { readCsvTable } from "../utils/fs-utils";
import { Table } from "../utils/table";
import { formatTable } from "./schema-normalizer";

/**
 * Reads one gradebook export and normalizes it
 * @param file Path to a CSV file with headers on the first row
 */
export async function loadGradebook(
  file: string,
  options: FormatOptions = {},
  diagnostics: Diagnostics = new Diagnostics()
): Promise<Table> {
  console.log(`Loading gradebook ${path.basename(file)}...`);
  const raw = await readCsvTable(file);
  const gradebook = formatTable(raw, options, diagnostics);
  console.log(
    `Loaded ${gradebook.size} students and ${gradebook.columns.length} columns from ${path.basename(file)}`
  );
  return gradebook;
}
