import {
  DEFAULT_INFO_COLUMNS,
  DEFAULT_NAME_SEPARATOR,
  FILE_TYPE_PRESETS,
} from "../constants";
import { SchemaError, ValidationError } from "../errors";
import { ColumnMapping, FormatOptions, InfoColumns, NamePreset } from "../types";
import { Diagnostics } from "../utils/diagnostics";
import { Cell, Row, Table } from "../utils/table";

/**
 * The settings actually used to read one export
 */
export interface ResolvedFormat extends NamePreset {
  infoColumns: InfoColumns;
}

/**
 * Merges the preset for `fileType` with the explicit options; explicit
 * values win field by field.
 */
export function resolveInputColumns(options: FormatOptions = {}): ResolvedFormat {
  const preset: NamePreset | undefined = options.fileType
    ? FILE_TYPE_PRESETS[options.fileType]
    : undefined;
  if (options.fileType && !preset) {
    throw new SchemaError("Unknown file type", [options.fileType]);
  }

  return {
    columns: options.inputColumns ?? { ...preset?.columns },
    nameSeparator:
      options.nameSeparator ?? preset?.nameSeparator ?? DEFAULT_NAME_SEPARATOR,
    lastNameFirst: options.lastNameFirst ?? preset?.lastNameFirst ?? false,
    missingValues: options.missingValues ?? preset?.missingValues ?? [],
    infoColumns: options.infoColumns ?? DEFAULT_INFO_COLUMNS,
  };
}

export interface SplitNames {
  first: Cell[];
  last: Cell[];
  /** Full names with more than two parts */
  ambiguous: string[];
}

/**
 * Splits full names in two. Only the first two parts are used; names
 * with more parts are returned in `ambiguous`.
 */
export function splitFullNames(
  fullNames: readonly Cell[],
  separator: string,
  lastNameFirst: boolean
): SplitNames {
  const first: Cell[] = [];
  const last: Cell[] = [];
  const ambiguous: string[] = [];

  for (const fullName of fullNames) {
    if (fullName === null) {
      first.push(null);
      last.push(null);
      continue;
    }
    const parts = String(fullName).split(separator);
    if (parts.length > 2) {
      ambiguous.push(String(fullName));
    }
    const [leading, trailing = null] = parts;
    first.push(lastNameFirst ? trailing : leading);
    last.push(lastNameFirst ? leading : trailing);
  }
  return { first, last, ambiguous };
}

/**
 * Formats one raw export as a gradebook: info columns first (last name,
 * first name, ID, email), then every other raw column, indexed by ID.
 * Missing-value aliases become absent cells.
 * @param raw The export as read, one row per student
 */
export function formatTable(
  raw: Table,
  options: FormatOptions = {},
  diagnostics: Diagnostics = new Diagnostics()
): Table {
  const format = resolveInputColumns(options);
  const { columns: input, infoColumns: info } = format;
  checkMappedColumns(raw, input);

  const aliases = new Set(format.missingValues);
  const table = raw.mapCells((value) =>
    value !== null && aliases.has(String(value).trim()) ? null : value
  );

  // Names
  let first: Cell[];
  let last: Cell[];
  if (input.first && input.last) {
    first = table.column(input.first);
    last = table.column(input.last);
  } else if (input.full) {
    const names = splitFullNames(
      table.column(input.full),
      format.nameSeparator,
      format.lastNameFirst
    );
    first = names.first;
    last = names.last;
    if (names.ambiguous.length > 0) {
      diagnostics.warn(
        "name-split",
        "The following students have more than 2 names, the name split may be incorrect",
        names.ambiguous
      );
    }
  } else {
    throw new SchemaError(
      "First and last name columns or a full name column must be specified"
    );
  }

  // IDs, backfilled from the email username where missing
  if (!input.id && !input.email) {
    throw new SchemaError("An ID column or an email column must be provided");
  }
  const emails = input.email
    ? table.column(input.email)
    : table.index.map((): Cell => null);
  const givenIds = input.id
    ? table.column(input.id)
    : table.index.map((): Cell => null);
  const ids = givenIds.map((id, i) =>
    id !== null ? String(id).trim() : emailUsername(emails[i])
  );

  const missing = ids
    .map((id, i) => (id === null ? `${first[i] ?? ""} ${last[i] ?? ""}`.trim() : null))
    .filter((name): name is string => name !== null);
  if (missing.length > 0) {
    throw new ValidationError("Some students do not have an ID nor an email", missing);
  }
  const duplicates = [
    ...new Set(ids.filter((id, i) => ids.indexOf(id) !== i)),
  ].filter((id): id is string => id !== null);
  if (duplicates.length > 0) {
    throw new ValidationError("Some IDs are duplicated", duplicates);
  }

  const mapped = new Set(Object.values(input));
  const infoNames = [info.last, info.first, info.id, info.email];
  const others = table.columns.filter(
    (column) => !mapped.has(column) && !infoNames.includes(column)
  );

  const records: Row[] = table.index.map((key, i) => {
    const row: Row = {
      [info.last]: last[i],
      [info.first]: first[i],
      [info.id]: ids[i],
      [info.email]: emails[i],
    };
    for (const column of others) {
      row[column] = table.get(key, column);
    }
    return row;
  });

  return Table.fromRecords(records, [...infoNames, ...others]).setIndex(info.id);
}

function emailUsername(email: Cell): string | null {
  if (email === null) {
    return null;
  }
  const username = String(email).split("@")[0].trim();
  return username === "" ? null : username;
}

function checkMappedColumns(raw: Table, input: ColumnMapping): void {
  const absent = Object.values(input).filter(
    (column): column is string => column !== undefined && !raw.has(column)
  );
  if (absent.length > 0) {
    throw new SchemaError("Columns missing from the file", absent);
  }
}
