import { ValidationError } from "../errors";

/**
 * A single table cell. `null` is the absent marker and is kept distinct
 * from zero everywhere in the table layer.
 */
export type Cell = string | number | null;

export type Row = Record<string, Cell>;

/**
 * Immutable in-memory table: ordered columns, an ordered string index
 * and one row per index key. Every transformation returns a new table.
 */
export class Table {
  readonly columns: readonly string[];
  readonly index: readonly string[];
  private readonly rows: ReadonlyMap<string, Row>;

  constructor(
    columns: readonly string[],
    index: readonly string[],
    rows: ReadonlyMap<string, Row>
  ) {
    this.columns = [...columns];
    this.index = [...index];
    this.rows = rows;
  }

  /**
   * Builds a table indexed by row position ("0", "1", ...)
   * @param records Row objects; absent keys become absent cells
   * @param columns Column order; defaults to first-seen key order
   */
  static fromRecords(records: Row[], columns?: readonly string[]): Table {
    const order = columns ?? collectColumns(records);
    const index = records.map((_, i) => String(i));
    const rows = new Map<string, Row>();
    records.forEach((record, i) => {
      rows.set(index[i], pick(record, order));
    });
    return new Table(order, index, rows);
  }

  /**
   * Concatenates tables column-wise and aligns them on `index`.
   * The first table holding a column wins.
   */
  static concatColumns(tables: readonly Table[], index: readonly string[]): Table {
    const columns: string[] = [];
    const owners = new Map<string, Table>();
    for (const table of tables) {
      for (const column of table.columns) {
        if (!owners.has(column)) {
          owners.set(column, table);
          columns.push(column);
        }
      }
    }

    const rows = new Map<string, Row>();
    for (const key of index) {
      const row: Row = {};
      for (const column of columns) {
        const owner = owners.get(column);
        row[column] = owner ? owner.get(key, column) : null;
      }
      rows.set(key, row);
    }
    return new Table(columns, index, rows);
  }

  get size(): number {
    return this.index.length;
  }

  has(column: string): boolean {
    return this.columns.includes(column);
  }

  hasRow(key: string): boolean {
    return this.rows.has(key);
  }

  /**
   * Cell lookup; unknown rows or columns read as absent
   */
  get(key: string, column: string): Cell {
    return this.rows.get(key)?.[column] ?? null;
  }

  row(key: string): Row {
    return pick(this.rows.get(key) ?? {}, this.columns);
  }

  column(column: string): Cell[] {
    return this.index.map((key) => this.get(key, column));
  }

  toRecords(): Row[] {
    return this.index.map((key) => this.row(key));
  }

  select(columns: readonly string[]): Table {
    const rows = new Map<string, Row>();
    for (const key of this.index) {
      rows.set(key, pick(this.rows.get(key) ?? {}, columns));
    }
    return new Table(columns, this.index, rows);
  }

  drop(columns: readonly string[]): Table {
    return this.select(this.columns.filter((c) => !columns.includes(c)));
  }

  /**
   * Adds (or replaces) a column computed row by row
   */
  withColumn(name: string, compute: (key: string, row: Row) => Cell): Table {
    const columns = this.has(name) ? this.columns : [...this.columns, name];
    const rows = new Map<string, Row>();
    for (const key of this.index) {
      const current = this.row(key);
      rows.set(key, { ...current, [name]: compute(key, current) });
    }
    return new Table(columns, this.index, rows);
  }

  /**
   * Rewrites every cell; used for alias replacement
   */
  mapCells(transform: (value: Cell, column: string) => Cell): Table {
    const rows = new Map<string, Row>();
    for (const key of this.index) {
      const row: Row = {};
      for (const column of this.columns) {
        row[column] = transform(this.get(key, column), column);
      }
      rows.set(key, row);
    }
    return new Table(this.columns, this.index, rows);
  }

  /**
   * Aligns the table on a new index. Keys not in the table get absent
   * cells; keys not in `index` are dropped.
   */
  reindex(index: readonly string[]): Table {
    const rows = new Map<string, Row>();
    for (const key of index) {
      rows.set(key, this.row(key));
    }
    return new Table(this.columns, index, rows);
  }

  /**
   * Re-keys the rows by the values of `column`, keeping the column.
   * Absent or repeated keys are rejected.
   */
  setIndex(column: string): Table {
    const keys = this.column(column).map((value) =>
      value === null ? null : String(value)
    );
    const absent = this.index.filter((_, i) => keys[i] === null);
    if (absent.length > 0) {
      throw new ValidationError(`Rows without a value in ${column}`, absent);
    }

    const rows = new Map<string, Row>();
    const index: string[] = [];
    const duplicates = new Set<string>();
    this.index.forEach((oldKey, i) => {
      const key = String(keys[i]);
      if (rows.has(key)) {
        duplicates.add(key);
        return;
      }
      index.push(key);
      rows.set(key, this.row(oldKey));
    });
    if (duplicates.size > 0) {
      throw new ValidationError(`Repeated values in ${column}`, [...duplicates]);
    }
    return new Table(this.columns, index, rows);
  }

  /**
   * Stable sort on one column. Absent cells go last; numbers compare
   * numerically, anything else as text.
   */
  sortBy(column: string, descending: boolean = false): Table {
    const direction = descending ? -1 : 1;
    const index = [...this.index].sort((a, b) => {
      const left = this.get(a, column);
      const right = this.get(b, column);
      if (left === null || right === null) {
        return left === right ? 0 : left === null ? 1 : -1;
      }
      if (typeof left === "number" && typeof right === "number") {
        return (left - right) * direction;
      }
      return String(left).localeCompare(String(right)) * direction;
    });
    return this.reindex(index);
  }
}

function collectColumns(records: Row[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    Object.keys(record).forEach((key) => seen.add(key));
  }
  return [...seen];
}

function pick(record: Row, columns: readonly string[]): Row {
  const row: Row = {};
  for (const column of columns) {
    row[column] = record[column] ?? null;
  }
  return row;
}
