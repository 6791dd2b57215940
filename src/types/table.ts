import type { Cell } from './cell.js';

/**
 * One well row of an extracted table.
 */
export interface WellRow<C extends Cell = Cell> {
  /** Well coordinate as written by the instrument (e.g. `1(1,A1)`) */
  location: string;
  /** Sample label */
  sample: string;
  /** Analyte name → value */
  values: Record<string, C>;
}

/**
 * Well-indexed table carved out of an export block.
 *
 * `columns` is the full trimmed header (Location, Sample, analytes...),
 * kept for the cross-table column check.
 */
export interface WellTable<C extends Cell = Cell> {
  columns: string[];
  analytes: string[];
  rows: WellRow<C>[];
}

/**
 * Read a cell, treating an absent analyte as missing.
 */
export function cellAt<C extends Cell>(row: WellRow<C>, analyte: string): C | { kind: 'missing' } {
  return row.values[analyte] ?? { kind: 'missing' };
}

/**
 * Rebuild every analyte cell of a table through `fn`.
 */
export function mapCells<C extends Cell, D extends Cell>(
  table: WellTable<C>,
  fn: (cell: C | { kind: 'missing' }, analyte: string, row: WellRow<C>) => D
): WellTable<D> {
  return {
    columns: [...table.columns],
    analytes: [...table.analytes],
    rows: table.rows.map((row) => {
      const values: Record<string, D> = {};
      for (const analyte of table.analytes) {
        values[analyte] = fn(cellAt(row, analyte), analyte, row);
      }
      return { location: row.location, sample: row.sample, values };
    }),
  };
}
