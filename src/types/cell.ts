/**
 * Cell values flowing through the plate QC pipeline.
 *
 * A cell starts as a reading (or missing), may be masked to missing by
 * bead-count QC, and ends as either a reading or one of two sentinels.
 */

export type NumericCell = { kind: 'numeric'; value: number };
export type MissingCell = { kind: 'missing' };
export type FailedBeadCell = { kind: 'failed_bead' };
export type FailedStandardsCell = { kind: 'failed_standards' };

/** A value read from the export or masked during QC. */
export type ReadingCell = NumericCell | MissingCell;

/** Bead-count cell after thresholding. */
export type BeadCountCell = NumericCell | MissingCell | FailedBeadCell;

/** Final cell written to the cleaned table. */
export type CleanedCell = NumericCell | FailedBeadCell | FailedStandardsCell;

export type Cell = NumericCell | MissingCell | FailedBeadCell | FailedStandardsCell;

export const FAILED_BEAD_LABEL = 'Failed QC (bead)';
export const FAILED_STANDARDS_LABEL = 'Failed QC (standards)';

export const MISSING: MissingCell = { kind: 'missing' };
export const FAILED_BEAD: FailedBeadCell = { kind: 'failed_bead' };
export const FAILED_STANDARDS: FailedStandardsCell = { kind: 'failed_standards' };

export function numeric(value: number): NumericCell {
  return { kind: 'numeric', value };
}

const MISSING_TOKENS = new Set(['', 'NA', 'NAN', 'N/A', 'NULL', 'NONE', '#DIV/0!']);

/**
 * Parse a raw export cell. Anything that is not a finite number is missing.
 */
export function parseReading(raw: string): ReadingCell {
  const s = raw.trim();
  if (MISSING_TOKENS.has(s.toUpperCase())) return MISSING;
  const n = Number(s);
  return Number.isFinite(n) ? numeric(n) : MISSING;
}

export function isNumeric(cell: Cell): cell is NumericCell {
  return cell.kind === 'numeric';
}

/**
 * Render a cell for CSV output.
 */
export function formatCell(cell: Cell): string {
  switch (cell.kind) {
    case 'numeric':
      return String(cell.value);
    case 'missing':
      return '';
    case 'failed_bead':
      return FAILED_BEAD_LABEL;
    case 'failed_standards':
      return FAILED_STANDARDS_LABEL;
  }
}
