/**
 * TableExtractor: turns a located block into a well-indexed table.
 */

import { parseReading, type ReadingCell } from '../types/cell.js';
import type { WellRow, WellTable } from '../types/table.js';
import { SchemaError } from '../qc/errors.js';
import { isBlankLine, splitCsvLine } from './csvCommon.js';
import type { BlockRange } from './types.js';

export const LOCATION_COLUMN = 'Location';
export const SAMPLE_COLUMN = 'Sample';
export const TOTAL_EVENTS_COLUMN = 'Total Events';

/**
 * Parse the block's first line as a header and the rest as well rows,
 * keeping the columns from Location up to (not including) Total Events.
 */
export function extractTable(lines: readonly string[], range: BlockRange, label = 'block'): WellTable<ReadingCell> {
  const header = splitCsvLine(lines[range.start] ?? '');

  const locationIdx = header.indexOf(LOCATION_COLUMN);
  if (locationIdx < 0) {
    throw new SchemaError(LOCATION_COLUMN, `${label} header has no "${LOCATION_COLUMN}" column`);
  }
  const totalIdx = header.indexOf(TOTAL_EVENTS_COLUMN, locationIdx + 1);
  if (totalIdx < 0) {
    throw new SchemaError(TOTAL_EVENTS_COLUMN, `${label} header has no "${TOTAL_EVENTS_COLUMN}" column after "${LOCATION_COLUMN}"`);
  }

  const columns = header.slice(locationIdx, totalIdx);
  const sampleIdx = columns.indexOf(SAMPLE_COLUMN);
  if (sampleIdx < 0) {
    throw new SchemaError(SAMPLE_COLUMN, `${label} header has no "${SAMPLE_COLUMN}" column`);
  }

  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length === 0) {
      throw new SchemaError(column, `${label} header has an unnamed analyte column`);
    }
    if (seen.has(column)) {
      throw new SchemaError(column, `${label} header repeats column "${column}"`);
    }
    seen.add(column);
  }

  const analytes = columns.filter((c) => c !== LOCATION_COLUMN && c !== SAMPLE_COLUMN);

  const rows: WellRow<ReadingCell>[] = [];
  for (let i = range.start + 1; i < range.end; i += 1) {
    const line = lines[i] ?? '';
    if (isBlankLine(line)) continue;
    const cells = splitCsvLine(line).slice(locationIdx, totalIdx);
    const values: Record<string, ReadingCell> = {};
    columns.forEach((column, idx) => {
      if (column === LOCATION_COLUMN || column === SAMPLE_COLUMN) return;
      values[column] = parseReading(cells[idx] ?? '');
    });
    rows.push({
      location: cells[0] ?? '',
      sample: cells[sampleIdx] ?? '',
      values,
    });
  }

  return { columns, analytes, rows };
}
