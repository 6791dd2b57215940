/**
 * AlignmentValidator: checks that the bead-count and MFI tables describe
 * the same wells, in the same order, with the same columns.
 */

import type { Cell } from '../types/cell.js';
import type { WellTable } from '../types/table.js';
import type { QcLogger } from '../logging/logger.js';
import { AlignmentError } from './errors.js';

type NamedTable = { name: string; table: WellTable<Cell> };

function checkNoMissingLocations(tables: NamedTable[]): void {
  for (const { name, table } of tables) {
    const idx = table.rows.findIndex((row) => row.location.length === 0);
    if (idx >= 0) {
      throw new AlignmentError('missing-location', `${name} table row ${idx + 1} has no Location`);
    }
  }
}

function checkNoMissingSamples(tables: NamedTable[]): void {
  for (const { name, table } of tables) {
    const idx = table.rows.findIndex((row) => row.sample.length === 0);
    if (idx >= 0) {
      throw new AlignmentError('missing-sample', `${name} table row ${idx + 1} (${table.rows[idx]?.location ?? '?'}) has no Sample`);
    }
  }
}

function checkSameColumns(count: WellTable<Cell>, mfi: WellTable<Cell>): void {
  const same =
    count.columns.length === mfi.columns.length &&
    count.columns.every((column, idx) => column === mfi.columns[idx]);
  if (!same) {
    throw new AlignmentError(
      'column-mismatch',
      `bead-count columns [${count.columns.join(', ')}] differ from MFI columns [${mfi.columns.join(', ')}]`
    );
  }
}

function checkUniqueLocations(tables: NamedTable[]): void {
  for (const { name, table } of tables) {
    const seen = new Set<string>();
    for (const row of table.rows) {
      if (seen.has(row.location)) {
        throw new AlignmentError('duplicate-location', `${name} table lists well ${row.location} more than once`);
      }
      seen.add(row.location);
    }
  }
}

function checkSameLocationOrder(count: WellTable<Cell>, mfi: WellTable<Cell>): void {
  if (count.rows.length !== mfi.rows.length) {
    throw new AlignmentError(
      'location-order',
      `bead-count table has ${count.rows.length} wells, MFI table has ${mfi.rows.length}`
    );
  }
  count.rows.forEach((row, idx) => {
    const other = mfi.rows[idx];
    if (other?.location !== row.location) {
      throw new AlignmentError(
        'location-order',
        `row ${idx + 1}: bead-count well ${row.location} but MFI well ${other?.location ?? '(none)'}`
      );
    }
  });
}

/**
 * Throws {@link AlignmentError} naming the first violated check.
 */
export function validateAlignment(
  count: WellTable<Cell>,
  mfi: WellTable<Cell>,
  logger?: QcLogger,
  label = 'plate'
): void {
  const tables: NamedTable[] = [
    { name: 'bead-count', table: count },
    { name: 'MFI', table: mfi },
  ];

  checkNoMissingLocations(tables);
  checkNoMissingSamples(tables);
  checkSameColumns(count, mfi);
  checkUniqueLocations(tables);
  checkSameLocationOrder(count, mfi);

  logger?.info(`${label}: bead-count and MFI tables aligned (${mfi.rows.length} wells, ${mfi.analytes.length} analytes)`);
}
