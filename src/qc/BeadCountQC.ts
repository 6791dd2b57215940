/**
 * BeadCountQC: thresholds bead counts and masks the affected wells' MFI.
 */

import { FAILED_BEAD, MISSING, type BeadCountCell, type ReadingCell } from '../types/cell.js';
import type { LowBeadRecord } from '../types/qc.js';
import { mapCells, type WellTable } from '../types/table.js';
import type { QcLogger } from '../logging/logger.js';

export interface BeadQcResult {
  table: WellTable<BeadCountCell>;
  lowBead: LowBeadRecord[];
}

/**
 * Replace every count strictly below `threshold` with the bead sentinel and
 * record one {@link LowBeadRecord} per replaced cell.
 */
export function applyBeadThreshold(
  counts: WellTable<ReadingCell>,
  threshold: number,
  plateId: string
): BeadQcResult {
  const lowBead: LowBeadRecord[] = [];
  const table = mapCells<ReadingCell, BeadCountCell>(counts, (cell, analyte, row) => {
    if (cell.kind === 'numeric' && cell.value < threshold) {
      lowBead.push({ location: row.location, sample: row.sample, antigen: analyte, plate: plateId });
      return FAILED_BEAD;
    }
    return cell;
  });
  return { table, lowBead };
}

/**
 * Set every analyte of a well to missing when any analyte of that well
 * failed bead QC.
 */
export function maskLowBeadWells(
  mfi: WellTable<ReadingCell>,
  lowBead: LowBeadRecord[],
  logger?: QcLogger,
  label = 'plate'
): WellTable<ReadingCell> {
  const failing = new Map<string, string[]>();
  for (const record of lowBead) {
    const antigens = failing.get(record.location) ?? [];
    antigens.push(record.antigen);
    failing.set(record.location, antigens);
  }

  for (const [location, antigens] of failing) {
    logger?.warn(
      `${label}: well ${location} masked for all ${mfi.analytes.length} analytes (bead count below threshold for ${antigens.join(', ')})`
    );
  }

  return mapCells<ReadingCell, ReadingCell>(mfi, (cell, _analyte, row) =>
    failing.has(row.location) ? MISSING : cell
  );
}
