/**
 * PlateQCDecision: pass/fail policy and sentinel substitution.
 */

import { FAILED_BEAD, FAILED_STANDARDS, type CleanedCell, type ReadingCell } from '../types/cell.js';
import type { AnalyteFit, CleanedTable, PlateQCResult } from '../types/qc.js';
import { mapCells, type WellTable } from '../types/table.js';
import type { QcLogger } from '../logging/logger.js';
import type { StandardCurveFit } from './StandardCurveFitter.js';

export const PASSING_ANALYTE_SEPARATOR = ';';

/**
 * A fit passes when its R² is strictly above the threshold (NaN never passes).
 */
export function evaluateFits(fits: readonly StandardCurveFit[], rSquaredThreshold: number): AnalyteFit[] {
  return fits.map((fit) => ({ ...fit, passed: fit.rSquared > rSquaredThreshold }));
}

/**
 * The plate passes when at least one analyte curve passes.
 */
export function decidePlate(plateId: string, fits: readonly AnalyteFit[]): PlateQCResult {
  const passingAnalytes = fits.filter((f) => f.passed).map((f) => f.analyte);
  return { plateId, passed: passingAnalytes.length > 0, passingAnalytes };
}

/**
 * Produce the cleaned table. A passing plate turns missing cells into the
 * bead sentinel; a failing plate turns every cell into the standards
 * sentinel.
 */
export function applySentinels(
  mfi: WellTable<ReadingCell>,
  result: PlateQCResult,
  logger?: QcLogger
): CleanedTable {
  let replaced = 0;
  const table = mapCells<ReadingCell, CleanedCell>(mfi, (cell) => {
    if (!result.passed) return FAILED_STANDARDS;
    if (cell.kind === 'numeric') return cell;
    replaced += 1;
    return FAILED_BEAD;
  });

  if (!result.passed) {
    logger?.warn(
      `${result.plateId}: no standard curve passed; all ${mfi.rows.length * mfi.analytes.length} cells replaced with the standards sentinel`
    );
  } else if (replaced > 0) {
    logger?.warn(`${result.plateId}: ${replaced} masked cells replaced with the bead sentinel`);
  }

  return {
    ...table,
    plateId: result.plateId,
    standard: result.passingAnalytes.join(PASSING_ANALYTE_SEPARATOR),
  };
}
