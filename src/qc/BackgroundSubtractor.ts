import { MISSING, numeric, type ReadingCell } from '../types/cell.js';
import { cellAt, mapCells, type WellTable } from '../types/table.js';
import type { QcLogger } from '../logging/logger.js';
import { ConfigError } from './errors.js';

/**
 * Subtract the background analyte from every other analyte, well by well.
 * A missing value on either side leaves the result missing.
 */
export function subtractBackground(
  mfi: WellTable<ReadingCell>,
  backgroundAnalyte: string,
  logger?: QcLogger,
  label = 'plate'
): WellTable<ReadingCell> {
  if (!mfi.analytes.includes(backgroundAnalyte)) {
    throw new ConfigError(
      `${label}: background analyte "${backgroundAnalyte}" is not a column (analytes: ${mfi.analytes.join(', ')})`
    );
  }

  let unavailable = 0;
  const result = mapCells<ReadingCell, ReadingCell>(mfi, (cell, analyte, row) => {
    if (analyte === backgroundAnalyte || cell.kind !== 'numeric') return cell;
    const background = cellAt(row, backgroundAnalyte);
    if (background.kind !== 'numeric') {
      unavailable += 1;
      return MISSING;
    }
    return numeric(cell.value - background.value);
  });

  if (unavailable > 0) {
    logger?.warn(`${label}: ${unavailable} readings set to missing because the ${backgroundAnalyte} value of their well is missing`);
  }
  logger?.debug(`${label}: subtracted ${backgroundAnalyte} from ${mfi.analytes.length - 1} analytes`);
  return result;
}
