/**
 * StandardCurveFitter: per-analyte log-linear regression over the
 * serially diluted standard wells.
 *
 * Each analyte is evaluated independently and yields one immutable
 * {@link StandardCurveFit}; callers fold the results.
 */

import type { ReadingCell } from '../types/cell.js';
import type { AnalyteFit, StandardCurvePoint } from '../types/qc.js';
import { cellAt, type WellRow, type WellTable } from '../types/table.js';
import type { QcLogger } from '../logging/logger.js';
import { fitLinear } from './regression.js';

export const STANDARD_SAMPLE_MARKER = 'Standard';

/** A fitted curve before the R² threshold is applied. */
export type StandardCurveFit = Omit<AnalyteFit, 'passed'>;

/**
 * Negated first run of digits in a sample label ("Standard3" → -3).
 */
export function dilutionFactorFromLabel(label: string): number | null {
  const match = /\d+/.exec(label);
  if (!match) return null;
  return -Number.parseInt(match[0], 10);
}

export type StandardRow = { row: WellRow<ReadingCell>; dilutionFactor: number };

export function selectStandardRows(table: WellTable<ReadingCell>, logger?: QcLogger, label = 'plate'): StandardRow[] {
  const selected: StandardRow[] = [];
  for (const row of table.rows) {
    if (!row.sample.includes(STANDARD_SAMPLE_MARKER)) continue;
    const dilutionFactor = dilutionFactorFromLabel(row.sample);
    if (dilutionFactor === null) {
      logger?.warn(`${label}: standard well ${row.location} ("${row.sample}") has no dilution index and is left out of the curves`);
      continue;
    }
    selected.push({ row, dilutionFactor });
  }
  return selected;
}

/**
 * Curve points for one analyte; wells whose log10(MFI + 1) is missing or
 * not finite are dropped.
 */
export function standardCurvePoints(standards: StandardRow[], analyte: string): StandardCurvePoint[] {
  const points: StandardCurvePoint[] = [];
  for (const { row, dilutionFactor } of standards) {
    const cell = cellAt(row, analyte);
    if (cell.kind !== 'numeric') continue;
    const log10Mfi = Math.log10(cell.value + 1);
    if (!Number.isFinite(log10Mfi)) continue;
    points.push({ analyte, dilutionFactor, log10Mfi });
  }
  return points;
}

export function fitAnalyte(points: StandardCurvePoint[]): StandardCurveFit | null {
  const first = points[0];
  if (!first) return null;
  const fit = fitLinear(
    points.map((p) => p.dilutionFactor),
    points.map((p) => p.log10Mfi)
  );
  return { analyte: first.analyte, ...fit, points: points.length };
}

/**
 * Fit a standard curve for every requested analyte present in the table.
 * Absent analytes and analytes without usable points are skipped with a
 * warning. Repeated analytes keep the last computed fit.
 */
export function fitStandardCurves(
  table: WellTable<ReadingCell>,
  analytes: readonly string[],
  logger?: QcLogger,
  label = 'plate'
): StandardCurveFit[] {
  const standards = selectStandardRows(table, logger, label);
  if (standards.length === 0) {
    logger?.warn(`${label}: no sample label contains "${STANDARD_SAMPLE_MARKER}"; no standard curves fitted`);
  }

  const fits = new Map<string, StandardCurveFit>();
  for (const analyte of analytes) {
    if (!table.analytes.includes(analyte)) {
      logger?.warn(`${label}: standard analyte ${analyte} is not in the MFI table and is skipped`);
      continue;
    }
    const fit = fitAnalyte(standardCurvePoints(standards, analyte));
    if (!fit) {
      logger?.warn(`${label}: standard analyte ${analyte} has no usable standard readings and is skipped`);
      continue;
    }
    if (fits.has(analyte)) {
      logger?.warn(`${label}: standard analyte ${analyte} fitted more than once; keeping the last fit`);
    }
    fits.set(analyte, fit);
  }
  return [...fits.values()];
}
