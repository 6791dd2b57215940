/**
 * Records produced by the QC stages.
 */

import type { CleanedCell } from './cell.js';
import type { WellTable } from './table.js';

/**
 * A (well, analyte) pair whose bead count fell below threshold.
 */
export interface LowBeadRecord {
  location: string;
  sample: string;
  antigen: string;
  plate: string;
}

/**
 * One point on a standard curve.
 */
export interface StandardCurvePoint {
  analyte: string;
  /** Negated dilution index parsed from the sample label */
  dilutionFactor: number;
  log10Mfi: number;
}

export interface AnalyteFit {
  analyte: string;
  slope: number;
  intercept: number;
  rSquared: number;
  /** Number of points the regression was fitted on */
  points: number;
  passed: boolean;
}

export interface PlateQCResult {
  plateId: string;
  passed: boolean;
  passingAnalytes: string[];
}

/**
 * MFI table after sentinel substitution, tagged with its plate.
 */
export interface CleanedTable extends WellTable<CleanedCell> {
  plateId: string;
  /** Semicolon-joined passing analytes (empty when the plate failed) */
  standard: string;
}

export interface SkippedFile {
  file: string;
  code: string;
  reason: string;
}

export interface ProjectSummary {
  projectName: string;
  plates: PlateQCResult[];
  lowBead: LowBeadRecord[];
  skipped: SkippedFile[];
  artifacts: string[];
}
