/**
 * CSV renderings of the QC artifacts and the code that writes them.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatCell } from '../types/cell.js';
import type { AnalyteFit, CleanedTable, LowBeadRecord, PlateQCResult } from '../types/qc.js';
import { cellAt } from '../types/table.js';
import { toCsv } from '../parsing/csvCommon.js';
import { LOCATION_COLUMN, SAMPLE_COLUMN } from '../parsing/TableExtractor.js';

export const LOW_BEAD_HEADER = ['Location', 'Sample', 'Antigen', 'Plate'];
export const STANDARDS_QC_HEADER = ['Plate', 'Passed_QC'];
export const FITS_HEADER = ['Analyte', 'Slope', 'Intercept', 'R_squared', 'N_points', 'Passed'];

export const plateArtifactNames = (plateId: string) => ({
  clean: `${plateId}_clean.csv`,
  lowBead: `${plateId}_beadqc_low_df.csv`,
  fits: `${plateId}_standards_fits.csv`,
});

export const projectArtifactNames = (projectName: string) => ({
  standardsQc: `${projectName}_all_plates_standardsqc.csv`,
  beadQc: `${projectName}_all_plates_beadqc.csv`,
});

export function cleanedTableCsv(table: CleanedTable): string {
  const header = [...table.columns, 'Plate', 'Standard'];
  const rows = table.rows.map((row) => [
    ...table.columns.map((column) => {
      if (column === LOCATION_COLUMN) return row.location;
      if (column === SAMPLE_COLUMN) return row.sample;
      return formatCell(cellAt(row, column));
    }),
    table.plateId,
    table.standard,
  ]);
  return toCsv(header, rows);
}

export function lowBeadCsv(records: readonly LowBeadRecord[]): string {
  return toCsv(
    LOW_BEAD_HEADER,
    records.map((r) => [r.location, r.sample, r.antigen, r.plate])
  );
}

export function fitsCsv(fits: readonly AnalyteFit[]): string {
  return toCsv(
    FITS_HEADER,
    fits.map((f) => [f.analyte, String(f.slope), String(f.intercept), String(f.rSquared), String(f.points), String(f.passed)])
  );
}

export function standardsQcCsv(plates: readonly PlateQCResult[]): string {
  return toCsv(
    STANDARDS_QC_HEADER,
    plates.map((p) => [p.plateId, String(p.passed)])
  );
}

/**
 * Write named CSV documents into `outputDir`, returning the written paths
 * in the order given.
 */
export async function writeArtifacts(outputDir: string, files: Array<[name: string, content: string]>): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const written: string[] = [];
  for (const [name, content] of files) {
    const path = join(outputDir, name);
    await writeFile(path, content, 'utf-8');
    written.push(path);
  }
  return written;
}
