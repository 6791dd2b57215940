/**
 * PlateProcessor: runs extraction and QC for one export file.
 *
 * extract → validate → bead QC → mask → subtract → fit → decide → emit
 */

import type { QcSettings } from '../config/loader.js';
import type { QcLogger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { locateBlocks } from '../parsing/BlockLocator.js';
import { documentFromText, plateIdFromName, readExportDocument } from '../parsing/ExportDocument.js';
import { extractTable } from '../parsing/TableExtractor.js';
import type { RawDocument } from '../parsing/types.js';
import { validateAlignment } from '../qc/AlignmentValidator.js';
import { subtractBackground } from '../qc/BackgroundSubtractor.js';
import { applyBeadThreshold, maskLowBeadWells } from '../qc/BeadCountQC.js';
import { applySentinels, decidePlate, evaluateFits } from '../qc/PlateQCDecision.js';
import { fitStandardCurves } from '../qc/StandardCurveFitter.js';
import type { AnalyteFit, CleanedTable, LowBeadRecord, PlateQCResult } from '../types/qc.js';
import {
  cleanedTableCsv,
  fitsCsv,
  lowBeadCsv,
  plateArtifactNames,
  writeArtifacts,
} from './ArtifactWriter.js';

export interface PlateRunResult {
  plate: PlateQCResult;
  fits: AnalyteFit[];
  lowBead: LowBeadRecord[];
  cleaned: CleanedTable;
  /** Block termination strategy that located the tables */
  strategy: string;
}

export class PlateProcessor {
  private readonly settings: QcSettings;
  private readonly logger: QcLogger;

  constructor(settings: QcSettings, logger: QcLogger = silentLogger) {
    this.settings = settings;
    this.logger = logger;
  }

  /**
   * Run the pipeline over an already-read export.
   */
  processDocument(doc: RawDocument, plateId = plateIdFromName(doc.name)): PlateRunResult {
    const { settings, logger } = this;

    const blocks = locateBlocks(doc, settings.blocks, logger);
    const counts = extractTable(doc.lines, blocks.count, `${plateId} bead-count block`);
    const mfi = extractTable(doc.lines, blocks.mfi, `${plateId} MFI block`);

    validateAlignment(counts, mfi, logger, plateId);

    const beadQc = applyBeadThreshold(counts, settings.beadThreshold, plateId);
    if (beadQc.lowBead.length > 0) {
      logger.warn(`${plateId}: ${beadQc.lowBead.length} well/analyte pairs below ${settings.beadThreshold} beads`);
    }
    const masked = maskLowBeadWells(mfi, beadQc.lowBead, logger, plateId);
    const subtracted = subtractBackground(masked, settings.backgroundAnalyte, logger, plateId);

    const fits = evaluateFits(
      fitStandardCurves(subtracted, settings.standardAnalytes, logger, plateId),
      settings.rSquaredThreshold
    );
    for (const fit of fits) {
      logger.info(
        `${plateId}: ${fit.analyte} standard curve R²=${fit.rSquared} over ${fit.points} points (${fit.passed ? 'passed' : 'failed'})`
      );
    }

    const plate = decidePlate(plateId, fits);
    const cleaned = applySentinels(subtracted, plate, logger);
    logger.info(`${plateId}: plate ${plate.passed ? 'passed' : 'failed'} standards QC`);

    return { plate, fits, lowBead: beadQc.lowBead, cleaned, strategy: blocks.strategy };
  }

  processText(content: string, plateId: string): PlateRunResult {
    return this.processDocument(documentFromText(content, plateId), plateId);
  }

  async processFile(path: string): Promise<PlateRunResult> {
    const doc = await readExportDocument(path);
    return this.processDocument(doc);
  }

  /**
   * Write the clean table, the low-bead table and the fit table.
   */
  async writeArtifacts(result: PlateRunResult, outputDir = this.settings.outputDir): Promise<string[]> {
    const names = plateArtifactNames(result.plate.plateId);
    const written = await writeArtifacts(outputDir, [
      [names.clean, cleanedTableCsv(result.cleaned)],
      [names.lowBead, lowBeadCsv(result.lowBead)],
      [names.fits, fitsCsv(result.fits)],
    ]);
    this.logger.info(`${result.plate.plateId}: wrote ${written.length} artifacts to ${outputDir}`);
    return written;
  }
}
