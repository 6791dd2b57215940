/**
 * ProjectAggregator: runs every export in a folder and folds the per-plate
 * QC results into project-level tables.
 */

import { readdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { QcSettings } from '../config/loader.js';
import type { QcLogger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { plateIdFromName } from '../parsing/ExportDocument.js';
import { isSkippableError } from '../qc/errors.js';
import type { PlateQCResult, LowBeadRecord, ProjectSummary, SkippedFile } from '../types/qc.js';
import { lowBeadCsv, projectArtifactNames, standardsQcCsv, writeArtifacts } from './ArtifactWriter.js';
import { mapWithConcurrency } from './concurrency.js';
import { PlateProcessor } from './PlateProcessor.js';

type PlateOutcome =
  | { kind: 'processed'; plate: PlateQCResult; lowBead: LowBeadRecord[]; artifacts: string[] }
  | { kind: 'skipped'; skipped: SkippedFile };

/**
 * Project name: the first token of a file name before `_`, `-`, `.` or a space.
 */
export function projectNameFrom(fileName: string): string {
  const base = plateIdFromName(fileName);
  const token = base.split(/[_\-.\s]/)[0];
  return token && token.length > 0 ? token : base;
}

export class ProjectAggregator {
  private readonly settings: QcSettings;
  private readonly logger: QcLogger;
  private readonly processor: PlateProcessor;

  constructor(settings: QcSettings, logger: QcLogger = silentLogger) {
    this.settings = settings;
    this.logger = logger;
    this.processor = new PlateProcessor(settings, logger);
  }

  /**
   * Export files directly inside `directory` with the configured extension,
   * sorted by name.
   */
  async listInputFiles(directory: string): Promise<string[]> {
    const extension = this.settings.fileExtension.toLowerCase();
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(extension))
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((name) => join(directory, name));
  }

  private async runPlate(file: string): Promise<PlateOutcome> {
    try {
      const result = await this.processor.processFile(file);
      const artifacts = await this.processor.writeArtifacts(result);
      return { kind: 'processed', plate: result.plate, lowBead: result.lowBead, artifacts };
    } catch (err) {
      if (!this.settings.strict && isSkippableError(err)) {
        this.logger.warn(`Skipping ${basename(file)}: ${err.message}`);
        return { kind: 'skipped', skipped: { file: basename(file), code: err.code, reason: err.message } };
      }
      throw err;
    }
  }

  async run(directory: string): Promise<ProjectSummary> {
    const dir = resolve(directory);
    const files = await this.listInputFiles(dir);
    const first = files[0];
    const projectName = first ? projectNameFrom(basename(first)) : basename(dir);

    if (!first) {
      this.logger.warn(`No *${this.settings.fileExtension} files in ${dir}`);
    } else {
      this.logger.info(`Project ${projectName}: processing ${files.length} files (concurrency ${this.settings.concurrency})`);
    }

    const outcomes = await mapWithConcurrency(files, this.settings.concurrency, (file) => this.runPlate(file));

    const plates: PlateQCResult[] = [];
    const lowBead: LowBeadRecord[] = [];
    const skipped: SkippedFile[] = [];
    const artifacts: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === 'skipped') {
        skipped.push(outcome.skipped);
        continue;
      }
      plates.push(outcome.plate);
      lowBead.push(...outcome.lowBead);
      artifacts.push(...outcome.artifacts);
    }

    const names = projectArtifactNames(projectName);
    artifacts.push(
      ...(await writeArtifacts(this.settings.outputDir, [
        [names.standardsQc, standardsQcCsv(plates)],
        [names.beadQc, lowBeadCsv(lowBead)],
      ]))
    );

    if (skipped.length > 0) {
      this.logger.warn(`Project ${projectName}: skipped ${skipped.length} of ${files.length} files`);
    }
    this.logger.info(
      `Project ${projectName}: ${plates.filter((p) => p.passed).length} of ${plates.length} plates passed standards QC`
    );

    return { projectName, plates, lowBead, skipped, artifacts };
  }
}
