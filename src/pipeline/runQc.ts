import { stat } from 'node:fs/promises';
import type { QcSettings } from '../config/loader.js';
import type { QcLogger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ProjectSummary } from '../types/qc.js';
import { PlateProcessor, type PlateRunResult } from './PlateProcessor.js';
import { ProjectAggregator } from './ProjectAggregator.js';

export type QcRun =
  | { mode: 'plate'; result: PlateRunResult; artifacts: string[] }
  | { mode: 'project'; summary: ProjectSummary };

/**
 * Run QC on a single export (every error is fatal) or on a folder of
 * exports (unparseable files are skipped unless `strict`).
 */
export async function runQc(inputPath: string, settings: QcSettings, logger: QcLogger = silentLogger): Promise<QcRun> {
  const info = await stat(inputPath);
  if (info.isDirectory()) {
    const summary = await new ProjectAggregator(settings, logger).run(inputPath);
    return { mode: 'project', summary };
  }
  const processor = new PlateProcessor(settings, logger);
  const result = await processor.processFile(inputPath);
  const artifacts = await processor.writeArtifacts(result);
  return { mode: 'plate', result, artifacts };
}

/**
 * One summary line per plate (and per skipped file), then the written
 * artifact paths or a project total.
 */
export function describeRun(run: QcRun): string[] {
  if (run.mode === 'plate') {
    const { plate } = run.result;
    return [
      `${plate.plateId}\t${plate.passed ? 'PASSED' : 'FAILED'}\t${plate.passingAnalytes.join(';')}\tlow-bead=${run.result.lowBead.length}`,
      ...run.artifacts,
    ];
  }
  const { summary } = run;
  return [
    ...summary.plates.map((p) => `${p.plateId}\t${p.passed ? 'PASSED' : 'FAILED'}\t${p.passingAnalytes.join(';')}`),
    ...summary.skipped.map((s) => `${s.file}\tSKIPPED\t${s.code}: ${s.reason}`),
    `project ${summary.projectName}: ${summary.plates.length} plates, ${summary.skipped.length} skipped, ${summary.lowBead.length} low-bead records`,
  ];
}
