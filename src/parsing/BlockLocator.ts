/**
 * BlockLocator: finds the MFI and bead-count sections of an export.
 *
 * Block starts are found by keyword; where a block ends is delegated to a
 * {@link BlockTerminationStrategy}.
 */

import type { BlockConfig } from '../config/types.js';
import { BlockNotFoundError, ConfigError } from '../qc/errors.js';
import type { QcLogger } from '../logging/logger.js';
import { isBlankLine, splitCsvLine } from './csvCommon.js';
import type { BlockRange, BlockTerminationStrategy, LocatedBlocks, RawDocument } from './types.js';

const SECTION_MARKER = /^\s*"?DataType:/i;

/**
 * Block = header line plus exactly `wellCount` well lines.
 */
export class FixedWellCountStrategy implements BlockTerminationStrategy {
  readonly name = 'fixed-count';

  constructor(readonly wellCount: number) {}

  findEnd(lines: readonly string[], start: number, block: 'mfi' | 'count'): number {
    const end = start + 1 + this.wellCount;
    if (end > lines.length) {
      throw new BlockNotFoundError(
        block,
        `${block} block starting at line ${start + 1} needs ${this.wellCount} well rows but the document has ${lines.length} lines`
      );
    }
    return end;
  }
}

/**
 * Block ends before the next blank line, section marker or terminator.
 */
export class NextMarkerStrategy implements BlockTerminationStrategy {
  readonly name = 'next-marker';

  constructor(readonly terminators: readonly string[]) {}

  findEnd(lines: readonly string[], start: number): number {
    for (let i = start + 1; i < lines.length; i += 1) {
      const line = lines[i] ?? '';
      if (isBlankLine(line) || SECTION_MARKER.test(line)) return i;
      if (this.terminators.some((t) => line.includes(t))) return i;
    }
    return lines.length;
  }
}

/**
 * Well count the instrument declared in the preamble (`Samples,<n>`), if any.
 */
export function detectDeclaredWellCount(lines: readonly string[], before = lines.length): number | null {
  for (let i = 0; i < Math.min(before, lines.length); i += 1) {
    const cells = splitCsvLine(lines[i] ?? '');
    if (cells[0]?.toLowerCase() !== 'samples') continue;
    const raw = cells[1] ?? '';
    if (!/^\d+$/.test(raw)) continue;
    const n = Number.parseInt(raw, 10);
    if (n > 0) return n;
  }
  return null;
}

/**
 * Pick the termination strategy for a document.
 */
export function selectStrategy(doc: RawDocument, config: BlockConfig, mfiMarkerLine = doc.lines.length): BlockTerminationStrategy {
  switch (config.strategy) {
    case 'fixed-count':
      if (config.wellCount === undefined) {
        throw new ConfigError('blocks.wellCount is required for the fixed-count strategy');
      }
      return new FixedWellCountStrategy(config.wellCount);
    case 'next-marker':
      return new NextMarkerStrategy(config.terminators);
    case 'auto': {
      const declared = detectDeclaredWellCount(doc.lines, mfiMarkerLine);
      if (declared !== null) {
        return new FixedWellCountStrategy(config.wellCount ?? declared);
      }
      return new NextMarkerStrategy(config.terminators);
    }
  }
}

function findFirst(lines: readonly string[], predicate: (line: string) => boolean): number {
  return lines.findIndex(predicate);
}

function findLast(lines: readonly string[], predicate: (line: string) => boolean): number {
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    if (predicate(lines[i] ?? '')) return i;
  }
  return -1;
}

function overlaps(a: BlockRange, b: BlockRange): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Locate the MFI and bead-count blocks.
 *
 * The MFI block starts on the line after the first line containing the MFI
 * marker; the bead-count block on the line after the last count-marker line
 * that is not a per-bead variant.
 */
export function locateBlocks(doc: RawDocument, config: BlockConfig, logger?: QcLogger): LocatedBlocks {
  const { lines } = doc;

  const mfiMarkerLine = findFirst(lines, (line) => line.includes(config.mfiMarker));
  if (mfiMarkerLine < 0) {
    throw new BlockNotFoundError('mfi', `No line containing "${config.mfiMarker}" in ${doc.name}`);
  }

  const countPattern = new RegExp(config.countMarker);
  const countMarkerLine = findLast(
    lines,
    (line) => countPattern.test(line) && !line.includes(config.countExclude)
  );
  if (countMarkerLine < 0) {
    throw new BlockNotFoundError('count', `No line matching /${config.countMarker}/ (excluding "${config.countExclude}") in ${doc.name}`);
  }

  if (countMarkerLine === mfiMarkerLine) {
    throw new BlockNotFoundError('count', `Line ${mfiMarkerLine + 1} of ${doc.name} matches both the MFI and the bead-count marker`);
  }

  const strategy = selectStrategy(doc, config, mfiMarkerLine);
  logger?.info(`${doc.name}: locating blocks with the ${strategy.name} strategy`);

  const mfi = blockFrom(lines, mfiMarkerLine + 1, strategy, 'mfi', doc.name);
  const count = blockFrom(lines, countMarkerLine + 1, strategy, 'count', doc.name);

  if (overlaps(mfi, count)) {
    throw new BlockNotFoundError(
      'count',
      `MFI block (lines ${mfi.start + 1}-${mfi.end}) and bead-count block (lines ${count.start + 1}-${count.end}) overlap in ${doc.name}`
    );
  }

  return { mfi, count, strategy: strategy.name };
}

function blockFrom(
  lines: readonly string[],
  start: number,
  strategy: BlockTerminationStrategy,
  block: 'mfi' | 'count',
  name: string
): BlockRange {
  if (start >= lines.length) {
    throw new BlockNotFoundError(block, `${block} marker is the last line of ${name}`);
  }
  const end = strategy.findEnd(lines, start, block);
  const hasRows = lines.slice(start + 1, end).some((line) => !isBlankLine(line));
  if (!hasRows) {
    throw new BlockNotFoundError(block, `${block} block at line ${start + 1} of ${name} has no well rows`);
  }
  return { start, end };
}
