/**
 * Raw text of one instrument export; lines are never modified after reading.
 */
export interface RawDocument {
  /** Source file name (or caller-supplied label) */
  name: string;
  lines: readonly string[];
}

/**
 * Half-open line range [start, end) of a block, header line included.
 */
export interface BlockRange {
  start: number;
  end: number;
}

export interface LocatedBlocks {
  mfi: BlockRange;
  count: BlockRange;
  /** Name of the termination strategy that produced the ranges */
  strategy: string;
}

/**
 * Decides where a block that starts at `start` ends.
 */
export interface BlockTerminationStrategy {
  readonly name: string;
  findEnd(lines: readonly string[], start: number, block: 'mfi' | 'count'): number;
}
