import { describe, expect, it } from 'vitest';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_BLOCK_CONFIG } from '../config/types.js';
import { BlockNotFoundError, ConfigError } from '../qc/errors.js';
import {
  FixedWellCountStrategy,
  NextMarkerStrategy,
  detectDeclaredWellCount,
  locateBlocks,
  selectStrategy,
} from './BlockLocator.js';
import { documentFromText } from './ExportDocument.js';

const here = dirname(fileURLToPath(import.meta.url));
const fixtureDir = join(here, 'fixtures');

function fixture(name: string) {
  return documentFromText(readFileSync(join(fixtureDir, name), 'utf-8'), name);
}

function doc(lines: string[]) {
  return documentFromText(lines.join('\n'), 'inline.csv');
}

describe('locateBlocks', () => {
  it('uses the declared well count when the preamble has a Samples row', () => {
    const blocks = locateBlocks(fixture('ProjA_plate1.csv'), DEFAULT_BLOCK_CONFIG);
    expect(blocks.strategy).toBe('fixed-count');
    expect(blocks.mfi).toEqual({ start: 9, end: 16 });
    // the Per Bead Count section comes later but is excluded
    expect(blocks.count).toEqual({ start: 27, end: 34 });
  });

  it('falls back to the next marker without a Samples row', () => {
    const blocks = locateBlocks(fixture('ProjA_plate2.csv'), DEFAULT_BLOCK_CONFIG);
    expect(blocks.strategy).toBe('next-marker');
    expect(blocks.mfi).toEqual({ start: 4, end: 9 });
    expect(blocks.count).toEqual({ start: 11, end: 16 });
  });

  it('stops a next-marker block at a terminator line', () => {
    const blocks = locateBlocks(
      doc([
        'DataType:,Median',
        'Location,Sample,A,Total Events',
        '"1(1,A1)",S,1,10',
        'Avg Net MFI',
        'DataType:,Count',
        'Location,Sample,A,Total Events',
        '"1(1,A1)",S,60,10',
      ]),
      { ...DEFAULT_BLOCK_CONFIG, strategy: 'next-marker' }
    );
    expect(blocks.mfi).toEqual({ start: 1, end: 3 });
    expect(blocks.count).toEqual({ start: 5, end: 7 });
  });

  it('reports a missing bead-count section', () => {
    const run = () => locateBlocks(fixture('ProjA_plate3.csv'), DEFAULT_BLOCK_CONFIG);
    expect(run).toThrow(BlockNotFoundError);
    try {
      run();
    } catch (err) {
      expect(err).toBeInstanceOf(BlockNotFoundError);
      if (err instanceof BlockNotFoundError) {
        expect(err.block).toBe('count');
        expect(err.code).toBe('BLOCK_NOT_FOUND');
      }
    }
  });

  it('reports a missing MFI section', () => {
    expect(() => locateBlocks(doc(['DataType:,Count', 'Location,Sample,A,Total Events']), DEFAULT_BLOCK_CONFIG)).toThrow(
      /No line containing "Median"/
    );
  });

  it('rejects a line matching both markers', () => {
    expect(() =>
      locateBlocks(doc(['DataType:,Median Count', 'Location,Sample,A,Total Events', 'x,y,1,2']), DEFAULT_BLOCK_CONFIG)
    ).toThrow(/matches both/);
  });

  it('rejects a block without well rows', () => {
    expect(() =>
      locateBlocks(
        doc([
          'DataType:,Median',
          'Location,Sample,A,Total Events',
          ',,',
          'DataType:,Count',
          'Location,Sample,A,Total Events',
          '"1(1,A1)",S,60,10',
        ]),
        { ...DEFAULT_BLOCK_CONFIG, strategy: 'next-marker' }
      )
    ).toThrow(/has no well rows/);
  });

  it('rejects a fixed block that runs past the end of the document', () => {
    expect(() =>
      locateBlocks(
        doc([
          'DataType:,Median',
          'Location,Sample,A,Total Events',
          '"1(1,A1)",S,1,10',
          'DataType:,Count',
          'Location,Sample,A,Total Events',
          '"1(1,A1)",S,60,10',
        ]),
        { ...DEFAULT_BLOCK_CONFIG, strategy: 'fixed-count', wellCount: 2 }
      )
    ).toThrow(/needs 2 well rows/);
  });
});

describe('selectStrategy', () => {
  it('requires a well count for fixed-count', () => {
    expect(() => selectStrategy(doc(['x']), { ...DEFAULT_BLOCK_CONFIG, strategy: 'fixed-count' })).toThrow(ConfigError);
  });

  it('prefers a configured well count over the declared one', () => {
    const strategy = selectStrategy(doc(['Samples,6']), { ...DEFAULT_BLOCK_CONFIG, wellCount: 4 });
    expect(strategy).toBeInstanceOf(FixedWellCountStrategy);
    expect(strategy instanceof FixedWellCountStrategy ? strategy.wellCount : 0).toBe(4);
  });

  it('ignores a Samples row after the MFI marker', () => {
    const strategy = selectStrategy(doc(['DataType:,Median', 'Samples,6']), DEFAULT_BLOCK_CONFIG, 0);
    expect(strategy).toBeInstanceOf(NextMarkerStrategy);
  });
});

describe('detectDeclaredWellCount', () => {
  it('reads the count from a Samples row', () => {
    expect(detectDeclaredWellCount(['Batch,x', 'SAMPLES,96,Min Events,50'])).toBe(96);
  });

  it('ignores rows without a positive integer', () => {
    expect(detectDeclaredWellCount(['Samples,abc', 'Samples,0'])).toBeNull();
  });
});
