import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { splitLines } from './csvCommon.js';
import type { RawDocument } from './types.js';

export function documentFromText(content: string, name: string): RawDocument {
  return { name, lines: Object.freeze(splitLines(content)) };
}

export async function readExportDocument(path: string): Promise<RawDocument> {
  const content = await readFile(path, 'utf-8');
  return documentFromText(content, basename(path));
}

/**
 * Plate identifier: the file name without directory or extension.
 */
export function plateIdFromName(name: string): string {
  const base = basename(name);
  return basename(base, extname(base));
}
