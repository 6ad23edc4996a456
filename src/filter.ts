import path from 'node:path';
import fs from 'node:fs';
import { TextDecoder } from 'node:util';
import { classifyAndStrip } from './classifier.js';
import { DEFAULT_FORMAT_TABLE, type FormatTable, resolveFormat, sniffFormat } from './formats.js';

export interface KnitFilterOptions {
  /** format name or extension used instead of the file's own extension */
  format?: string;
  /** fall back to matching format patterns against the content */
  detectByContent?: boolean;
  table?: FormatTable;
}

const DEFAULT_ENCODINGS = new Set(['', 'unknown', 'native.enc']);

/** Split text into lines the way a line reader does: `\n`, `\r\n` or `\r` ends a line, no trailing empty line, BOM dropped. */
export function splitLines(text: string): string[] {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (body === '') return [];
  const lines = body.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function readLines(file: string, encoding: string): string[] {
  const label = DEFAULT_ENCODINGS.has(encoding.toLowerCase()) ? 'utf-8' : encoding;

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label);
  } catch {
    throw new Error(`Failed to read ${file}: unsupported encoding "${encoding}"`);
  }

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(file);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${file}: ${reason}`);
  }
  return splitLines(decoder.decode(bytes));
}

export function formatNameFor(file: string): string {
  return path.extname(file).replace(/^\./, '').toLowerCase();
}

/**
 * Read a source document and return its lines with code chunks blanked and
 * inline code removed, for use as a spell-check filter.
 */
export function knitFilter(file: string, encoding = 'unknown', options: KnitFilterOptions = {}): string[] {
  const lines = readLines(file, encoding);
  const table = options.table ?? DEFAULT_FORMAT_TABLE;
  let formatName = options.format ?? formatNameFor(file);

  if (options.detectByContent && resolveFormat(formatName, table).kind === 'none') {
    const sniffed = sniffFormat(lines, table);
    if (sniffed.kind === 'format') formatName = sniffed.name;
  }

  return classifyAndStrip(lines, formatName, table);
}

export function knitFilterText(text: string, formatName: string, table: FormatTable = DEFAULT_FORMAT_TABLE): string[] {
  return classifyAndStrip(splitLines(text), formatName, table);
}
