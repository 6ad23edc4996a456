import {
  DEFAULT_FORMAT_TABLE,
  type FormatDescriptor,
  type FormatTable,
  globalMatcher,
  lineMatcher,
  resolveFormat,
} from './formats.js';

export type LineTag = 'unset' | 'code' | 'text';

export interface Classification {
  tags: LineTag[];
  /** lines that close an open chunk; blanked regardless of their tag */
  terminators: boolean[];
}

/**
 * Keep only the end matches that close an open chunk. A line matching both
 * patterns closes the chunk when one is open, otherwise it opens one.
 */
export function filterChunkEnds(isBegin: readonly boolean[], isEnd: readonly boolean[]): boolean[] {
  let inChunk = false;
  return isBegin.map((begin, i) => {
    if (inChunk && isEnd[i]) {
      inChunk = false;
      return true;
    }
    if (!inChunk && begin) inChunk = true;
    return false;
  });
}

export function classifyLines(lines: readonly string[], descriptor: FormatDescriptor): Classification {
  const begin = lineMatcher(descriptor.chunkBegin);
  const end = lineMatcher(descriptor.chunkEnd);

  const isBegin = lines.map(line => begin.test(line));
  const terminators = filterChunkEnds(isBegin, lines.map(line => end.test(line)));

  const tags: LineTag[] = lines.map((_, i) => {
    if (terminators[i]) return 'text';
    return isBegin[i] ? 'code' : 'unset';
  });
  if (tags.length > 0 && tags[0] === 'unset') tags[0] = 'text';
  for (let i = 1; i < tags.length; i++) {
    if (tags[i] === 'unset') tags[i] = tags[i - 1];
  }

  return { tags, terminators };
}

/**
 * Blank code chunks and remove inline code from the prose of a document.
 * Formats the table does not know leave the lines untouched.
 */
export function classifyAndStrip(
  lines: readonly string[],
  formatName: string,
  table: FormatTable = DEFAULT_FORMAT_TABLE
): string[] {
  if (lines.length === 0) return [...lines];

  const selection = resolveFormat(formatName, table);
  if (selection.kind === 'none') return [...lines];

  const { descriptor } = selection;
  const { tags, terminators } = classifyLines(lines, descriptor);
  const inline = globalMatcher(descriptor.inlineCode);

  return lines.map((line, i) => {
    if (tags[i] === 'code' || terminators[i]) return '';
    return line.replace(inline, '');
  });
}
