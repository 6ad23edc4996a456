export interface FormatDescriptor {
  chunkBegin: RegExp;
  chunkEnd: RegExp;
  inlineCode: RegExp;
}

export type BuiltinFormat = 'rnw' | 'tex' | 'html' | 'md' | 'rst' | 'asciidoc' | 'textile';

export interface FormatTable {
  readonly descriptors: ReadonlyMap<string, FormatDescriptor>;
  /** lower-case file extension -> format name */
  readonly extensions: ReadonlyMap<string, string>;
}

export type FormatSelection =
  | { kind: 'format'; name: string; descriptor: FormatDescriptor }
  | { kind: 'none'; requested: string };

const BUILTIN_DESCRIPTORS: Record<BuiltinFormat, FormatDescriptor> = {
  rnw: {
    chunkBegin: /^\s*<<(.*)>>=.*$/,
    chunkEnd: /^\s*@\s*(%+.*|)$/,
    inlineCode: /\\Sexpr\{([^}]+)\}/,
  },
  tex: {
    chunkBegin: /^\s*%+\s*begin.rcode\s*(.*)/,
    chunkEnd: /^\s*%+\s*end.rcode/,
    inlineCode: /\\rinline\{([^}]+)\}/,
  },
  html: {
    chunkBegin: /^\s*<!--\s*begin.rcode\s*(.*)/,
    chunkEnd: /^\s*end.rcode\s*-->/,
    inlineCode: /<!--\s*rinline(.+?)-->/,
  },
  md: {
    chunkBegin: /^[\t >]*```+\s*\{([a-zA-Z0-9_]+.*)\}\s*$/,
    chunkEnd: /^[\t >]*```+\s*$/,
    inlineCode: /(?<!(^|\n)``)`r[ #]([^`]+)\s*`/,
  },
  rst: {
    chunkBegin: /^\s*[.][.]\s+\{r(.*)\}\s*$/,
    chunkEnd: /^\s*[.][.]\s+[.][.]\s*$/,
    inlineCode: /:r:`([^`]+)`/,
  },
  asciidoc: {
    chunkBegin: /^\/\/\s*begin[.]rcode(.*)$/,
    chunkEnd: /^\/\/\s*end[.]rcode\s*$/,
    inlineCode: /`r +([^`]+)\s*`|[+]r +([^+]+)\s*[+]/,
  },
  textile: {
    chunkBegin: /^###[.]\s+begin[.]rcode(.*)$/,
    chunkEnd: /^###[.]\s+end[.]rcode\s*$/,
    inlineCode: /@r +([^@]+)\s*@/,
  },
};

const BUILTIN_EXTENSIONS: Record<BuiltinFormat, string[]> = {
  rnw: ['rnw', 'snw', 'stex'],
  tex: ['rtex', 'tex'],
  html: ['rhtml', 'rhtm', 'html', 'htm'],
  md: ['rmd', 'rmarkdown', 'md', 'markdown'],
  rst: ['rrst', 'rst'],
  asciidoc: ['rasciidoc', 'radoc', 'asciidoc', 'adoc'],
  textile: ['rtextile', 'textile'],
};

export const BUILTIN_FORMATS: readonly BuiltinFormat[] = ['rnw', 'tex', 'html', 'md', 'rst', 'asciidoc', 'textile'];

export interface ExtraFormat {
  name: string;
  descriptor: FormatDescriptor;
  extensions?: string[];
}

/**
 * Build an immutable format table from the built-in formats plus any extra
 * ones. An extra format with a built-in name replaces that descriptor.
 */
export function createFormatTable(extra: ExtraFormat[] = []): FormatTable {
  const descriptors = new Map<string, FormatDescriptor>();
  const extensions = new Map<string, string>();

  for (const name of BUILTIN_FORMATS) {
    descriptors.set(name, BUILTIN_DESCRIPTORS[name]);
    for (const ext of BUILTIN_EXTENSIONS[name]) extensions.set(ext, name);
  }
  for (const format of extra) {
    descriptors.set(format.name, format.descriptor);
    for (const ext of format.extensions ?? []) extensions.set(ext.toLowerCase(), format.name);
  }

  return Object.freeze({ descriptors, extensions });
}

export const DEFAULT_FORMAT_TABLE: FormatTable = createFormatTable();

/**
 * Resolve an extension or format name. Format names win over extension
 * aliases; lookup is case-insensitive for aliases.
 */
export function resolveFormat(requested: string, table: FormatTable = DEFAULT_FORMAT_TABLE): FormatSelection {
  const direct = table.descriptors.get(requested);
  if (direct) return { kind: 'format', name: requested, descriptor: direct };

  const key = requested.replace(/^\./, '').toLowerCase();
  const name = table.descriptors.has(key) ? key : table.extensions.get(key);
  if (name === undefined) return { kind: 'none', requested };
  const descriptor = table.descriptors.get(name);
  return descriptor ? { kind: 'format', name, descriptor } : { kind: 'none', requested };
}

/** Pick the first format whose chunk-begin or inline-code pattern occurs in the text. */
export function sniffFormat(lines: readonly string[], table: FormatTable = DEFAULT_FORMAT_TABLE): FormatSelection {
  for (const [name, descriptor] of table.descriptors) {
    const begin = lineMatcher(descriptor.chunkBegin);
    const inline = lineMatcher(descriptor.inlineCode);
    if (lines.some(line => begin.test(line) || inline.test(line))) {
      return { kind: 'format', name, descriptor };
    }
  }
  return { kind: 'none', requested: '' };
}

/** Copy of a pattern without the stateful g/y flags, safe to reuse with test(). */
export function lineMatcher(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/** Global copy of a pattern, for removing every match from a line. */
export function globalMatcher(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'g');
}
