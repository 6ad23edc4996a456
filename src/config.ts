import path from 'node:path';

export type FilterMode = 'filter' | 'engines' | 'find';

export interface FilterConfig {
  mode: FilterMode;
  files: string[];
  encoding: string;
  format?: string;
  outDir?: string;
  /** package root searched in `find` mode */
  root: string;
  detectByContent: boolean;
  verbose: boolean;
}

export const DEFAULT_ENCODING = 'unknown';

export const USAGE = `Usage: vignette-filter [options] <file...>

Prints each source document with code chunks and inline code removed, ready
to be piped into a spell checker.

Options:
  -e, --encoding <name>     Encoding of the input files (default: "unknown", i.e. UTF-8)
  -f, --format <name>       Format or extension to use instead of the file extension
  -o, --outDir <dir>        Write filtered copies into <dir> instead of stdout
      --detect              Detect the format from the content when the extension is unknown
      --engines             List the registered vignette engines
      --find <dir>          List vignettes under <dir>/vignettes and their engines
      --verbose             Print the resolved configuration
  -h, --help                Show this help message

Example:
  vignette-filter vignettes/intro.Rmd | aspell list`;

function valueOf(args: string[], i: number, option: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('-')) throw new Error(`${option} requires a value`);
  return value;
}

export function parseArgs(args: string[]): FilterConfig {
  let mode: FilterMode = 'filter';
  const files: string[] = [];
  let encoding = DEFAULT_ENCODING;
  let format: string | undefined;
  let outDir: string | undefined;
  let root = '.';
  let detectByContent = false;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        console.log(USAGE);
        process.exit(0);
      case '--encoding':
      case '-e':
        encoding = valueOf(args, ++i, arg);
        break;
      case '--format':
      case '-f':
        format = valueOf(args, ++i, arg);
        break;
      case '--outDir':
      case '-o':
        outDir = valueOf(args, ++i, arg);
        break;
      case '--detect':
        detectByContent = true;
        break;
      case '--engines':
        mode = 'engines';
        break;
      case '--find':
        mode = 'find';
        root = valueOf(args, ++i, arg);
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        files.push(arg);
    }
  }

  if (mode === 'filter' && files.length === 0) throw new Error('at least one input file is required');

  return {
    mode,
    files: files.map(f => path.resolve(f)),
    encoding,
    format,
    outDir: outDir === undefined ? undefined : path.resolve(outDir),
    root: path.resolve(root),
    detectByContent,
    verbose,
  };
}
