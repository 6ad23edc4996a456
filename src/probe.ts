import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { execFileSync } from 'node:child_process';

export interface AvailabilityProbe {
  hasPackage(name: string): boolean;
  isPandocAvailable(): boolean;
  /** true while a package check is running */
  isCheckRun(): boolean;
}

export type Env = Record<string, string | undefined>;

export const MIN_PANDOC_VERSION = '1.12.3';

const LIBRARY_VARS = ['R_LIBS', 'R_LIBS_USER', 'R_LIBS_SITE'];
const CHECK_VARS = ['_R_CHECK_TIMINGS_', '_R_CHECK_LICENSE_'];

export interface SystemProbeOptions {
  env?: Env;
  libraryPaths?: string[];
  /** returns the output of `<pandoc> --version` */
  readPandocVersion?: (pandocPath: string) => string;
}

export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(n => parseInt(n, 10) || 0);
  const pb = b.split('.').map(n => parseInt(n, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function findExecutable(name: string, env: Env = process.env): string | undefined {
  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
  const suffixes = process.platform === 'win32'
    ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
    : [''];

  for (const dir of dirs) {
    for (const suffix of suffixes) {
      const candidate = path.join(dir, name + suffix);
      try {
        fs.accessSync(candidate, fs.constants.X_OK);
        if (fs.statSync(candidate).isFile()) return candidate;
      } catch {
        continue;
      }
    }
  }
  return undefined;
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Library search order: extra paths, `R_LIBS*`, then the home library under `R_HOME`. */
export function libraryPathsFrom(env: Env, extra: string[] = []): string[] {
  const fromEnv = LIBRARY_VARS.flatMap(v => (env[v] ?? '').split(path.delimiter));
  const home = env.R_HOME ? [path.join(env.R_HOME, 'library')] : [];
  return [...extra, ...fromEnv, ...home]
    .map(p => p.trim())
    .filter(Boolean)
    .map(expandHome);
}

function defaultPandocVersion(pandocPath: string): string {
  return execFileSync(pandocPath, ['--version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] });
}

/** Parse the version out of `pandoc --version` output ("pandoc 2.19.2", "pandoc.exe 3.1"). */
export function parsePandocVersion(output: string): string | undefined {
  const match = /^pandoc(?:\.exe)?\s+(\d+(?:\.\d+)*)/m.exec(output);
  return match ? match[1] : undefined;
}

export function createSystemProbe(options: SystemProbeOptions = {}): AvailabilityProbe {
  const env = options.env ?? process.env;
  const libraries = libraryPathsFrom(env, options.libraryPaths);
  const readVersion = options.readPandocVersion ?? defaultPandocVersion;

  return {
    hasPackage(name: string): boolean {
      return libraries.some(lib => fs.existsSync(path.join(lib, name, 'DESCRIPTION')));
    },

    isPandocAvailable(): boolean {
      if ((env.RSTUDIO_PANDOC ?? '') !== '') return true;
      if (!findExecutable('pandoc-citeproc', env)) return false;
      const pandoc = findExecutable('pandoc', env);
      if (!pandoc) return false;
      let version: string | undefined;
      try {
        version = parsePandocVersion(readVersion(pandoc));
      } catch {
        return false;
      }
      return version !== undefined && compareVersions(version, MIN_PANDOC_VERSION) >= 0;
    },

    isCheckRun(): boolean {
      return CHECK_VARS.some(v => env[v] !== undefined);
    },
  };
}
