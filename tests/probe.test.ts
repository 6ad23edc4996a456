import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import {
  compareVersions,
  createSystemProbe,
  findExecutable,
  libraryPathsFrom,
  parsePandocVersion,
} from '../src/probe.js';

describe('compareVersions', () => {
  it('compares dotted versions numerically', () => {
    expect(compareVersions('1.12.3', '1.12.3')).toBe(0);
    expect(compareVersions('2.0', '1.12.3')).toBe(1);
    expect(compareVersions('1.9', '1.12')).toBe(-1);
    expect(compareVersions('1.12', '1.12.0')).toBe(0);
  });
});

describe('parsePandocVersion', () => {
  it('reads the version from the first line', () => {
    expect(parsePandocVersion('pandoc 3.1.2\nFeatures: +server\n')).toBe('3.1.2');
    expect(parsePandocVersion('pandoc.exe 2.19\n')).toBe('2.19');
    expect(parsePandocVersion('something else')).toBeUndefined();
  });
});

describe('libraryPathsFrom', () => {
  it('joins extra paths and the R library variables', () => {
    const env = { R_LIBS: ['/a', '/b'].join(path.delimiter), R_LIBS_USER: '/c' };
    expect(libraryPathsFrom(env, ['/x'])).toEqual(['/x', '/a', '/b', '/c']);
  });

  it('adds the home library after the R library variables', () => {
    expect(libraryPathsFrom({ R_LIBS: '/a', R_HOME: '/opt/R' })).toEqual(['/a', path.join('/opt/R', 'library')]);
  });

  it('expands a leading tilde', () => {
    expect(libraryPathsFrom({ R_LIBS_USER: '~/R/library' })).toEqual([path.join(os.homedir(), 'R/library')]);
    expect(libraryPathsFrom({ R_LIBS_USER: '~' })).toEqual([os.homedir()]);
  });
});

describe.skipIf(process.platform === 'win32')('createSystemProbe', () => {
  let dir: string;
  let bin: string;

  function addExecutable(name: string) {
    fs.writeFileSync(path.join(bin, name), '#!/bin/sh\n', { mode: 0o755 });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vignette-probe-'));
    bin = path.join(dir, 'bin');
    fs.mkdirSync(bin);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('finds installed packages in the library paths', () => {
    const lib = path.join(dir, 'lib');
    fs.mkdirSync(path.join(lib, 'rmarkdown'), { recursive: true });
    fs.writeFileSync(path.join(lib, 'rmarkdown', 'DESCRIPTION'), 'Package: rmarkdown\n');
    const probe = createSystemProbe({ env: { R_LIBS: lib } });
    expect(probe.hasPackage('rmarkdown')).toBe(true);
    expect(probe.hasPackage('shiny')).toBe(false);
  });

  it('finds packages in the R home library', () => {
    fs.mkdirSync(path.join(dir, 'library', 'rmarkdown'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'library', 'rmarkdown', 'DESCRIPTION'), 'Package: rmarkdown\n');
    expect(createSystemProbe({ env: { R_HOME: dir } }).hasPackage('rmarkdown')).toBe(true);
  });

  it('trusts RSTUDIO_PANDOC', () => {
    const probe = createSystemProbe({ env: { RSTUDIO_PANDOC: '/opt/pandoc', PATH: '' } });
    expect(probe.isPandocAvailable()).toBe(true);
  });

  it('requires pandoc-citeproc and a recent pandoc', () => {
    addExecutable('pandoc');
    addExecutable('pandoc-citeproc');
    const env = { PATH: bin };
    expect(createSystemProbe({ env, readPandocVersion: () => 'pandoc 2.5\n' }).isPandocAvailable()).toBe(true);
    expect(createSystemProbe({ env, readPandocVersion: () => 'pandoc 1.12.2\n' }).isPandocAvailable()).toBe(false);
  });

  it('reports pandoc missing without pandoc-citeproc', () => {
    addExecutable('pandoc');
    const probe = createSystemProbe({ env: { PATH: bin }, readPandocVersion: () => 'pandoc 3.0\n' });
    expect(probe.isPandocAvailable()).toBe(false);
  });

  it('reports pandoc missing when its version cannot be read', () => {
    addExecutable('pandoc');
    addExecutable('pandoc-citeproc');
    const probe = createSystemProbe({
      env: { PATH: bin },
      readPandocVersion: () => {
        throw new Error('spawn failed');
      },
    });
    expect(probe.isPandocAvailable()).toBe(false);
  });

  it('detects a package check from the environment', () => {
    expect(createSystemProbe({ env: { _R_CHECK_LICENSE_: 'TRUE' } }).isCheckRun()).toBe(true);
    expect(createSystemProbe({ env: {} }).isCheckRun()).toBe(false);
  });

  it('finds executables on PATH', () => {
    addExecutable('pandoc');
    expect(findExecutable('pandoc', { PATH: bin })).toBe(path.join(bin, 'pandoc'));
    expect(findExecutable('missing', { PATH: bin })).toBeUndefined();
  });
});
