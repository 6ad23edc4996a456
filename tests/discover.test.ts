import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { findVignettes } from '../src/discover.js';
import { buildRegistry } from '../src/cli.js';

describe('findVignettes', () => {
  let root: string;

  function touch(rel: string) {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '');
  }

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'vignette-find-'));
    touch('vignettes/paper.Rnw');
    touch('vignettes/intro.Rmd');
    touch('vignettes/README.txt');
    touch('vignettes/sub/deep.Rhtml');
    touch('vignettes/node_modules/dep/skip.Rnw');
    touch('R/code.R');
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists vignette sources with their engines', async () => {
    const found = await findVignettes(root, buildRegistry());
    expect(found.map(v => v.file)).toEqual(['intro.Rmd', 'paper.Rnw', 'sub/deep.Rhtml']);
    expect(found[1].engines).toEqual(['knitr::knitr', 'knitr::knitr_notangle']);
    expect(found[0].engines).toHaveLength(8);
  });

  it('searches another directory when asked', async () => {
    const found = await findVignettes(root, buildRegistry(), { directory: '.', ignore: ['vignettes/sub/**'] });
    expect(found.map(v => v.file)).toEqual(['vignettes/intro.Rmd', 'vignettes/paper.Rnw']);
  });

  it('finds nothing in a missing directory', async () => {
    expect(await findVignettes(root, buildRegistry(), { directory: 'doc' })).toEqual([]);
  });
});
