#!/usr/bin/env node
import path from 'node:path';
import fs from 'node:fs';
import { type FilterConfig, parseArgs } from './config.js';
import { knitFilter } from './filter.js';
import { engineKey, type EngineRegistry, type RenderingCollaborator, registerVignetteEngines } from './engines.js';
import { createSystemProbe } from './probe.js';
import { findVignettes } from './discover.js';

// listing engines never renders anything
const listingRenderer: RenderingCollaborator = {
  render: async request => {
    throw new Error(`No renderer configured for ${request.documentPath}`);
  },
  extractCode: async documentPath => {
    throw new Error(`No renderer configured for ${documentPath}`);
  },
};

export function buildRegistry(): EngineRegistry {
  return registerVignetteEngines({ renderer: listingRenderer, probe: createSystemProbe() });
}

export function formatEngines(registry: EngineRegistry): string {
  const width = Math.max(0, ...registry.names().map(k => k.length)) + 2;
  return registry
    .list()
    .map(engine => `${engineKey(engine.package, engine.name).padEnd(width)}${engine.pattern.source}`)
    .join('\n');
}

function outputPaths(files: string[], outDir: string): Map<string, string> {
  const byOutput = new Map<string, string>();
  for (const file of files) {
    const outPath = path.join(outDir, path.basename(file));
    const previous = byOutput.get(outPath);
    if (previous !== undefined) {
      throw new Error(`${previous} and ${file} would both be written to ${outPath}`);
    }
    byOutput.set(outPath, file);
  }
  return new Map([...byOutput].map(([outPath, file]) => [file, outPath]));
}

export function runFilter(config: FilterConfig): string[] {
  const targets = config.outDir ? outputPaths(config.files, config.outDir) : undefined;
  const outputs: string[] = [];
  for (const file of config.files) {
    const lines = knitFilter(file, config.encoding, {
      format: config.format,
      detectByContent: config.detectByContent,
    });
    const outPath = targets?.get(file);
    if (config.outDir && outPath) {
      fs.mkdirSync(config.outDir, { recursive: true });
      fs.writeFileSync(outPath, lines.map(l => l + '\n').join(''));
      outputs.push(outPath);
    } else {
      outputs.push(...lines);
    }
  }
  return outputs;
}

async function main() {
  try {
    const config = parseArgs(process.argv.slice(2));

    if (config.verbose) {
      console.log('Configuration:', JSON.stringify(config, null, 2));
    }

    switch (config.mode) {
      case 'engines':
        console.log(formatEngines(buildRegistry()));
        break;
      case 'find': {
        const found = await findVignettes(config.root, buildRegistry());
        for (const v of found) {
          console.log(`${v.file}    ${v.engines.join(', ')}`);
        }
        if (config.verbose) console.log(`\nFound ${found.length} vignette(s).`);
        break;
      }
      case 'filter': {
        const output = runFilter(config);
        if (config.outDir) {
          console.log(`Filtered ${output.length} file(s) into ${config.outDir}`);
        } else {
          console.log(output.join('\n'));
        }
        break;
      }
    }
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

// Only run main when executed directly
const isDirectRun = process.argv[1] && (
  process.argv[1].endsWith('/cli.js') ||
  process.argv[1].endsWith('/cli.ts')
);
if (isDirectRun) {
  await main();
}
