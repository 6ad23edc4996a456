import path from 'node:path';
import fg from 'fast-glob';
import { engineKey, type EngineRegistry } from './engines.js';

export interface DiscoveredVignette {
  /** path relative to the search root */
  file: string;
  /** `package::name` keys of the engines whose pattern matches the file */
  engines: string[];
}

export interface FindVignettesOptions {
  /** sub-directory of the root that holds the vignette sources */
  directory?: string;
  ignore?: string[];
}

export const DEFAULT_VIGNETTE_DIR = 'vignettes';

export async function findVignettes(
  root: string,
  registry: EngineRegistry,
  options: FindVignettesOptions = {}
): Promise<DiscoveredVignette[]> {
  const cwd = path.resolve(root, options.directory ?? DEFAULT_VIGNETTE_DIR);
  const files = await fg('**/*', {
    cwd,
    dot: false,
    onlyFiles: true,
    ignore: ['**/node_modules/**', ...(options.ignore ?? [])],
  });

  const found: DiscoveredVignette[] = [];
  for (const file of files.sort()) {
    const engines = registry.match(file).map(e => engineKey(e.package, e.name));
    if (engines.length > 0) found.push({ file, engines });
  }
  return found;
}
