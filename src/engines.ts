import path from 'node:path';
import fs from 'node:fs';
import { lineMatcher } from './formats.js';
import type { AvailabilityProbe } from './probe.js';

export interface WeaveOptions {
  encoding?: string;
  quiet?: boolean;
}

export type WeaveFn = (file: string, options?: WeaveOptions) => Promise<void>;
export type TangleFn = (file: string, options?: WeaveOptions) => Promise<void>;

export type RenderTarget = 'knit' | 'html' | 'pdf' | 'docco-linear' | 'docco-classic' | 'rmarkdown';

export interface RenderRequest {
  documentPath: string;
  encoding: string;
  quiet: boolean;
  target: RenderTarget;
  /** write the document's code out while rendering it */
  extractCode: boolean;
  /** chunk errors stop the render instead of being shown in the output */
  haltOnError: boolean;
}

/** Renders documents and extracts their code; supplied by the caller. */
export interface RenderingCollaborator {
  render(request: RenderRequest): Promise<void>;
  extractCode(documentPath: string, options: Required<WeaveOptions>): Promise<void>;
}

export type WeaveStrategy = 'render-and-extract' | 'render-no-extract';
export type TangleStrategy = 'extract' | 'discard';

export interface VignetteEngine {
  name: string;
  package: string;
  weave: WeaveFn;
  tangle: TangleFn;
  pattern: RegExp;
}

export interface EngineContext {
  renderer: RenderingCollaborator;
  probe: AvailabilityProbe;
  packageName?: string;
  warn?: (message: string) => void;
}

export const DEFAULT_ENGINE_PACKAGE = 'knitr';

export function engineKey(packageName: string, name: string): string {
  return `${packageName}::${name}`;
}

/**
 * Immutable set of vignette engines keyed by `package::name`. Registering
 * returns a new registry and leaves this one as it was.
 */
export class EngineRegistry {
  private readonly engines: ReadonlyMap<string, VignetteEngine>;

  constructor(engines: Iterable<VignetteEngine> = []) {
    const map = new Map<string, VignetteEngine>();
    for (const engine of engines) map.set(engineKey(engine.package, engine.name), engine);
    this.engines = map;
  }

  register(
    name: string,
    weave: WeaveFn,
    tangle: TangleFn,
    pattern: RegExp,
    packageName: string = DEFAULT_ENGINE_PACKAGE
  ): EngineRegistry {
    const engine: VignetteEngine = { name, package: packageName, weave, tangle, pattern };
    const next = new Map(this.engines);
    next.set(engineKey(packageName, name), engine);
    return new EngineRegistry(next.values());
  }

  get(key: string): VignetteEngine | undefined {
    return this.engines.get(key);
  }

  has(key: string): boolean {
    return this.engines.has(key);
  }

  get size(): number {
    return this.engines.size;
  }

  names(): string[] {
    return [...this.engines.keys()];
  }

  list(): VignetteEngine[] {
    return [...this.engines.values()];
  }

  /** Engines whose file pattern matches the file's name. */
  match(fileName: string): VignetteEngine[] {
    const base = path.basename(fileName);
    return this.list().filter(engine => lineMatcher(engine.pattern).test(base));
  }
}

function withDefaults(options: WeaveOptions = {}): Required<WeaveOptions> {
  return { encoding: options.encoding ?? '', quiet: options.quiet ?? false };
}

export function defaultTarget(file: string): RenderTarget {
  if (/\.[Rr]md$/.test(file)) return 'html';
  if (/\.[Rr]rst$/.test(file)) return 'pdf';
  return 'knit';
}

export type TargetSelector = (file: string) => RenderTarget;

export function makeWeave(renderer: RenderingCollaborator, strategy: WeaveStrategy, target: TargetSelector): WeaveFn {
  return async (file, options) => {
    const { encoding, quiet } = withDefaults(options);
    await renderer.render({
      documentPath: file,
      encoding,
      quiet,
      target: target(file),
      extractCode: strategy === 'render-and-extract',
      haltOnError: true,
    });
  };
}

/** Sibling R script that tangling writes for a document. */
export function codeFileFor(file: string): string {
  const ext = path.extname(file);
  return (ext ? file.slice(0, -ext.length) : file) + '.R';
}

export function makeTangle(renderer: RenderingCollaborator, strategy: TangleStrategy): TangleFn {
  if (strategy === 'discard') {
    return async file => {
      await fs.promises.rm(codeFileFor(file), { force: true });
    };
  }
  return async (file, options) => {
    await renderer.extractCode(file, withDefaults(options));
  };
}

export function rmarkdownMissingWarning(key: string): string {
  return `The vignette engine ${key} is not available, because the rmarkdown package is not installed. Please install it.`;
}
export const PANDOC_MISSING_WARNING =
  'Pandoc (>= 1.12.3) and/or pandoc-citeproc is not available. Please install both.';

function rmarkdownWeave(context: EngineContext, key: string, fallback: WeaveFn): WeaveFn {
  const warn = context.warn ?? ((message: string) => console.warn(`Warning: ${message}`));
  const render = makeWeave(context.renderer, 'render-and-extract', () => 'rmarkdown');

  return async (file, options) => {
    if (!context.probe.hasPackage('rmarkdown')) {
      warn(rmarkdownMissingWarning(key));
      return fallback(file, options);
    }
    if (context.probe.isPandocAvailable()) return render(file, options);
    if (!context.probe.isCheckRun()) warn(PANDOC_MISSING_WARNING);
    return fallback(file, options);
  };
}

interface EngineDefinition {
  name: string;
  pattern: RegExp;
  weave: (strategy: WeaveStrategy) => WeaveFn;
}

/**
 * Register the knitr engines and a `_notangle` twin of each. The twins weave
 * without writing code out and remove any code file on tangle.
 */
export function registerVignetteEngines(
  context: EngineContext,
  registry: EngineRegistry = new EngineRegistry()
): EngineRegistry {
  const { renderer } = context;
  const pkg = context.packageName ?? DEFAULT_ENGINE_PACKAGE;
  const knitWeave = (strategy: WeaveStrategy) => makeWeave(renderer, strategy, defaultTarget);

  const definitions: EngineDefinition[] = [
    {
      name: 'knitr',
      pattern: /[.]([rRsS](nw|tex)|[Rr](md|html|rst))$/,
      weave: knitWeave,
    },
    {
      name: 'docco_linear',
      pattern: /[.][Rr](md|markdown)$/,
      weave: strategy => makeWeave(renderer, strategy, () => 'docco-linear'),
    },
    {
      name: 'docco_classic',
      pattern: /[.][Rr]mk?d$/,
      weave: strategy => makeWeave(renderer, strategy, () => 'docco-classic'),
    },
    {
      name: 'rmarkdown',
      pattern: /[.][Rr](md|markdown)$/,
      // the fallback keeps writing code out, also for the notangle twin
      weave: () => rmarkdownWeave(context, engineKey(pkg, 'rmarkdown'), knitWeave('render-and-extract')),
    },
  ];

  let next = registry;
  for (const def of definitions) {
    next = next.register(def.name, def.weave('render-and-extract'), makeTangle(renderer, 'extract'), def.pattern, pkg);
  }
  for (const def of definitions) {
    next = next.register(
      `${def.name}_notangle`,
      def.weave('render-no-extract'),
      makeTangle(renderer, 'discard'),
      def.pattern,
      pkg
    );
  }
  return next;
}
