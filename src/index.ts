export {
  type FormatDescriptor,
  type FormatTable,
  type FormatSelection,
  type BuiltinFormat,
  type ExtraFormat,
  BUILTIN_FORMATS,
  DEFAULT_FORMAT_TABLE,
  createFormatTable,
  resolveFormat,
  sniffFormat,
} from './formats.js';
export { type LineTag, type Classification, classifyLines, classifyAndStrip, filterChunkEnds } from './classifier.js';
export { type KnitFilterOptions, knitFilter, knitFilterText, readLines, splitLines } from './filter.js';
export {
  type AvailabilityProbe,
  type SystemProbeOptions,
  MIN_PANDOC_VERSION,
  compareVersions,
  createSystemProbe,
  findExecutable,
} from './probe.js';
export {
  type VignetteEngine,
  type WeaveFn,
  type TangleFn,
  type WeaveOptions,
  type RenderTarget,
  type RenderRequest,
  type RenderingCollaborator,
  type EngineContext,
  type WeaveStrategy,
  type TangleStrategy,
  DEFAULT_ENGINE_PACKAGE,
  EngineRegistry,
  engineKey,
  makeWeave,
  makeTangle,
  registerVignetteEngines,
} from './engines.js';
export { type HtmlVignetteOptions, htmlVignetteOptions } from './html-vignette.js';
export { type DiscoveredVignette, type FindVignettesOptions, findVignettes } from './discover.js';
export { type FilterConfig, DEFAULT_ENCODING, parseArgs } from './config.js';
