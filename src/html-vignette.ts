import path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface HtmlVignetteOptions {
  figCaption: boolean;
  theme: string | null;
  highlight: string;
  css: string;
  includes: { afterBody: string };
}

// src/ and dist/ both sit one level below the package root
export const DEFAULT_ASSETS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../misc');

/**
 * Options for the lightweight HTML vignette output format: no theme, pygments
 * highlighting, and the bundled stylesheet and footer.
 */
export function htmlVignetteOptions(
  overrides: Partial<HtmlVignetteOptions> = {},
  assetsDir: string = DEFAULT_ASSETS_DIR
): HtmlVignetteOptions {
  return {
    figCaption: true,
    theme: null,
    highlight: 'pygments',
    css: path.join(assetsDir, 'vignette.css'),
    includes: { afterBody: path.join(assetsDir, 'vignette.html') },
    ...overrides,
  };
}
