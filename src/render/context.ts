import type { Severity } from "../logs/levels.js";
import { type Colorizer, createColorizer } from "../utils/colors.js";
import { getGlyphSet, type GlyphSet, type GlyphSetName } from "./glyphs.js";

export interface RenderOptions {
  glyphs?: GlyphSetName;
  /** Emit ANSI colour codes. Off by default so output stays plain text. */
  color?: boolean;
}

export interface RenderContext {
  readonly glyphs: GlyphSet;
  readonly colorize: Colorizer;
  readonly severity: Severity;
}

export function createRenderContext(
  severity: Severity,
  options: RenderOptions = {},
): RenderContext {
  return {
    glyphs: getGlyphSet(options.glyphs ?? "unicode"),
    colorize: createColorizer(options.color ?? false),
    severity,
  };
}
