import { z } from "zod";

export const GLYPH_SET_VALUES = ["unicode", "ascii"] as const;

export type GlyphSetName = (typeof GLYPH_SET_VALUES)[number];

export const glyphSetNameSchema = z.enum(GLYPH_SET_VALUES);

export interface GlyphSet {
  /** Separates the gutter from the excerpt body. */
  readonly gutterBar: string;
  readonly topBorder: string;
  readonly bottomBorder: string;
  /** Stands in for the lines skipped between two displayed runs. */
  readonly ellipsis: string;
  readonly marker: string;
  readonly horizontal: string;
  readonly vertical: string;
  readonly topCorner: string;
  readonly bottomCorner: string;
  readonly branch: string;
  readonly pointer: string;
  /** Leads every header metadata line. */
  readonly arrow: string;
  readonly separator: string;
  readonly noteMarker: string;
  /** Appended to excerpt lines that end in a line break. */
  readonly newline: string;
}

export const UNICODE_GLYPHS: GlyphSet = {
  gutterBar: "│",
  topBorder: "╭─",
  bottomBorder: "╰─",
  ellipsis: "···",
  marker: "^",
  horizontal: "─",
  vertical: "│",
  topCorner: "╭",
  bottomCorner: "╰",
  branch: "├",
  pointer: "▶",
  arrow: "↪",
  separator: "─",
  noteMarker: "=",
  newline: "↩",
};

export const ASCII_GLYPHS: GlyphSet = {
  gutterBar: "|",
  topBorder: ",-",
  bottomBorder: "`-",
  ellipsis: "...",
  marker: "^",
  horizontal: "-",
  vertical: "|",
  topCorner: ",",
  bottomCorner: "`",
  branch: "|",
  pointer: ">",
  arrow: "->",
  separator: "-",
  noteMarker: "=",
  newline: "$",
};

export function getGlyphSet(name: GlyphSetName): GlyphSet {
  switch (name) {
    case "ascii":
      return ASCII_GLYPHS;
    case "unicode":
    default:
      return UNICODE_GLYPHS;
  }
}
