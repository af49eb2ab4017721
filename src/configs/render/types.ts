import { z } from "zod";

import { glyphSetNameSchema, type GlyphSetName } from "../../render/glyphs.js";

export const colorModeSchema = z.enum(["auto", "always", "never"]);

export type ColorMode = z.infer<typeof colorModeSchema>;

export interface RenderSettings {
  glyphs: GlyphSetName;
  color: ColorMode;
  contextLines: number;
}

export const renderSettingsSchema = z
  .object({
    glyphs: glyphSetNameSchema.optional(),
    color: colorModeSchema.optional(),
    contextLines: z.number().int().nonnegative().optional(),
  })
  .strict();
