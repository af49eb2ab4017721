import { getSeverityStyle } from "../../logs/levels.js";
import type { NoteBlock, SeparatorBlock, TagBlock } from "../../logs/types.js";
import type { RenderContext } from "../context.js";

export function renderNote(block: NoteBlock, context: RenderContext): string[] {
  const { colorize, glyphs } = context;
  const accent = { color: getSeverityStyle(context.severity).cli, bold: true };
  const title = singleLine(block.title);
  const [first = "", ...rest] = block.message.split("\n");

  const head = `${colorize(glyphs.noteMarker, accent)} ${colorize(title, { bold: true })}${colorize(":", accent)}`;
  const lines = [first ? `${head} ${first}` : head];
  const indentation = " ".repeat(
    [...glyphs.noteMarker].length + [...title].length + 3,
  );
  for (const line of rest) {
    lines.push(`${indentation}${line}`.trimEnd());
  }
  return lines;
}

export function renderTag(block: TagBlock, context: RenderContext): string[] {
  const { colorize, glyphs } = context;
  const accent = { color: getSeverityStyle(context.severity).cli, bold: true };
  return [
    `${colorize(glyphs.noteMarker, accent)} ${colorize(singleLine(block.tag), { bold: true })}`,
  ];
}

export function renderSeparator(
  block: SeparatorBlock,
  context: RenderContext,
): string[] {
  if (block.width === 0) {
    return [];
  }

  const character = block.character ?? context.glyphs.separator;
  if (character.trim().length === 0) {
    return [""];
  }

  const accent = { color: getSeverityStyle(context.severity).cli, bold: true };
  return [context.colorize(character.repeat(block.width), accent)];
}

function singleLine(value: string): string {
  return value.replace(/\r?\n/g, " ");
}
