import { getSeverityStyle } from "../../logs/levels.js";
import type { Block, StepsBlock } from "../../logs/types.js";
import type { RenderContext } from "../context.js";

/**
 * Renders ordered steps inside one bracket. Each step opens with a branch
 * arrow and its remaining lines hang off the bracket; separators only
 * continue the bracket.
 */
export function renderSteps(
  block: StepsBlock,
  context: RenderContext,
  renderStep: (step: Block) => string[],
): string[] {
  const { colorize, glyphs } = context;
  const accent = { color: getSeverityStyle(context.severity).cli, bold: true };
  const paint = (value: string): string => colorize(value, accent);
  const bar = paint(`${glyphs.vertical}   `);
  const lines: string[] = [];

  const head = `${glyphs.topCorner}${glyphs.horizontal}`;
  if (block.title === undefined) {
    lines.push(paint(head));
  } else {
    const [first = "", ...rest] = block.title.split("\n");
    lines.push(`${paint(`${head}${glyphs.pointer}`)} ${first}`.trimEnd());
    rest.forEach((line) => lines.push(`${bar}${line}`.trimEnd()));
  }

  const branch = paint(`${glyphs.branch}${glyphs.horizontal}${glyphs.pointer}`);
  for (const step of block.steps) {
    const rendered = renderStep(step);
    if (step.kind === "separator") {
      rendered.forEach((line) => lines.push(`${bar}${line}`.trimEnd()));
      continue;
    }
    const [first = "", ...rest] = rendered;
    lines.push(`${branch} ${first}`.trimEnd());
    rest.forEach((line) => lines.push(`${bar}${line}`.trimEnd()));
  }

  const tail = `${glyphs.bottomCorner}${glyphs.horizontal}`;
  if (block.finalMessage === undefined) {
    lines.push(paint(tail));
  } else {
    const [first = "", ...rest] = block.finalMessage.split("\n");
    lines.push(`${paint(`${tail}${glyphs.pointer}`)} ${first}`.trimEnd());
    rest.forEach((line) => lines.push(`    ${line}`.trimEnd()));
  }
  return lines;
}
