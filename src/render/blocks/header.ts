import { getSeverityStyle } from "../../logs/levels.js";
import type { HeaderBlock } from "../../logs/types.js";
import type { RenderContext } from "../context.js";

export function renderHeader(
  block: HeaderBlock,
  context: RenderContext,
): string[] {
  const { colorize, glyphs } = context;
  const style = getSeverityStyle(context.severity);
  const accent = { color: style.cli, bold: true } as const;

  const lead = block.code ? `${style.tag}[${block.code}]` : style.tag;
  const styledLead =
    colorize(style.tag, accent) +
    (block.code ? colorize(`[${block.code}]`, { bold: true }) : "");

  const [first = "", ...rest] = block.title.split("\n");
  const lines = [first ? `${styledLead}: ${first}` : styledLead];
  const continuation = " ".repeat([...lead].length + 2);
  for (const line of rest) {
    lines.push(`${continuation}${line}`.trimEnd());
  }

  const arrow = colorize(glyphs.arrow, accent);
  const metadata = (label: string, value: string): string =>
    ` ${arrow} ${label} ${value}`;

  if (block.show.location && block.location) {
    lines.push(metadata("in", block.location));
  }
  if (block.show.timestamp && block.timestamp !== undefined) {
    lines.push(metadata("at", formatTimestamp(block.timestamp)));
  }
  if (block.show.thread && block.threadId) {
    lines.push(metadata("in thread", block.threadId));
  }

  return lines;
}

function formatTimestamp(timestamp: string | Date): string {
  return typeof timestamp === "string" ? timestamp : timestamp.toISOString();
}
