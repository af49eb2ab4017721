import { getSeverityStyle } from "../../logs/levels.js";
import type { StackBlock, StackTrace } from "../../logs/types.js";
import type { RenderContext } from "../context.js";

const UNKNOWN_LOCATION = "<unknown location>";

/**
 * Renders a stack block and its chain of causes inside one bracket. With
 * `showNumbers`, traces are numbered across the whole chain, outermost first.
 */
export function renderStack(
  block: StackBlock,
  context: RenderContext,
): string[] {
  const { colorize, glyphs } = context;
  const accent = { color: getSeverityStyle(context.severity).cli, bold: true };
  const paint = (value: string): string => colorize(value, accent);

  const total = countTraces(block);
  const digits = String(total).length;
  const lines: string[] = [];

  let current: StackBlock | undefined = block;
  let remaining = total;
  let isCause = false;
  while (current) {
    const [first = "", ...rest] = (current.message ?? "").split("\n");
    if (isCause) {
      const lead = `${glyphs.branch}${glyphs.horizontal.repeat(3)}${glyphs.pointer} Caused by:`;
      lines.push(paint(glyphs.vertical));
      lines.push(first ? `${paint(lead)} ${first}` : paint(lead));
      pushContinuation(lines, rest, paint(glyphs.vertical), 6);
    } else {
      const lead = `${glyphs.topCorner}${glyphs.horizontal}`;
      lines.push(
        first ? `${paint(`${lead}${glyphs.pointer}`)} ${first}` : paint(lead),
      );
      pushContinuation(lines, rest, paint(glyphs.vertical), 4);
    }

    for (const trace of current.traces) {
      const label = current.showNumbers
        ? `[${String(remaining).padStart(digits)}]`
        : " at";
      remaining -= 1;

      const lead = `${glyphs.vertical}  ${label} `;
      const [traceFirst = "", ...traceRest] = describeTrace(trace).split("\n");
      lines.push(`${paint(lead)}${traceFirst}`.trimEnd());
      pushContinuation(lines, traceRest, paint(glyphs.vertical), lead.length);
    }

    current = current.cause;
    isCause = true;
  }

  lines.push(paint(`${glyphs.bottomCorner}${glyphs.horizontal}`));
  return lines;
}

function describeTrace(trace: StackTrace): string {
  const location = trace.location ? singleLine(trace.location) : UNKNOWN_LOCATION;
  const codePath = trace.codePath ? `(${singleLine(trace.codePath)})` : "";
  const message = trace.message ? ` - ${trace.message}` : "";
  return `${location}${codePath}${message}`;
}

/** Continuation lines keep the bracket and align under the text start. */
function pushContinuation(
  lines: string[],
  rest: readonly string[],
  bar: string,
  textColumn: number,
): void {
  for (const line of rest) {
    lines.push(`${bar}${" ".repeat(textColumn - 1)}${line}`.trimEnd());
  }
}

function countTraces(block: StackBlock): number {
  return block.traces.length + (block.cause ? countTraces(block.cause) : 0);
}

function singleLine(value: string): string {
  return value.replace(/\r?\n/g, " ");
}
