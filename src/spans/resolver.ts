import type { Severity } from "../logs/levels.js";
import type { Position, SourceText } from "../source/text.js";
import { InvalidSpanError } from "./errors.js";

/** Highlighted half-open byte range `[start, end)` of a source text. */
export interface Span {
  readonly start: number;
  readonly end: number;
  /** Rendered at the annotation site. */
  readonly inlineMessage?: string;
  /** Rendered after the pointer; for multi-line spans, after the end marker. */
  readonly trailingMessage?: string;
  readonly severity?: Severity;
}

export interface ResolvedAnnotation {
  readonly span: Span;
  readonly start: Position;
  /**
   * Exclusive end. When the span stops right after a line break this is the
   * end of the broken line rather than column 1 of the next one.
   */
  readonly end: Position;
  readonly multiline: boolean;
}

export function resolveSpans(
  source: SourceText,
  spans: readonly Span[],
): ResolvedAnnotation[] {
  const resolved = spans.map((span, index) => ({
    index,
    annotation: resolveSpan(source, span, index),
  }));

  resolved.sort((left, right) => {
    const a = left.annotation;
    const b = right.annotation;
    return (
      a.start.line - b.start.line ||
      a.start.column - b.start.column ||
      a.span.end - b.span.end ||
      left.index - right.index
    );
  });

  return resolved.map((entry) => entry.annotation);
}

function resolveSpan(
  source: SourceText,
  span: Span,
  index: number,
): ResolvedAnnotation {
  assertValidSpan(source, span, index);

  const start = clampToLine(source, source.resolve(span.start));
  let end = clampToLine(source, source.resolve(span.end));
  if (end.line > start.line && end.column === 1) {
    const line = end.line - 1;
    end = { line, column: source.lineLength(line) + 1 };
  }

  return {
    span,
    start,
    end,
    multiline: start.line !== end.line,
  };
}

/** Moves an offset between the `\r` and `\n` of a CRLF back onto the `\r`. */
function clampToLine(source: SourceText, position: Position): Position {
  const last = source.lineLength(position.line) + 1;
  return position.column > last
    ? { line: position.line, column: last }
    : position;
}

function assertValidSpan(source: SourceText, span: Span, index: number): void {
  const { start, end } = span;
  const fail = (reason: string): never => {
    throw new InvalidSpanError(index, start, end, reason);
  };

  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    fail("offsets must be integers");
  }
  if (start < 0) {
    fail("start is negative");
  }
  if (start > end) {
    fail("start is after end");
  }
  if (end > source.byteLength) {
    fail(`end is past the source length of ${source.byteLength} bytes`);
  }
  if (!source.isBoundary(start)) {
    fail("start is inside a multi-byte character");
  }
  if (!source.isBoundary(end)) {
    fail("end is inside a multi-byte character");
  }
}
