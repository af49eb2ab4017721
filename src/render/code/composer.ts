import { getSeverityStyle, type Severity } from "../../logs/levels.js";
import type { SourceText } from "../../source/text.js";
import type { ResolvedAnnotation } from "../../spans/resolver.js";
import type { Colorizer, TextStyle } from "../../utils/colors.js";
import { EmptyBlockError } from "../errors.js";
import type { GlyphSet } from "../glyphs.js";

/** Which unannotated lines accompany the annotated ones. */
export interface LineWindow {
  previousLines: number;
  nextLines: number;
  /** Gaps up to this size are printed in full instead of as an ellipsis. */
  middleLines: number;
}

export interface RelatedAnnotations {
  title?: string;
  annotations: readonly ResolvedAnnotation[];
}

export interface ComposeExcerptOptions extends Partial<LineWindow> {
  glyphs: GlyphSet;
  colorize: Colorizer;
  /** Colours markers of spans that carry no severity of their own. */
  severity: Severity;
  location?: string;
  title?: string;
  finalMessage?: string;
  showNewlines?: boolean;
  alignMessages?: boolean;
  /** Lower bound for the gutter width, so sibling excerpts line up. */
  minGutterWidth?: number;
  /** Drawn below the main excerpt, inside the same border. */
  related?: RelatedAnnotations;
}

type PointerRole = "single" | "start" | "end";

type RowContext =
  | { kind: "source" }
  | {
      kind: "pointer";
      index: number;
      role: PointerRole;
      continuation: boolean;
    };

interface Lane {
  annotation: ResolvedAnnotation;
  index: number;
}

interface Marker {
  index: number;
  role: PointerRole;
  column: number;
  width: number;
  message: string | undefined;
}

const BOLD: TextStyle = { bold: true };
const LINE_NUMBER: TextStyle = { color: "gray", bold: true };
const NEWLINE_MARK: TextStyle = { color: "gray" };

/**
 * Renders a bordered excerpt of `source`: every line touched by an
 * annotation, a right-aligned line-number gutter, and one pointer row per
 * annotation. Multi-line annotations get their own connector lane between
 * the gutter and the text.
 */
export function composeExcerpt(
  source: SourceText,
  annotations: readonly ResolvedAnnotation[],
  options: ComposeExcerptOptions,
): string[] {
  if (source.isEmpty) {
    throw new EmptyBlockError("code", "the source text is empty");
  }
  if (annotations.length === 0) {
    throw new EmptyBlockError("code", "no span is highlighted");
  }
  const { related } = options;
  if (related && related.annotations.length === 0) {
    throw new EmptyBlockError("code", "the related excerpt highlights no span");
  }

  const window = lineWindow(options);
  const gutterWidth = Math.max(
    options.minGutterWidth ?? 0,
    excerptGutterWidth(source, annotations, window),
    related ? excerptGutterWidth(source, related.annotations, window) : 0,
  );

  const { glyphs, colorize } = options;
  const pad = " ".repeat(gutterWidth);
  const rows: string[] = [];

  if (options.title !== undefined) {
    for (const line of options.title.split("\n")) {
      rows.push(`${pad} ${colorize(line, BOLD)}`.trimEnd());
    }
  }

  const top = options.location
    ? `${glyphs.topBorder}[${options.location}]`
    : glyphs.topBorder;
  rows.push(`${pad} ${colorize(top, BOLD)}`);
  rows.push(
    ...new ExcerptComposer(
      source,
      annotations,
      options,
      window,
      gutterWidth,
    ).compose(),
  );

  if (related) {
    const lead = colorize(`${glyphs.branch}${glyphs.horizontal}`, BOLD);
    const [first = "", ...rest] = (related.title ?? "").split("\n");
    rows.push(`${pad} ${lead} ${first}`.trimEnd());
    const bar = colorize(glyphs.gutterBar, BOLD);
    for (const line of rest) {
      rows.push(`${pad} ${bar}  ${line}`.trimEnd());
    }
    rows.push(
      ...new ExcerptComposer(
        source,
        related.annotations,
        options,
        window,
        gutterWidth,
      ).compose(),
    );
  }

  const bottom = colorize(glyphs.bottomBorder, BOLD);
  if (options.finalMessage === undefined) {
    rows.push(`${pad} ${bottom}`);
  } else {
    const [first = "", ...rest] = options.finalMessage.split("\n");
    rows.push(`${pad} ${bottom} ${first}`.trimEnd());
    const indent = " ".repeat([...glyphs.bottomBorder].length + 1);
    for (const line of rest) {
      rows.push(`${pad} ${indent}${line}`.trimEnd());
    }
  }

  return rows;
}

/** Width of the line-number gutter an excerpt needs on its own. */
export function excerptGutterWidth(
  source: SourceText,
  annotations: readonly ResolvedAnnotation[],
  window: Partial<LineWindow> = {},
): number {
  const displayed = collectDisplayedLines(
    source.lineCount,
    annotations,
    lineWindow(window),
  );
  const last = displayed[displayed.length - 1] ?? 1;
  return String(last).length;
}

function lineWindow(options: Partial<LineWindow>): LineWindow {
  return {
    previousLines: options.previousLines ?? 0,
    nextLines: options.nextLines ?? 0,
    middleLines: options.middleLines ?? 0,
  };
}

class ExcerptComposer {
  private readonly glyphs: GlyphSet;
  private readonly colorize: Colorizer;
  private readonly lanes: Lane[];
  private readonly displayed: number[];

  constructor(
    private readonly source: SourceText,
    private readonly annotations: readonly ResolvedAnnotation[],
    private readonly options: ComposeExcerptOptions,
    window: LineWindow,
    private readonly gutterWidth: number,
  ) {
    this.glyphs = options.glyphs;
    this.colorize = options.colorize;
    this.lanes = annotations
      .map((annotation, index) => ({ annotation, index }))
      .filter((lane) => lane.annotation.multiline);
    this.displayed = collectDisplayedLines(
      source.lineCount,
      annotations,
      window,
    );
  }

  /** Rows between the borders. */
  compose(): string[] {
    const rows: string[] = [];
    let previous: number | undefined;
    for (const line of this.displayed) {
      if (previous !== undefined && line !== previous + 1) {
        rows.push(this.ellipsisRow());
      }
      rows.push(this.sourceRow(line));
      rows.push(...this.pointerRows(line));
      previous = line;
    }
    return rows;
  }

  private ellipsisRow(): string {
    return `${" ".repeat(this.gutterWidth)} ${this.colorize(this.glyphs.ellipsis, BOLD)}`;
  }

  private row(line: number | undefined, body: string): string {
    const gutter =
      line === undefined
        ? " ".repeat(this.gutterWidth)
        : this.colorize(String(line).padStart(this.gutterWidth), LINE_NUMBER);
    const bar = this.colorize(this.glyphs.gutterBar, BOLD);
    return `${gutter} ${bar} ${body}`.trimEnd();
  }

  private sourceRow(line: number): string {
    const text = this.source.lineText(line).replace(/\t/g, " ");
    const lanes = this.laneSegment(line, { kind: "source" }, undefined);
    const newline =
      this.options.showNewlines && line < this.source.lineCount
        ? this.colorize(this.glyphs.newline, NEWLINE_MARK)
        : "";
    return this.row(line, `${lanes}${text}${newline}`);
  }

  private pointerRows(line: number): string[] {
    const markers = this.lineMarkers(line);
    const aligned = this.options.alignMessages
      ? Math.max(
          0,
          ...markers
            .filter((marker) => marker.message)
            .map((marker) => marker.column + marker.width),
        )
      : 0;

    return markers.flatMap((marker) =>
      this.markerRows(
        line,
        marker,
        Math.max(aligned, marker.column + marker.width),
      ),
    );
  }

  private lineMarkers(line: number): Marker[] {
    const markers: Marker[] = [];
    this.annotations.forEach((annotation, index) => {
      const { span } = annotation;
      if (!annotation.multiline) {
        if (annotation.start.line === line) {
          markers.push({
            index,
            role: "single",
            column: annotation.start.column,
            width: Math.max(1, annotation.end.column - annotation.start.column),
            message: span.inlineMessage ?? span.trailingMessage,
          });
        }
        return;
      }

      if (annotation.start.line === line) {
        markers.push({
          index,
          role: "start",
          column: annotation.start.column,
          width: 1,
          message: span.inlineMessage,
        });
      }
      if (annotation.end.line === line) {
        markers.push({
          index,
          role: "end",
          column: Math.max(1, annotation.end.column - 1),
          width: 1,
          message: span.trailingMessage,
        });
      }
    });
    return markers;
  }

  /** `messageColumn` is the 0-based text column where the message starts. */
  private markerRows(
    line: number,
    marker: Marker,
    messageColumn: number,
  ): string[] {
    const { index, role } = marker;
    const annotation = this.annotations[index];
    const style = this.annotationStyle(annotation);
    const connects = role !== "single";
    const lead = connects ? this.glyphs.horizontal : " ";

    const lanes = this.laneSegment(
      line,
      { kind: "pointer", index, role, continuation: false },
      connects ? index : undefined,
    );
    const padding = lead.repeat(marker.column - 1);
    const markers = this.glyphs.marker.repeat(marker.width);
    const body = `${lanes}${connects ? this.colorize(padding, style) : padding}${this.colorize(markers, style)}`;

    const messageLines = marker.message ? marker.message.split("\n") : [];
    if (messageLines.length === 0) {
      return [this.row(undefined, body)];
    }

    const gap = " ".repeat(messageColumn - (marker.column - 1 + marker.width));
    const rows = [this.row(undefined, `${body}${gap}${messageLines[0]}`)];
    for (const text of messageLines.slice(1)) {
      const continuationLanes = this.laneSegment(
        line,
        { kind: "pointer", index, role, continuation: true },
        undefined,
      );
      rows.push(
        this.row(
          undefined,
          `${continuationLanes}${" ".repeat(messageColumn)}${text}`,
        ),
      );
    }
    return rows;
  }

  /**
   * Connector lanes plus the gap before the text. When `runFrom` names the
   * annotation owning this row, lanes to the right of its own are replaced by
   * a horizontal run heading to its marker.
   */
  private laneSegment(
    line: number,
    context: RowContext,
    runFrom: number | undefined,
  ): string {
    if (this.lanes.length === 0) {
      return "";
    }

    const ownLane =
      runFrom === undefined
        ? -1
        : this.lanes.findIndex((lane) => lane.index === runFrom);
    const runStyle =
      runFrom === undefined
        ? BOLD
        : this.annotationStyle(this.annotations[runFrom]);

    const cells = this.lanes.map((lane, laneIndex) => {
      if (ownLane >= 0 && laneIndex > ownLane) {
        return this.colorize(this.glyphs.horizontal, runStyle);
      }
      const glyph = laneGlyph(lane, line, context, this.glyphs);
      return glyph === " "
        ? glyph
        : this.colorize(glyph, this.annotationStyle(lane.annotation));
    });
    const gap =
      ownLane >= 0 ? this.colorize(this.glyphs.horizontal, runStyle) : " ";

    return `${cells.join("")}${gap}`;
  }

  private annotationStyle(annotation: ResolvedAnnotation): TextStyle {
    const severity = annotation.span.severity ?? this.options.severity;
    return { color: getSeverityStyle(severity).cli, bold: true };
  }
}

function laneGlyph(
  lane: Lane,
  line: number,
  context: RowContext,
  glyphs: GlyphSet,
): string {
  const { annotation, index } = lane;

  if (context.kind === "source") {
    if (line === annotation.start.line) {
      return glyphs.topCorner;
    }
    return line > annotation.start.line && line <= annotation.end.line
      ? glyphs.vertical
      : " ";
  }

  if (context.index === index) {
    if (context.role === "start") {
      return context.continuation ? glyphs.vertical : glyphs.branch;
    }
    if (context.role === "end") {
      return context.continuation ? " " : glyphs.bottomCorner;
    }
  }

  const open =
    (line >= annotation.start.line && line < annotation.end.line) ||
    (line === annotation.end.line && context.index < index);
  return open ? glyphs.vertical : " ";
}

/**
 * Sorted, de-duplicated line numbers to print: the lines every annotation
 * covers, widened by the window's previous and next lines and clamped to the
 * source, plus every gap of at most `middleLines` lines between them.
 */
export function collectDisplayedLines(
  lineCount: number,
  annotations: readonly ResolvedAnnotation[],
  window: LineWindow,
): number[] {
  const lines = new Set<number>();
  for (const annotation of annotations) {
    const first = Math.max(1, annotation.start.line - window.previousLines);
    const last = Math.min(lineCount, annotation.end.line + window.nextLines);
    for (let line = first; line <= last; line += 1) {
      lines.add(line);
    }
  }

  const sorted = [...lines].sort((left, right) => left - right);
  const filled: number[] = [];
  sorted.forEach((line, position) => {
    const previous = sorted[position - 1];
    if (previous !== undefined && line - previous - 1 <= window.middleLines) {
      for (let gap = previous + 1; gap < line; gap += 1) {
        filled.push(gap);
      }
    }
    filled.push(line);
  });
  return filled;
}
