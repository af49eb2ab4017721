import { EmptyBlockError } from "../render/errors.js";
import { SourceText } from "../source/text.js";
import { resolveSpans, type Span } from "../spans/resolver.js";
import { ValidationError } from "../utils/errors.js";
import type { Severity } from "./levels.js";
import type {
  Block,
  CodeBlock,
  ContainerBlock,
  HeaderBlock,
  HeaderVisibility,
  Log,
  NoteBlock,
  PrefixBlock,
  RelatedExcerpt,
  SeparatorBlock,
  StackBlock,
  StackTrace,
  StepsBlock,
  TagBlock,
  TextBlock,
} from "./types.js";

export interface HeaderOptions {
  code?: string;
  location?: string;
  timestamp?: string | Date;
  threadId?: string;
  show?: Partial<HeaderVisibility>;
}

export interface CodeOptions {
  location?: string;
  title?: string;
  finalMessage?: string;
  /** Default for both `previousLines` and `nextLines`. */
  contextLines?: number;
  previousLines?: number;
  nextLines?: number;
  middleLines?: number;
  showNewlines?: boolean;
  alignMessages?: boolean;
  related?: RelatedExcerpt;
}

export interface StepsOptions {
  title?: string;
  finalMessage?: string;
}

export interface StackOptions {
  message?: string;
  traces?: readonly StackTrace[];
  cause?: StackBlock;
  showNumbers?: boolean;
}

export interface LogOptions {
  cause?: Log;
}

export function createLog(
  severity: Severity,
  blocks: readonly Block[],
  options: LogOptions = {},
): Log {
  const log: Log = {
    severity,
    blocks: Object.freeze(blocks.map(freezeBlock)),
    ...(options.cause ? { cause: options.cause } : {}),
  };
  return Object.freeze(log);
}

export function header(title: string, options: HeaderOptions = {}): HeaderBlock {
  const { show, ...fields } = options;
  const block: HeaderBlock = {
    kind: "header",
    title,
    ...fields,
    show: Object.freeze({
      location: show?.location ?? true,
      timestamp: show?.timestamp ?? true,
      thread: show?.thread ?? true,
    }),
  };
  return Object.freeze(block);
}

export function prefix(value: string, child: Block): PrefixBlock {
  const block: PrefixBlock = { kind: "prefix", prefix: value, child };
  return Object.freeze(block);
}

/** A prefix made of `width` spaces. */
export function indent(width: number, child: Block): PrefixBlock {
  assertCount(width, "Indent width");
  return prefix(" ".repeat(width), child);
}

/**
 * Builds a code excerpt. Spans are validated against the source right away
 * so a bad offset surfaces where the block is created.
 */
export function code(
  source: string | SourceText,
  spans: readonly Span[],
  options: CodeOptions = {},
): CodeBlock {
  const sourceText =
    typeof source === "string" ? new SourceText(source) : source;
  const contextLines = options.contextLines ?? 0;
  assertCount(contextLines, "Context line count");
  const previousLines = options.previousLines ?? contextLines;
  const nextLines = options.nextLines ?? contextLines;
  const middleLines = options.middleLines ?? 0;
  assertCount(previousLines, "Previous line count");
  assertCount(nextLines, "Next line count");
  assertCount(middleLines, "Middle line count");

  if (sourceText.isEmpty) {
    throw new EmptyBlockError("code", "the source text is empty");
  }
  if (spans.length === 0) {
    throw new EmptyBlockError("code", "no span is highlighted");
  }
  resolveSpans(sourceText, spans);

  const { related } = options;
  if (related) {
    if (related.spans.length === 0) {
      throw new EmptyBlockError("code", "the related excerpt highlights no span");
    }
    resolveSpans(sourceText, related.spans);
  }

  const block: CodeBlock = {
    kind: "code",
    source: sourceText,
    spans: freezeSpans(spans),
    previousLines,
    nextLines,
    middleLines,
    showNewlines: options.showNewlines ?? false,
    alignMessages: options.alignMessages ?? false,
    ...(options.location !== undefined ? { location: options.location } : {}),
    ...(options.title !== undefined ? { title: options.title } : {}),
    ...(options.finalMessage !== undefined
      ? { finalMessage: options.finalMessage }
      : {}),
    ...(related ? { related: freezeRelated(related) } : {}),
  };
  return Object.freeze(block);
}

export function text(...lines: string[]): TextBlock {
  const block: TextBlock = {
    kind: "text",
    lines: Object.freeze(lines.flatMap((line) => line.split("\n"))),
  };
  return Object.freeze(block);
}

export function container(...children: Block[]): ContainerBlock {
  const block: ContainerBlock = {
    kind: "container",
    children: Object.freeze(children),
  };
  return Object.freeze(block);
}

export function separator(width: number, character?: string): SeparatorBlock {
  assertCount(width, "Separator width");
  if (character !== undefined && [...character].length !== 1) {
    throw new ValidationError(
      `Separator character must be a single character, got "${character}".`,
    );
  }
  const block: SeparatorBlock = {
    kind: "separator",
    width,
    ...(character !== undefined ? { character } : {}),
  };
  return Object.freeze(block);
}

export function note(title: string, message: string): NoteBlock {
  const block: NoteBlock = { kind: "note", title, message };
  return Object.freeze(block);
}

export function tag(value: string): TagBlock {
  const block: TagBlock = { kind: "tag", tag: value };
  return Object.freeze(block);
}

export function stackTrace(trace: StackTrace): StackTrace {
  return Object.freeze({ ...trace });
}

export function stack(options: StackOptions = {}): StackBlock {
  const block: StackBlock = {
    kind: "stack",
    ...(options.message !== undefined ? { message: options.message } : {}),
    traces: Object.freeze((options.traces ?? []).map(stackTrace)),
    ...(options.cause ? { cause: options.cause } : {}),
    showNumbers: options.showNumbers ?? false,
  };
  return Object.freeze(block);
}

/** Ordered blocks drawn as the steps of one bracket. */
export function steps(
  blocks: readonly Block[],
  options: StepsOptions = {},
): StepsBlock {
  const block: StepsBlock = {
    kind: "steps",
    ...(options.title !== undefined ? { title: options.title } : {}),
    steps: Object.freeze([...blocks]),
    ...(options.finalMessage !== undefined
      ? { finalMessage: options.finalMessage }
      : {}),
  };
  return Object.freeze(block);
}

/**
 * Freezes a block tree that was assembled by hand rather than through the
 * builders. Source texts stay unfrozen: they memoize their line index.
 */
function freezeBlock(block: Block): Block {
  switch (block.kind) {
    case "prefix":
      return Object.freeze({ ...block, child: freezeBlock(block.child) });
    case "container":
      return Object.freeze({
        ...block,
        children: Object.freeze(block.children.map(freezeBlock)),
      });
    case "code":
      return Object.freeze({
        ...block,
        spans: freezeSpans(block.spans),
        ...(block.related ? { related: freezeRelated(block.related) } : {}),
      });
    case "steps":
      return Object.freeze({
        ...block,
        steps: Object.freeze(block.steps.map(freezeBlock)),
      });
    case "text":
      return Object.freeze({
        ...block,
        lines: Object.freeze([...block.lines]),
      });
    case "header":
      return Object.freeze({
        ...block,
        show: Object.freeze({ ...block.show }),
      });
    case "stack":
      return freezeStack(block);
    case "separator":
    case "note":
    case "tag":
      return Object.freeze({ ...block });
  }
}

function freezeStack(block: StackBlock): StackBlock {
  return Object.freeze({
    ...block,
    traces: Object.freeze(block.traces.map(stackTrace)),
    ...(block.cause ? { cause: freezeStack(block.cause) } : {}),
  });
}

function freezeSpans(spans: readonly Span[]): readonly Span[] {
  return Object.freeze(spans.map((span) => Object.freeze({ ...span })));
}

function freezeRelated(related: RelatedExcerpt): RelatedExcerpt {
  return Object.freeze({ ...related, spans: freezeSpans(related.spans) });
}

function assertCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `${label} must be a non-negative integer, got ${value}.`,
    );
  }
}
