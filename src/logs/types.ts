import type { SourceText } from "../source/text.js";
import type { Span } from "../spans/resolver.js";
import type { Severity } from "./levels.js";

export interface HeaderVisibility {
  readonly location: boolean;
  readonly timestamp: boolean;
  readonly thread: boolean;
}

export interface HeaderBlock {
  readonly kind: "header";
  readonly title: string;
  /** Diagnostic code shown next to the severity tag, e.g. `E0308`. */
  readonly code?: string;
  readonly location?: string;
  /** Supplied by the caller; the renderer never reads a clock. */
  readonly timestamp?: string | Date;
  readonly threadId?: string;
  readonly show: HeaderVisibility;
}

export interface PrefixBlock {
  readonly kind: "prefix";
  readonly prefix: string;
  readonly child: Block;
}

/** A second set of spans over the same source, drawn under the first. */
export interface RelatedExcerpt {
  readonly title?: string;
  readonly spans: readonly Span[];
}

export interface CodeBlock {
  readonly kind: "code";
  readonly source: SourceText;
  readonly spans: readonly Span[];
  /** Shown inside the top border, usually a file path. */
  readonly location?: string;
  /** Shown above the top border. */
  readonly title?: string;
  /** Shown after the bottom border. */
  readonly finalMessage?: string;
  /** Unannotated lines shown before every annotated run. */
  readonly previousLines: number;
  /** Unannotated lines shown after every annotated run. */
  readonly nextLines: number;
  /** Gaps of at most this many lines are printed instead of elided. */
  readonly middleLines: number;
  /** Marks every line break with the glyph set's newline glyph. */
  readonly showNewlines: boolean;
  /** Starts every message of a line in the same column. */
  readonly alignMessages: boolean;
  readonly related?: RelatedExcerpt;
}

export interface TextBlock {
  readonly kind: "text";
  readonly lines: readonly string[];
}

export interface ContainerBlock {
  readonly kind: "container";
  readonly children: readonly Block[];
}

export interface SeparatorBlock {
  readonly kind: "separator";
  readonly width: number;
  /** Defaults to the glyph set's separator. */
  readonly character?: string;
}

export interface NoteBlock {
  readonly kind: "note";
  readonly title: string;
  readonly message: string;
}

export interface TagBlock {
  readonly kind: "tag";
  readonly tag: string;
}

export interface StackTrace {
  readonly location?: string;
  readonly codePath?: string;
  readonly message?: string;
}

export interface StackBlock {
  readonly kind: "stack";
  readonly message?: string;
  readonly traces: readonly StackTrace[];
  readonly cause?: StackBlock;
  /** Number traces from the outermost down instead of prefixing `at`. */
  readonly showNumbers: boolean;
}

export interface StepsBlock {
  readonly kind: "steps";
  readonly title?: string;
  readonly steps: readonly Block[];
  readonly finalMessage?: string;
}

export type Block =
  | HeaderBlock
  | PrefixBlock
  | CodeBlock
  | TextBlock
  | ContainerBlock
  | SeparatorBlock
  | NoteBlock
  | TagBlock
  | StackBlock
  | StepsBlock;

export type BlockKind = Block["kind"];

export interface Log {
  readonly severity: Severity;
  readonly blocks: readonly Block[];
  /** Rendered after the log, separated by a blank line. */
  readonly cause?: Log;
}
