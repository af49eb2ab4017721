import { LineRangeError, OffsetError } from "./errors.js";

/** 1-based line and column; columns count Unicode scalar values. */
export interface Position {
  readonly line: number;
  readonly column: number;
}

interface LineIndex {
  readonly bytes: Buffer;
  /** Byte offset of the first byte of every line; line 1 starts at 0. */
  readonly lineStarts: readonly number[];
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Immutable source string addressed by UTF-8 byte offsets.
 *
 * The byte buffer and the line-start table are built on the first query and
 * reused afterwards; nothing else about the instance ever changes.
 */
export class SourceText {
  private index: LineIndex | undefined;

  constructor(public readonly text: string) {}

  get byteLength(): number {
    return this.getIndex().bytes.length;
  }

  get lineCount(): number {
    return this.getIndex().lineStarts.length;
  }

  get isEmpty(): boolean {
    return this.text.length === 0;
  }

  /** Whether `offset` is inside the text and not inside a multi-byte sequence. */
  isBoundary(offset: number): boolean {
    const { bytes } = this.getIndex();
    if (!Number.isInteger(offset) || offset < 0 || offset > bytes.length) {
      return false;
    }
    return offset === bytes.length || !isContinuationByte(bytes[offset]);
  }

  resolve(offset: number): Position {
    this.assertOffset(offset);
    const { bytes, lineStarts } = this.getIndex();
    const line = findLine(lineStarts, offset);
    const column = countScalars(bytes, lineStarts[line - 1], offset) + 1;
    return { line, column };
  }

  /** Inverse of {@link resolve}. */
  offsetOf(position: Position): number {
    const lineStart = this.lineStart(position.line);
    const lineEnd = this.lineEnd(position.line);
    const { bytes } = this.getIndex();

    if (!Number.isInteger(position.column) || position.column < 1) {
      throw new OffsetError(
        lineStart,
        bytes.length,
        `column ${position.column} is not a positive integer`,
      );
    }

    let offset = lineStart;
    let remaining = position.column - 1;
    while (remaining > 0) {
      if (offset >= lineEnd) {
        throw new OffsetError(
          lineEnd,
          bytes.length,
          `column ${position.column} is past the end of line ${position.line}`,
        );
      }
      offset += 1;
      while (offset < lineEnd && isContinuationByte(bytes[offset])) {
        offset += 1;
      }
      remaining -= 1;
    }
    return offset;
  }

  /** Text of a 1-based line without its line terminator. */
  lineText(line: number): string {
    const { bytes } = this.getIndex();
    return bytes
      .subarray(this.lineStart(line), this.contentEnd(line))
      .toString("utf8");
  }

  /** Number of scalar values on a line, excluding `\r\n` or `\n`. */
  lineLength(line: number): number {
    const { bytes } = this.getIndex();
    return countScalars(bytes, this.lineStart(line), this.contentEnd(line));
  }

  lineStart(line: number): number {
    this.assertLine(line);
    return this.getIndex().lineStarts[line - 1];
  }

  /** Byte offset of the line's `\n`, or the text length on the last line. */
  lineEnd(line: number): number {
    this.assertLine(line);
    const { bytes, lineStarts } = this.getIndex();
    return line < lineStarts.length ? lineStarts[line] - 1 : bytes.length;
  }

  /** Like {@link lineEnd}, but before the `\r` of a `\r\n` terminator. */
  private contentEnd(line: number): number {
    const start = this.lineStart(line);
    const end = this.lineEnd(line);
    const { bytes } = this.getIndex();
    return end > start && bytes[end - 1] === CARRIAGE_RETURN ? end - 1 : end;
  }

  private assertLine(line: number): void {
    const count = this.lineCount;
    if (!Number.isInteger(line) || line < 1 || line > count) {
      throw new LineRangeError(line, count);
    }
  }

  private assertOffset(offset: number): void {
    const { bytes } = this.getIndex();
    if (!Number.isInteger(offset) || offset < 0) {
      throw new OffsetError(offset, bytes.length, "not a non-negative integer");
    }
    if (offset > bytes.length) {
      throw new OffsetError(offset, bytes.length, "past the end of the source");
    }
    if (offset < bytes.length && isContinuationByte(bytes[offset])) {
      throw new OffsetError(
        offset,
        bytes.length,
        "inside a multi-byte character",
      );
    }
  }

  private getIndex(): LineIndex {
    if (!this.index) {
      this.index = buildLineIndex(this.text);
    }
    return this.index;
  }
}

export function resolvePosition(source: SourceText, offset: number): Position {
  return source.resolve(offset);
}

export function lineText(source: SourceText, line: number): string {
  return source.lineText(line);
}

function buildLineIndex(text: string): LineIndex {
  const bytes = Buffer.from(text, "utf8");
  const lineStarts = [0];
  for (let offset = 0; offset < bytes.length; offset += 1) {
    if (bytes[offset] === NEWLINE) {
      lineStarts.push(offset + 1);
    }
  }
  return { bytes, lineStarts };
}

function findLine(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    if (lineStarts[middle] <= offset) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }
  return low + 1;
}

function countScalars(bytes: Buffer, from: number, to: number): number {
  let count = 0;
  for (let offset = from; offset < to; offset += 1) {
    if (!isContinuationByte(bytes[offset])) {
      count += 1;
    }
  }
  return count;
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}
