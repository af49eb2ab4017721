import { DiagnosticError } from "../utils/errors.js";

export class OffsetError extends DiagnosticError {
  constructor(
    public readonly offset: number,
    public readonly byteLength: number,
    reason: string,
  ) {
    super(`Byte offset ${offset} is invalid: ${reason}.`, {
      detailLines: [`Source length: ${byteLength} bytes`],
    });
    this.name = "OffsetError";
  }
}

export class LineRangeError extends DiagnosticError {
  constructor(
    public readonly line: number,
    public readonly lineCount: number,
  ) {
    super(`Line ${line} is outside the source text (1-${lineCount}).`);
    this.name = "LineRangeError";
  }
}
