import { DiagnosticError } from "../utils/errors.js";

export class InvalidSpanError extends DiagnosticError {
  constructor(
    public readonly spanIndex: number,
    public readonly start: number,
    public readonly end: number,
    reason: string,
  ) {
    super(`Span #${spanIndex} [${start}, ${end}) is invalid: ${reason}.`);
    this.name = "InvalidSpanError";
  }
}
