import { DiagnosticError } from "../utils/errors.js";

export class EmptyBlockError extends DiagnosticError {
  constructor(
    public readonly blockKind: string,
    reason: string,
  ) {
    super(`Cannot render an empty ${blockKind} block: ${reason}.`, {
      hintLines: ["Highlight at least one span of a non-empty source text."],
    });
    this.name = "EmptyBlockError";
  }
}
