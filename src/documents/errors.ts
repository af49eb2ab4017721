import { HintedError } from "../utils/errors.js";

export class DocumentError extends HintedError {
  constructor(message: string, detailLines: readonly string[] = []) {
    super(message, {
      detailLines,
      hintLines: ["Fix the diagnostic document and rerun."],
    });
    this.name = "DocumentError";
  }
}
