import { colorize } from "../utils/colors.js";
import { HintedError, toErrorMessage } from "../utils/errors.js";

export class CliError extends HintedError {
  constructor(
    headline: string,
    detailLines: readonly string[] = [],
    hintLines: readonly string[] = [],
  ) {
    super(headline, { detailLines, hintLines });
    this.name = "CliError";
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof HintedError) {
    return new CliError(error.headline, error.detailLines, error.hintLines);
  }

  return new CliError(toErrorMessage(error));
}

/** Headline, details and hints, one blank line between each group. */
export function renderCliError(error: CliError): string {
  const primary = [`${colorize("Error:", "red")} ${error.headline}`];
  if (error.detailLines.length > 0) {
    primary.push("", ...error.detailLines);
  }

  return [primary, error.hintLines]
    .filter((section) => section.length > 0)
    .map((section) => section.join("\n"))
    .join("\n\n");
}
