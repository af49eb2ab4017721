import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

export interface FormatYamlErrorOptions {
  /**
   * Contextual prefix for the error message (e.g., "Invalid `diaglines.yaml`").
   */
  context: string;

  /**
   * Optional file path to include in the error message.
   */
  displayPath?: string;

  /**
   * Default reason to use when the detail provides none.
   */
  fallbackReason?: string;
}

/**
 * Formats a YAML parse error detail into one message:
 * - With displayPath and location: `context: displayPath (line X, column Y): message`
 * - With displayPath only: `context: displayPath: message`
 * - With location only: `context (line X, column Y): message`
 * - Minimal: `context: message`
 */
export function formatYamlErrorMessage(
  detail: YamlParseErrorDetail,
  options: FormatYamlErrorOptions,
): string {
  const { context, displayPath, fallbackReason } = options;
  const message = detail.reason ?? detail.message ?? fallbackReason ?? context;
  const location =
    typeof detail.line === "number" && typeof detail.column === "number"
      ? ` (line ${detail.line}, column ${detail.column})`
      : "";

  if (displayPath) {
    return `${context}: ${displayPath}${location}: ${message}`;
  }

  return `${context}${location}: ${message}`;
}
