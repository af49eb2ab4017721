import { appendFile } from "node:fs/promises";

import type { Log } from "../logs/types.js";
import type { RenderOptions } from "./context.js";
import { renderLogText } from "./layout.js";

export interface LogDestination {
  write(chunk: string): unknown;
}

/** Renders `log` and writes it, newline-terminated, to `destination`. */
export function printLog(
  log: Log,
  destination: LogDestination = process.stdout,
  options: RenderOptions = {},
): void {
  destination.write(`${renderLogText(log, options)}\n`);
}

/**
 * Appends the plain-text rendering of `log` to `filePath`, creating the file
 * when needed. Colour is always off in files.
 */
export async function appendLogToFile(
  log: Log,
  filePath: string,
  options: Omit<RenderOptions, "color"> = {},
): Promise<void> {
  const content = `${renderLogText(log, { ...options, color: false })}\n`;
  await appendFile(filePath, content, { encoding: "utf8" });
}
