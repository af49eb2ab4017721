import { z } from "zod";

import type { TerminalColor } from "../utils/colors.js";

export const SEVERITY_VALUES = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
] as const;

export type Severity = (typeof SEVERITY_VALUES)[number];

export const severitySchema = z.enum(SEVERITY_VALUES);

interface SeverityStyle {
  rank: number;
  tag: string;
  cli: TerminalColor;
}

const severityStyles: Record<Severity, SeverityStyle> = {
  trace: { rank: 1000, tag: "TRACE", cli: "gray" },
  debug: { rank: 2000, tag: "DEBUG", cli: "green" },
  info: { rank: 3000, tag: "INFO", cli: "blue" },
  warn: { rank: 4000, tag: "WARN", cli: "yellow" },
  error: { rank: 5000, tag: "ERROR", cli: "red" },
};

export function getSeverityStyle(severity: Severity): SeverityStyle {
  return severityStyles[severity];
}

export function compareSeverity(left: Severity, right: Severity): number {
  return severityStyles[left].rank - severityStyles[right].rank;
}
