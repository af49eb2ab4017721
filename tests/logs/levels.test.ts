import { describe, expect, it } from "@jest/globals";

import {
  compareSeverity,
  getSeverityStyle,
  SEVERITY_VALUES,
} from "../../src/logs/levels.js";

describe("severity levels", () => {
  it("orders severities from trace to error", () => {
    const shuffled = ["error", "trace", "warn", "info", "debug"] as const;

    expect([...shuffled].sort(compareSeverity)).toEqual([...SEVERITY_VALUES]);
  });

  it("upper-cases tags", () => {
    expect(SEVERITY_VALUES.map((value) => getSeverityStyle(value).tag)).toEqual(
      ["TRACE", "DEBUG", "INFO", "WARN", "ERROR"],
    );
  });
});
