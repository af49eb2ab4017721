import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";

import { DocumentError } from "../../src/documents/errors.js";
import {
  loadLogDocument,
  parseLogDocument,
} from "../../src/documents/loader.js";
import { renderLog } from "../../src/render/layout.js";
import { InvalidSpanError } from "../../src/spans/errors.js";

const TYPE_MISMATCH = `severity: error
blocks:
  - kind: header
    title: Type mismatch
    location: src/main.ts:3:13
  - kind: code
    source: "let z = x + y"
    spans:
      - start: 12
        end: 13
        trailingMessage: The variable 'y' must be a number
`;

function captureDocumentError(run: () => unknown): DocumentError {
  try {
    run();
  } catch (error) {
    if (error instanceof DocumentError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DocumentError");
}

describe("parseLogDocument", () => {
  it("builds a renderable log from YAML", () => {
    const log = parseLogDocument(TYPE_MISMATCH);

    expect(renderLog(log)).toEqual([
      "ERROR: Type mismatch",
      " ↪ in src/main.ts:3:13",
      "  ╭─",
      "1 │ let z = x + y",
      "  │             ^ The variable 'y' must be a number",
      "  ╰─",
    ]);
  });

  it("accepts JSON with nested blocks and causes", () => {
    const log = parseLogDocument(
      JSON.stringify({
        severity: "warn",
        blocks: [
          { kind: "indent", width: 2, child: { kind: "text", lines: ["a"] } },
          { kind: "note", title: "help", message: "retry" },
        ],
        cause: { severity: "info", blocks: [{ kind: "tag", tag: "I001" }] },
      }),
    );

    expect(renderLog(log)).toEqual(["  a", "= help: retry", "", "= I001"]);
  });

  it("reads unquoted timestamps", () => {
    const log = parseLogDocument(
      [
        "severity: info",
        "blocks:",
        "  - kind: header",
        "    title: Started",
        "    timestamp: 2024-01-02T03:04:05Z",
      ].join("\n"),
    );

    expect(renderLog(log)).toEqual([
      "INFO: Started",
      " ↪ at 2024-01-02T03:04:05.000Z",
    ]);
  });

  it("applies the default context to code blocks without their own", () => {
    const document = JSON.stringify({
      severity: "error",
      blocks: [
        {
          kind: "code",
          source: "a\nb\nc",
          spans: [{ start: 2, end: 3 }],
        },
        {
          kind: "code",
          source: "a\nb\nc",
          spans: [{ start: 2, end: 3 }],
          contextLines: 0,
        },
      ],
    });

    expect(renderLog(parseLogDocument(document, { contextLines: 1 }))).toEqual(
      [
        "  ╭─",
        "1 │ a",
        "2 │ b",
        "  │ ^",
        "3 │ c",
        "  ╰─",
        "  ╭─",
        "2 │ b",
        "  │ ^",
        "  ╰─",
      ],
    );
  });

  it("reads steps and the extra code block fields", () => {
    const log = parseLogDocument(
      JSON.stringify({
        severity: "warn",
        blocks: [
          {
            kind: "steps",
            title: "Trace",
            steps: [
              {
                kind: "code",
                source: "let a = 1\nlet b = a",
                spans: [{ start: 4, end: 5, inlineMessage: "defined" }],
                title: "main.ts",
                finalMessage: "done",
                showNewlines: true,
                related: {
                  title: "used",
                  spans: [{ start: 18, end: 19, inlineMessage: "read" }],
                },
              },
            ],
            finalMessage: "end",
          },
          {
            kind: "code",
            source: "a\nb\nc",
            spans: [{ start: 4, end: 5 }],
            previousLines: 2,
            nextLines: 0,
            middleLines: 1,
            alignMessages: true,
          },
        ],
      }),
    );

    expect(renderLog(log)).toEqual([
      "╭─▶ Trace",
      "├─▶   main.ts",
      "│     ╭─",
      "│   1 │ let a = 1↩",
      "│     │     ^ defined",
      "│     ├─ used",
      "│   2 │ let b = a",
      "│     │         ^ read",
      "│     ╰─ done",
      "╰─▶ end",
      "  ╭─",
      "1 │ a",
      "2 │ b",
      "3 │ c",
      "  │ ^",
      "  ╰─",
    ]);
  });

  it("rejects a related excerpt without spans", () => {
    const error = captureDocumentError(() =>
      parseLogDocument(
        JSON.stringify({
          severity: "error",
          blocks: [
            {
              kind: "code",
              source: "ab",
              spans: [{ start: 0, end: 1 }],
              related: { spans: [] },
            },
          ],
        }),
      ),
    );

    expect(error.detailLines).toEqual([
      "blocks.0.related.spans: at least one span is required",
    ]);
  });

  it("rejects empty documents", () => {
    expect(() =>
      parseLogDocument("  \n", { displayPath: "empty.yaml" }),
    ).toThrow("Diagnostic document `empty.yaml` is empty.");
  });

  it("reports YAML syntax errors with their location", () => {
    const error = captureDocumentError(() =>
      parseLogDocument("severity: [", { displayPath: "broken.yaml" }),
    );

    expect(error.message).toMatch(
      /^Invalid diagnostic document: broken\.yaml \(line \d+, column \d+\): /u,
    );
  });

  it("lists every schema violation with its path", () => {
    const error = captureDocumentError(() =>
      parseLogDocument(
        JSON.stringify({
          severity: "fatal",
          blocks: [{ kind: "banner" }],
        }),
      ),
    );

    expect(error.message).toBe("Invalid diagnostic document");
    expect(error.detailLines).toHaveLength(2);
    expect(error.detailLines[0]).toMatch(/^severity: Invalid enum value/u);
    expect(error.detailLines[1]).toMatch(
      /^blocks\.0\.kind: Invalid discriminator value/u,
    );
  });

  it("rejects unknown fields", () => {
    const error = captureDocumentError(() =>
      parseLogDocument(
        JSON.stringify({
          severity: "info",
          blocks: [{ kind: "tag", tag: "T1", colour: "red" }],
        }),
      ),
    );

    expect(error.detailLines).toEqual([
      "blocks.0: Unrecognized key(s) in object: 'colour'",
    ]);
  });

  it("lets span errors from the builders through", () => {
    const document = JSON.stringify({
      severity: "error",
      blocks: [{ kind: "code", source: "abc", spans: [{ start: 1, end: 7 }] }],
    });

    expect(() => parseLogDocument(document)).toThrow(InvalidSpanError);
  });
});

describe("loadLogDocument", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "diaglines-documents-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("reads a document from disk", async () => {
    const path = join(directory, "diagnostic.yaml");
    await writeFile(path, TYPE_MISMATCH, "utf8");

    const log = await loadLogDocument(path);

    expect(log.severity).toBe("error");
    expect(log.blocks.map((block) => block.kind)).toEqual(["header", "code"]);
  });

  it("fails when the file is missing", async () => {
    const path = join(directory, "missing.yaml");

    await expect(loadLogDocument(path)).rejects.toThrow(
      `Diagnostic document \`${path}\` not found.`,
    );
  });
});
