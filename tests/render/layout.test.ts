import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "@jest/globals";

import {
  code,
  container,
  createLog,
  header,
  indent,
  prefix,
  separator,
  steps,
  text,
} from "../../src/logs/builders.js";
import type { CodeBlock } from "../../src/logs/types.js";
import { EmptyBlockError } from "../../src/render/errors.js";
import { renderLog, renderLogText } from "../../src/render/layout.js";
import { appendLogToFile, printLog } from "../../src/render/print.js";
import { SourceText } from "../../src/source/text.js";
import { InvalidSpanError } from "../../src/spans/errors.js";

const SOURCE = 'let a = "test"\nlet y = 3\nlet z = x + y';

describe("renderLog", () => {
  const log = createLog("error", [
    header("Type mismatch", {
      code: "E0308",
      location: "src/main.ts:3:13",
      timestamp: "2024-01-01T00:00:00Z",
      threadId: "main",
    }),
    code(SOURCE, [
      {
        start: 37,
        end: 38,
        trailingMessage: "The variable 'y' must be a number",
      },
    ]),
  ]);

  it("renders a header followed by an excerpt", () => {
    expect(renderLog(log)).toEqual([
      "ERROR[E0308]: Type mismatch",
      " ↪ in src/main.ts:3:13",
      " ↪ at 2024-01-01T00:00:00Z",
      " ↪ in thread main",
      "  ╭─",
      "3 │ let z = x + y",
      "  │             ^ The variable 'y' must be a number",
      "  ╰─",
    ]);
  });

  it("renders the same log identically every time", () => {
    expect(renderLog(log)).toEqual(renderLog(log));
    expect(renderLogText(log, { glyphs: "ascii" })).toBe(
      renderLogText(log, { glyphs: "ascii" }),
    );
  });

  it("concatenates nested prefixes from the outside in", () => {
    const nested = createLog("info", [
      prefix("> ", prefix("> ", text("first", "second"))),
    ]);

    expect(renderLog(nested)).toEqual(["> > first", "> > second"]);
  });

  it("prefixes every line of an excerpt", () => {
    const indented = createLog("warn", [
      indent(2, code("abc", [{ start: 0, end: 1, inlineMessage: "here" }])),
    ]);

    expect(renderLog(indented)).toEqual([
      "    ╭─",
      "  1 │ abc",
      "    │ ^ here",
      "    ╰─",
    ]);
  });

  it("flattens containers and splits text on newlines", () => {
    const flat = createLog("info", [
      container(text("one\ntwo"), container(text("three"))),
      separator(4),
      separator(2, " "),
      separator(0),
    ]);

    expect(renderLog(flat)).toEqual(["one", "two", "three", "────", ""]);
  });

  it("renders causes after a blank line with their own severity", () => {
    const chained = createLog("error", [header("Build failed")], {
      cause: createLog("warn", [header("Cache miss")]),
    });

    expect(renderLogText(chained)).toBe(
      "ERROR: Build failed\n\nWARN: Cache miss",
    );
  });

  it("fails before producing output when a span is invalid", () => {
    const broken: CodeBlock = {
      kind: "code",
      source: new SourceText("ab"),
      spans: [{ start: 0, end: 9 }],
      previousLines: 0,
      nextLines: 0,
      middleLines: 0,
      showNewlines: false,
      alignMessages: false,
    };
    const invalid = createLog("error", [header("Oops")], {
      cause: createLog("error", [broken]),
    });

    expect(() => renderLog(invalid)).toThrow(InvalidSpanError);
  });

  it("lines up the gutters of excerpts inside steps", () => {
    const source = new SourceText(
      Array.from({ length: 10 }, (_, i) => `l${i + 1}`).join("\n"),
    );
    const walkthrough = createLog("error", [
      steps(
        [
          text("Parse the file"),
          code(source, [{ start: 3, end: 5, inlineMessage: "a" }]),
          separator(2),
          code(source, [{ start: 27, end: 30, inlineMessage: "b" }]),
        ],
        { title: "Build", finalMessage: "Fix the input" },
      ),
    ]);

    expect(renderLog(walkthrough)).toEqual([
      "╭─▶ Build",
      "├─▶ Parse the file",
      "├─▶    ╭─",
      "│    2 │ l2",
      "│      │ ^^ a",
      "│      ╰─",
      "│   ──",
      "├─▶    ╭─",
      "│   10 │ l10",
      "│      │ ^^^ b",
      "│      ╰─",
      "╰─▶ Fix the input",
    ]);
  });

  it("validates spans of related excerpts nested in steps", () => {
    const broken: CodeBlock = {
      kind: "code",
      source: new SourceText("ab"),
      spans: [{ start: 0, end: 1 }],
      previousLines: 0,
      nextLines: 0,
      middleLines: 0,
      showNewlines: false,
      alignMessages: false,
      related: { spans: [{ start: 1, end: 7 }] },
    };

    expect(() => renderLog(createLog("error", [steps([broken])]))).toThrow(
      InvalidSpanError,
    );
  });

  it("rejects code blocks that highlight nothing", () => {
    const empty: CodeBlock = {
      kind: "code",
      source: new SourceText("ab"),
      spans: [],
      previousLines: 0,
      nextLines: 0,
      middleLines: 0,
      showNewlines: false,
      alignMessages: false,
    };

    expect(() => renderLog(createLog("error", [empty]))).toThrow(
      EmptyBlockError,
    );
  });
});

describe("printLog", () => {
  it("writes the rendered text with a trailing newline", () => {
    const chunks: string[] = [];
    printLog(
      createLog("info", [header("Done")]),
      { write: (chunk: string) => chunks.push(chunk) },
      { glyphs: "ascii" },
    );

    expect(chunks).toEqual(["INFO: Done\n"]);
  });
});

describe("appendLogToFile", () => {
  it("appends plain renderings after the existing content", async () => {
    const directory = await mkdtemp(join(tmpdir(), "diaglines-append-"));
    const path = join(directory, "diagnostics.log");
    try {
      await writeFile(path, "INFO: Started\n", "utf8");
      await appendLogToFile(createLog("warn", [header("Slow")]), path);
      await appendLogToFile(
        createLog("error", [code("ab", [{ start: 0, end: 1 }])]),
        path,
        { glyphs: "ascii" },
      );

      expect(await readFile(path, "utf8")).toBe(
        [
          "INFO: Started",
          "WARN: Slow",
          "  ,-",
          "1 | ab",
          "  | ^",
          "  `-",
          "",
        ].join("\n"),
      );
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("creates the file when it does not exist", async () => {
    const directory = await mkdtemp(join(tmpdir(), "diaglines-append-"));
    const path = join(directory, "new.log");
    try {
      await appendLogToFile(createLog("info", [header("Done")]), path);

      expect(await readFile(path, "utf8")).toBe("INFO: Done\n");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
