import { formatYamlErrorMessage } from "../configs/shared/yaml-error-formatter.js";
import {
  code,
  container,
  createLog,
  header,
  indent,
  note,
  prefix,
  separator,
  stack,
  steps,
  tag,
  text,
} from "../logs/builders.js";
import type { Block, Log, StackBlock } from "../logs/types.js";
import { ensureFileExists, readUtf8File } from "../utils/fs.js";
import { parseYamlDocument } from "../utils/yaml-reader.js";
import { DocumentError } from "./errors.js";
import {
  type BlockDocument,
  type LogDocument,
  logDocumentSchema,
  type StackDocument,
} from "./schema.js";

const DOCUMENT_CONTEXT = "Invalid diagnostic document";

export interface ParseLogDocumentOptions {
  /** Named in error messages. */
  displayPath?: string;
  /** Used by code blocks that do not set `contextLines` themselves. */
  contextLines?: number;
}

/**
 * Parses a YAML or JSON diagnostic document into a frozen {@link Log}.
 * Span offsets are checked against their sources while the blocks are built.
 */
export function parseLogDocument(
  content: string,
  options: ParseLogDocumentOptions = {},
): Log {
  const { displayPath } = options;
  const raw = parseYamlDocument(content, {
    filename: displayPath,
    onEmpty: () => {
      throw new DocumentError(
        displayPath
          ? `Diagnostic document \`${displayPath}\` is empty.`
          : "Diagnostic document is empty.",
      );
    },
    formatError: (detail) =>
      new DocumentError(
        formatYamlErrorMessage(detail, {
          context: DOCUMENT_CONTEXT,
          displayPath,
          fallbackReason: "unable to parse YAML",
        }),
      ),
  });

  const result = logDocumentSchema.safeParse(raw);
  if (!result.success) {
    const detailLines = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    });
    throw new DocumentError(
      displayPath ? `${DOCUMENT_CONTEXT}: ${displayPath}` : DOCUMENT_CONTEXT,
      detailLines,
    );
  }

  return toLog(result.data, options.contextLines ?? 0);
}

export async function loadLogDocument(
  path: string,
  options: Omit<ParseLogDocumentOptions, "displayPath"> = {},
): Promise<Log> {
  await ensureFileExists(
    path,
    () => new DocumentError(`Diagnostic document \`${path}\` not found.`),
  );
  return parseLogDocument(readUtf8File(path, "utf8"), {
    ...options,
    displayPath: path,
  });
}

function toLog(document: LogDocument, contextLines: number): Log {
  const toBlock = (block: BlockDocument): Block =>
    toBlockWithContext(block, contextLines);
  return createLog(document.severity, document.blocks.map(toBlock), {
    ...(document.cause ? { cause: toLog(document.cause, contextLines) } : {}),
  });
}

function toBlockWithContext(
  document: BlockDocument,
  contextLines: number,
): Block {
  const toBlock = (block: BlockDocument): Block =>
    toBlockWithContext(block, contextLines);

  switch (document.kind) {
    case "header":
      return header(document.title, {
        code: document.code,
        location: document.location,
        timestamp: document.timestamp,
        threadId: document.threadId,
        show: document.show,
      });
    case "prefix":
      return prefix(document.prefix, toBlock(document.child));
    case "indent":
      return indent(document.width, toBlock(document.child));
    case "code":
      return code(document.source, document.spans, {
        location: document.location,
        title: document.title,
        finalMessage: document.finalMessage,
        contextLines: document.contextLines ?? contextLines,
        previousLines: document.previousLines,
        nextLines: document.nextLines,
        middleLines: document.middleLines,
        showNewlines: document.showNewlines,
        alignMessages: document.alignMessages,
        related: document.related,
      });
    case "text":
      return text(...document.lines);
    case "container":
      return container(...document.children.map(toBlock));
    case "separator":
      return separator(document.width, document.character);
    case "note":
      return note(document.title, document.message);
    case "tag":
      return tag(document.tag);
    case "stack":
      return toStack(document);
    case "steps":
      return steps(document.steps.map(toBlock), {
        title: document.title,
        finalMessage: document.finalMessage,
      });
  }
}

function toStack(document: StackDocument): StackBlock {
  return stack({
    message: document.message,
    traces: document.traces,
    cause: document.cause ? toStack(document.cause) : undefined,
    showNumbers: document.showNumbers,
  });
}
