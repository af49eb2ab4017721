import type { Block, CodeBlock, Log } from "../logs/types.js";
import {
  type ResolvedAnnotation,
  resolveSpans,
} from "../spans/resolver.js";
import { renderHeader } from "./blocks/header.js";
import { renderNote, renderSeparator, renderTag } from "./blocks/notes.js";
import { renderStack } from "./blocks/stack.js";
import { renderSteps } from "./blocks/steps.js";
import { composeExcerpt, excerptGutterWidth } from "./code/composer.js";
import {
  createRenderContext,
  type RenderContext,
  type RenderOptions,
} from "./context.js";
import { EmptyBlockError } from "./errors.js";

interface ResolvedExcerpt {
  readonly annotations: readonly ResolvedAnnotation[];
  readonly related?: readonly ResolvedAnnotation[];
}

type AnnotationCache = ReadonlyMap<CodeBlock, ResolvedExcerpt>;

/**
 * Renders a log into its final lines. Every code block is resolved before
 * the first line is produced, so invalid input fails without partial output.
 */
export function renderLog(log: Log, options: RenderOptions = {}): string[] {
  const chain: Log[] = [];
  for (let current: Log | undefined = log; current; current = current.cause) {
    chain.push(current);
  }

  const annotations = new Map<CodeBlock, ResolvedExcerpt>();
  for (const entry of chain) {
    entry.blocks.forEach((block) => resolveAnnotations(block, annotations));
  }

  return chain.flatMap((entry, index) => {
    const context = createRenderContext(entry.severity, options);
    const lines = entry.blocks.flatMap((block) =>
      renderBlock(block, context, annotations),
    );
    return index === 0 ? lines : ["", ...lines];
  });
}

export function renderLogText(log: Log, options: RenderOptions = {}): string {
  return renderLog(log, options).join("\n");
}

function renderBlock(
  block: Block,
  context: RenderContext,
  annotations: AnnotationCache,
  minGutterWidth = 0,
): string[] {
  switch (block.kind) {
    case "header":
      return renderHeader(block, context);
    case "prefix":
      return renderBlock(block.child, context, annotations).map(
        (line) => `${block.prefix}${line}`,
      );
    case "code": {
      const resolved = annotations.get(block);
      return composeExcerpt(block.source, resolved?.annotations ?? [], {
        glyphs: context.glyphs,
        colorize: context.colorize,
        severity: context.severity,
        location: block.location,
        title: block.title,
        finalMessage: block.finalMessage,
        previousLines: block.previousLines,
        nextLines: block.nextLines,
        middleLines: block.middleLines,
        showNewlines: block.showNewlines,
        alignMessages: block.alignMessages,
        minGutterWidth,
        ...(block.related
          ? {
              related: {
                title: block.related.title,
                annotations: resolved?.related ?? [],
              },
            }
          : {}),
      });
    }
    case "steps": {
      const gutterWidth = Math.max(
        0,
        ...block.steps.map((step) =>
          step.kind === "code" ? codeGutterWidth(step, annotations) : 0,
        ),
      );
      return renderSteps(block, context, (step) =>
        renderBlock(step, context, annotations, gutterWidth),
      );
    }
    case "text":
      return [...block.lines];
    case "container":
      return block.children.flatMap((child) =>
        renderBlock(child, context, annotations),
      );
    case "separator":
      return renderSeparator(block, context);
    case "note":
      return renderNote(block, context);
    case "tag":
      return renderTag(block, context);
    case "stack":
      return renderStack(block, context);
  }
}

function codeGutterWidth(
  block: CodeBlock,
  annotations: AnnotationCache,
): number {
  const resolved = annotations.get(block);
  if (!resolved) {
    return 0;
  }
  const window = {
    previousLines: block.previousLines,
    nextLines: block.nextLines,
    middleLines: block.middleLines,
  };
  return Math.max(
    excerptGutterWidth(block.source, resolved.annotations, window),
    resolved.related
      ? excerptGutterWidth(block.source, resolved.related, window)
      : 0,
  );
}

function resolveAnnotations(
  block: Block,
  cache: Map<CodeBlock, ResolvedExcerpt>,
): void {
  switch (block.kind) {
    case "code": {
      if (block.source.isEmpty) {
        throw new EmptyBlockError("code", "the source text is empty");
      }
      if (block.spans.length === 0) {
        throw new EmptyBlockError("code", "no span is highlighted");
      }
      if (block.related && block.related.spans.length === 0) {
        throw new EmptyBlockError(
          "code",
          "the related excerpt highlights no span",
        );
      }
      cache.set(block, {
        annotations: resolveSpans(block.source, block.spans),
        ...(block.related
          ? { related: resolveSpans(block.source, block.related.spans) }
          : {}),
      });
      return;
    }
    case "steps":
      block.steps.forEach((step) => resolveAnnotations(step, cache));
      return;
    case "prefix":
      resolveAnnotations(block.child, cache);
      return;
    case "container":
      block.children.forEach((child) => resolveAnnotations(child, cache));
      return;
    default:
      return;
  }
}
