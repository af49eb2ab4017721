import { z } from "zod";

import { type Severity, severitySchema } from "../logs/levels.js";

export interface SpanDocument {
  start: number;
  end: number;
  inlineMessage?: string;
  trailingMessage?: string;
  severity?: Severity;
}

export interface StackTraceDocument {
  location?: string;
  codePath?: string;
  message?: string;
}

export interface StackDocument {
  message?: string;
  traces?: StackTraceDocument[];
  cause?: StackDocument;
  showNumbers?: boolean;
}

export type BlockDocument =
  | {
      kind: "header";
      title: string;
      code?: string;
      location?: string;
      timestamp?: string | Date;
      threadId?: string;
      show?: { location?: boolean; timestamp?: boolean; thread?: boolean };
    }
  | { kind: "prefix"; prefix: string; child: BlockDocument }
  | { kind: "indent"; width: number; child: BlockDocument }
  | {
      kind: "code";
      source: string;
      spans: SpanDocument[];
      location?: string;
      title?: string;
      finalMessage?: string;
      contextLines?: number;
      previousLines?: number;
      nextLines?: number;
      middleLines?: number;
      showNewlines?: boolean;
      alignMessages?: boolean;
      related?: { title?: string; spans: SpanDocument[] };
    }
  | { kind: "text"; lines: string[] }
  | { kind: "container"; children: BlockDocument[] }
  | { kind: "separator"; width: number; character?: string }
  | { kind: "note"; title: string; message: string }
  | { kind: "tag"; tag: string }
  | ({ kind: "stack" } & StackDocument)
  | {
      kind: "steps";
      title?: string;
      steps: BlockDocument[];
      finalMessage?: string;
    };

export interface LogDocument {
  severity: Severity;
  blocks: BlockDocument[];
  cause?: LogDocument;
}

const count = z.number().int().nonnegative();

const spanDocumentSchema = z
  .object({
    start: count,
    end: count,
    inlineMessage: z.string().optional(),
    trailingMessage: z.string().optional(),
    severity: severitySchema.optional(),
  })
  .strict();

const stackTraceDocumentSchema = z
  .object({
    location: z.string().optional(),
    codePath: z.string().optional(),
    message: z.string().optional(),
  })
  .strict();

const stackFields = {
  message: z.string().optional(),
  traces: z.array(stackTraceDocumentSchema).optional(),
  showNumbers: z.boolean().optional(),
};

const stackDocumentSchema: z.ZodType<StackDocument> = z.lazy(() =>
  z
    .object({ ...stackFields, cause: stackDocumentSchema.optional() })
    .strict(),
);

// js-yaml turns unquoted ISO dates into Date values.
const timestampSchema = z.union([z.string(), z.date()]);

export const blockDocumentSchema: z.ZodType<BlockDocument> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z
      .object({
        kind: z.literal("header"),
        title: z.string(),
        code: z.string().optional(),
        location: z.string().optional(),
        timestamp: timestampSchema.optional(),
        threadId: z.string().optional(),
        show: z
          .object({
            location: z.boolean().optional(),
            timestamp: z.boolean().optional(),
            thread: z.boolean().optional(),
          })
          .strict()
          .optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal("prefix"),
        prefix: z.string(),
        child: blockDocumentSchema,
      })
      .strict(),
    z
      .object({
        kind: z.literal("indent"),
        width: count,
        child: blockDocumentSchema,
      })
      .strict(),
    z
      .object({
        kind: z.literal("code"),
        source: z.string().min(1, "source must not be empty"),
        spans: z
          .array(spanDocumentSchema)
          .min(1, "at least one span is required"),
        location: z.string().optional(),
        title: z.string().optional(),
        finalMessage: z.string().optional(),
        contextLines: count.optional(),
        previousLines: count.optional(),
        nextLines: count.optional(),
        middleLines: count.optional(),
        showNewlines: z.boolean().optional(),
        alignMessages: z.boolean().optional(),
        related: z
          .object({
            title: z.string().optional(),
            spans: z
              .array(spanDocumentSchema)
              .min(1, "at least one span is required"),
          })
          .strict()
          .optional(),
      })
      .strict(),
    z
      .object({ kind: z.literal("text"), lines: z.array(z.string()) })
      .strict(),
    z
      .object({
        kind: z.literal("container"),
        children: z.array(blockDocumentSchema),
      })
      .strict(),
    z
      .object({
        kind: z.literal("separator"),
        width: count,
        character: z.string().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal("note"),
        title: z.string(),
        message: z.string(),
      })
      .strict(),
    z.object({ kind: z.literal("tag"), tag: z.string() }).strict(),
    z
      .object({
        kind: z.literal("stack"),
        ...stackFields,
        cause: stackDocumentSchema.optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal("steps"),
        title: z.string().optional(),
        steps: z.array(blockDocumentSchema),
        finalMessage: z.string().optional(),
      })
      .strict(),
  ]),
);

export const logDocumentSchema: z.ZodType<LogDocument> = z.lazy(() =>
  z
    .object({
      severity: severitySchema,
      blocks: z.array(blockDocumentSchema),
      cause: logDocumentSchema.optional(),
    })
    .strict(),
);
