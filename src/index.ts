export { RenderSettingsError } from "./configs/render/errors.js";
export {
  DEFAULT_RENDER_SETTINGS,
  loadRenderSettings,
  type LoadRenderSettingsOptions,
} from "./configs/render/loader.js";
export type { ColorMode, RenderSettings } from "./configs/render/types.js";
export { DocumentError } from "./documents/errors.js";
export {
  loadLogDocument,
  parseLogDocument,
  type ParseLogDocumentOptions,
} from "./documents/loader.js";
export type { BlockDocument, LogDocument } from "./documents/schema.js";
export {
  code,
  type CodeOptions,
  container,
  createLog,
  header,
  type HeaderOptions,
  indent,
  type LogOptions,
  note,
  prefix,
  separator,
  stack,
  type StackOptions,
  stackTrace,
  steps,
  type StepsOptions,
  tag,
  text,
} from "./logs/builders.js";
export {
  compareSeverity,
  SEVERITY_VALUES,
  type Severity,
} from "./logs/levels.js";
export type * from "./logs/types.js";
export type { RenderOptions } from "./render/context.js";
export { EmptyBlockError } from "./render/errors.js";
export {
  getGlyphSet,
  type GlyphSet,
  type GlyphSetName,
} from "./render/glyphs.js";
export { renderLog, renderLogText } from "./render/layout.js";
export {
  appendLogToFile,
  type LogDestination,
  printLog,
} from "./render/print.js";
export { LineRangeError, OffsetError } from "./source/errors.js";
export {
  lineText,
  type Position,
  resolvePosition,
  SourceText,
} from "./source/text.js";
export { InvalidSpanError } from "./spans/errors.js";
export {
  type ResolvedAnnotation,
  resolveSpans,
  type Span,
} from "./spans/resolver.js";
export { DiagnosticError, HintedError, ValidationError } from "./utils/errors.js";
