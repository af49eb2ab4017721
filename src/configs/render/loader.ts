import { join } from "node:path";
import process from "node:process";

import { parseYamlDocument } from "../../utils/yaml-reader.js";
import { createConfigLoader } from "../shared/loader-factory.js";
import { formatYamlErrorMessage } from "../shared/yaml-error-formatter.js";
import { RenderSettingsError } from "./errors.js";
import { type RenderSettings, renderSettingsSchema } from "./types.js";

export const RENDER_SETTINGS_FILENAME = "diaglines.yaml" as const;

export interface LoadRenderSettingsOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

export const DEFAULT_RENDER_SETTINGS: Readonly<RenderSettings> = Object.freeze(
  {
    glyphs: "unicode",
    color: "auto",
    contextLines: 0,
  },
);

const renderSettingsLoader = createConfigLoader<
  RenderSettings,
  LoadRenderSettingsOptions & { root: string }
>({
  resolveFilePath: (root, options) =>
    options.filePath ?? join(root, RENDER_SETTINGS_FILENAME),
  selectReadFile: (options) => options.readFile,
  handleMissing: () => ({ ...DEFAULT_RENDER_SETTINGS }),
  parse: (content, context) => {
    const parsed = parseRenderSettingsYaml(content, context.filePath);
    return {
      glyphs: parsed.glyphs ?? DEFAULT_RENDER_SETTINGS.glyphs,
      color: parsed.color ?? DEFAULT_RENDER_SETTINGS.color,
      contextLines: parsed.contextLines ?? DEFAULT_RENDER_SETTINGS.contextLines,
    };
  },
});

/** Reads `diaglines.yaml` from the working directory; absent means defaults. */
export function loadRenderSettings(
  options: LoadRenderSettingsOptions = {},
): RenderSettings {
  const root = options.root ?? process.cwd();
  return renderSettingsLoader({ ...options, root });
}

function parseRenderSettingsYaml(
  content: string,
  filePath: string,
): Partial<RenderSettings> {
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new RenderSettingsError(
        filePath,
        formatYamlErrorMessage(detail, {
          context: "YAML error",
          fallbackReason: "unable to parse YAML",
        }),
      ),
  });

  const result = renderSettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") ?? "";
    const detail = issue?.message ?? "Invalid settings value";
    throw new RenderSettingsError(
      filePath,
      path.length > 0 ? `${path}: ${detail}` : detail,
    );
  }
  return result.data;
}
