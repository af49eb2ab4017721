import { resolve } from "node:path";
import process from "node:process";

import { Command } from "commander";

import { loadRenderSettings } from "../configs/render/loader.js";
import type { ColorMode, RenderSettings } from "../configs/render/types.js";
import { loadLogDocument } from "../documents/loader.js";
import type { RenderOptions } from "../render/context.js";
import { renderLogText } from "../render/layout.js";
import { appendLogToFile } from "../render/print.js";
import { ensureFileExists } from "../utils/fs.js";
import { supportsColor } from "../utils/terminal.js";
import { parseNonNegativeInteger } from "../utils/validators.js";
import { CliError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

export interface RenderCommandOptions {
  file: string;
  root?: string;
  config?: string;
  ascii?: boolean;
  color?: boolean;
  contextLines?: number;
  /** Also append the plain-text rendering to this file. */
  appendTo?: string;
  /** Whether stdout can show colour; consulted when the mode is `auto`. */
  colorTerminal?: boolean;
}

export interface RenderCommandResult {
  body: string;
  settings: RenderSettings;
}

export async function runRenderCommand(
  options: RenderCommandOptions,
): Promise<RenderCommandResult> {
  const root = options.root ?? process.cwd();
  const configPath =
    options.config !== undefined ? resolve(root, options.config) : undefined;

  if (configPath !== undefined) {
    await ensureFileExists(
      configPath,
      () =>
        new CliError(
          `Render settings file \`${options.config}\` not found.`,
          [],
          ["Pass an existing file to --config, or omit the flag."],
        ),
    );
  }

  const fileSettings = loadRenderSettings({ root, filePath: configPath });
  const settings: RenderSettings = {
    glyphs: options.ascii ? "ascii" : fileSettings.glyphs,
    color:
      options.color === undefined
        ? fileSettings.color
        : options.color
          ? "always"
          : "never",
    contextLines: options.contextLines ?? fileSettings.contextLines,
  };

  const log = await loadLogDocument(resolve(root, options.file), {
    contextLines: settings.contextLines,
  });

  const renderOptions: RenderOptions = {
    glyphs: settings.glyphs,
    color: resolveColor(settings.color, options.colorTerminal),
  };

  if (options.appendTo !== undefined) {
    await appendLogToFile(log, resolve(root, options.appendTo), {
      glyphs: settings.glyphs,
    });
  }

  return { body: renderLogText(log, renderOptions), settings };
}

function resolveColor(mode: ColorMode, colorTerminal?: boolean): boolean {
  switch (mode) {
    case "always":
      return true;
    case "never":
      return false;
    case "auto":
      return colorTerminal ?? supportsColor();
  }
}

interface RenderCommandActionOptions {
  config?: string;
  ascii?: boolean;
  color?: boolean;
  contextLines?: number;
  appendTo?: string;
}

function parseContextLinesOption(value: string): number {
  return parseNonNegativeInteger(
    value,
    "Expected non-negative integer after --context-lines",
  );
}

export function createRenderCommand(): Command {
  return new Command("render")
    .description("Render a diagnostic described in a YAML or JSON document")
    .argument("<file>", "Path to the diagnostic document")
    .option("--config <path>", "Render settings file (default: diaglines.yaml)")
    .option("--ascii", "Draw with ASCII glyphs only")
    .option("--color", "Always emit ANSI colours")
    .option("--no-color", "Never emit ANSI colours")
    .option(
      "--context-lines <count>",
      "Unannotated lines shown around each excerpt",
      parseContextLinesOption,
    )
    .option(
      "--append-to <path>",
      "Also append the rendering, without colour, to a file",
    )
    .allowExcessArguments(false)
    .action(async (file: string, options: RenderCommandActionOptions) => {
      const result = await runRenderCommand({
        file,
        config: options.config,
        ascii: options.ascii,
        color: options.color,
        contextLines: options.contextLines,
        appendTo: options.appendTo,
      });

      writeCommandOutput({ body: result.body });
    });
}
