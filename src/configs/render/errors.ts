import { HintedError } from "../../utils/errors.js";

const DEFAULT_RENDER_SETTINGS_ERROR_CONTEXT = "Invalid render settings";

export class RenderSettingsError extends HintedError {
  constructor(
    public readonly filePath: string,
    detail?: string,
  ) {
    super(
      detail
        ? `${DEFAULT_RENDER_SETTINGS_ERROR_CONTEXT} (${filePath}): ${detail}`
        : `${DEFAULT_RENDER_SETTINGS_ERROR_CONTEXT} at ${filePath}`,
      {
        hintLines: [
          "Allowed keys: `glyphs` (unicode|ascii), `color` (auto|always|never), `contextLines`.",
        ],
      },
    );
    this.name = "RenderSettingsError";
  }
}
