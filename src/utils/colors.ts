import chalk from "chalk";

export type TerminalColor =
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "gray";

export interface TextStyle {
  readonly color?: TerminalColor;
  readonly bold?: boolean;
}

export type Colorizer = (text: string, style: TextStyle) => string;

export const plainColorizer: Colorizer = (text) => text;

/**
 * Builds a colorizer bound to its own chalk instance so the decision to emit
 * ANSI codes is made by the caller and not by chalk's terminal detection.
 */
export function createColorizer(enabled: boolean): Colorizer {
  if (!enabled) {
    return plainColorizer;
  }

  const painter = new chalk.Instance({ level: 1 });
  return (text, style) => {
    if (!text) {
      return text;
    }

    const colored = style.color ? painter[style.color] : painter;
    return style.bold ? colored.bold(text) : colored(text);
  };
}

/** Colours CLI chrome with chalk's own detection of the output stream. */
export function colorize(text: string, color: TerminalColor): string {
  return chalk[color](text);
}
