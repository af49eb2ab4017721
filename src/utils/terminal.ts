export interface ColorSupportOptions {
  output?: NodeJS.WriteStream | null;
  env?: NodeJS.ProcessEnv;
}

/** True when `output` is a terminal and `NO_COLOR` is unset. */
export function supportsColor(options: ColorSupportOptions = {}): boolean {
  const output = options.output ?? process.stdout;
  const env = options.env ?? process.env;

  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }

  return Boolean(output?.isTTY);
}
