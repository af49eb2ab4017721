import { isMissing, readUtf8File } from "../../utils/fs.js";

export type ReadFileFn = (path: string) => string;

export interface BaseConfigLoaderOptions {
  root: string;
  filePath?: string;
}

export interface ConfigLoaderContext<TOptions extends BaseConfigLoaderOptions> {
  root: string;
  filePath: string;
  options: Readonly<TOptions>;
}

export interface ConfigLoaderDefinition<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
> {
  resolveFilePath: (root: string, options: Readonly<TOptions>) => string;
  selectReadFile?: (options: Readonly<TOptions>) => ReadFileFn | undefined;
  handleMissing: (context: ConfigLoaderContext<TOptions>) => TResult;
  parse: (content: string, context: ConfigLoaderContext<TOptions>) => TResult;
}

export type ConfigLoader<TOptions extends BaseConfigLoaderOptions, TResult> = (
  options: Readonly<TOptions>,
) => TResult;

/** A missing file is not an error: `handleMissing` decides what it means. */
export function createConfigLoader<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
>(
  definition: ConfigLoaderDefinition<TResult, TOptions>,
): ConfigLoader<TOptions, TResult> {
  return (options) => {
    const { root } = options;
    const filePath = definition.resolveFilePath(root, options);
    const context: ConfigLoaderContext<TOptions> = {
      root,
      filePath,
      options,
    };

    const readFile = definition.selectReadFile?.(options) ?? defaultReadFile;

    let content: string;
    try {
      content = readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        return definition.handleMissing(context);
      }
      throw error;
    }

    return definition.parse(content, context);
  };
}

function defaultReadFile(path: string): string {
  return readUtf8File(path, "utf8");
}
