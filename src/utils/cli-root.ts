import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;
const CLI_ROOT_ERROR_MESSAGE =
  "Unable to locate the diaglines install directory." as const;

let cachedCliRoot: string | undefined;

export function resolveCliAssetRoot(): string {
  if (cachedCliRoot) {
    return cachedCliRoot;
  }

  const derivedRoot = ascendToPackageRoot(__dirname);
  if (derivedRoot) {
    cachedCliRoot = derivedRoot;
    return cachedCliRoot;
  }

  throw new Error(
    `${CLI_ROOT_ERROR_MESSAGE} Attempted discovery starting from "${__dirname}".`,
  );
}

export function getCliAssetPath(...segments: string[]): string {
  const root = resolveCliAssetRoot();
  return resolveNative(root, ...segments);
}

function ascendToPackageRoot(start: string): string | undefined {
  let current = start;

  while (true) {
    if (existsSync(resolveNative(current, PACKAGE_JSON_FILENAME))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
