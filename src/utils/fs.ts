import { stat } from "node:fs/promises";

type ErrorOrFactory = Error | (() => Error);

export function isFileSystemError(
  error: unknown,
): error is NodeJS.ErrnoException & { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

export function isMissing(error: unknown): boolean {
  return isFileSystemError(error) && error.code === "ENOENT";
}

export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export async function ensureFileExists(
  path: string,
  error: ErrorOrFactory,
): Promise<void> {
  if (!(await isFile(path))) {
    throw resolveError(error);
  }
}

function resolveError(error: ErrorOrFactory): Error {
  return typeof error === "function" ? error() : error;
}

export { readFileSync as readUtf8File } from "node:fs";
