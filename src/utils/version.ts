import { z } from "zod";

import { getCliAssetPath } from "./cli-root.js";
import { readUtf8File } from "./fs.js";

const packageManifestSchema = z.object({ version: z.string().optional() });

let cachedVersion: string | undefined;

export function getDiaglinesVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const packageJsonRaw = readUtf8File(getCliAssetPath("package.json"), "utf-8");
  const manifest = packageManifestSchema.safeParse(JSON.parse(packageJsonRaw));
  const version = manifest.success ? manifest.data.version?.trim() : undefined;

  cachedVersion = version ? version : "unknown";
  return cachedVersion;
}
