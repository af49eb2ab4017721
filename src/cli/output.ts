export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly stderr?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  const stderr = normalizeToArray(payload.stderr);
  for (const entry of stderr) {
    process.stderr.write(entry);
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(`\n${normalizedBody.trimEnd()}\n\n`);
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function normalizeToArray(
  value: string | readonly string[] | undefined,
): readonly string[] {
  if (value === undefined) {
    return [] as const;
  }
  if (typeof value === "string") {
    return [value] as const;
  }
  return value;
}
