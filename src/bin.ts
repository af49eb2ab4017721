#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, renderCliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { createRenderCommand } from "./cli/render.js";
import { toErrorMessage } from "./utils/errors.js";
import { getDiaglinesVersion } from "./utils/version.js";

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

function installProcessGuards(): void {
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      process.exit(SIGNAL_EXIT_CODES[signal] ?? 1);
    });
  }

  process.on("uncaughtException", (error) => {
    console.error(`[diaglines] Uncaught exception: ${toErrorMessage(error)}`);
    console.error(error);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error(`[diaglines] Unhandled rejection: ${toErrorMessage(reason)}`);
    console.error(reason);
    process.exit(1);
  });
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = new Command();

  program
    .name("diaglines")
    .description("Render compiler-style diagnostics")
    .version(
      getDiaglinesVersion(),
      "-v, --version",
      "print the diaglines version",
    )
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  program.addCommand(createRenderCommand().exitOverride());

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module) {
  installProcessGuards();
  void runCli();
}
