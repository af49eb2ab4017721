import type { CommanderError } from "commander";

/** Codes for which Commander has already written its own message or help. */
const SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.error",
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.optionMissingArgument",
  "commander.unknownCommand",
  "commander.unknownOption",
  "commander.version",
]);

export function commanderAlreadyRendered(error: CommanderError): boolean {
  if (!error.code) {
    return false;
  }

  return (
    SELF_RENDERED_CODES.has(error.code) ||
    (error.code.startsWith("commander.") && error.message.startsWith("error:"))
  );
}
