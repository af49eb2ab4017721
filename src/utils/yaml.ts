import { YAMLException } from "js-yaml";

export function isYamlException(error: unknown): error is YAMLException {
  return error instanceof YAMLException;
}
