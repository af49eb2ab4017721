import { join } from "node:path";

import { describe, expect, jest, test } from "@jest/globals";

import { RenderSettingsError } from "../../../src/configs/render/errors.js";
import { loadRenderSettings } from "../../../src/configs/render/loader.js";

function missingFile(): never {
  const error = new Error("missing") as NodeJS.ErrnoException;
  error.code = "ENOENT";
  throw error;
}

describe("loadRenderSettings", () => {
  test("falls back to defaults when diaglines.yaml is missing", () => {
    const settings = loadRenderSettings({
      root: "/repo",
      readFile: missingFile,
    });

    expect(settings).toEqual({
      glyphs: "unicode",
      color: "auto",
      contextLines: 0,
    });
  });

  test("reads diaglines.yaml from the root", () => {
    const readFile = jest.fn(
      (_path: string) => "glyphs: ascii\ncontextLines: 2\n",
    );

    const settings = loadRenderSettings({ root: "/repo", readFile });

    expect(readFile).toHaveBeenCalledWith(join("/repo", "diaglines.yaml"));
    expect(settings).toEqual({
      glyphs: "ascii",
      color: "auto",
      contextLines: 2,
    });
  });

  test("prefers an explicit file path", () => {
    const readFile = jest.fn((_path: string) => "color: never\n");

    const settings = loadRenderSettings({
      root: "/repo",
      filePath: "/elsewhere/render.yaml",
      readFile,
    });

    expect(readFile).toHaveBeenCalledWith("/elsewhere/render.yaml");
    expect(settings.color).toBe("never");
  });

  test("treats an empty file as defaults", () => {
    const settings = loadRenderSettings({ root: "/repo", readFile: () => "" });

    expect(settings.glyphs).toBe("unicode");
  });

  test("throws when a value is invalid", () => {
    expect(() =>
      loadRenderSettings({
        root: "/repo",
        readFile: () => "color: sometimes\n",
      }),
    ).toThrow(RenderSettingsError);
    expect(() =>
      loadRenderSettings({
        root: "/repo",
        readFile: () => "contextLines: -1\n",
      }),
    ).toThrow(
      `Invalid render settings (${join("/repo", "diaglines.yaml")}): contextLines: Number must be greater than or equal to 0`,
    );
  });

  test("throws on malformed YAML", () => {
    expect(() =>
      loadRenderSettings({ root: "/repo", readFile: () => "glyphs: [" }),
    ).toThrow(/^Invalid render settings \(.*diaglines\.yaml\): YAML error/u);
  });
});
