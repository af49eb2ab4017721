import { describe, expect, it } from "@jest/globals";

import { stack } from "../../../src/logs/builders.js";
import { renderStack } from "../../../src/render/blocks/stack.js";
import { createRenderContext } from "../../../src/render/context.js";

describe("renderStack", () => {
  const context = createRenderContext("error");

  it("renders traces and causes inside one bracket", () => {
    const block = stack({
      message: "boom",
      traces: [
        { location: "main.ts:1:1", codePath: "main", message: "called" },
        {},
      ],
      cause: stack({ message: "root", traces: [{ location: "lib.ts:2:2" }] }),
    });

    expect(renderStack(block, context)).toEqual([
      "╭─▶ boom",
      "│   at main.ts:1:1(main) - called",
      "│   at <unknown location>",
      "│",
      "├───▶ Caused by: root",
      "│   at lib.ts:2:2",
      "╰─",
    ]);
  });

  it("numbers traces across the cause chain", () => {
    const block = stack({
      message: "boom\nagain",
      showNumbers: true,
      traces: [{ location: "a.ts" }, { location: "b.ts" }],
      cause: stack({ showNumbers: true, traces: [{ location: "c.ts" }] }),
    });

    expect(renderStack(block, context)).toEqual([
      "╭─▶ boom",
      "│   again",
      "│  [3] a.ts",
      "│  [2] b.ts",
      "│",
      "├───▶ Caused by:",
      "│  [1] c.ts",
      "╰─",
    ]);
  });

  it("draws an empty stack as a bare bracket", () => {
    expect(renderStack(stack(), context)).toEqual(["╭─", "╰─"]);
  });
});
