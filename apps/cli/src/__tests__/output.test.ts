import type { RecordedScope } from "@dbgscope/compiler/debuginfo/index.js";
import { describe, expect, it, vi } from "vitest";
import { mirScopeIds, printJson, scopeMapIds, stringifyOutput } from "../output.js";

const scope = (id: number): RecordedScope => ({
  id,
  kind: "lexical-block",
  file: "main.rs",
  line: 1,
  column: 0,
});

describe("cli output", () => {
  it("renders scope maps as objects keyed by node id", () => {
    const report = {
      function: "main",
      scopeMap: new Map([
        [0, 0],
        [4, 1],
      ]),
      coverage: undefined,
    };

    expect(JSON.parse(stringifyOutput(report))).toEqual({
      function: "main",
      scopeMap: { "0": 0, "4": 1 },
    });
  });

  it("orders scope map entries by node id", () => {
    const ids = scopeMapIds(
      new Map([
        [7, scope(2)],
        [0, scope(0)],
        [3, scope(1)],
      ]),
    );
    expect(Array.from(ids.entries())).toEqual([
      [0, 0],
      [3, 1],
      [7, 2],
    ]);
  });

  it("keeps null slots of an unresolved MIR scope table", () => {
    expect(mirScopeIds([scope(0), null, scope(5)])).toEqual([0, null, 5]);
  });

  it("prints JSON with two space indentation", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      printJson({ mirScopes: [null] });
      expect(logSpy).toHaveBeenCalledWith('{\n  "mirScopes": [\n    null\n  ]\n}');
    } finally {
      logSpy.mockRestore();
    }
  });
});
