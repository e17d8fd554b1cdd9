import { describe, expect, it } from "vitest";
import { getConfigFromCli } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("getConfigFromCli", () => {
  it("emits the scope map of ./function.json by default", () => {
    const config = runWithArgv(["node", "dbgscope"]);
    expect(config).toEqual({
      input: "./function.json",
      emit: ["scope-map"],
      verifyCoverage: false,
      color: true,
    });
  });

  it("collects the requested outputs in a fixed order", () => {
    const config = runWithArgv([
      "node",
      "dbgscope",
      "--emit-mir-scopes",
      "fn.json",
      "--emit-scope-tree",
    ]);
    expect(config.input).toBe("fn.json");
    expect(config.emit).toEqual(["scope-tree", "mir-scopes"]);
  });

  it("supports --verify-coverage and --no-color", () => {
    const config = runWithArgv([
      "node",
      "dbgscope",
      "fn.json",
      "--verify-coverage",
      "--no-color",
    ]);
    expect(config.verifyCoverage).toBe(true);
    expect(config.color).toBe(false);
    expect(config.emit).toEqual(["scope-map"]);
  });
});
