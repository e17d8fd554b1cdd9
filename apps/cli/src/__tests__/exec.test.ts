import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DbgscopeConfig } from "../config/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => resolve(__dirname, "fixtures", name);

const configFor = (overrides: Partial<DbgscopeConfig>): DbgscopeConfig => ({
  input: fixture("shadowing.json"),
  emit: ["scope-map"],
  verifyCoverage: false,
  color: false,
  ...overrides,
});

/** Loads `exec` with perf counters pinned off, whatever the outer environment says. */
const loadExec = async () => {
  vi.stubEnv("DBGSCOPE_COMPILER_PERF", "0");
  vi.resetModules();
  const { exec } = await import("../exec.js");
  return exec;
};

const captureConsole = () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  return {
    log,
    error,
    printed: (): unknown => JSON.parse(String(log.mock.calls[0]?.[0])),
  };
};

describe("exec", () => {
  const originalExitCode = process.exitCode;
  let workdir: string | undefined;

  beforeEach(() => {
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = originalExitCode;
    if (workdir) {
      rmSync(workdir, { recursive: true, force: true });
      workdir = undefined;
    }
  });

  it("prints the scope map of a function with a shadowed local", async () => {
    const { error, printed } = captureConsole();
    const exec = await loadExec();
    await exec(configFor({}));

    expect(printed()).toEqual({
      function: "main",
      debugInfo: true,
      scopeMap: {
        "0": 0,
        "1": 1,
        "2": 1,
        "3": 1,
        "4": 1,
        "5": 1,
        "6": 1,
        "7": 1,
        "8": 2,
        "9": 2,
        "10": 2,
        "11": 3,
        "12": 3,
      },
    });
    expect(error).not.toHaveBeenCalled();
  });

  it("prints the scope tree, the MIR scope table and coverage", async () => {
    const { printed } = captureConsole();
    const exec = await loadExec();
    await exec(
      configFor({
        emit: ["scope-tree", "mir-scopes"],
        verifyCoverage: true,
      }),
    );

    expect(printed()).toEqual({
      function: "main",
      debugInfo: true,
      scopeTree: [
        {
          id: 0,
          kind: "function",
          name: "main",
          location: "main.rs:1:0",
          children: [
            {
              id: 1,
              kind: "lexical-block",
              location: "main.rs:1:10",
              children: [
                {
                  id: 2,
                  kind: "lexical-block",
                  location: "main.rs:3:4",
                  children: [
                    {
                      id: 3,
                      kind: "lexical-block",
                      location: "main.rs:4:12",
                      children: [],
                    },
                  ],
                },
              ],
            },
            {
              id: 4,
              kind: "lexical-block",
              location: "main.rs:1:10",
              children: [
                {
                  id: 5,
                  kind: "lexical-block",
                  location: "main.rs:4:8",
                  children: [],
                },
              ],
            },
          ],
        },
      ],
      mirScopes: [0, 4, 4, 5],
      coverage: {
        complete: true,
        reachable: 13,
        mapped: 13,
        missing: [],
        unexpected: [],
      },
    });
    expect(process.exitCode).toBe(originalExitCode);
  });

  it("resolves every MIR scope to null when debug info is off", async () => {
    const { printed } = captureConsole();
    const document = JSON.parse(readFileSync(fixture("shadowing.json"), "utf8"));
    workdir = mkdtempSync(join(tmpdir(), "dbgscope-exec-"));
    const input = join(workdir, "nodebug.json");
    writeFileSync(input, JSON.stringify({ ...document, debugInfo: "none" }));

    const exec = await loadExec();
    await exec(configFor({ input, emit: ["scope-map", "mir-scopes"] }));

    expect(printed()).toEqual({
      function: "main",
      debugInfo: false,
      mirScopes: [null, null, null, null],
    });
  });

  it("formats scope faults and exits with status 1", async () => {
    const { log, error } = captureConsole();
    const exec = await loadExec();
    await expect(
      exec(configFor({ input: fixture("cyclic-mir.json"), emit: ["mir-scopes"] })),
    ).rejects.toThrow("exit 1");

    expect(log).not.toHaveBeenCalled();
    expect(String(error.mock.calls[0]?.[0]).split("\n")).toEqual([
      "f.rs:1:8 ERROR [debuginfo] DI0003: debuginfo: MIR scope 0 is its own ancestor",
      "  |",
      "1 | fn f() {}",
      "  |        ^^ debuginfo: MIR scope 0 is its own ancestor",
    ]);
  });

  it("names the malformed value of an invalid input", async () => {
    const { error } = captureConsole();
    workdir = mkdtempSync(join(tmpdir(), "dbgscope-exec-"));
    const input = join(workdir, "empty.json");
    writeFileSync(input, "{}");

    const exec = await loadExec();
    await expect(exec(configFor({ input }))).rejects.toThrow("exit 1");

    expect(error).toHaveBeenCalledWith(
      `invalid input ${input}: $.function: missing required field`,
    );
  });

  const writeMacroDocument = (): string => {
    workdir = mkdtempSync(join(tmpdir(), "dbgscope-exec-"));
    const input = join(workdir, "expanded.json");
    const macroSpan = { file: "macro.rs", start: 0, end: 5 };
    writeFileSync(
      input,
      JSON.stringify({
        files: { "f.rs": "fn f() {}\n" },
        function: {
          id: 0,
          name: "f",
          span: { file: "f.rs", start: 0, end: 9 },
          body: {
            id: 1,
            span: { start: 7, end: 9 },
            value: {
              exprKind: "block",
              id: 2,
              span: macroSpan,
              block: { id: 3, span: macroSpan },
            },
          },
        },
      }),
    );
    return input;
  };

  it("reads a second source file named by a nested span from disk", async () => {
    const { error, printed } = captureConsole();
    const input = writeMacroDocument();
    writeFileSync(join(dirname(input), "macro.rs"), "{ 1 }\n");

    const exec = await loadExec();
    await exec(configFor({ input, emit: ["scope-tree"] }));

    expect(printed()).toEqual({
      function: "f",
      debugInfo: true,
      scopeTree: [
        {
          id: 0,
          kind: "function",
          name: "f",
          location: "f.rs:1:0",
          children: [
            {
              id: 1,
              kind: "lexical-block",
              location: "f.rs:1:7",
              children: [
                {
                  id: 2,
                  kind: "lexical-block",
                  location: "macro.rs:1:0",
                  children: [],
                },
              ],
            },
          ],
        },
      ],
    });
    expect(error).not.toHaveBeenCalled();
  });

  it("names the first span of a source file that cannot be found", async () => {
    const { error } = captureConsole();
    const input = writeMacroDocument();

    const exec = await loadExec();
    await expect(exec(configFor({ input }))).rejects.toThrow("exit 1");

    expect(error).toHaveBeenCalledWith(
      `invalid input ${input}: $.function.body.value.span: source file "macro.rs" is neither embedded nor found beside the document`,
    );
  });
});
