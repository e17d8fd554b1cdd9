import { afterEach, describe, expect, it, vi } from "vitest";
import type { MirBody } from "../debuginfo/mir-scopes.js";
import { offsetLocator } from "../debuginfo/__tests__/helpers.js";
import { createSyntaxBuilder } from "../debuginfo/__tests__/syntax-builder.js";
import { parsePerfFlag } from "../perf.js";

const PERF_ENV = "DBGSCOPE_COMPILER_PERF";

/** Loads a fresh module graph so the perf flag is read again. */
const loadCompiler = async (flag: string) => {
  vi.stubEnv(PERF_ENV, flag);
  vi.resetModules();
  const perf = await import("../perf.js");
  const debuginfo = await import("../debuginfo/index.js");
  return { perf, debuginfo };
};

const shadowingFunction = () => {
  const b = createSyntaxBuilder();
  return b.fn(
    "main",
    [],
    b.block([
      b.local(b.bind("x"), b.lit("1")),
      b.stmt(b.blockExpr(b.block([b.local(b.bind("x"), b.lit("2"))]))),
    ]),
  );
};

const span = { file: "test.rs", start: 0, end: 1 };

/** Scope 2 declares nothing and sits below a lexical scope, so it is elided. */
const mirWithElidedScope: MirBody = {
  scopes: [{ span }, { parent: 0, span }, { parent: 1, span }],
  varDecls: [{ name: "x", scope: 1 }],
};

describe("compiler perf counters", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it("accepts the usual truthy spellings", () => {
    expect(["1", "true", " YES "].map(parsePerfFlag)).toEqual([
      true,
      true,
      true,
    ]);
    expect([undefined, "", "0", "off"].map(parsePerfFlag)).toEqual([
      false,
      false,
      false,
      false,
    ]);
  });

  it("counts lexical blocks, artificial scopes and elided MIR scopes", async () => {
    const { perf, debuginfo } = await loadCompiler("1");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const before = perf.snapshotCompilerPerfCounters();

    debuginfo.debugInfoPipeline({
      fn: shadowingFunction(),
      ctx: {
        backend: new debuginfo.RecordingDebugInfoBackend(),
        locator: offsetLocator,
      },
      debugInfo: true,
      mir: mirWithElidedScope,
      resolveMirScopes: true,
    });

    const counters = {
      "debuginfo.artificial-scopes": 1,
      "debuginfo.lexical-blocks": 4,
      "debuginfo.mir-scopes.elided": 1,
    };
    expect(perf.isCompilerPerfEnabled()).toBe(true);
    expect(
      perf.diffCompilerPerfCounters({
        before,
        after: perf.snapshotCompilerPerfCounters(),
      }),
    ).toEqual(counters);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      `[dbgscope:debuginfo:perf] ${JSON.stringify({
        functionName: "main",
        success: true,
        diagnostics: 0,
        counters,
      })}`,
    );
  });

  it("logs a failed run with its diagnostics count", async () => {
    const { debuginfo } = await loadCompiler("true");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const b = createSyntaxBuilder();

    expect(() =>
      debuginfo.debugInfoPipeline({
        fn: b.fn("f", [], b.block([])),
        ctx: {
          backend: new debuginfo.RecordingDebugInfoBackend(),
          locator: offsetLocator,
        },
        debugInfo: true,
        resolveMirScopes: true,
      }),
    ).toThrow("missing MIR for function 'f'");

    expect(errorSpy).toHaveBeenCalledWith(
      '[dbgscope:debuginfo:perf] {"functionName":"f","success":false,"diagnostics":1,"counters":{"debuginfo.lexical-blocks":1}}',
    );
  });

  it("records and logs nothing when switched off", async () => {
    const { perf, debuginfo } = await loadCompiler("0");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    perf.incrementCompilerPerfCounter("debuginfo.lexical-blocks", 2);
    debuginfo.debugInfoPipeline({
      fn: shadowingFunction(),
      ctx: {
        backend: new debuginfo.RecordingDebugInfoBackend(),
        locator: offsetLocator,
      },
      debugInfo: true,
    });

    expect(perf.isCompilerPerfEnabled()).toBe(false);
    expect(perf.snapshotCompilerPerfCounters().size).toBe(0);
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
