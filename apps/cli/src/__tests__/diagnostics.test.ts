import { resolve } from "node:path";
import type { Diagnostic } from "@dbgscope/compiler/diagnostics/index.js";
import { diagnosticFromCode } from "@dbgscope/compiler/diagnostics/index.js";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic } from "../diagnostics.js";

const source = "fn main() {\n    let x = 1;\n}\n";

const mismatch = (): Diagnostic =>
  diagnosticFromCode({
    code: "DI0001",
    params: { kind: "scope-stack-mismatch", depth: 2, stackDepth: 3 },
    span: { file: "main.rs", start: 16, end: 26 },
  });

describe("formatCliDiagnostic", () => {
  it("renders the location, source snippet and hints", () => {
    const formatted = formatCliDiagnostic(mismatch(), {
      color: false,
      sources: { "main.rs": source },
    });

    const message =
      "debuginfo: inconsistency in scope management (scope opened at depth 2 is not on top of the stack, stack depth is 3)";
    expect(formatted.split("\n")).toEqual([
      `main.rs:2:5 ERROR [debuginfo] DI0001: ${message}`,
      "  |",
      "2 |     let x = 1;",
      `  |     ^^^^^^^^^^ ${message}`,
      "hint: This is an internal compiler error; the syntax tree or the scope walker is malformed.",
    ]);
  });

  it("falls back to the raw span when the source is unavailable", () => {
    const missing = resolve("does-not-exist.rs");
    const diagnostic: Diagnostic = {
      code: "DI0002",
      message: "debuginfo: missing MIR for function 'f'",
      severity: "error",
      span: { file: missing, start: 3, end: 7 },
    };

    expect(formatCliDiagnostic(diagnostic, { color: false })).toBe(
      `${missing}:3-7 ERROR DI0002: debuginfo: missing MIR for function 'f'`,
    );
  });

  it("colors the severity and code when enabled", () => {
    const formatted = formatCliDiagnostic(mismatch(), {
      sources: { "main.rs": source },
    });
    const header = formatted.split("\n")[0];

    expect(header).toContain("\u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m");
    expect(header).toContain("\u001B[35mDI0001\u001B[0m");
  });
});
