import {
  DiagnosticEmitter,
  emitDiagnostic,
} from "../diagnostics/index.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { createLexicalScopeAt, type DebugInfoContext } from "./backend.js";
import type { MirScopeIndex, SourceSpan } from "./ids.js";

export interface MirScopeData {
  parent?: MirScopeIndex;
  span: SourceSpan;
}

export interface MirVarDecl {
  name: string;
  scope: MirScopeIndex;
}

export interface MirBody {
  scopes: readonly MirScopeData[];
  varDecls: readonly MirVarDecl[];
}

export type FunctionDebugContext<Scope> =
  | { kind: "regular"; fnMetadata: Scope }
  | { kind: "disabled" }
  | { kind: "without-debug-info" };

export interface MirFunction<Scope> {
  name: string;
  span: SourceSpan;
  mir?: MirBody;
  debugContext: FunctionDebugContext<Scope>;
}

export type MirScopeContext<Scope> = DebugInfoContext<Scope> & {
  diagnostics?: DiagnosticEmitter;
};

type MirScopeSlot<Scope> =
  | { state: "unresolved" }
  | { state: "resolving" }
  | { state: "resolved"; scope: Scope };

/** Indices of the MIR scopes that directly declare at least one variable. */
export const scopesWithVariables = (mir: MirBody): ReadonlySet<MirScopeIndex> =>
  new Set(mir.varDecls.map((decl) => decl.scope));

/**
 * Produces a debug scope for every MIR scope of `fn`. A scope without
 * variables reuses its parent's debug scope, unless that parent is the
 * function itself (arguments live in the function scope and must not be
 * shadowed by body locals). With debug info off the result is all `null`.
 */
export const createMirScopes = <Scope>({
  fn,
  ctx,
}: {
  fn: MirFunction<Scope>;
  ctx: MirScopeContext<Scope>;
}): (Scope | null)[] => {
  const diagnostics = ctx.diagnostics ?? new DiagnosticEmitter();
  const mir = fn.mir;
  if (!mir) {
    return emitDiagnostic({
      ctx: diagnostics,
      code: "DI0002",
      params: { kind: "missing-mir", functionName: fn.name },
      span: fn.span,
    });
  }

  if (fn.debugContext.kind !== "regular") {
    return mir.scopes.map(() => null);
  }

  const fnMetadata = fn.debugContext.fnMetadata;
  const hasVariables = scopesWithVariables(mir);
  const slots: MirScopeSlot<Scope>[] = mir.scopes.map(() => ({
    state: "unresolved",
  }));

  const resolve = (index: MirScopeIndex): Scope => {
    const slot = slots[index];
    if (slot?.state === "resolved") {
      return slot.scope;
    }

    const data = mir.scopes[index];
    if (!data) {
      return emitDiagnostic({
        ctx: diagnostics,
        code: "DI0003",
        params: { kind: "unknown-mir-scope", scope: index },
        span: fn.span,
      });
    }

    if (slot?.state === "resolving") {
      return emitDiagnostic({
        ctx: diagnostics,
        code: "DI0003",
        params: { kind: "cyclic-mir-scope", scope: index },
        span: data.span,
      });
    }

    const scope = resolveSlot(index, data);
    slots[index] = { state: "resolved", scope };
    return scope;
  };

  const resolveSlot = (index: MirScopeIndex, data: MirScopeData): Scope => {
    if (data.parent === undefined) {
      return fnMetadata;
    }

    slots[index] = { state: "resolving" };
    const parentScope = resolve(data.parent);

    if (!hasVariables.has(index) && parentScope !== fnMetadata) {
      incrementCompilerPerfCounter("debuginfo.mir-scopes.elided");
      return parentScope;
    }

    return createLexicalScopeAt(ctx, parentScope, data.span);
  };

  return mir.scopes.map((_, index) => resolve(index));
};
