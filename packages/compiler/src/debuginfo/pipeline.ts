import {
  DiagnosticEmitter,
  type Diagnostic,
} from "../diagnostics/index.js";
import {
  diffCompilerPerfCounters,
  logCompilerPerfSummary,
  snapshotCompilerPerfCounters,
} from "../perf.js";
import { createFunctionScopeAt, type DebugInfoContext } from "./backend.js";
import {
  createMirScopes,
  type FunctionDebugContext,
  type MirBody,
} from "./mir-scopes.js";
import { createScopeMap, type ScopeMap } from "./scope-map.js";
import type { DefMap, FunctionBody } from "./syntax.js";

export interface DebugInfoPipelineOptions<Scope> {
  fn: FunctionBody;
  ctx: DebugInfoContext<Scope>;
  /** When false no scope is created and MIR scopes resolve to `null`. */
  debugInfo: boolean;
  defMap?: DefMap;
  mir?: MirBody;
  /** Resolve MIR scopes too; the function must then carry MIR. */
  resolveMirScopes?: boolean;
}

export interface DebugInfoPipelineResult<Scope> {
  fnScope?: Scope;
  scopeMap?: ScopeMap<Scope>;
  mirScopes?: (Scope | null)[];
  diagnostics: readonly Diagnostic[];
}

export const debugInfoPipeline = <Scope>({
  fn,
  ctx,
  debugInfo,
  defMap = new Map(),
  mir,
  resolveMirScopes = false,
}: DebugInfoPipelineOptions<Scope>): DebugInfoPipelineResult<Scope> => {
  const diagnostics = new DiagnosticEmitter();
  const before = snapshotCompilerPerfCounters();
  let success = false;

  const resolveMir = (
    debugContext: FunctionDebugContext<Scope>,
  ): (Scope | null)[] | undefined =>
    resolveMirScopes
      ? createMirScopes<Scope>({
          fn: { name: fn.name, span: fn.span, mir, debugContext },
          ctx: { ...ctx, diagnostics },
        })
      : undefined;

  try {
    if (!debugInfo) {
      const mirScopes = resolveMir({ kind: "disabled" });
      success = true;
      return { mirScopes, diagnostics: diagnostics.diagnostics };
    }

    const fnScope = createFunctionScopeAt(ctx, fn.name, fn.span);
    const scopeMap = createScopeMap<Scope>({
      fn,
      fnScope,
      ctx: { ...ctx, defMap, diagnostics },
    });
    const mirScopes = resolveMir({ kind: "regular", fnMetadata: fnScope });

    success = true;
    return {
      fnScope,
      scopeMap,
      mirScopes,
      diagnostics: diagnostics.diagnostics,
    };
  } finally {
    logCompilerPerfSummary({
      functionName: fn.name,
      success,
      counters: diffCompilerPerfCounters({
        before,
        after: snapshotCompilerPerfCounters(),
      }),
      diagnostics: diagnostics.diagnostics.length,
    });
  }
};
