import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const internalFaultHint: DiagnosticHint = {
  message:
    "This is an internal compiler error; the syntax tree or the scope walker is malformed.",
};

type DiagnosticParamsMap = {
  DI0001:
    | { kind: "scope-stack-mismatch"; depth: number; stackDepth: number }
    | { kind: "scope-stack-underflow" }
    | { kind: "duplicate-scope-map-entry"; nodeId: number };
  DI0002: { kind: "missing-mir"; functionName: string };
  DI0003:
    | { kind: "cyclic-mir-scope"; scope: number }
    | { kind: "unknown-mir-scope"; scope: number };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  DI0001: {
    code: "DI0001",
    message: (params) => {
      switch (params.kind) {
        case "scope-stack-mismatch":
          return `debuginfo: inconsistency in scope management (scope opened at depth ${params.depth} is not on top of the stack, stack depth is ${params.stackDepth})`;
        case "scope-stack-underflow":
          return "debuginfo: inconsistency in scope management (scope stack is empty)";
        case "duplicate-scope-map-entry":
          return `debuginfo: node ${params.nodeId} was assigned a scope twice`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "debuginfo",
    hints: [internalFaultHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DI0001"]>,
  DI0002: {
    code: "DI0002",
    message: (params) =>
      `debuginfo: missing MIR for function '${params.functionName}'`,
    severity: "error",
    phase: "debuginfo",
    hints: [internalFaultHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DI0002"]>,
  DI0003: {
    code: "DI0003",
    message: (params) =>
      params.kind === "cyclic-mir-scope"
        ? `debuginfo: MIR scope ${params.scope} is its own ancestor`
        : `debuginfo: MIR scope ${params.scope} does not exist`,
    severity: "error",
    phase: "debuginfo",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DI0003"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
