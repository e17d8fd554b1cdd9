import type {
  NodeId,
  RecordedScope,
  ScopeMap,
  ScopeTreeNode,
} from "@dbgscope/compiler/debuginfo/index.js";
import type { CoverageReport } from "./coverage.js";

/** What one CLI run prints. Only the requested sections are present. */
export type ScopeReport = {
  function: string;
  debugInfo: boolean;
  scopeMap?: Map<NodeId, number>;
  scopeTree?: ScopeTreeNode[];
  mirScopes?: (number | null)[];
  coverage?: CoverageReport;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Scope maps become objects keyed by node id; absent sections are dropped. */
const normalizeOutput = (value: unknown): unknown => {
  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value.entries()).map(([key, entry]) => [
        String(key),
        normalizeOutput(entry),
      ]),
    );
  }

  if (Array.isArray(value)) {
    return value.map(normalizeOutput);
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .map(([key, entry]) => [key, normalizeOutput(entry)]),
    );
  }

  return value;
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput(value), undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};

/** Node id to recorded scope id, ordered by node id. */
export const scopeMapIds = (
  scopeMap: ScopeMap<RecordedScope>,
): Map<NodeId, number> =>
  new Map(
    Array.from(scopeMap.entries())
      .sort(([left], [right]) => left - right)
      .map(([node, scope]) => [node, scope.id]),
  );

export const mirScopeIds = (
  scopes: readonly (RecordedScope | null)[],
): (number | null)[] => scopes.map((scope) => scope?.id ?? null);
