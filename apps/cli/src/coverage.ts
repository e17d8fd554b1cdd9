import {
  collectReachableNodeIds,
  type DefMap,
  type FunctionBody,
  type NodeId,
  type ScopeMap,
} from "@dbgscope/compiler/debuginfo/index.js";

export type CoverageReport = {
  complete: boolean;
  reachable: number;
  mapped: number;
  /** Reachable nodes the scope map has no entry for. */
  missing: NodeId[];
  /** Mapped nodes that are not reachable from the function. */
  unexpected: NodeId[];
};

const ascending = (left: number, right: number) => left - right;

export const checkScopeMapCoverage = <Scope>({
  fn,
  defMap,
  scopeMap,
}: {
  fn: FunctionBody;
  defMap: DefMap;
  scopeMap: ScopeMap<Scope>;
}): CoverageReport => {
  const reachable = new Set(collectReachableNodeIds(fn, defMap));
  const missing = Array.from(reachable)
    .filter((id) => !scopeMap.has(id))
    .sort(ascending);
  const unexpected = Array.from(scopeMap.keys())
    .filter((id) => !reachable.has(id))
    .sort(ascending);

  return {
    complete: missing.length === 0 && unexpected.length === 0,
    reachable: reachable.size,
    mapped: scopeMap.size,
    missing,
    unexpected,
  };
};
