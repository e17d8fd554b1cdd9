export type EmitTarget = "scope-map" | "scope-tree" | "mir-scopes";

export type DbgscopeConfig = {
  /** Path to the JSON function description. */
  input: string;
  emit: EmitTarget[];
  /** Compare the scope map against every node reachable from the function. */
  verifyCoverage: boolean;
  color: boolean;
};
