import type { NodeId } from "./ids.js";
import type { DefMap, IdentifierPattern, Pattern } from "./syntax.js";

export interface PatternBinding {
  id: NodeId;
  name: string;
}

/**
 * An identifier pattern binds a new local unless name resolution tied it to
 * an enum variant, a unit struct or a constant (`None`, `Unit`, `MAX`).
 */
export const isBindingPattern = (
  pattern: Pattern,
  defMap: DefMap,
): pattern is IdentifierPattern => {
  if (pattern.kind !== "identifier") {
    return false;
  }

  const definition = defMap.get(pattern.id);
  if (!definition) {
    return true;
  }

  switch (definition.kind) {
    case "local":
      return true;
    case "variant":
    case "struct":
    case "const":
      return false;
  }
};

const subpatternsOf = (pattern: Pattern): readonly Pattern[] => {
  switch (pattern.kind) {
    case "identifier":
      return pattern.subpattern ? [pattern.subpattern] : [];
    case "wildcard":
    case "path":
    case "literal":
    case "range":
      return [];
    case "tuple-struct":
      return pattern.subpatterns ?? [];
    case "struct":
      return pattern.fields.map((field) => field.pattern);
    case "tuple":
      return pattern.elements;
    case "box":
    case "ref":
      return [pattern.pattern];
    case "slice":
      return [
        ...pattern.before,
        ...(pattern.middle ? [pattern.middle] : []),
        ...pattern.after,
      ];
  }
};

/** Every name `pattern` binds, left to right. */
export const bindingsOf = (
  pattern: Pattern,
  defMap: DefMap,
): PatternBinding[] => {
  const bindings: PatternBinding[] = [];
  const visit = (current: Pattern): void => {
    if (isBindingPattern(current, defMap)) {
      bindings.push({ id: current.id, name: current.name });
    }
    subpatternsOf(current).forEach(visit);
  };
  visit(pattern);
  return bindings;
};
