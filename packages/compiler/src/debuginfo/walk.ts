import type { NodeId } from "./ids.js";
import { bindingsOf } from "./patterns.js";
import type {
  Block,
  DefMap,
  Expression,
  FunctionBody,
  Pattern,
  Statement,
} from "./syntax.js";

export type SyntaxVisitor = {
  onEnterBlock?: (block: Block) => void;
  onEnterStatement?: (stmt: Statement) => void;
  onEnterExpression?: (expr: Expression) => void;
  onEnterPattern?: (pattern: Pattern) => void;
};

export const walkPattern = (pattern: Pattern, visitor: SyntaxVisitor): void => {
  visitor.onEnterPattern?.(pattern);
  switch (pattern.kind) {
    case "identifier":
      if (pattern.subpattern) walkPattern(pattern.subpattern, visitor);
      break;
    case "wildcard":
    case "path":
      break;
    case "tuple-struct":
      pattern.subpatterns?.forEach((sub) => walkPattern(sub, visitor));
      break;
    case "struct":
      pattern.fields.forEach((field) => walkPattern(field.pattern, visitor));
      break;
    case "tuple":
      pattern.elements.forEach((sub) => walkPattern(sub, visitor));
      break;
    case "box":
    case "ref":
      walkPattern(pattern.pattern, visitor);
      break;
    case "literal":
      walkExpression(pattern.expr, visitor);
      break;
    case "range":
      walkExpression(pattern.start, visitor);
      walkExpression(pattern.end, visitor);
      break;
    case "slice":
      pattern.before.forEach((sub) => walkPattern(sub, visitor));
      if (pattern.middle) walkPattern(pattern.middle, visitor);
      pattern.after.forEach((sub) => walkPattern(sub, visitor));
      break;
  }
};

export const walkBlock = (block: Block, visitor: SyntaxVisitor): void => {
  visitor.onEnterBlock?.(block);
  for (const stmt of block.statements) {
    visitor.onEnterStatement?.(stmt);
    switch (stmt.kind) {
      case "local":
        walkPattern(stmt.local.pattern, visitor);
        if (stmt.local.initializer) {
          walkExpression(stmt.local.initializer, visitor);
        }
        break;
      case "expr":
        walkExpression(stmt.expr, visitor);
        break;
      case "item":
        break;
    }
  }
  if (block.value) walkExpression(block.value, visitor);
};

export const walkExpression = (
  expr: Expression,
  visitor: SyntaxVisitor,
): void => {
  visitor.onEnterExpression?.(expr);
  const visit = (child: Expression) => walkExpression(child, visitor);

  switch (expr.exprKind) {
    case "literal":
    case "path":
    case "continue":
      break;
    case "break":
    case "return":
      if (expr.value) visit(expr.value);
      break;
    case "cast":
    case "type-ascription":
    case "address-of":
    case "box":
    case "unary":
      visit(expr.expr);
      break;
    case "field":
    case "tuple-field":
      visit(expr.target);
      break;
    case "assign-op":
    case "assign":
      visit(expr.target);
      visit(expr.value);
      break;
    case "index":
      visit(expr.target);
      visit(expr.index);
      break;
    case "binary":
      visit(expr.left);
      visit(expr.right);
      break;
    case "repeat":
      visit(expr.value);
      visit(expr.count);
      break;
    case "array":
    case "tuple":
      expr.elements.forEach(visit);
      break;
    case "if":
      visit(expr.condition);
      walkBlock(expr.then, visitor);
      if (expr.otherwise) visit(expr.otherwise);
      break;
    case "while":
      visit(expr.condition);
      walkBlock(expr.body, visitor);
      break;
    case "loop":
      walkBlock(expr.body, visitor);
      break;
    case "block":
      walkBlock(expr.block, visitor);
      break;
    case "closure":
      expr.params.forEach((param) => walkPattern(param.pattern, visitor));
      walkBlock(expr.body, visitor);
      break;
    case "call":
      visit(expr.callee);
      expr.args.forEach(visit);
      break;
    case "method-call":
      visit(expr.receiver);
      expr.args.forEach(visit);
      break;
    case "match":
      visit(expr.discriminant);
      for (const arm of expr.arms) {
        arm.patterns.forEach((pattern) => walkPattern(pattern, visitor));
        if (arm.guard) visit(arm.guard);
        visit(arm.body);
      }
      break;
    case "struct":
      expr.fields.forEach((field) => visit(field.value));
      if (expr.base) visit(expr.base);
      break;
    case "inline-asm":
      expr.outputs.forEach(visit);
      expr.inputs.forEach(visit);
      break;
  }
};

/**
 * Node ids a scope map for `fn` must cover. Parameters contribute only the
 * ids of the names they bind. Ids appear once per occurrence in the tree, so
 * a malformed tree that reuses an id shows up as a duplicate.
 */
export const collectReachableNodeIds = (
  fn: FunctionBody,
  defMap: DefMap,
): NodeId[] => {
  const ids: NodeId[] = [fn.id];
  fn.params.forEach((param) =>
    bindingsOf(param.pattern, defMap).forEach((binding) => ids.push(binding.id)),
  );

  walkBlock(fn.body, {
    onEnterBlock: (block) => ids.push(block.id),
    onEnterStatement: (stmt) => {
      ids.push(stmt.id);
      if (stmt.kind === "local") ids.push(stmt.local.id);
    },
    onEnterExpression: (expr) => ids.push(expr.id),
    onEnterPattern: (pattern) => ids.push(pattern.id),
  });

  return ids;
};
