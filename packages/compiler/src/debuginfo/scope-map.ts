import {
  DiagnosticEmitter,
  emitDiagnostic,
} from "../diagnostics/index.js";
import type { DebugInfoContext } from "./backend.js";
import type { NodeId, SourceSpan } from "./ids.js";
import { bindingsOf, isBindingPattern } from "./patterns.js";
import { ScopeStack } from "./scope-stack.js";
import type {
  Block,
  DefMap,
  Expression,
  FunctionBody,
  MatchArm,
  Pattern,
  Statement,
} from "./syntax.js";

export type ScopeMap<Scope> = ReadonlyMap<NodeId, Scope>;

export type ScopeMapContext<Scope> = DebugInfoContext<Scope> & {
  defMap: DefMap;
  diagnostics?: DiagnosticEmitter;
};

type WalkContext<Scope> = {
  stack: ScopeStack<Scope>;
  defMap: DefMap;
  record: (id: NodeId, span: SourceSpan) => void;
};

/**
 * Maps every node of `fn` to the debug scope that contains it. Nodes are
 * visited in execution order so that a binding only becomes visible, and may
 * only open an artificial scope, once its declaration has been reached.
 *
 * `fnScope` is the function's own scope, created by the caller.
 */
export const createScopeMap = <Scope>({
  fn,
  fnScope,
  ctx,
}: {
  fn: FunctionBody;
  fnScope: Scope;
  ctx: ScopeMapContext<Scope>;
}): ScopeMap<Scope> => {
  const diagnostics = ctx.diagnostics ?? new DiagnosticEmitter();
  const stack = new ScopeStack({ ...ctx, diagnostics, span: fn.span }, fnScope);
  const scopeMap = new Map<NodeId, Scope>();

  const record = (id: NodeId, span: SourceSpan): void => {
    if (scopeMap.has(id)) {
      emitDiagnostic({
        ctx: diagnostics,
        code: "DI0001",
        params: { kind: "duplicate-scope-map-entry", nodeId: id },
        span,
      });
    }
    scopeMap.set(id, stack.top());
  };

  const walk: WalkContext<Scope> = { stack, defMap: ctx.defMap, record };

  record(fn.id, fn.span);

  // Parameters live in the function scope itself. Registering their names
  // lets body locals that reuse them get an artificial scope.
  for (const param of fn.params) {
    for (const binding of bindingsOf(param.pattern, ctx.defMap)) {
      stack.push({ scope: fnScope, name: binding.name });
      record(binding.id, param.pattern.span);
    }
  }

  // The body gets its own block, as C compilers emit one.
  stack.withNewScope(fn.body.span, () => walkBlock(fn.body, walk));

  return scopeMap;
};

const walkBlock = <Scope>(block: Block, walk: WalkContext<Scope>): void => {
  walk.record(block.id, block.span);

  for (const stmt of block.statements) {
    walk.record(stmt.id, stmt.span);
    walkStatement(stmt, walk);
  }

  if (block.value) {
    walkExpression(block.value, walk);
  }
};

const walkStatement = <Scope>(
  stmt: Statement,
  walk: WalkContext<Scope>,
): void => {
  switch (stmt.kind) {
    case "local":
      walk.record(stmt.local.id, stmt.local.span);
      walkPattern(stmt.local.pattern, walk);
      if (stmt.local.initializer) {
        walkExpression(stmt.local.initializer, walk);
      }
      return;
    case "expr":
      walkExpression(stmt.expr, walk);
      return;
    case "item":
      return;
  }
};

const walkNestedBlock = <Scope>(block: Block, walk: WalkContext<Scope>): void =>
  walk.stack.withNewScope(block.span, () => walkBlock(block, walk));

const walkMatchArm = <Scope>(arm: MatchArm, walk: WalkContext<Scope>): void => {
  // Arms may rebind the same names, so each one gets a scope of its own that
  // starts at its (first) pattern.
  walk.stack.withNewScope(arm.patterns[0].span, () => {
    arm.patterns.forEach((pattern) => walkPattern(pattern, walk));
    if (arm.guard) {
      walkExpression(arm.guard, walk);
    }
    walkExpression(arm.body, walk);
  });
};

const walkExpression = <Scope>(
  expr: Expression,
  walk: WalkContext<Scope>,
): void => {
  walk.record(expr.id, expr.span);
  const visit = (child: Expression): void => walkExpression(child, walk);

  switch (expr.exprKind) {
    case "literal":
    case "path":
    case "continue":
      return;
    case "break":
    case "return":
      if (expr.value) visit(expr.value);
      return;
    case "cast":
    case "type-ascription":
    case "address-of":
    case "box":
    case "unary":
      visit(expr.expr);
      return;
    case "field":
    case "tuple-field":
      visit(expr.target);
      return;
    case "assign-op":
    case "assign":
      visit(expr.target);
      visit(expr.value);
      return;
    case "index":
      visit(expr.target);
      visit(expr.index);
      return;
    case "binary":
      visit(expr.left);
      visit(expr.right);
      return;
    case "repeat":
      visit(expr.value);
      visit(expr.count);
      return;
    case "array":
    case "tuple":
      expr.elements.forEach(visit);
      return;
    case "if":
      visit(expr.condition);
      walkNestedBlock(expr.then, walk);
      if (expr.otherwise) visit(expr.otherwise);
      return;
    case "while":
      visit(expr.condition);
      walkNestedBlock(expr.body, walk);
      return;
    case "loop":
      walkNestedBlock(expr.body, walk);
      return;
    case "block":
      walkNestedBlock(expr.block, walk);
      return;
    case "closure":
      walk.stack.withNewScope(expr.body.span, () => {
        expr.params.forEach((param) => walkPattern(param.pattern, walk));
        walkBlock(expr.body, walk);
      });
      return;
    case "call":
      visit(expr.callee);
      expr.args.forEach(visit);
      return;
    case "method-call":
      visit(expr.receiver);
      expr.args.forEach(visit);
      return;
    case "match":
      visit(expr.discriminant);
      expr.arms.forEach((arm) => walkMatchArm(arm, walk));
      return;
    case "struct":
      expr.fields.forEach((field) => visit(field.value));
      if (expr.base) visit(expr.base);
      return;
    case "inline-asm":
      expr.outputs.forEach(visit);
      expr.inputs.forEach(visit);
      return;
  }
};

const walkPattern = <Scope>(
  pattern: Pattern,
  walk: WalkContext<Scope>,
): void => {
  const visit = (child: Pattern): void => walkPattern(child, walk);

  switch (pattern.kind) {
    case "identifier":
      if (isBindingPattern(pattern, walk.defMap)) {
        walk.stack.bindName(pattern.name, pattern.span);
      }
      // Recorded after the push so the binding belongs to its own scope.
      walk.record(pattern.id, pattern.span);
      if (pattern.subpattern) visit(pattern.subpattern);
      return;
    case "wildcard":
    case "path":
      walk.record(pattern.id, pattern.span);
      return;
    case "tuple-struct":
      walk.record(pattern.id, pattern.span);
      pattern.subpatterns?.forEach(visit);
      return;
    case "struct":
      walk.record(pattern.id, pattern.span);
      pattern.fields.forEach((field) => visit(field.pattern));
      return;
    case "tuple":
      walk.record(pattern.id, pattern.span);
      pattern.elements.forEach(visit);
      return;
    case "box":
    case "ref":
      walk.record(pattern.id, pattern.span);
      visit(pattern.pattern);
      return;
    case "literal":
      walk.record(pattern.id, pattern.span);
      walkExpression(pattern.expr, walk);
      return;
    case "range":
      walk.record(pattern.id, pattern.span);
      walkExpression(pattern.start, walk);
      walkExpression(pattern.end, walk);
      return;
    case "slice":
      walk.record(pattern.id, pattern.span);
      pattern.before.forEach(visit);
      if (pattern.middle) visit(pattern.middle);
      pattern.after.forEach(visit);
      return;
  }
};
