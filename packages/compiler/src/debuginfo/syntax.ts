import type { NodeId, SourceSpan } from "./ids.js";

export interface SyntaxNodeBase {
  id: NodeId;
  span: SourceSpan;
}

export interface Block extends SyntaxNodeBase {
  statements: readonly Statement[];
  /** Trailing expression that produces the block's value. */
  value?: Expression;
}

export type Statement = LocalStatement | ItemStatement | ExprStatement;

export interface LocalStatement extends SyntaxNodeBase {
  kind: "local";
  local: LocalDecl;
}

export interface LocalDecl extends SyntaxNodeBase {
  pattern: Pattern;
  initializer?: Expression;
}

/** Nested item declaration (fn, struct, ...). Items get their own scope map. */
export interface ItemStatement extends SyntaxNodeBase {
  kind: "item";
  name: string;
}

export interface ExprStatement extends SyntaxNodeBase {
  kind: "expr";
  expr: Expression;
  semi: boolean;
}

export interface Param {
  pattern: Pattern;
}

export interface FunctionBody {
  id: NodeId;
  name: string;
  span: SourceSpan;
  params: readonly Param[];
  body: Block;
}

export type Expression =
  | LiteralExpr
  | PathExpr
  | BreakExpr
  | ContinueExpr
  | CastExpr
  | TypeAscriptionExpr
  | AddressOfExpr
  | FieldExpr
  | TupleFieldExpr
  | BoxExpr
  | ReturnExpr
  | UnaryExpr
  | AssignOpExpr
  | IndexExpr
  | BinaryExpr
  | ArrayExpr
  | TupleExpr
  | AssignExpr
  | RepeatExpr
  | IfExpr
  | WhileExpr
  | LoopExpr
  | BlockExpr
  | ClosureExpr
  | CallExpr
  | MethodCallExpr
  | MatchExpr
  | StructExpr
  | InlineAsmExpr;

export type ExprKind = Expression["exprKind"];

export interface LiteralExpr extends SyntaxNodeBase {
  exprKind: "literal";
  value: string;
}

export interface PathExpr extends SyntaxNodeBase {
  exprKind: "path";
  path: readonly string[];
}

export interface BreakExpr extends SyntaxNodeBase {
  exprKind: "break";
  label?: string;
  value?: Expression;
}

export interface ContinueExpr extends SyntaxNodeBase {
  exprKind: "continue";
  label?: string;
}

export interface CastExpr extends SyntaxNodeBase {
  exprKind: "cast";
  expr: Expression;
  type: string;
}

export interface TypeAscriptionExpr extends SyntaxNodeBase {
  exprKind: "type-ascription";
  expr: Expression;
  type: string;
}

export interface AddressOfExpr extends SyntaxNodeBase {
  exprKind: "address-of";
  mutable: boolean;
  expr: Expression;
}

export interface FieldExpr extends SyntaxNodeBase {
  exprKind: "field";
  target: Expression;
  field: string;
}

export interface TupleFieldExpr extends SyntaxNodeBase {
  exprKind: "tuple-field";
  target: Expression;
  index: number;
}

export interface BoxExpr extends SyntaxNodeBase {
  exprKind: "box";
  expr: Expression;
}

export interface ReturnExpr extends SyntaxNodeBase {
  exprKind: "return";
  value?: Expression;
}

export interface UnaryExpr extends SyntaxNodeBase {
  exprKind: "unary";
  op: string;
  expr: Expression;
}

export interface AssignOpExpr extends SyntaxNodeBase {
  exprKind: "assign-op";
  op: string;
  target: Expression;
  value: Expression;
}

export interface IndexExpr extends SyntaxNodeBase {
  exprKind: "index";
  target: Expression;
  index: Expression;
}

export interface BinaryExpr extends SyntaxNodeBase {
  exprKind: "binary";
  op: string;
  left: Expression;
  right: Expression;
}

export interface ArrayExpr extends SyntaxNodeBase {
  exprKind: "array";
  elements: readonly Expression[];
}

export interface TupleExpr extends SyntaxNodeBase {
  exprKind: "tuple";
  elements: readonly Expression[];
}

export interface AssignExpr extends SyntaxNodeBase {
  exprKind: "assign";
  target: Expression;
  value: Expression;
}

/** `[value; count]` */
export interface RepeatExpr extends SyntaxNodeBase {
  exprKind: "repeat";
  value: Expression;
  count: Expression;
}

export interface IfExpr extends SyntaxNodeBase {
  exprKind: "if";
  condition: Expression;
  then: Block;
  otherwise?: Expression;
}

export interface WhileExpr extends SyntaxNodeBase {
  exprKind: "while";
  condition: Expression;
  body: Block;
  label?: string;
}

export interface LoopExpr extends SyntaxNodeBase {
  exprKind: "loop";
  body: Block;
  label?: string;
}

export interface BlockExpr extends SyntaxNodeBase {
  exprKind: "block";
  block: Block;
}

export interface ClosureExpr extends SyntaxNodeBase {
  exprKind: "closure";
  params: readonly Param[];
  body: Block;
}

export interface CallExpr extends SyntaxNodeBase {
  exprKind: "call";
  callee: Expression;
  args: readonly Expression[];
}

export interface MethodCallExpr extends SyntaxNodeBase {
  exprKind: "method-call";
  receiver: Expression;
  method: string;
  args: readonly Expression[];
}

export interface MatchExpr extends SyntaxNodeBase {
  exprKind: "match";
  discriminant: Expression;
  arms: readonly MatchArm[];
}

export interface MatchArm {
  /**
   * Alternatives (`a | b`). Every alternative binds the same names, so the
   * first one positions the arm's scope.
   */
  patterns: readonly [Pattern, ...Pattern[]];
  guard?: Expression;
  body: Expression;
}

export interface StructExpr extends SyntaxNodeBase {
  exprKind: "struct";
  path: readonly string[];
  fields: readonly { name: string; value: Expression }[];
  base?: Expression;
}

export interface InlineAsmExpr extends SyntaxNodeBase {
  exprKind: "inline-asm";
  template: string;
  outputs: readonly Expression[];
  inputs: readonly Expression[];
}

export type Pattern =
  | IdentifierPattern
  | WildcardPattern
  | TupleStructPattern
  | PathPattern
  | StructPattern
  | TuplePattern
  | BoxPattern
  | RefPattern
  | LiteralPattern
  | RangePattern
  | SlicePattern;

export type PatternKind = Pattern["kind"];

export interface IdentifierPattern extends SyntaxNodeBase {
  kind: "identifier";
  name: string;
  mode: "value" | "ref" | "ref-mut";
  mutable: boolean;
  /** `name @ subpattern` */
  subpattern?: Pattern;
}

export interface WildcardPattern extends SyntaxNodeBase {
  kind: "wildcard";
}

export interface TupleStructPattern extends SyntaxNodeBase {
  kind: "tuple-struct";
  path: readonly string[];
  /** Absent for `Variant(..)`. */
  subpatterns?: readonly Pattern[];
}

export interface PathPattern extends SyntaxNodeBase {
  kind: "path";
  path: readonly string[];
  qualified: boolean;
}

export interface StructPattern extends SyntaxNodeBase {
  kind: "struct";
  path: readonly string[];
  fields: readonly { name: string; pattern: Pattern }[];
  rest: boolean;
}

export interface TuplePattern extends SyntaxNodeBase {
  kind: "tuple";
  elements: readonly Pattern[];
}

export interface BoxPattern extends SyntaxNodeBase {
  kind: "box";
  pattern: Pattern;
}

export interface RefPattern extends SyntaxNodeBase {
  kind: "ref";
  mutable: boolean;
  pattern: Pattern;
}

export interface LiteralPattern extends SyntaxNodeBase {
  kind: "literal";
  expr: Expression;
}

export interface RangePattern extends SyntaxNodeBase {
  kind: "range";
  start: Expression;
  end: Expression;
}

/** `[before.., middle @ .., after..]` */
export interface SlicePattern extends SyntaxNodeBase {
  kind: "slice";
  before: readonly Pattern[];
  middle?: Pattern;
  after: readonly Pattern[];
}

/** What a path in pattern position resolved to, as reported by name resolution. */
export type Definition =
  | { kind: "local"; binding: NodeId }
  | { kind: "variant"; path: string }
  | { kind: "struct"; path: string }
  | { kind: "const"; path: string };

export type DefMap = ReadonlyMap<NodeId, Definition>;
