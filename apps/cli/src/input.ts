import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type {
  Block,
  DefMap,
  Definition,
  Expression,
  FunctionBody,
  MatchArm,
  MirBody,
  MirScopeData,
  MirVarDecl,
  NodeId,
  Param,
  Pattern,
  SourceSpan,
  Statement,
} from "@dbgscope/compiler/debuginfo/index.js";

/** A malformed input document. `path` is the JSON path of the offending value. */
export class InputError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "InputError";
    this.path = path;
  }
}

export interface FunctionInput {
  /** Source texts keyed by the file names the spans use. */
  files: Record<string, string>;
  fn: FunctionBody;
  defMap: DefMap;
  mir?: MirBody;
  debugInfo: boolean;
  /** Every file a span names, with the JSON path of the first such span. */
  sourceSpans: ReadonlyMap<string, string>;
}

type Decoder<T> = (value: unknown, path: string) => T;
type JsonObject = Record<string, unknown>;

const typeOf = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const object: Decoder<JsonObject> = (value, path) => {
  if (!isObject(value)) {
    throw new InputError(path, `expected object, got ${typeOf(value)}`);
  }
  return value;
};

const string: Decoder<string> = (value, path) => {
  if (typeof value !== "string") {
    throw new InputError(path, `expected string, got ${typeOf(value)}`);
  }
  return value;
};

const integer: Decoder<number> = (value, path) => {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InputError(path, `expected non-negative integer, got ${typeOf(value)}`);
  }
  return value;
};

const boolean: Decoder<boolean> = (value, path) => {
  if (typeof value !== "boolean") {
    throw new InputError(path, `expected boolean, got ${typeOf(value)}`);
  }
  return value;
};

const arrayOf =
  <T>(item: Decoder<T>): Decoder<T[]> =>
  (value, path) => {
    if (!Array.isArray(value)) {
      throw new InputError(path, `expected array, got ${typeOf(value)}`);
    }
    return value.map((entry, index) => item(entry, `${path}[${index}]`));
  };

const oneOf =
  <T extends string>(allowed: readonly T[]): Decoder<T> =>
  (value, path) => {
    const text = string(value, path);
    const match = allowed.find((candidate) => candidate === text);
    if (match === undefined) {
      throw new InputError(
        path,
        `expected one of ${allowed.map((entry) => `"${entry}"`).join(", ")}, got "${text}"`,
      );
    }
    return match;
  };

const required = <T>(
  obj: JsonObject,
  path: string,
  key: string,
  decode: Decoder<T>,
): T => {
  const value = obj[key];
  if (value === undefined) {
    throw new InputError(`${path}.${key}`, "missing required field");
  }
  return decode(value, `${path}.${key}`);
};

const optional = <T>(
  obj: JsonObject,
  path: string,
  key: string,
  decode: Decoder<T>,
): T | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  return decode(value, `${path}.${key}`);
};

const withDefault = <T>(
  obj: JsonObject,
  path: string,
  key: string,
  decode: Decoder<T>,
  fallback: T,
): T => optional(obj, path, key, decode) ?? fallback;

const stringList = arrayOf(string);

/**
 * Span decoder. Without a `defaultFile` every span must name its file. The
 * JSON path of the first span naming each file is kept in `sourceSpans`.
 */
const createSpanDecoder = ({
  defaultFile,
  sourceSpans,
}: {
  defaultFile?: string;
  sourceSpans: Map<string, string>;
}): Decoder<SourceSpan> => (value, path) => {
  const obj = object(value, path);
  const file =
    defaultFile === undefined
      ? required(obj, path, "file", string)
      : withDefault(obj, path, "file", string, defaultFile);
  const start = required(obj, path, "start", integer);
  const end = required(obj, path, "end", integer);
  if (end < start) {
    throw new InputError(`${path}.end`, `span ends (${end}) before it starts (${start})`);
  }
  if (!sourceSpans.has(file)) {
    sourceSpans.set(file, path);
  }
  return { file, start, end };
};

const createSyntaxDecoders = (span: Decoder<SourceSpan>) => {
  const base = (obj: JsonObject, path: string) => ({
    id: required(obj, path, "id", integer),
    span: required(obj, path, "span", span),
  });

  const pattern: Decoder<Pattern> = (value, path) => {
    const obj = object(value, path);
    const kind = required(obj, path, "kind", string);
    const node = base(obj, path);
    const patterns = arrayOf(pattern);

    switch (kind) {
      case "identifier":
        return {
          ...node,
          kind: "identifier",
          name: required(obj, path, "name", string),
          mode: withDefault(
            obj,
            path,
            "mode",
            oneOf(["value", "ref", "ref-mut"] as const),
            "value",
          ),
          mutable: withDefault(obj, path, "mutable", boolean, false),
          subpattern: optional(obj, path, "subpattern", pattern),
        };
      case "wildcard":
        return { ...node, kind: "wildcard" };
      case "tuple-struct":
        return {
          ...node,
          kind: "tuple-struct",
          path: required(obj, path, "path", stringList),
          subpatterns: optional(obj, path, "subpatterns", patterns),
        };
      case "path":
        return {
          ...node,
          kind: "path",
          path: required(obj, path, "path", stringList),
          qualified: withDefault(obj, path, "qualified", boolean, false),
        };
      case "struct":
        return {
          ...node,
          kind: "struct",
          path: required(obj, path, "path", stringList),
          fields: required(
            obj,
            path,
            "fields",
            arrayOf((field, fieldPath) => {
              const entry = object(field, fieldPath);
              return {
                name: required(entry, fieldPath, "name", string),
                pattern: required(entry, fieldPath, "pattern", pattern),
              };
            }),
          ),
          rest: withDefault(obj, path, "rest", boolean, false),
        };
      case "tuple":
        return {
          ...node,
          kind: "tuple",
          elements: required(obj, path, "elements", patterns),
        };
      case "box":
        return { ...node, kind: "box", pattern: required(obj, path, "pattern", pattern) };
      case "ref":
        return {
          ...node,
          kind: "ref",
          mutable: withDefault(obj, path, "mutable", boolean, false),
          pattern: required(obj, path, "pattern", pattern),
        };
      case "literal":
        return { ...node, kind: "literal", expr: required(obj, path, "expr", expression) };
      case "range":
        return {
          ...node,
          kind: "range",
          start: required(obj, path, "start", expression),
          end: required(obj, path, "end", expression),
        };
      case "slice":
        return {
          ...node,
          kind: "slice",
          before: withDefault(obj, path, "before", patterns, []),
          middle: optional(obj, path, "middle", pattern),
          after: withDefault(obj, path, "after", patterns, []),
        };
      default:
        throw new InputError(`${path}.kind`, `unknown pattern kind "${kind}"`);
    }
  };

  const param: Decoder<Param> = (value, path) => ({
    pattern: required(object(value, path), path, "pattern", pattern),
  });

  const arm: Decoder<MatchArm> = (value, path) => {
    const obj = object(value, path);
    const [first, ...rest] = required(obj, path, "patterns", arrayOf(pattern));
    if (first === undefined) {
      throw new InputError(`${path}.patterns`, "a match arm needs at least one pattern");
    }
    return {
      patterns: [first, ...rest],
      guard: optional(obj, path, "guard", expression),
      body: required(obj, path, "body", expression),
    };
  };

  const expression: Decoder<Expression> = (value, path) => {
    const obj = object(value, path);
    const exprKind = required(obj, path, "exprKind", string);
    const node = base(obj, path);
    const expressions = arrayOf(expression);
    const expr = (key: string) => required(obj, path, key, expression);

    switch (exprKind) {
      case "literal":
        return { ...node, exprKind: "literal", value: required(obj, path, "value", string) };
      case "path":
        return { ...node, exprKind: "path", path: required(obj, path, "path", stringList) };
      case "break":
        return {
          ...node,
          exprKind: "break",
          label: optional(obj, path, "label", string),
          value: optional(obj, path, "value", expression),
        };
      case "continue":
        return { ...node, exprKind: "continue", label: optional(obj, path, "label", string) };
      case "cast":
        return {
          ...node,
          exprKind: "cast",
          expr: expr("expr"),
          type: required(obj, path, "type", string),
        };
      case "type-ascription":
        return {
          ...node,
          exprKind: "type-ascription",
          expr: expr("expr"),
          type: required(obj, path, "type", string),
        };
      case "address-of":
        return {
          ...node,
          exprKind: "address-of",
          mutable: withDefault(obj, path, "mutable", boolean, false),
          expr: expr("expr"),
        };
      case "field":
        return {
          ...node,
          exprKind: "field",
          target: expr("target"),
          field: required(obj, path, "field", string),
        };
      case "tuple-field":
        return {
          ...node,
          exprKind: "tuple-field",
          target: expr("target"),
          index: required(obj, path, "index", integer),
        };
      case "box":
        return { ...node, exprKind: "box", expr: expr("expr") };
      case "return":
        return { ...node, exprKind: "return", value: optional(obj, path, "value", expression) };
      case "unary":
        return {
          ...node,
          exprKind: "unary",
          op: required(obj, path, "op", string),
          expr: expr("expr"),
        };
      case "assign-op":
        return {
          ...node,
          exprKind: "assign-op",
          op: required(obj, path, "op", string),
          target: expr("target"),
          value: expr("value"),
        };
      case "index":
        return { ...node, exprKind: "index", target: expr("target"), index: expr("index") };
      case "binary":
        return {
          ...node,
          exprKind: "binary",
          op: required(obj, path, "op", string),
          left: expr("left"),
          right: expr("right"),
        };
      case "array":
        return {
          ...node,
          exprKind: "array",
          elements: required(obj, path, "elements", expressions),
        };
      case "tuple":
        return {
          ...node,
          exprKind: "tuple",
          elements: required(obj, path, "elements", expressions),
        };
      case "assign":
        return { ...node, exprKind: "assign", target: expr("target"), value: expr("value") };
      case "repeat":
        return { ...node, exprKind: "repeat", value: expr("value"), count: expr("count") };
      case "if":
        return {
          ...node,
          exprKind: "if",
          condition: expr("condition"),
          then: required(obj, path, "then", block),
          otherwise: optional(obj, path, "otherwise", expression),
        };
      case "while":
        return {
          ...node,
          exprKind: "while",
          condition: expr("condition"),
          body: required(obj, path, "body", block),
          label: optional(obj, path, "label", string),
        };
      case "loop":
        return {
          ...node,
          exprKind: "loop",
          body: required(obj, path, "body", block),
          label: optional(obj, path, "label", string),
        };
      case "block":
        return { ...node, exprKind: "block", block: required(obj, path, "block", block) };
      case "closure":
        return {
          ...node,
          exprKind: "closure",
          params: withDefault(obj, path, "params", arrayOf(param), []),
          body: required(obj, path, "body", block),
        };
      case "call":
        return {
          ...node,
          exprKind: "call",
          callee: expr("callee"),
          args: withDefault(obj, path, "args", expressions, []),
        };
      case "method-call":
        return {
          ...node,
          exprKind: "method-call",
          receiver: expr("receiver"),
          method: required(obj, path, "method", string),
          args: withDefault(obj, path, "args", expressions, []),
        };
      case "match":
        return {
          ...node,
          exprKind: "match",
          discriminant: expr("discriminant"),
          arms: required(obj, path, "arms", arrayOf(arm)),
        };
      case "struct":
        return {
          ...node,
          exprKind: "struct",
          path: required(obj, path, "path", stringList),
          fields: withDefault(
            obj,
            path,
            "fields",
            arrayOf((field, fieldPath) => {
              const entry = object(field, fieldPath);
              return {
                name: required(entry, fieldPath, "name", string),
                value: required(entry, fieldPath, "value", expression),
              };
            }),
            [],
          ),
          base: optional(obj, path, "base", expression),
        };
      case "inline-asm":
        return {
          ...node,
          exprKind: "inline-asm",
          template: withDefault(obj, path, "template", string, ""),
          outputs: withDefault(obj, path, "outputs", expressions, []),
          inputs: withDefault(obj, path, "inputs", expressions, []),
        };
      default:
        throw new InputError(
          `${path}.exprKind`,
          `unknown expression kind "${exprKind}"`,
        );
    }
  };

  const statement: Decoder<Statement> = (value, path) => {
    const obj = object(value, path);
    const kind = required(obj, path, "kind", string);
    const node = base(obj, path);

    switch (kind) {
      case "local":
        return {
          ...node,
          kind: "local",
          local: required(obj, path, "local", (local, localPath) => {
            const entry = object(local, localPath);
            return {
              ...base(entry, localPath),
              pattern: required(entry, localPath, "pattern", pattern),
              initializer: optional(entry, localPath, "initializer", expression),
            };
          }),
        };
      case "item":
        return { ...node, kind: "item", name: required(obj, path, "name", string) };
      case "expr":
        return {
          ...node,
          kind: "expr",
          expr: required(obj, path, "expr", expression),
          semi: withDefault(obj, path, "semi", boolean, false),
        };
      default:
        throw new InputError(`${path}.kind`, `unknown statement kind "${kind}"`);
    }
  };

  const block: Decoder<Block> = (value, path) => {
    const obj = object(value, path);
    return {
      ...base(obj, path),
      statements: withDefault(obj, path, "statements", arrayOf(statement), []),
      value: optional(obj, path, "value", expression),
    };
  };

  return { pattern, param, expression, block };
};

const definition: Decoder<Definition> = (value, path) => {
  const obj = object(value, path);
  const kind = required(
    obj,
    path,
    "kind",
    oneOf(["local", "variant", "struct", "const"] as const),
  );
  if (kind === "local") {
    return { kind, binding: required(obj, path, "binding", integer) };
  }
  return { kind, path: required(obj, path, "path", string) };
};

const defMap: Decoder<DefMap> = (value, path) => {
  const entries = Object.entries(object(value, path)).map(
    ([key, entry]): [NodeId, Definition] => {
      const id = Number(key);
      if (!Number.isInteger(id) || id < 0) {
        throw new InputError(`${path}.${key}`, "definition keys must be node ids");
      }
      return [id, definition(entry, `${path}.${key}`)];
    },
  );
  return new Map(entries);
};

const mirBody = (span: Decoder<SourceSpan>): Decoder<MirBody> => {
  const scope: Decoder<MirScopeData> = (value, path) => {
    const obj = object(value, path);
    return {
      parent: optional(obj, path, "parent", integer),
      span: required(obj, path, "span", span),
    };
  };
  const varDecl: Decoder<MirVarDecl> = (value, path) => {
    const obj = object(value, path);
    return {
      name: required(obj, path, "name", string),
      scope: required(obj, path, "scope", integer),
    };
  };

  return (value, path) => {
    const obj = object(value, path);
    return {
      scopes: required(obj, path, "scopes", arrayOf(scope)),
      varDecls: withDefault(obj, path, "varDecls", arrayOf(varDecl), []),
    };
  };
};

const files: Decoder<Record<string, string>> = (value, path) =>
  Object.fromEntries(
    Object.entries(object(value, path)).map(([file, text]) => [
      file,
      string(text, `${path}.${file}`),
    ]),
  );

/** Validates a parsed input document. Throws {@link InputError} on the first malformed value. */
export const decodeFunctionInput = (value: unknown): FunctionInput => {
  const root = object(value, "$");
  const fnObj = required(root, "$", "function", object);
  const sourceSpans = new Map<string, string>();
  const fnSpan = required(
    fnObj,
    "$.function",
    "span",
    createSpanDecoder({ sourceSpans }),
  );
  const span = createSpanDecoder({ defaultFile: fnSpan.file, sourceSpans });
  const syntax = createSyntaxDecoders(span);

  const fn: FunctionBody = {
    id: required(fnObj, "$.function", "id", integer),
    name: required(fnObj, "$.function", "name", string),
    span: fnSpan,
    params: withDefault(fnObj, "$.function", "params", arrayOf(syntax.param), []),
    body: required(fnObj, "$.function", "body", syntax.block),
  };

  return {
    files: withDefault(root, "$", "files", files, {}),
    fn,
    defMap: withDefault(root, "$", "defMap", defMap, new Map()),
    mir: optional(root, "$", "mir", mirBody(span)),
    debugInfo:
      withDefault(root, "$", "debugInfo", oneOf(["full", "none"] as const), "full") ===
      "full",
    sourceSpans,
  };
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError("$", `invalid JSON (${reason})`);
  }
};

const readSourceBeside = ({
  document,
  file,
  spanPath,
}: {
  document: string;
  file: string;
  spanPath: string;
}): string => {
  try {
    return readFileSync(resolve(dirname(document), file), "utf8");
  } catch {
    throw new InputError(
      spanPath,
      `source file "${file}" is neither embedded nor found beside the document`,
    );
  }
};

/**
 * Reads and decodes an input document. Source files the spans name that the
 * document does not embed are read from disk relative to the document.
 */
export const loadFunctionInput = (path: string): FunctionInput => {
  const input = decodeFunctionInput(parseJson(readFileSync(path, "utf8")));
  for (const [file, spanPath] of input.sourceSpans) {
    if (input.files[file] === undefined) {
      input.files[file] = readSourceBeside({ document: path, file, spanPath });
    }
  }
  return input;
};
