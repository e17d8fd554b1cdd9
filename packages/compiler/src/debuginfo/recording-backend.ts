import type { DebugInfoBackend } from "./backend.js";

export interface RecordedScope {
  id: number;
  kind: "function" | "lexical-block";
  /** Function name; lexical blocks have none. */
  name?: string;
  parent?: RecordedScope;
  file: string;
  line: number;
  column: number;
}

export interface ScopeTreeNode {
  id: number;
  kind: RecordedScope["kind"];
  name?: string;
  location: string;
  children: ScopeTreeNode[];
}

/**
 * Backend that keeps every scope it creates in memory. Stands in for a real
 * object-file writer in tests and in the CLI.
 */
export class RecordingDebugInfoBackend
  implements DebugInfoBackend<RecordedScope>
{
  #nextId = 0;
  readonly #scopes: RecordedScope[] = [];

  get scopes(): readonly RecordedScope[] {
    return this.#scopes;
  }

  get lexicalBlockCount(): number {
    return this.#scopes.filter((scope) => scope.kind === "lexical-block")
      .length;
  }

  createFunctionScope({
    file,
    name,
    line,
  }: {
    file: string;
    name: string;
    line: number;
  }): RecordedScope {
    return this.#record({ kind: "function", name, file, line, column: 0 });
  }

  createLexicalBlock({
    parent,
    file,
    line,
    column,
  }: {
    parent: RecordedScope;
    file: string;
    line: number;
    column: number;
  }): RecordedScope {
    return this.#record({ kind: "lexical-block", parent, file, line, column });
  }

  /** Scope chain from `scope` outwards, ending at its function. */
  ancestry(scope: RecordedScope): RecordedScope[] {
    const chain: RecordedScope[] = [];
    let current: RecordedScope | undefined = scope;
    while (current) {
      chain.push(current);
      current = current.parent;
    }
    return chain;
  }

  /** Recorded scopes as a forest, children in creation order. */
  tree(): ScopeTreeNode[] {
    const nodes = new Map<RecordedScope, ScopeTreeNode>();
    const roots: ScopeTreeNode[] = [];

    for (const scope of this.#scopes) {
      const node: ScopeTreeNode = {
        id: scope.id,
        kind: scope.kind,
        name: scope.name,
        location: `${scope.file}:${scope.line}:${scope.column}`,
        children: [],
      };
      nodes.set(scope, node);

      const parent = scope.parent ? nodes.get(scope.parent) : undefined;
      if (parent) {
        parent.children.push(node);
      } else {
        roots.push(node);
      }
    }

    return roots;
  }

  #record(scope: Omit<RecordedScope, "id">): RecordedScope {
    const recorded: RecordedScope = { ...scope, id: this.#nextId++ };
    this.#scopes.push(recorded);
    return recorded;
  }
}
