import { emitDiagnostic, type DiagnosticEmitter } from "../diagnostics/index.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { createLexicalScopeAt, type DebugInfoContext } from "./backend.js";
import type { SourceSpan } from "./ids.js";

export interface ScopeStackEntry<Scope> {
  scope: Scope;
  /**
   * Set for entries that make a binding name visible to later shadow checks.
   * Named entries above a block's own entry are popped when the block closes.
   */
  name?: string;
}

export type ScopeStackContext<Scope> = DebugInfoContext<Scope> & {
  diagnostics: DiagnosticEmitter;
  /** Reported when a fault has no better span (the function's span). */
  span: SourceSpan;
};

/**
 * Lexical scope stack for one function. Owned by a single walk; never share
 * an instance between functions.
 */
export class ScopeStack<Scope> {
  readonly #stack: ScopeStackEntry<Scope>[] = [];
  readonly #ctx: ScopeStackContext<Scope>;

  constructor(ctx: ScopeStackContext<Scope>, root: Scope) {
    this.#ctx = ctx;
    this.#stack.push({ scope: root });
  }

  get depth(): number {
    return this.#stack.length;
  }

  entries(): readonly Readonly<ScopeStackEntry<Scope>>[] {
    return [...this.#stack];
  }

  top(): Scope {
    return this.#topEntry().scope;
  }

  push(entry: ScopeStackEntry<Scope>): void {
    this.#stack.push({ ...entry });
  }

  isBound(name: string): boolean {
    return this.#stack.some((entry) => entry.name === name);
  }

  /**
   * Runs `walk` inside a new lexical block positioned at `span`. Entries the
   * walk leaves behind (bindings) are dropped with the block.
   */
  withNewScope(span: SourceSpan, walk: () => void): void {
    const scope = createLexicalScopeAt(this.#ctx, this.top(), span);
    this.#stack.push({ scope });
    const depth = this.#stack.length;

    walk();

    while (this.#topEntry(span).name !== undefined) {
      this.#stack.pop();
    }

    if (this.#topEntry(span).scope !== scope) {
      emitDiagnostic({
        ctx: this.#ctx,
        code: "DI0001",
        params: {
          kind: "scope-stack-mismatch",
          depth,
          stackDepth: this.#stack.length,
        },
        span,
      });
    }

    this.#stack.pop();
  }

  /**
   * Makes `name` visible from this point on. Debuggers cannot tell where a
   * variable's lifetime starts, so a name already bound anywhere on the stack
   * gets a fresh lexical block starting at `span`; otherwise the binding
   * shares the current scope. Names compare textually, as debuggers do.
   */
  bindName(name: string, span: SourceSpan): Readonly<ScopeStackEntry<Scope>> {
    if (!this.isBound(name)) {
      const entry = { scope: this.top(), name };
      this.#stack.push(entry);
      return entry;
    }

    incrementCompilerPerfCounter("debuginfo.artificial-scopes");
    const entry = {
      scope: createLexicalScopeAt(this.#ctx, this.top(), span),
      name,
    };
    this.#stack.push(entry);
    return entry;
  }

  #topEntry(span: SourceSpan = this.#ctx.span): ScopeStackEntry<Scope> {
    const entry = this.#stack.at(-1);
    if (!entry) {
      return emitDiagnostic({
        ctx: this.#ctx,
        code: "DI0001",
        params: { kind: "scope-stack-underflow" },
        span,
      });
    }
    return entry;
  }
}
