import { incrementCompilerPerfCounter } from "../perf.js";
import type { SourceSpan } from "./ids.js";

export interface SourceLocation {
  file: string;
  /** 1-based */
  line: number;
  /** 0-based, in characters */
  column: number;
}

export interface SourceLocator {
  spanStart(span: SourceSpan): SourceLocation;
}

/**
 * Creates debug scope records. `Scope` is whatever the backend hands out;
 * the engine only stores the values and compares them with `===`.
 *
 * Scope-map construction is independent per function, so callers may run it
 * for several functions concurrently (worker threads), but only if the
 * backend's creation methods are safe to call concurrently or the caller
 * serializes them. This module does not serialize anything.
 */
export interface DebugInfoBackend<Scope> {
  createFunctionScope(options: {
    file: string;
    name: string;
    line: number;
  }): Scope;
  createLexicalBlock(options: {
    parent: Scope;
    file: string;
    line: number;
    column: number;
  }): Scope;
}

export type DebugInfoContext<Scope> = {
  backend: DebugInfoBackend<Scope>;
  locator: SourceLocator;
};

/** Opens a lexical block under `parent` positioned at the start of `span`. */
export const createLexicalScopeAt = <Scope>(
  ctx: DebugInfoContext<Scope>,
  parent: Scope,
  span: SourceSpan,
): Scope => {
  const loc = ctx.locator.spanStart(span);
  incrementCompilerPerfCounter("debuginfo.lexical-blocks");
  return ctx.backend.createLexicalBlock({
    parent,
    file: loc.file,
    line: loc.line,
    column: loc.column,
  });
};

export const createFunctionScopeAt = <Scope>(
  ctx: DebugInfoContext<Scope>,
  name: string,
  span: SourceSpan,
): Scope => {
  const loc = ctx.locator.spanStart(span);
  return ctx.backend.createFunctionScope({ file: loc.file, name, line: loc.line });
};
