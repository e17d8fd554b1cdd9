/**
 * Identifier aliases shared by the scope walker and the MIR scope resolver.
 * Node ids are unique within one function; MIR scope indices address the
 * function's MIR scope array.
 */
export type NodeId = number;
export type MirScopeIndex = number;

export type { SourceSpan } from "../diagnostics/index.js";
