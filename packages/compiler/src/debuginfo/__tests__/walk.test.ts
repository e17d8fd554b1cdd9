import { describe, expect, it } from "vitest";
import { collectReachableNodeIds, walkBlock } from "../walk.js";
import { createSyntaxBuilder } from "./syntax-builder.js";

describe("syntax walk", () => {
  it("collects parameter bindings but not the parameter patterns", () => {
    const b = createSyntaxBuilder();
    const left = b.bind("left");
    const pair = b.tuplePat([left, b.wild()]);
    const item = b.item("nested");
    const body = b.block([item]);
    const fn = b.fn("f", [pair], body);

    expect(collectReachableNodeIds(fn, new Map())).toEqual([
      fn.id,
      left.id,
      body.id,
      item.id,
    ]);
  });

  it("visits statements and expressions in evaluation order", () => {
    const b = createSyntaxBuilder();
    const callee = b.path("f");
    const arg = b.lit("1");
    const call = b.call(callee, [arg]);
    const pattern = b.bind("x");
    const init = b.lit("2");
    const block = b.block([b.local(pattern, init)], call);

    const visited: number[] = [];
    walkBlock(block, {
      onEnterExpression: (expr) => visited.push(expr.id),
      onEnterPattern: (p) => visited.push(p.id),
    });

    expect(visited).toEqual([pattern.id, init.id, call.id, callee.id, arg.id]);
  });
});
