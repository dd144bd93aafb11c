import { describe, it, expect } from "vitest";
import { findTopLevel, isBalanced, matchingClose, parseCompound, splitTopLevel } from "../src/terms.js";
import { tagTitle } from "../src/wiki/tags.js";

describe("term scanning", () => {
  it("splits only at depth zero", () => {
    expect(splitTopLevel("a(b, c), d", ",")).toEqual(["a(b, c)", " d"]);
    expect(splitTopLevel("'x,y', [1,2]", ",")).toEqual(["'x,y'", " [1,2]"]);
    expect(splitTopLevel("a(b", ",")).toBeUndefined();
  });

  it("finds the first or last top-level needle", () => {
    expect(findTopLevel("a is (b is c) is d", " is ")).toBe(1);
    expect(findTopLevel("a is (b is c) is d", " is ", true)).toBe(13);
    expect(findTopLevel("(a is b)", " is ")).toBe(-1);
  });

  it("matches brackets", () => {
    expect(matchingClose("f(a, [b], ')')) x", 1)).toBe(13);
    expect(matchingClose("f(a", 1)).toBe(-1);
    expect(isBalanced("[a, {b}]")).toBe(true);
    expect(isBalanced("[a, {b]}")).toBe(false);
  });

  it("reads compound terms", () => {
    expect(parseCompound(" foo(a, B) ")).toEqual({ name: "foo", args: ["a", "B"] });
    expect(parseCompound("'hello world'")).toEqual({ name: "hello world", args: [] });
    expect(parseCompound("foo(a,)")).toBeUndefined();
    expect(parseCompound("foo(a) bar")).toBeUndefined();
    expect(parseCompound("Foo")).toBeUndefined();
  });
});

describe("tagTitle", () => {
  it("maps known keywords and capitalises the rest", () => {
    expect(tagTitle("see")).toBe("See also");
    expect(tagTitle("tbd")).toBe("To be done");
    expect(tagTitle("note")).toBe("Note");
  });
});
