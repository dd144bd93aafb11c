import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { documentSource, extractComments, moduleDeclaration } from "../src/extract.js";
import { renderHtml, serializeHtml } from "../src/html.js";
import { indexTrees, SignatureRegistry } from "../src/registry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const source = readFileSync(join(__dirname, "fixtures", "lists.pl"), "utf-8");

describe("extractComments", () => {
  it("finds structured comments and skips ordinary ones", () => {
    const comments = extractComments(source);
    expect(comments).toHaveLength(4);

    const [module] = comments;
    const text = source.slice(module.offset, module.offset + module.length);
    expect(text.startsWith("/** <module> List utilities")).toBe(true);
    expect(text.endsWith("*/\n")).toBe(true);
    expect(comments[1].lines).toEqual(["%%\tappend(?List1, ?List2, ?List3) is nondet.", "%", "%\tList3 is List1 followed by List2."]);
  });

  it("ignores single % and /* comments", () => {
    expect(extractComments("% plain\n/* block */\nfoo.\n")).toEqual([]);
  });

  it("measures an indented comment from its first marker", () => {
    expect(extractComments("a.\n  %% b is det.\n")).toEqual([{ lines: ["  %% b is det."], offset: 5, length: 13 }]);
  });
});

describe("moduleDeclaration", () => {
  it("reads the export list", () => {
    expect(moduleDeclaration(source)).toEqual({ name: "lists", exports: ["append/3", "phrase_list//1"] });
  });

  it("returns undefined without a module directive", () => {
    expect(moduleDeclaration("foo :- bar.\n")).toBeUndefined();
  });

  it("skips operator declarations", () => {
    expect(moduleDeclaration(":- module(ops, [op(700, xfx, ===), (===)/2, run/0]).")?.exports).toEqual(["run/0"]);
  });
});

describe("documentSource", () => {
  it("marks predicates that are not exported as private", () => {
    const trees = documentSource(source, "lists.pl");
    const predicates = trees.flatMap(tree => tree.content).flatMap(node => (node.kind === "predicate" ? [node] : []));

    expect(predicates.map(node => [node.signatures[0].functor, node.visibility, node.module])).toEqual([
      ["append", "public", "lists"],
      ["phrase_list", "public", "lists"],
      ["helper", "private", "lists"]
    ]);
    expect(trees[1].pos).toEqual({ file: "lists.pl", offset: source.indexOf("%%\tappend") });
  });

  it("keeps everything public outside a module", () => {
    const [tree] = documentSource("%% foo is det.\n", "foo.pl");
    expect(tree.content[0]).toMatchObject({ kind: "predicate", visibility: "public" });
  });

  it("links bare indicators on the second pass", () => {
    const registry = new SignatureRegistry();
    indexTrees(registry, documentSource(source, "lists.pl"), "lists.html", { publicOnly: false });
    registry.freeze();

    const trees = documentSource(source, "lists.pl", {
      isKnown: (name, arity, ref) => registry.isKnown(name, arity, ref)
    });
    const html = serializeHtml(renderHtml(trees, { registry, page: "lists.html", module: "lists", options: { publicOnly: false } }));

    expect(html).toContain('<p>Emits the items. Uses <a href="#helper/1" title="Not exported.">helper/1</a>.</p>');
  });

  it("leaves references to hidden predicates unresolved", () => {
    const module = [
      ":- module(m, [foo/1]).",
      "",
      "%% foo(+X) is det.",
      "%",
      "%  Calls [[helper/1]].",
      "",
      "foo(X) :- helper(X).",
      "",
      "%% helper(+X) is det.",
      "%",
      "%  Internal.",
      "",
      "helper(_)."
    ].join("\n");
    const trees = documentSource(module, "m.pl");

    const registry = new SignatureRegistry();
    indexTrees(registry, trees, "m.html");
    registry.freeze();
    const html = serializeHtml(renderHtml(trees, { registry, page: "m.html", module: "m" }));

    expect(registry.isKnown("helper", 1)).toBe(false);
    expect(html).toContain('<dd class="defbody"><p>Calls <em class="undef">helper/1</em>.</p></dd>');
    expect(html).not.toContain('id="helper/1"');
  });
});
