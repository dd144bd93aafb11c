import { describe, it, expect } from "vitest";
import { generateIndex, renderHtml, serializeHtml } from "../src/html.js";
import { latexForTrees } from "../src/latex/print.js";
import { parseModeLine } from "../src/modes.js";
import { parse } from "../src/wiki/parser.js";
import type { DocNode, DocTree } from "../src/wiki/types.js";

const signature = parseModeLine("member(?Elem, ?List) is nondet");
if (!signature) throw new Error("mode line did not parse");

const text = (value: string): DocNode => ({ kind: "text", text: value });

/// one node of every kind, nested where the kind allows it.
const nodes: DocNode[] = [
  { kind: "heading", level: 2, content: [text("Heading")] },
  { kind: "paragraph", content: [text("Para "), { kind: "inlineCode", text: "x = y" }] },
  { kind: "list", ordered: true, items: [[text("one")], [text("two")]] },
  { kind: "descriptionList", items: [{ term: { kind: "term", name: "opt", args: ["V"] }, body: [text("an option")] }] },
  { kind: "codeBlock", text: "a :- b." },
  { kind: "inlineCode", text: "member" },
  { kind: "emphasis", style: "italic", content: [text("slanted")] },
  { kind: "link", target: "https://example.org", content: [text("site")] },
  text("plain"),
  { kind: "predicateRef", name: "phrase", arity: 2, ref: "dcg" },
  { kind: "tag", keyword: "author", value: [text("Someone")] },
  { kind: "paramList", entries: [{ name: "Elem", description: [text("an element")] }] },
  {
    kind: "tagSection",
    params: { kind: "paramList", entries: [{ name: "List", description: [text("a list")] }] },
    tags: [{ kind: "tag", keyword: "tbd", value: [text("later")] }]
  },
  { kind: "predicate", signatures: [signature], visibility: "public", body: [{ kind: "paragraph", content: [text("True if.")] }] }
];

const everything: DocTree = { kind: "doc", content: nodes };

describe("both backends", () => {
  it("render a tree holding every kind of node", () => {
    const before = structuredClone(everything);

    const html = serializeHtml(renderHtml([everything]));
    const latex = latexForTrees([everything], { options: { standAlone: false } });

    expect(html).not.toBe("");
    expect(latex).not.toBe("");
    expect(everything).toEqual(before);
  });

  it.each(nodes)("render a lone $kind", node => {
    const tree: DocTree = { kind: "doc", content: [node] };

    expect(serializeHtml(renderHtml([tree]))).not.toBe("");
    expect(latexForTrees([tree], { options: { standAlone: false } })).not.toBe("");
  });
});

describe("generateIndex", () => {
  it("lists public predicates per page", () => {
    const swap = parse(["%% foo(+X, -Y) is det.", "%", "%  Swaps things."]);
    const hidden = parse(["%% bar is det."], { visibility: "private" });

    const html = generateIndex([
      { page: "z.html", title: "z.pl", trees: [] },
      { page: "lists.html", title: "lists.pl", trees: [swap, hidden] }
    ]);

    expect(html).toContain(
      '<h2><a href="lists.html">lists.pl</a></h2><ul class="index"><li><a href="lists.html#foo/2">foo/2</a> Swaps things.</li></ul><h2><a href="z.html">z.pl</a></h2>'
    );
    expect(html).toContain("<title>Index</title>");
  });
});
