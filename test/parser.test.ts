import { describe, it, expect } from "vitest";
import { parse, parseBlocks, stripComment } from "../src/wiki/parser.js";
import { parseInline } from "../src/wiki/inline.js";

describe("inline markup", () => {
  it("reads code spans", () => {
    expect(parseInline("use `foo(X)` here")).toEqual([
      { kind: "text", text: "use " },
      { kind: "inlineCode", text: "foo(X)" },
      { kind: "text", text: " here" }
    ]);
  });

  it("reads bold and italic", () => {
    expect(parseInline("*bold* and _it_")).toEqual([
      { kind: "emphasis", style: "bold", content: [{ kind: "text", text: "bold" }] },
      { kind: "text", text: " and " },
      { kind: "emphasis", style: "italic", content: [{ kind: "text", text: "it" }] }
    ]);
  });

  it("leaves underscores inside words alone", () => {
    expect(parseInline("snake_case_name")).toEqual([{ kind: "text", text: "snake_case_name" }]);
  });

  it("reads bracketed references and file links", () => {
    expect(parseInline("see [[append/3]] and [[lists.pl]]")).toEqual([
      { kind: "text", text: "see " },
      { kind: "predicateRef", name: "append", arity: 3, ref: "predicate" },
      { kind: "text", text: " and " },
      { kind: "link", target: "lists.pl", content: [{ kind: "text", text: "lists.pl" }] }
    ]);
    expect(parseInline("[[phrase//2]]")).toEqual([{ kind: "predicateRef", name: "phrase", arity: 2, ref: "dcg" }]);
  });

  it("does not let a code span cross a line break", () => {
    expect(parseInline("Use `foo\nbar` here.")).toEqual([{ kind: "text", text: "Use `foo\nbar` here." }]);
    expect(parseInline("`a`\n`b`")).toEqual([
      { kind: "inlineCode", text: "a" },
      { kind: "text", text: "\n" },
      { kind: "inlineCode", text: "b" }
    ]);
  });

  it("keeps an unmatched bracket as text", () => {
    expect(parseInline("a [[b")).toEqual([{ kind: "text", text: "a [[b" }]);
  });

  it("links bare indicators only when they are known", () => {
    const isKnown = (name: string, arity: number) => name === "foo" && arity === 2;
    expect(parseInline("calls foo/2 now", { isKnown })).toEqual([
      { kind: "text", text: "calls " },
      { kind: "predicateRef", name: "foo", arity: 2, ref: "predicate" },
      { kind: "text", text: " now" }
    ]);
    expect(parseInline("calls bar/1 now", { isKnown })).toEqual([{ kind: "text", text: "calls bar/1 now" }]);
  });
});

describe("comment prefixes", () => {
  it("splits mode lines off a %% comment", () => {
    const stripped = stripComment(["%% foo(+X) is det.", "%", "%   Does foo."]);
    expect(stripped).toEqual({ style: "line", modeLines: ["foo(+X) is det."], lines: ["", "Does foo."] });
  });

  it("strips block comment delimiters", () => {
    const stripped = stripComment(["/** foo(+X) is det", "", "    Does foo.", "*/"]);
    expect(stripped).toEqual({ style: "block", modeLines: [], lines: ["foo(+X) is det", "", "Does foo.", ""] });
  });
});

describe("blocks", () => {
  it("parses a module comment", () => {
    const tree = parse([
      "/** <module> List utilities",
      "",
      "This module does things.",
      "",
      "  * first item",
      "  * second item",
      "",
      "@author Jan",
      "*/"
    ]);

    expect(tree).toEqual({
      kind: "doc",
      content: [
        { kind: "heading", level: 1, content: [{ kind: "text", text: "List utilities" }] },
        { kind: "paragraph", content: [{ kind: "text", text: "This module does things." }] },
        {
          kind: "list",
          ordered: false,
          items: [[{ kind: "text", text: "first item" }], [{ kind: "text", text: "second item" }]]
        },
        { kind: "tagSection", tags: [{ kind: "tag", keyword: "author", value: [{ kind: "text", text: "Jan" }] }] }
      ]
    });
  });

  it("parses a predicate comment with mode lines and tags", () => {
    const tree = parse(
      [
        "%%  append(+List1, +List2, -List3) is det.",
        "%%  append(?Prefix, ?Suffix, +List) is nondet.",
        "%",
        "%   List3 is the concatenation of List1 and List2.",
        "%",
        "%   @param List1 the first list",
        "%   @see [[reverse/2]]"
      ],
      { module: "lists" }
    );

    expect(tree.content).toHaveLength(1);
    const [node] = tree.content;
    if (node.kind !== "predicate") throw new Error(`expected a predicate, got ${node.kind}`);

    expect(node.module).toBe("lists");
    expect(node.visibility).toBe("public");
    expect(node.signatures.map(sig => `${sig.functor}/${sig.arity} ${sig.determinism}`)).toEqual([
      "append/3 det",
      "append/3 nondet"
    ]);
    expect(node.body).toEqual([
      { kind: "paragraph", content: [{ kind: "text", text: "List3 is the concatenation of List1 and List2." }] },
      {
        kind: "tagSection",
        params: {
          kind: "paramList",
          entries: [{ name: "List1", description: [{ kind: "text", text: "the first list" }] }]
        },
        tags: [{ kind: "tag", keyword: "see", value: [{ kind: "predicateRef", name: "reverse", arity: 2, ref: "predicate" }] }]
      }
    ]);
  });

  it("takes mode lines from the top of a block comment", () => {
    const tree = parse(["/** foo(+X) is det", "", "Does foo.", "*/"]);
    const [node] = tree.content;
    expect(node.kind).toBe("predicate");
    if (node.kind !== "predicate") return;
    expect(node.signatures).toHaveLength(1);
    expect(node.body).toEqual([{ kind: "paragraph", content: [{ kind: "text", text: "Does foo." }] }]);
  });

  it("keeps a %% line that is not a mode line as prose", () => {
    const tree = parse(["%% This is just a note", "% more"]);
    expect(tree.content).toEqual([{ kind: "paragraph", content: [{ kind: "text", text: "This is just a note\nmore" }] }]);
  });

  it("parses description lists", () => {
    const nodes = parseBlocks(["$ foo(X, Y): does foo", "  continued here", "$ bar: does bar"]);
    expect(nodes).toEqual([
      {
        kind: "descriptionList",
        items: [
          { term: { kind: "term", name: "foo", args: ["X", "Y"] }, body: [{ kind: "text", text: "does foo\ncontinued here" }] },
          { term: { kind: "term", name: "bar", args: [] }, body: [{ kind: "text", text: "does bar" }] }
        ]
      }
    ]);
  });

  it("parses fenced code", () => {
    expect(parseBlocks(["==", "foo :- bar.", "==", "after"])).toEqual([
      { kind: "codeBlock", text: "foo :- bar." },
      { kind: "paragraph", content: [{ kind: "text", text: "after" }] }
    ]);
  });

  it("closes unterminated code at the end of the text", () => {
    expect(parseBlocks(["==", "x.", "y."])).toEqual([{ kind: "codeBlock", text: "x.\ny." }]);
  });

  it("parses indented code with inner blank lines", () => {
    expect(parseBlocks(["Intro:", "", "    a :- b.", "", "    c.", "", "Done."])).toEqual([
      { kind: "paragraph", content: [{ kind: "text", text: "Intro:" }] },
      { kind: "codeBlock", text: "a :- b.\n\nc." },
      { kind: "paragraph", content: [{ kind: "text", text: "Done." }] }
    ]);
  });

  it("parses both heading styles", () => {
    expect(parseBlocks(["---+ Title", "## Sub"])).toEqual([
      { kind: "heading", level: 1, content: [{ kind: "text", text: "Title" }] },
      { kind: "heading", level: 2, content: [{ kind: "text", text: "Sub" }] }
    ]);
  });

  it("nests lists by indentation", () => {
    expect(parseBlocks(["* a", "  * b", "* c"])).toEqual([
      {
        kind: "list",
        ordered: false,
        items: [
          [
            { kind: "text", text: "a" },
            { kind: "list", ordered: false, items: [[{ kind: "text", text: "b" }]] }
          ],
          [{ kind: "text", text: "c" }]
        ]
      }
    ]);
  });

  it("parses ordered lists", () => {
    expect(parseBlocks(["1. one", "2. two"])).toEqual([
      { kind: "list", ordered: true, items: [[{ kind: "text", text: "one" }], [{ kind: "text", text: "two" }]] }
    ]);
  });

  it("gives an empty tree for an empty comment", () => {
    expect(parse([])).toEqual({ kind: "doc", content: [] });
    expect(parse(["/** */"])).toEqual({ kind: "doc", content: [] });
  });

  it("records the source position", () => {
    expect(parse(["Text."], { pos: { file: "a.pl", offset: 12 } }).pos).toEqual({ file: "a.pl", offset: 12 });
  });
});
