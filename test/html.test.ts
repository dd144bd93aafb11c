import { describe, it, expect } from "vitest";
import { renderHtml, serializeHtml, type HtmlContent } from "../src/html.js";
import { SignatureRegistry } from "../src/registry.js";
import { parse } from "../src/wiki/parser.js";
import type { Diagnostic, DocTree } from "../src/wiki/types.js";

const swap = parse(["%% foo(+X, -Y) is det.", "%% foo(-X, +Y) is semidet.", "%", "%  Swaps things."]);

function tags(content: readonly HtmlContent[]): string[] {
  return content.map(item => (typeof item === "string" ? "#text" : item.tag));
}

describe("html rendering", () => {
  it("renders overloaded mode lines under one anchor", () => {
    expect(serializeHtml(renderHtml([swap]))).toBe(
      '<dl class="predicates">' +
        '<dt class="pubdef"><a id="foo/2"><b class="pred">foo</b>(<var class="arglist">+X, -Y</var>)</a> is <b class="det">det</b></dt>' +
        '<dt class="pubdef"><b class="pred">foo</b>(<var class="arglist">-X, +Y</var>) is <b class="det">semidet</b></dt>' +
        '<dd class="defbody"><p>Swaps things.</p></dd>' +
        "</dl>"
    );
  });

  it("links known references and marks unknown ones", () => {
    const registry = new SignatureRegistry();
    registry.register({ name: "foo", arity: 2, ref: "predicate", page: "lists.html", summary: "Swaps things." });
    registry.freeze();
    const tree = parse(["See [[foo/2]] and [[bar/1]]."]);

    expect(serializeHtml(renderHtml([tree], { registry }))).toBe(
      '<p>See <a href="lists.html#foo/2" title="Swaps things.">foo/2</a> and <em class="undef">bar/1</em>.</p>'
    );
    expect(serializeHtml(renderHtml([tree], { registry, page: "lists.html" }))).toBe(
      '<p>See <a href="#foo/2" title="Swaps things.">foo/2</a> and <em class="undef">bar/1</em>.</p>'
    );
  });

  it("links across directories relative to the current page", () => {
    const registry = new SignatureRegistry();
    registry.register({ name: "foo", arity: 2, ref: "predicate", page: "lib/lists.html" });
    const tree = parse(["See [[foo/2]]."]);

    expect(serializeHtml(renderHtml([tree], { registry, page: "lib/sub/page.html" }))).toBe(
      '<p>See <a href="../lists.html#foo/2">foo/2</a>.</p>'
    );
  });

  it("groups consecutive predicates into one list", () => {
    const trees: DocTree[] = [
      parse(["/** <module> Title", "*/"]),
      swap,
      parse(["%% bar is det."]),
      parse(["Some prose."]),
      parse(["%% baz(+X) is det."])
    ];
    const page = renderHtml(trees);

    expect(tags(page)).toEqual(["h1", "dl", "p", "dl"]);
    const [, first] = page;
    expect(typeof first === "string" ? [] : tags(first.children)).toEqual(["dt", "dt", "dd", "dt", "dd"]);
  });

  it("hides private predicates unless asked", () => {
    const tree = parse(["%% helper(+X) is det."], { visibility: "private" });

    expect(renderHtml([tree])).toEqual([]);
    expect(serializeHtml(renderHtml([tree], { options: { publicOnly: false } }))).toBe(
      '<dl class="predicates">' +
        '<dt class="privdef"><a id="helper/1"><b class="pred">helper</b>(<var class="arglist">+X</var>)</a> is <b class="det">det</b> <span class="private">[private]</span></dt>' +
        '<dd class="defbody"></dd>' +
        "</dl>"
    );
  });

  it("renders operator heads", () => {
    expect(serializeHtml(renderHtml([parse(["%% +A == +B is semidet."])]))).toBe(
      '<dl class="predicates">' +
        '<dt class="pubdef"><a id="==/2"><var class="arg">+A</var> <b class="pred">==</b> <var class="arg">+B</var></a> is <b class="det">semidet</b></dt>' +
        '<dd class="defbody"></dd>' +
        "</dl>"
    );
  });

  it("renders tags with parameters first", () => {
    const tree = parse(["@see [[reverse/2]]", "@param List1 the first list"]);

    expect(serializeHtml(renderHtml([tree]))).toBe(
      '<dl class="tags">' +
        '<dt class="tag">Parameters</dt>' +
        '<dd><table class="arglist"><tr><td class="param"><var>List1</var></td><td>the first list</td></tr></table></dd>' +
        '<dt class="tag">See also</dt><dd><em class="undef">reverse/2</em></dd>' +
        "</dl>"
    );
  });

  it("renders code as plain text before the highlighter is loaded", () => {
    expect(serializeHtml(renderHtml([parse(["==", "foo :- bar.", "=="])]))).toBe('<pre class="code">foo :- bar.</pre>');
  });

  it("escapes text", () => {
    expect(serializeHtml(renderHtml([parse(["a < b & \"c\""])]))).toBe("<p>a &lt; b &amp; &quot;c&quot;</p>");
  });

  it("reports nodes it cannot render", () => {
    const bogus: DocTree = JSON.parse('{"kind":"doc","content":[{"kind":"table","rows":[]}]}');
    const diagnostics: Diagnostic[] = [];

    const html = serializeHtml(renderHtml([bogus], { onDiagnostic: d => diagnostics.push(d) }));

    expect(html).toBe('<span class="diagnostic">[table]</span>');
    expect(diagnostics).toEqual([{ backend: "html", nodeKind: "table", message: 'cannot render node of kind "table"' }]);
  });
});
