import { describe, it, expect, beforeAll } from "vitest";
import { generateHtml, generateListing, initHighlighter } from "../src/html.js";
import { classifySource, highlightCode, isHighlighterReady } from "../src/html/highlight.js";
import { renderListing } from "../src/html/listing.js";
import { textContent } from "../src/html/elements.js";
import { parse } from "../src/wiki/parser.js";

const code = "append([], L, L).\nappend([H|T], L, [H|R]) :-\n    append(T, L, R).";

describe("highlighting with shiki", () => {
  beforeAll(async () => {
    await initHighlighter();
  });

  it("keeps the code text intact", () => {
    expect(isHighlighterReady()).toBe(true);
    expect(textContent(highlightCode(code))).toBe(code);
  });

  it("classifies a whole source file", () => {
    const source = `%% run is det.\n${code}\n`;
    const fragments = classifySource(source);

    expect(fragments.length).toBeGreaterThan(0);
    expect(textContent(renderListing(source, fragments))).toBe(source);
  });

  it("writes complete pages", async () => {
    const html = await generateHtml([parse(["==", "foo :- bar.", "=="])], { title: "src/lists.pl" });

    expect(html).toContain("<title>lists.pl</title>");
    expect(html).toContain('<pre class="code">');
    expect(html).toContain('<a href="index.html" class="navhdr-left">index</a>');
  });

  it("writes listing pages", async () => {
    const html = await generateListing("foo.\n", { title: "foo.pl" });

    expect(html).toContain("<title>foo.pl</title>");
    expect(html).toContain('<pre class="listing">');
  });
});
