/// # html generation — main entry point
///
/// this is the orchestrator. it ties together:
///
/// - **the renderer** (`render.ts`) that turns document trees into elements
/// - **shiki** (`highlight.ts`) for the code blocks inside comments
/// - **listings** (`listing.ts`) for whole source files
/// - **styles** (`styles.ts`) for the inlined stylesheet
///
/// there are three entry points:
///
/// - `generateHtml`: documentation trees in, one page out.
/// - `generateListing`: a source file in, a coloured listing page out.
/// - `generateIndex`: the table of contents for a directory of pages.

import { initHighlighter, classifySource } from "./highlight.js";
import { escapeHtml, h, serializeHtml, type HtmlElement } from "./elements.js";
import { renderListing, type Fragment } from "./listing.js";
import { renderHtml } from "./render.js";
import { defaultCss, listingPageCss } from "./styles.js";
import type { HtmlOptions } from "./types.js";
import { signatureKey } from "../modes.js";
import { summaryOf } from "../wiki/summary.js";
import type { DocTree } from "../wiki/types.js";

export type { HtmlOptions } from "./types.js";
export { initHighlighter } from "./highlight.js";

/// ## generateHtml
///
/// the highlighter is loaded first so code blocks come out coloured;
/// everything after that is synchronous. the registry, if any, must be
/// complete before this is called: references are resolved while
/// rendering and an entry added later will not be seen.

export async function generateHtml(trees: readonly DocTree[], options: HtmlOptions = {}): Promise<string> {
  await initHighlighter();

  const body = renderHtml(trees, {
    registry: options.registry,
    page: options.page,
    module: options.module,
    options: options.docOptions,
    onDiagnostic: options.onDiagnostic
  });

  return wrapHtml(serializeHtml(body), options, defaultCss);
}

/// ## generateListing
///
/// `fragments` come from an outside classifier. when none are given the
/// source is classified with shiki's prolog grammar.

export async function generateListing(source: string, options: HtmlOptions = {}, fragments?: readonly Fragment[]): Promise<string> {
  await initHighlighter();
  const listing = renderListing(source, fragments ?? classifySource(source));
  return wrapHtml(serializeHtml(listing), options, listingPageCss);
}

/// ## generateIndex
///
/// a table of contents for a directory build: every page, and under it
/// every public predicate with its one-line summary.

export interface IndexPage {
  /// output path of the page, relative to the index.
  page: string;
  title: string;
  trees: readonly DocTree[];
}

export function generateIndex(pages: readonly IndexPage[], options: HtmlOptions = {}): string {
  const sorted = [...pages].sort((a, b) => a.page.localeCompare(b.page));
  const body: HtmlElement[] = [h("h1", {}, [options.title ?? "Index"])];

  for (const { page, title, trees } of sorted) {
    const entries: HtmlElement[] = [];
    for (const tree of trees) {
      for (const node of tree.content) {
        if (node.kind !== "predicate" || node.visibility !== "public") continue;
        const [first] = node.signatures;
        if (!first) continue;
        const key = signatureKey(first);
        const summary = summaryOf(node.body);
        entries.push(
          h("li", {}, [h("a", { href: `${page}#${key}` }, [key]), ...(summary !== undefined ? [` ${summary}`] : [])])
        );
      }
    }
    body.push(h("h2", {}, [h("a", { href: page }, [title])]));
    if (entries.length > 0) body.push(h("ul", { class: "index" }, entries));
  }

  return wrapHtml(serializeHtml(body), { ...options, title: options.title ?? "Index" }, defaultCss);
}

/// once the body is rendered we wrap it in a real html document. styles
/// are either inlined (the default, so each page is self-contained) or
/// linked from an external file.

function wrapHtml(body: string, options: HtmlOptions, inlineCss: string): string {
  const title = options.title ?? "predoc";
  const css = options.cssFile ? `<link rel="stylesheet" href="${escapeHtml(options.cssFile)}">` : `<style>${inlineCss}</style>`;
  const indexHref = options.indexHref ?? "index.html";

  /// `/home/user/project/lists.pl` becomes `lists.pl` in the browser tab.
  const displayTitle = title.slice(title.lastIndexOf("/") + 1);

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(displayTitle)}</title>
  ${css}
</head>
<body>
<header class="navhdr">
  <a href="${escapeHtml(indexHref)}" class="navhdr-left">index</a>
  <span class="navhdr-right">predoc</span>
</header>
<div class="doc">
${body}
</div>
</body>
</html>`;
}
