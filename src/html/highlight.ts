/// # code highlighting
///
/// code blocks inside comments are prolog, and shiki ships a prolog
/// grammar. loading grammars is expensive, so the highlighter is created
/// once by `initHighlighter` and reused; until then code is rendered as
/// plain escaped text.

import type { HighlighterGeneric, BundledLanguage, BundledTheme } from "shiki";
import { h, type HtmlContent } from "./elements.js";
import type { Fragment } from "./listing.js";

const theme = "github-light";
const language = "prolog";

let highlighter: HighlighterGeneric<BundledLanguage, BundledTheme> | null = null;

export async function initHighlighter(): Promise<void> {
  if (highlighter) return;
  const { createHighlighter } = await import("shiki");
  highlighter = await createHighlighter({
    themes: [theme],
    langs: [language]
  });
}

export function isHighlighterReady(): boolean {
  return highlighter !== null;
}

/// coloured spans for one code block. the theme's default foreground
/// (#24292e) is left off so the surrounding css decides it.
export function highlightCode(code: string): HtmlContent[] {
  if (!highlighter) return [code];

  const { tokens } = highlighter.codeToTokens(code, { lang: language, theme });
  const out: HtmlContent[] = [];

  tokens.forEach((line, index) => {
    if (index > 0) out.push("\n");
    for (const token of line) {
      if (token.color && token.color.toLowerCase() !== "#24292e") {
        out.push(h("span", { style: `color:${token.color}` }, [token.content]));
      } else {
        out.push(token.content);
      }
    }
  });

  return out;
}

/// shiki as the classifier behind source listings. each token becomes a
/// fragment named after its innermost textmate scope, minus the language
/// suffix: `comment.line.percentage.prolog` → `comment-line`. tokens
/// with only the root scope are left unclassified.
export function classifySource(source: string): Fragment[] {
  if (!highlighter) return [];

  const { tokens } = highlighter.codeToTokens(source, { lang: language, theme, includeExplanation: true });
  const fragments: Fragment[] = [];

  for (const line of tokens) {
    for (const token of line) {
      const scopes = token.explanation?.[0]?.scopes ?? [];
      const innermost = scopes[scopes.length - 1]?.scopeName;
      if (innermost === undefined || scopes.length < 2) continue;

      const [name, detail] = innermost.split(".").filter(part => part !== language);
      if (name === undefined) continue;

      fragments.push({
        start: token.offset,
        end: token.offset + token.content.length,
        classification: detail !== undefined ? { name, arg: detail } : name
      });
    }
  }

  return fragments;
}
