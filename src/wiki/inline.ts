/// # inline markup
///
/// the spans that can appear inside a paragraph, list item or tag value:
///
/// - `` `code` ``
/// - `*bold*` and `_italic_`
/// - `[[name/2]]`, `[[name//1]]` and `[[file.pl]]` cross-references
/// - bare `name/2` when the caller knows a predicate by that name
///
/// anything that does not close properly is kept as the literal text.

import type { DocNode, RefKind } from "./types.js";

export interface InlineContext {
  /// decides whether a bare `name/arity` in running text is a reference.
  /// without it, only the bracketed `[[name/arity]]` form links.
  isKnown?: (name: string, arity: number, ref: RefKind) => boolean;
}

const wordChar = /[A-Za-z0-9_]/;
const space = /\s/;
const indicatorPattern = /^([a-z][A-Za-z0-9_]*|'[^']*')(\/\/?)(\d+)$/;
const barePattern = /^([a-z][A-Za-z0-9_]*)(\/\/?)(\d+)/;

/// `foo/2` → predicate ref, `foo//1` → grammar rule ref.
export function parseIndicator(text: string): { name: string; arity: number; ref: RefKind } | undefined {
  const match = indicatorPattern.exec(text.trim());
  if (!match) return undefined;
  const name = match[1].startsWith("'") ? match[1].slice(1, -1) : match[1];
  return { name, arity: Number(match[3]), ref: match[2] === "//" ? "dcg" : "predicate" };
}

function isWordChar(c: string | undefined): boolean {
  return c !== undefined && wordChar.test(c);
}

/// index of the marker closing an emphasis span opened at `open`, or -1.
/// the closing marker must follow a non-space and not precede a word
/// character, so `snake_case_names` stay plain.
function closingMarker(text: string, open: number, marker: string): number {
  for (let j = open + 2; j < text.length; j++) {
    if (text[j] !== marker) continue;
    if (space.test(text[j - 1])) continue;
    if (isWordChar(text[j + 1])) continue;
    return j;
  }
  return -1;
}

export function parseInline(text: string, ctx: InlineContext = {}): DocNode[] {
  const nodes: DocNode[] = [];
  let buffer = "";

  const flush = () => {
    if (buffer.length > 0) {
      nodes.push({ kind: "text", text: buffer });
      buffer = "";
    }
  };

  let i = 0;
  while (i < text.length) {
    const c = text[i];
    const prev = i > 0 ? text[i - 1] : undefined;

    if (c === "`") {
      const end = text.indexOf("`", i + 1);
      if (end > i + 1 && !text.slice(i + 1, end).includes("\n")) {
        flush();
        nodes.push({ kind: "inlineCode", text: text.slice(i + 1, end) });
        i = end + 1;
        continue;
      }
    }

    if (c === "[" && text[i + 1] === "[") {
      const end = text.indexOf("]]", i + 2);
      const inner = end >= 0 ? text.slice(i + 2, end).trim() : "";
      if (inner !== "" && !inner.includes("\n")) {
        flush();
        const ref = parseIndicator(inner);
        if (ref) {
          nodes.push({ kind: "predicateRef", ...ref });
        } else {
          nodes.push({ kind: "link", target: inner, content: [{ kind: "text", text: inner }] });
        }
        i = end + 2;
        continue;
      }
      buffer += "[[";
      i += 2;
      continue;
    }

    if ((c === "*" || c === "_") && !isWordChar(prev) && prev !== c) {
      const next = text[i + 1];
      if (next !== undefined && !space.test(next) && next !== c) {
        const end = closingMarker(text, i, c);
        if (end > 0) {
          flush();
          nodes.push({
            kind: "emphasis",
            style: c === "*" ? "bold" : "italic",
            content: parseInline(text.slice(i + 1, end), ctx)
          });
          i = end + 1;
          continue;
        }
      }
    }

    if (ctx.isKnown && !isWordChar(prev) && /[a-z]/.test(c)) {
      const match = barePattern.exec(text.slice(i));
      if (match) {
        const after = text[i + match[0].length];
        const ref: RefKind = match[2] === "//" ? "dcg" : "predicate";
        const arity = Number(match[3]);
        if (!isWordChar(after) && after !== "/" && ctx.isKnown(match[1], arity, ref)) {
          flush();
          nodes.push({ kind: "predicateRef", name: match[1], arity, ref });
          i += match[0].length;
          continue;
        }
      }
    }

    buffer += c;
    i++;
  }

  flush();
  return nodes;
}
