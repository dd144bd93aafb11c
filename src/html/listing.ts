/// # source listings
///
/// a listing is the source file itself, copied into a `<pre>` with each
/// classified fragment wrapped in a `<span>`. the classification comes
/// from outside (see `classifySource` for the shiki-backed one); this
/// module only maps classes to elements and writes the stylesheet.

import { h, type HtmlContent, type HtmlElement } from "./elements.js";

/// `"comment"`, or a nested classification such as
/// `{ name: "goal", arg: "built_in" }` for a call to a built-in.
export type Classification = string | { name: string; arg?: Classification };

export interface Fragment {
  start: number;
  end: number;
  classification: Classification;
  children?: Fragment[];
}

/// `goal(built_in)` → `goal-built_in`.
export function cssClass(classification: Classification): string {
  if (typeof classification === "string") return classification;
  if (classification.arg === undefined) return classification.name;
  return `${classification.name}-${cssClass(classification.arg)}`;
}

function renderRange(source: string, fragments: readonly Fragment[], from: number, to: number): HtmlContent[] {
  const out: HtmlContent[] = [];
  let pos = from;

  const sorted = [...fragments].sort((a, b) => a.start - b.start);
  for (const fragment of sorted) {
    /// overlapping or out-of-range fragments are dropped; their text is
    /// still copied as part of the surrounding range.
    if (fragment.start < pos || fragment.end > to || fragment.end <= fragment.start) continue;

    if (fragment.start > pos) {
      out.push(source.slice(pos, fragment.start));
    }
    out.push(
      h("span", { class: cssClass(fragment.classification) }, renderRange(source, fragment.children ?? [], fragment.start, fragment.end))
    );
    pos = fragment.end;
  }

  if (pos < to) {
    out.push(source.slice(pos, to));
  }
  return out;
}

export function renderListing(source: string, fragments: readonly Fragment[]): HtmlElement {
  return h("pre", { class: "listing" }, renderRange(source, fragments, 0, source.length));
}

/// ## stylesheet

export interface ListingStyle {
  color?: string;
  background?: string;
  underline?: boolean;
  bold?: boolean;
  italic?: boolean;
}

export const defaultListingStyles: Record<string, ListingStyle> = {
  "comment-line": { color: "#6a737d", italic: true },
  "comment-block": { color: "#6a737d", italic: true },
  "string-quoted": { color: "#032f62" },
  "constant-numeric": { color: "#005cc5" },
  "constant-other": { color: "#005cc5" },
  "variable-parameter": { color: "#e36209" },
  "variable-other": { color: "#e36209" },
  "keyword-operator": { color: "#d73a49" },
  "keyword-control": { color: "#d73a49", bold: true },
  "entity-name": { color: "#6f42c1" },
  "support-function": { color: "#005cc5" }
};

function declarations(style: ListingStyle): [string, string][] {
  const decls: [string, string][] = [];
  if (style.color) decls.push(["color", style.color]);
  if (style.background) decls.push(["background-color", style.background]);
  if (style.underline) decls.push(["text-decoration", "underline"]);
  if (style.bold) decls.push(["font-weight", "bold"]);
  if (style.italic) decls.push(["font-style", "italic"]);
  return decls;
}

/// one rule per class:
///
/// ```
/// span.comment-line
/// { color: #6a737d;
///   font-style: italic;
/// }
/// ```
export function listingCss(styles: Record<string, ListingStyle> = defaultListingStyles): string {
  let css = "";
  for (const [name, style] of Object.entries(styles)) {
    const [first, ...rest] = declarations(style);
    if (!first) continue;
    css += `span.${name}\n{ ${first[0]}: ${first[1]};\n`;
    for (const [prop, value] of rest) {
      css += `  ${prop}: ${value};\n`;
    }
    css += "}\n\n";
  }
  return css;
}
