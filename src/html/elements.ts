/// # html elements
///
/// the html backend builds a small element tree instead of strings, so
/// that containers such as the predicate `<dl>` can be opened and filled
/// later. `serializeHtml` turns the tree into text at the very end.

export interface HtmlElement {
  tag: string;
  attrs: Record<string, string>;
  children: HtmlContent[];
}

/// plain strings are text and get escaped on output.
export type HtmlContent = HtmlElement | string;

export function h(tag: string, attrs: Record<string, string> = {}, children: HtmlContent[] = []): HtmlElement {
  return { tag, attrs, children };
}

const voidTags = new Set(["br", "hr", "img", "input", "link", "meta"]);

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function isElement(content: HtmlElement | readonly HtmlContent[]): content is HtmlElement {
  return "tag" in content;
}

export function serializeHtml(content: HtmlContent | readonly HtmlContent[]): string {
  if (typeof content === "string") return escapeHtml(content);
  if (!isElement(content)) return content.map(item => serializeHtml(item)).join("");

  const attrs = Object.entries(content.attrs)
    .map(([name, value]) => ` ${name}="${escapeHtml(value)}"`)
    .join("");

  if (voidTags.has(content.tag)) return `<${content.tag}${attrs}>`;
  return `<${content.tag}${attrs}>${serializeHtml(content.children)}</${content.tag}>`;
}

/// the text of a tree with all markup removed.
export function textContent(content: HtmlContent | readonly HtmlContent[]): string {
  if (typeof content === "string") return content;
  if (!isElement(content)) return content.map(item => textContent(item)).join("");
  return textContent(content.children);
}
