/// # summaries
///
/// the first sentence of a description, used as the one-line summary in
/// link titles and the registry. a sentence ends at a period followed by
/// whitespace or the end of the text, unless the period follows another
/// period (`...`) or closes an abbreviation such as `Dr.` or `e.g.`.

import { plainText, type DocNode } from "./types.js";

const titleAbbreviation = /^[A-Z][a-z]?$/;
const dottedAbbreviation = /^[A-Za-z](\.[A-Za-z])+$/;

function wordBefore(text: string, end: number): string {
  let start = end;
  while (start > 0 && !/\s/.test(text[start - 1])) start--;
  return text.slice(start, end).replace(/^[("'[]+/, "");
}

function endsSentence(text: string, i: number): boolean {
  if (text[i] !== ".") return false;
  if (i + 1 < text.length && !/\s/.test(text[i + 1])) return false;
  if (i > 0 && text[i - 1] === ".") return false;

  const word = wordBefore(text, i);
  return !titleAbbreviation.test(word) && !dottedAbbreviation.test(word);
}

export function normaliseSpace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function summary(text: string): string {
  for (let i = 0; i < text.length; i++) {
    if (endsSentence(text, i)) {
      return normaliseSpace(text.slice(0, i + 1));
    }
  }
  return normaliseSpace(text);
}

/// summary of the first paragraph in a block list, if there is one.
export function summaryOf(nodes: readonly DocNode[]): string | undefined {
  const first = nodes.find(node => node.kind === "paragraph");
  if (!first) return undefined;
  const text = summary(plainText([first]));
  return text === "" ? undefined : text;
}
