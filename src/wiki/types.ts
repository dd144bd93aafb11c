/// # document tree
///
/// the parser's output and the only thing the backends ever look at.
/// the union is closed: every backend switches over `kind` exhaustively,
/// so adding a variant here is a compile error everywhere it is not yet
/// rendered.

import type { Signature } from "../modes.js";

export interface HeadingNode {
  kind: "heading";
  level: 1 | 2 | 3 | 4;
  content: DocNode[];
}

export interface ParagraphNode {
  kind: "paragraph";
  content: DocNode[];
}

export interface ListNode {
  kind: "list";
  ordered: boolean;
  items: DocNode[][];
}

/// the term of a `$ foo(X, Y): ...` description item. an atom term has
/// no args.
export interface TermNode {
  kind: "term";
  name: string;
  args: string[];
}

export interface DescriptionItem {
  term: TermNode;
  body: DocNode[];
}

export interface DescriptionListNode {
  kind: "descriptionList";
  items: DescriptionItem[];
}

export interface CodeBlockNode {
  kind: "codeBlock";
  text: string;
}

export interface InlineCodeNode {
  kind: "inlineCode";
  text: string;
}

export interface EmphasisNode {
  kind: "emphasis";
  style: "bold" | "italic";
  content: DocNode[];
}

export interface LinkNode {
  kind: "link";
  target: string;
  content: DocNode[];
}

export interface TextNode {
  kind: "text";
  text: string;
}

export type RefKind = "predicate" | "dcg";

export interface PredicateRefNode {
  kind: "predicateRef";
  name: string;
  arity: number;
  ref: RefKind;
}

export interface TagNode {
  kind: "tag";
  keyword: string;
  value: DocNode[];
}

export interface ParamEntry {
  name: string;
  description: DocNode[];
}

export interface ParamListNode {
  kind: "paramList";
  entries: ParamEntry[];
}

/// the `@tag` lines that close a comment. `@param` entries are pulled
/// into `params`; everything else keeps its written order.
export interface TagSectionNode {
  kind: "tagSection";
  params?: ParamListNode;
  tags: TagNode[];
}

export type Visibility = "public" | "private";

/// a documented predicate: one or more mode lines and the description
/// that follows them.
export interface PredicateNode {
  kind: "predicate";
  signatures: Signature[];
  visibility: Visibility;
  module?: string;
  body: DocNode[];
}

export type DocNode =
  | HeadingNode
  | ParagraphNode
  | ListNode
  | DescriptionListNode
  | CodeBlockNode
  | InlineCodeNode
  | EmphasisNode
  | LinkNode
  | TextNode
  | PredicateRefNode
  | TagNode
  | ParamListNode
  | TagSectionNode
  | PredicateNode;

/// where a comment came from. only used to name anchors and registry
/// locations, never to make parsing decisions.
export interface SourcePos {
  file: string;
  offset: number;
}

export interface DocTree {
  kind: "doc";
  content: DocNode[];
  pos?: SourcePos;
}

/// a node that reached a backend with a kind it does not know. this can
/// only happen for trees built outside the parser (e.g. read from json).
export interface Diagnostic {
  backend: "html" | "latex";
  nodeKind: string;
  message: string;
}

export type DiagnosticHandler = (diagnostic: Diagnostic) => void;

export const warnDiagnostic: DiagnosticHandler = d => {
  console.warn(`[${d.backend}] ${d.message}`);
};

export function unknownKind(node: unknown): string {
  if (typeof node === "object" && node !== null && "kind" in node) {
    return String(node.kind);
  }
  return typeof node;
}

/// cross-reference syntax: `name/arity` or `name//arity` for grammar rules.
export function indicator(name: string, arity: number, ref: RefKind): string {
  return `${name}${ref === "dcg" ? "//" : "/"}${arity}`;
}

/// the plain text of an inline run, with markup dropped.
export function plainText(nodes: readonly DocNode[]): string {
  let text = "";
  for (const node of nodes) {
    switch (node.kind) {
      case "text":
      case "inlineCode":
        text += node.text;
        break;
      case "emphasis":
      case "link":
      case "paragraph":
      case "heading":
        text += plainText(node.content);
        break;
      case "predicateRef":
        text += indicator(node.name, node.arity, node.ref);
        break;
      default:
        break;
    }
  }
  return text;
}
