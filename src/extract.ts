/// # comment extraction
///
/// we scan a prolog file line by line, looking for structured comments.
/// two forms count:
///
/// - a run of `%` lines whose first line starts with `%%` or `%!`
/// - a block comment opened by `/**`
///
/// plain `%` and `/*` comments are ordinary comments and are skipped.
///
/// each comment keeps its raw lines (the parser strips the comment
/// markers itself, see `stripComment`) together with where it sits in
/// the source, so a rendered entry can point back at the file.

import { signatureKey } from "./modes.js";
import { matchingClose, splitTopLevel } from "./terms.js";
import { parseIndicator } from "./wiki/inline.js";
import { parse, type ParseContext } from "./wiki/parser.js";
import { indicator, type DocNode, type DocTree, type PredicateNode } from "./wiki/types.js";

export interface StructuredComment {
  /// the comment as written, markers included.
  lines: string[];
  /// offset of the comment's first character in the source, counted in
  /// string characters (utf-16 code units), not bytes.
  offset: number;
  /// how many characters of source the comment spans, its final line
  /// break included.
  length: number;
}

const lineStart = /^%[%!](?:\s|$)/;
const blockStart = /^\/\*\*(?:\s|$)/;

export function extractComments(source: string): StructuredComment[] {
  const comments: StructuredComment[] = [];
  const lines = source.split("\n");

  /// `split("\n")` eats the newlines, so each line starts one character
  /// further on than the lengths alone would say.
  const starts: number[] = [];
  let pos = 0;
  for (const line of lines) {
    starts.push(pos);
    pos += line.length + 1;
  }

  let i = 0;
  while (i < lines.length) {
    const trimmed = lines[i].trimStart();
    const start = i;

    if (lineStart.test(trimmed)) {
      while (i < lines.length && lines[i].trimStart().startsWith("%")) i++;
    } else if (blockStart.test(trimmed)) {
      while (i < lines.length && !(i === start ? trimmed.slice(3) : lines[i]).includes("*/")) i++;
      i = Math.min(i + 1, lines.length);
    } else {
      i++;
      continue;
    }

    const offset = starts[start] + (lines[start].length - trimmed.length);
    const end = i < lines.length ? starts[i] : source.length;
    comments.push({ lines: lines.slice(start, i), offset, length: end - offset });
  }

  return comments;
}

/// ## module declarations

export interface ModuleDeclaration {
  name: string;
  /// exported indicators, as `name/arity` or `name//arity`.
  exports: string[];
}

const moduleHead = /:-\s*module\(\s*([a-z][A-Za-z0-9_]*|'[^']*')\s*,\s*\[/;

/// the `:- module(Name, [...])` directive, if the file has one. export
/// list entries that are not predicate indicators (`op/3` declarations)
/// are ignored.
export function moduleDeclaration(source: string): ModuleDeclaration | undefined {
  const match = moduleHead.exec(source);
  if (!match) return undefined;

  const open = match.index + match[0].length - 1;
  const close = matchingClose(source, open);
  if (close < 0) return undefined;

  const list = source.slice(open + 1, close).replace(/%[^\n]*/g, "");
  const exports: string[] = [];
  for (const item of splitTopLevel(list, ",") ?? []) {
    const ref = parseIndicator(item);
    if (ref) exports.push(indicator(ref.name, ref.arity, ref.ref));
  }

  const name = match[1].startsWith("'") ? match[1].slice(1, -1) : match[1];
  return { name, exports };
}

/// ## documenting a file

function withVisibility(node: DocNode, exported: ReadonlySet<string>): DocNode {
  if (node.kind !== "predicate") return node;
  const isPublic = node.signatures.some(signature => exported.has(signatureKey(signature)));
  const marked: PredicateNode = { ...node, visibility: isPublic ? "public" : "private" };
  return marked;
}

/// one tree per structured comment. in a module file, predicates that
/// are not exported are private; in a file without a module declaration
/// everything is public.
export function documentSource(source: string, file: string, ctx: ParseContext = {}): DocTree[] {
  const declaration = moduleDeclaration(source);
  const exported = new Set(declaration?.exports ?? []);

  return extractComments(source).map(comment => {
    const tree = parse(comment.lines, {
      ...ctx,
      pos: { file, offset: comment.offset },
      ...(declaration ? { module: declaration.name } : {})
    });
    if (!declaration) return tree;
    return { ...tree, content: tree.content.map(node => withVisibility(node, exported)) };
  });
}
