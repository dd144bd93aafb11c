/// # wiki parser
///
/// turns the lines of one structured comment into a `DocTree`. the
/// parser is line-oriented: each line is classified by its leading
/// marker, the first rule that matches wins, and runs of lines of the
/// same kind are gathered into one block.
///
/// it never fails. markup that does not close is kept as text, and an
/// empty comment gives an empty tree.

import { defaultOperators, parseModeLine, type OperatorTable, type Signature } from "../modes.js";
import { parseCompound } from "../terms.js";
import { parseInline, type InlineContext } from "./inline.js";
import type {
  DescriptionItem,
  DocNode,
  DocTree,
  ParamEntry,
  SourcePos,
  TagNode,
  TagSectionNode,
  TermNode,
  Visibility
} from "./types.js";

export interface ParseContext extends InlineContext {
  pos?: SourcePos;
  /// module the documented predicates belong to.
  module?: string;
  /// visibility given to a predicate comment. defaults to public.
  visibility?: Visibility;
  operators?: OperatorTable;
}

/// ## comment prefixes
///
/// the opening delimiter decides how each line is un-commented:
///
/// - `%%` or `%!`: every line loses its run of `%` characters. the
///   leading `%%`/`%!` lines are the mode lines.
/// - `/**`: the delimiters go, the first line is taken as written.
/// - anything else is already plain text.
///
/// after that the common indentation is removed, so a comment reads the
/// same wherever it sits in the source.

export type CommentStyle = "line" | "block" | "plain";

export interface StrippedComment {
  style: CommentStyle;
  /// mode-line candidates of a `%%` comment.
  modeLines: string[];
  lines: string[];
}

const tabWidth = 8;

export function expandTabs(line: string): string {
  if (!line.includes("\t")) return line;
  let out = "";
  for (const c of line) {
    if (c === "\t") {
      out += " ".repeat(tabWidth - (out.length % tabWidth));
    } else {
      out += c;
    }
  }
  return out;
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export function unindent(lines: readonly string[]): string[] {
  const expanded = lines.map(line => expandTabs(line).trimEnd());
  const indents = expanded.filter(line => !isBlank(line)).map(indentOf);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return expanded.map(line => line.slice(common));
}

export function stripComment(raw: readonly string[]): StrippedComment {
  if (raw.length === 0) return { style: "plain", modeLines: [], lines: [] };

  const first = raw[0].trimStart();

  if (first.startsWith("%%") || first.startsWith("%!")) {
    const modeLines: string[] = [];
    let i = 0;
    while (i < raw.length) {
      const line = raw[i].trimStart();
      if (!line.startsWith("%%") && !line.startsWith("%!")) break;
      modeLines.push(line.slice(2).trim());
      i++;
    }
    const body = raw.slice(i).map(line => line.trimStart().replace(/^%+/, ""));
    return { style: "line", modeLines, lines: unindent(body) };
  }

  if (first.startsWith("/**")) {
    const lines = [first.slice(3), ...raw.slice(1)];
    const last = lines.length - 1;
    const close = lines[last].lastIndexOf("*/");
    if (close >= 0) {
      lines[last] = lines[last].slice(0, close);
    }
    const head = lines[0].trim();
    const rest = unindent(lines.slice(1));
    return { style: "block", modeLines: [], lines: head === "" ? rest : [head, ...rest] };
  }

  return { style: "plain", modeLines: [], lines: unindent(raw) };
}

/// ## line classification

type LineKind = "blank" | "fence" | "heading" | "tag" | "list" | "description" | "code" | "text";

const fence = /^==\s*$/;
const headingPattern = /^(?:---(\+{1,4})|(#{1,4}))\s+(.*)$/;
const tagPattern = /^@([A-Za-z_][A-Za-z0-9_]*)(?:\s+([\s\S]*))?$/;
const listPattern = /^([*-]|\d+\.)(\s+)(.*)$/;
const descriptionPattern = /^\$\s+(.*?)\s*:(?:\s+(.*))?$/;
const headingLevels = [1, 2, 3, 4] as const;

function classify(line: string, allowTags: boolean): LineKind {
  if (isBlank(line)) return "blank";
  const text = line.trimStart();
  if (indentOf(line) >= 4) return "code";
  if (fence.test(text)) return "fence";
  if (headingPattern.test(text)) return "heading";
  if (allowTags && tagPattern.test(text)) return "tag";
  if (listPattern.test(text)) return "list";
  if (descriptionPattern.test(text)) return "description";
  return "text";
}

interface Marker {
  ordered: boolean;
  text: string;
  /// column where the item text starts.
  column: number;
}

function listMarker(line: string): Marker | undefined {
  const indent = indentOf(line);
  const match = listPattern.exec(line.slice(indent));
  if (!match) return undefined;
  return {
    ordered: match[1] !== "*" && match[1] !== "-",
    text: match[3],
    column: indent + match[1].length + match[2].length
  };
}

function nextNonBlank(lines: readonly string[], from: number): number {
  for (let k = from; k < lines.length; k++) {
    if (!isBlank(lines[k])) return k;
  }
  return -1;
}

/// a list item's first block is usually a single paragraph; its inline
/// content goes straight into the item.
function unwrapLeadingParagraph(blocks: DocNode[]): DocNode[] {
  const [first, ...rest] = blocks;
  if (first?.kind === "paragraph") {
    return [...first.content, ...rest];
  }
  return blocks;
}

/// ## block scanner

interface BlockResult {
  blocks: DocNode[];
  tags?: TagSectionNode;
}

class BlockParser {
  private i = 0;
  private readonly blocks: DocNode[] = [];

  constructor(
    private readonly lines: readonly string[],
    private readonly ctx: ParseContext,
    private readonly allowTags: boolean
  ) {}

  run(): BlockResult {
    while (this.i < this.lines.length) {
      const line = this.lines[this.i];
      switch (classify(line, this.allowTags)) {
        case "blank":
          this.i++;
          break;
        case "fence":
          this.fencedCode();
          break;
        case "heading":
          this.heading(line.trimStart());
          break;
        case "tag":
          return { blocks: this.blocks, tags: this.tagSection() };
        case "list":
          this.list(indentOf(line));
          break;
        case "description":
          this.descriptionList(indentOf(line));
          break;
        case "code":
          this.indentedCode();
          break;
        case "text":
          this.paragraph();
          break;
      }
    }
    return { blocks: this.blocks };
  }

  private inline(text: string): DocNode[] {
    return parseInline(text, this.ctx);
  }

  private nested(lines: readonly string[]): DocNode[] {
    return unwrapLeadingParagraph(new BlockParser(lines, this.ctx, false).run().blocks);
  }

  private heading(text: string): void {
    const match = headingPattern.exec(text);
    this.i++;
    if (!match) return;
    const marks = match[1] ?? match[2] ?? "+";
    this.blocks.push({
      kind: "heading",
      level: headingLevels[Math.min(marks.length, 4) - 1],
      content: this.inline(match[3].trim())
    });
  }

  private paragraph(): void {
    const texts = [this.lines[this.i].trim()];
    this.i++;
    while (this.i < this.lines.length && classify(this.lines[this.i], this.allowTags) === "text") {
      texts.push(this.lines[this.i].trim());
      this.i++;
    }
    this.blocks.push({ kind: "paragraph", content: this.inline(texts.join("\n")) });
  }

  /// verbatim between `==` lines. an unclosed fence runs to the end.
  private fencedCode(): void {
    const start = ++this.i;
    while (this.i < this.lines.length && !fence.test(this.lines[this.i].trim())) {
      this.i++;
    }
    const body = unindent(this.lines.slice(start, this.i));
    this.i++;
    this.blocks.push({ kind: "codeBlock", text: body.join("\n") });
  }

  /// lines indented by four or more, up to the first line that is not.
  /// blank lines inside stay; trailing ones do not.
  private indentedCode(): void {
    const start = this.i;
    let end = this.i;
    while (this.i < this.lines.length) {
      const line = this.lines[this.i];
      if (isBlank(line)) {
        this.i++;
        continue;
      }
      if (indentOf(line) < 4) break;
      this.i++;
      end = this.i;
    }
    this.i = end;
    this.blocks.push({ kind: "codeBlock", text: unindent(this.lines.slice(start, end)).join("\n") });
  }

  /// a blank line ends a list unless the next text continues it: another
  /// item at the same indent, or a line indented under the item.
  private continuesAfterBlank(base: number, sameItem: (line: string) => boolean): boolean {
    const k = nextNonBlank(this.lines, this.i);
    if (k < 0) return false;
    const next = this.lines[k];
    return sameItem(next) || indentOf(next) > base;
  }

  private list(base: number): void {
    const first = listMarker(this.lines[this.i]);
    if (!first) {
      this.paragraph();
      return;
    }

    const isItem = (line: string) => {
      const marker = listMarker(line);
      return marker !== undefined && indentOf(line) === base && marker.ordered === first.ordered;
    };

    const items: { marker: Marker; lines: string[] }[] = [];

    while (this.i < this.lines.length) {
      const line = this.lines[this.i];

      if (isBlank(line)) {
        if (!this.continuesAfterBlank(base, isItem)) break;
        items[items.length - 1]?.lines.push("");
        this.i++;
        continue;
      }

      const marker = listMarker(line);
      if (marker && isItem(line)) {
        items.push({ marker, lines: [] });
      } else if (indentOf(line) > base && items.length > 0) {
        const current = items[items.length - 1];
        current.lines.push(line.slice(Math.min(current.marker.column, indentOf(line))));
      } else {
        break;
      }
      this.i++;
    }

    this.blocks.push({
      kind: "list",
      ordered: first.ordered,
      items: items.map(item => this.nested([item.marker.text, ...trimTrailingBlank(item.lines)]))
    });
  }

  private descriptionList(base: number): void {
    const isItem = (line: string) => indentOf(line) === base && descriptionPattern.test(line.trimStart());
    const items: { term: string; first: string; lines: string[] }[] = [];

    while (this.i < this.lines.length) {
      const line = this.lines[this.i];

      if (isBlank(line)) {
        if (!this.continuesAfterBlank(base, isItem)) break;
        items[items.length - 1]?.lines.push("");
        this.i++;
        continue;
      }

      const match = isItem(line) ? descriptionPattern.exec(line.trimStart()) : null;
      if (match) {
        items.push({ term: match[1], first: match[2] ?? "", lines: [] });
      } else if (indentOf(line) > base && items.length > 0) {
        items[items.length - 1].lines.push(line);
      } else {
        break;
      }
      this.i++;
    }

    const described: DescriptionItem[] = items.map(item => {
      const body = unindent(trimTrailingBlank(item.lines));
      return {
        term: parseTerm(item.term),
        body: this.nested(item.first === "" ? body : [item.first, ...body])
      };
    });
    this.blocks.push({ kind: "descriptionList", items: described });
  }

  /// everything from the first `@tag` line on. lines that are not tags
  /// continue the value of the tag above them.
  private tagSection(): TagSectionNode {
    const raw: { keyword: string; text: string }[] = [];

    for (; this.i < this.lines.length; this.i++) {
      const line = this.lines[this.i].trim();
      if (line === "") continue;
      const match = tagPattern.exec(line);
      if (match) {
        raw.push({ keyword: match[1], text: match[2] ?? "" });
      } else if (raw.length > 0) {
        const current = raw[raw.length - 1];
        current.text = current.text === "" ? line : `${current.text}\n${line}`;
      }
    }

    const params: ParamEntry[] = [];
    const tags: TagNode[] = [];

    for (const { keyword, text } of raw) {
      const param = keyword === "param" ? /^(\S+)(?:\s+([\s\S]*))?$/.exec(text) : null;
      if (param) {
        params.push({ name: param[1], description: this.inline(param[2] ?? "") });
      } else {
        tags.push({ kind: "tag", keyword, value: this.inline(text) });
      }
    }

    const section: TagSectionNode = { kind: "tagSection", tags };
    if (params.length > 0) {
      section.params = { kind: "paramList", entries: params };
    }
    return section;
  }
}

function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && isBlank(lines[end - 1])) end--;
  return lines.slice(0, end);
}

function parseTerm(text: string): TermNode {
  const term = parseCompound(text);
  if (term) return { kind: "term", name: term.name, args: term.args };
  return { kind: "term", name: text.trim(), args: [] };
}

/// ## entry point

const moduleHeader = /^<module>\s*(.*)$/;

export function parseBlocks(lines: readonly string[], ctx: ParseContext = {}): DocNode[] {
  const { blocks, tags } = new BlockParser(lines, ctx, true).run();
  return tags ? [...blocks, tags] : blocks;
}

export function parse(lines: readonly string[], ctx: ParseContext = {}): DocTree {
  const comment = stripComment(lines);
  const operators = ctx.operators ?? defaultOperators;
  const signatures: Signature[] = [];
  let body = comment.lines;

  const tree: DocTree = { kind: "doc", content: [] };
  if (ctx.pos) tree.pos = ctx.pos;

  const header = body.length > 0 ? moduleHeader.exec(body[0]) : null;
  if (header) {
    const title = header[1].trim();
    const content = parseBlocks(body.slice(1), ctx);
    tree.content = title === "" ? content : [{ kind: "heading", level: 1, content: parseInline(title, ctx) }, ...content];
    return tree;
  }

  if (comment.style === "line") {
    const prose: string[] = [];
    for (const line of comment.modeLines) {
      const sig = parseModeLine(line, operators);
      if (sig) signatures.push(sig);
      else prose.push(line);
    }
    body = [...prose, ...body];
  } else {
    let k = 0;
    while (k < body.length && !isBlank(body[k])) {
      const sig = parseModeLine(body[k], operators);
      if (!sig) break;
      signatures.push(sig);
      k++;
    }
    body = body.slice(k);
  }

  const content = parseBlocks(body, ctx);

  if (signatures.length === 0) {
    tree.content = content;
    return tree;
  }

  tree.content = [
    {
      kind: "predicate",
      signatures,
      visibility: ctx.visibility ?? "public",
      ...(ctx.module !== undefined ? { module: ctx.module } : {}),
      body: content
    }
  ];
  return tree;
}
